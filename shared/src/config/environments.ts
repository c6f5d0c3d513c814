import type { EnvironmentConfig, EnvironmentName } from '../types/environment.js';
import { SIGIL } from '../constants.js';

export const devConfig: EnvironmentConfig = {
  environment: 'dev',
  features: {
    honeypotEnabled: true,
    sigilEnabled: false,
  },
  form: {
    timeZone: 'UTC',
    seedDefaultHoneypots: true,
    sigilName: SIGIL.DEFAULT_NAME,
  },
};

export const betaConfig: EnvironmentConfig = {
  environment: 'beta',
  features: {
    honeypotEnabled: true,
    sigilEnabled: true,
  },
  form: {
    timeZone: 'UTC',
    seedDefaultHoneypots: true,
    sigilName: SIGIL.DEFAULT_NAME,
  },
};

export const prodConfig: EnvironmentConfig = {
  environment: 'prod',
  features: {
    honeypotEnabled: true,
    sigilEnabled: true,
  },
  form: {
    timeZone: 'UTC',
    seedDefaultHoneypots: true,
    sigilName: SIGIL.DEFAULT_NAME,
  },
};

const configs: Record<EnvironmentName, EnvironmentConfig> = {
  dev: devConfig,
  beta: betaConfig,
  prod: prodConfig,
};

function isEnvironmentName(env: string): env is EnvironmentName {
  return Object.hasOwn(configs, env);
}

export function getEnvironmentConfig(env: string): EnvironmentConfig {
  if (!isEnvironmentName(env)) {
    throw new Error(`Unknown environment: ${env}. Valid: dev, beta, prod`);
  }
  return configs[env];
}
