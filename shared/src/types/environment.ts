export type EnvironmentName = 'dev' | 'beta' | 'prod';

export interface FeatureFlags {
  honeypotEnabled: boolean;
  sigilEnabled: boolean;
}

export interface FormConfig {
  /** IANA zone used to cut the hourly obfuscation buckets. */
  timeZone: string;
  seedDefaultHoneypots: boolean;
  sigilName: string;
}

export interface EnvironmentConfig {
  environment: EnvironmentName;
  features: FeatureFlags;
  form: FormConfig;
}
