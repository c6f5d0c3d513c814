import { SSMClient, GetParameterCommand } from '@aws-sdk/client-ssm';
import { getEnvironmentConfig, type EnvironmentConfig } from '@formveil/shared';

const env = process.env.ENVIRONMENT || 'dev';

export const config: EnvironmentConfig = getEnvironmentConfig(env);

let formSecretCache: string | undefined;

// Key for wire-name obfuscation. Must stay stable across instances, or a form
// rendered by one container will not validate on another.
export async function getFormSecret(): Promise<string> {
  if (formSecretCache) return formSecretCache;
  const paramName = process.env.FORM_SECRET_PARAM;
  if (!paramName) throw new Error('FORM_SECRET_PARAM env var is required');
  const ssm = new SSMClient({});
  const res = await ssm.send(new GetParameterCommand({ Name: paramName, WithDecryption: true }));
  if (!res.Parameter?.Value) throw new Error('Form secret not found in SSM');
  formSecretCache = res.Parameter.Value;
  return formSecretCache;
}
