import {
  SecretsManagerClient,
  GetSecretValueCommand,
} from '@aws-sdk/client-secrets-manager';
import { ConfigError, toError } from './errors.js';

/**
 * Fetch a JSON object of configuration keys (JAMF_URL, JAMF_USERNAME, ...)
 * from AWS Secrets Manager. Non-string values are dropped.
 */
export async function fetchSecrets(
  secretName: string,
  region?: string,
): Promise<Record<string, string>> {
  const client = new SecretsManagerClient({ region: region ?? 'us-east-1' });

  let secretString: string;
  try {
    const result = await client.send(
      new GetSecretValueCommand({ SecretId: secretName }),
    );
    if (!result.SecretString) {
      throw new ConfigError('Secret has no string value', {
        context: { secretName },
      });
    }
    secretString = result.SecretString;
  } catch (err) {
    if (err instanceof ConfigError) throw err;
    throw new ConfigError(`Failed to fetch secret: ${secretName}`, {
      context: { secretName },
      cause: toError(err),
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(secretString);
  } catch (err) {
    throw new ConfigError('Secret contains invalid JSON', {
      context: { secretName },
      cause: toError(err),
    });
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError('Secret is not a JSON object', {
      context: { secretName },
    });
  }

  const values: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === 'string') values[key] = value;
  }
  return values;
}
