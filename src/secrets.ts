import { GetSecretValueCommand, SecretsManagerClient } from '@aws-sdk/client-secrets-manager';
import { z } from 'zod';
import { SecretAccessError } from './errors.js';

export type SecretStringLoader = (secretId: string) => Promise<string | undefined>;

export function secretsManagerLoader(region: string, client = new SecretsManagerClient({ region })): SecretStringLoader {
  return async (secretId) => {
    const res = await client.send(new GetSecretValueCommand({ SecretId: secretId }));
    return res.SecretString;
  };
}

/**
 * Read one field of a JSON secret, e.g. `{"GNEWS_API_KEY": "..."}`.
 * Every failure surfaces as `SecretAccessError`.
 */
export async function getSecretValue(secretId: string, field: string, load: SecretStringLoader): Promise<string> {
  let raw: string | undefined;
  try {
    raw = await load(secretId);
  } catch (error) {
    throw new SecretAccessError(secretId, error);
  }
  if (!raw) {
    throw new SecretAccessError(secretId, new Error('secret has no string value'));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new SecretAccessError(secretId, error);
  }

  const fields = z.record(z.unknown()).safeParse(parsed);
  const value = fields.success ? fields.data[field] : undefined;
  if (typeof value !== 'string' || !value) {
    throw new SecretAccessError(secretId, new Error(`field "${field}" is missing`));
  }
  return value;
}
