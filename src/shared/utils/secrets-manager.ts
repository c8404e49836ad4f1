// AWS Secrets Manager integration for the unsubscribe signing secret
import { SecretsManagerClient, GetSecretValueCommand } from '@aws-sdk/client-secrets-manager';
import { config } from './environment';
import { ConfigurationError, errorMessage } from './error-handling';

const DEFAULT_SECRET_NAME = 'design-pipeline/unsubscribe';

let cachedSecret: string | undefined;

/**
 * Retrieves the unsubscribe secret from AWS Secrets Manager
 */
export async function getUnsubscribeSecretFromSecretsManager(
  secretName: string = process.env.UNSUBSCRIBE_SECRET_NAME || DEFAULT_SECRET_NAME,
  client: SecretsManagerClient = new SecretsManagerClient({ region: config.regions.primary })
): Promise<string> {
  const response = await client.send(new GetSecretValueCommand({ SecretId: secretName }));

  if (!response.SecretString) {
    throw new ConfigurationError('Secret value is empty', { secretName });
  }

  // Either a plain string or {"UNSUBSCRIBE_SECRET": "..."}
  try {
    const parsed: unknown = JSON.parse(response.SecretString);
    if (parsed !== null && typeof parsed === 'object' && 'UNSUBSCRIBE_SECRET' in parsed) {
      const value = parsed.UNSUBSCRIBE_SECRET;
      if (typeof value === 'string' && value !== '') {
        return value;
      }
    }
  } catch (error) {
    console.log('Secret is not JSON, using it verbatim', { secretName, reason: errorMessage(error) });
  }

  return response.SecretString;
}

/**
 * Gets the unsubscribe secret, trying Secrets Manager first when enabled
 */
export async function getUnsubscribeSecretWithFallback(): Promise<string> {
  if (cachedSecret) {
    return cachedSecret;
  }

  if (process.env.USE_SECRETS_MANAGER === 'true') {
    try {
      cachedSecret = await getUnsubscribeSecretFromSecretsManager();
      return cachedSecret;
    } catch (error) {
      console.warn('Failed to get unsubscribe secret from Secrets Manager, falling back to environment variables', {
        error: errorMessage(error)
      });
    }
  }

  const secret = process.env.UNSUBSCRIBE_SECRET;
  if (!secret || secret.trim() === '') {
    throw new ConfigurationError('Unsubscribe secret not found in Secrets Manager or environment variables', {
      setting: 'UNSUBSCRIBE_SECRET'
    });
  }

  cachedSecret = secret;
  return cachedSecret;
}

/**
 * Forgets the cached secret so the next call reads it again
 */
export function resetUnsubscribeSecretCache(): void {
  cachedSecret = undefined;
}
