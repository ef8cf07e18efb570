/**
 * Credentials for the video system.
 *
 * The provider memoizes one fetch per process and shares the in-flight
 * promise between concurrent callers. Cached values expire after `ttlMs` and
 * can be dropped early with `invalidate()`, which the processor does after the
 * video system rejects them. A failed fetch is never cached.
 */

import { GetSecretValueCommand, SecretsManagerClient } from '@aws-sdk/client-secrets-manager';
import { Credentials } from '../types/alarm';
import { CredentialsError } from '../utils/errors';
import { isNonEmptyString, isRecord, optionalString } from '../utils/guards';
import { Logger, describeError } from '../utils/logger';

export interface CredentialsProvider {
  getCredentials(): Promise<Credentials>;
  invalidate(): void;
}

export type CredentialsSource = () => Promise<Credentials>;

export class CachedCredentialsProvider implements CredentialsProvider {
  private cached?: { value: Promise<Credentials>; expiresAt: number };

  /**
   * @param ttlMs - 0 keeps the credentials for the life of the process
   */
  constructor(
    private readonly source: CredentialsSource,
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  getCredentials(): Promise<Credentials> {
    if (this.cached && (this.ttlMs === 0 || this.now() < this.cached.expiresAt)) {
      return this.cached.value;
    }

    const entry: { value: Promise<Credentials>; expiresAt: number } = {
      value: this.source().catch((error: unknown) => {
        if (this.cached === entry) {
          this.cached = undefined;
        }
        throw error;
      }),
      expiresAt: this.now() + this.ttlMs,
    };
    this.cached = entry;

    return entry.value;
  }

  invalidate(): void {
    this.cached = undefined;
  }
}

/**
 * Parses the secret JSON `{hostname, username, password, apiKey?}`.
 */
export function parseCredentials(secretString: string): Credentials {
  let parsed: unknown;
  try {
    parsed = JSON.parse(secretString);
  } catch (error) {
    throw new CredentialsError('Credentials secret is not valid JSON', { cause: error });
  }

  if (!isRecord(parsed)) {
    throw new CredentialsError('Credentials secret must be a JSON object');
  }

  for (const field of ['hostname', 'username', 'password'] as const) {
    if (!isNonEmptyString(parsed[field])) {
      throw new CredentialsError(`${field} is required in the credentials secret`);
    }
  }

  return {
    hostname: String(parsed.hostname),
    username: String(parsed.username),
    password: String(parsed.password),
    apiKey: optionalString(parsed.apiKey),
  };
}

export function secretsManagerSource(
  client: SecretsManagerClient,
  secretArn: string,
  logger: Logger
): CredentialsSource {
  return async () => {
    try {
      const response = await client.send(new GetSecretValueCommand({ SecretId: secretArn }));
      if (!response.SecretString) {
        throw new CredentialsError('Credentials secret has no string value');
      }
      const credentials = parseCredentials(response.SecretString);
      logger.info('Loaded video system credentials', { hostname: credentials.hostname });
      return credentials;
    } catch (error) {
      logger.error('Error retrieving credentials from Secrets Manager', describeError(error));
      throw error instanceof CredentialsError
        ? error
        : new CredentialsError('Failed to retrieve credentials', { cause: error });
    }
  };
}
