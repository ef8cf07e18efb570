/**
 * Runtime configuration read from the Lambda environment.
 *
 * Optional settings fall back to defaults here. Required settings stay
 * undefined until the service that needs them asks through `requireSetting`,
 * so a function that never touches the queue can run without its URL.
 */

import { ConfigurationError } from '../utils/errors';

export interface AppConfig {
  functionName: string;
  storageBucket?: string;
  alarmQueueUrl?: string;
  alarmDlqUrl?: string;
  credentialsSecretArn?: string;
  credentialsTtlSeconds: number;
  processingDelaySeconds: number;
  deviceMetadataJson?: string;
  downloadDirectory: string;
  timeZone?: string;
  latestSearchDays: number;
  eventSearchDays: number;
  signedUrlExpirySeconds: number;
  videoPollIntervalMs: number;
  videoDownloadTimeoutMs: number;
  chromiumPath?: string;
  metricsNamespace: string;
}

type Env = Record<string, string | undefined>;

// SQS accepts per-message delays of 0 to 900 seconds
const MAX_DELAY_SECONDS = 900;

function readInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

function readString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readTimeZone(env: Env): string | undefined {
  const timeZone = readString(env, 'TIME_ZONE');
  if (!timeZone) {
    return undefined;
  }

  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
  } catch (error) {
    throw new ConfigurationError(`TIME_ZONE "${timeZone}" is not a valid IANA time zone`, { cause: error });
  }
  return timeZone;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    functionName: readString(env, 'FUNCTION_NAME') ?? env.AWS_LAMBDA_FUNCTION_NAME ?? 'alarm-video-receiver',
    storageBucket: readString(env, 'STORAGE_BUCKET'),
    alarmQueueUrl: readString(env, 'ALARM_QUEUE_URL'),
    alarmDlqUrl: readString(env, 'ALARM_DLQ_URL'),
    credentialsSecretArn: readString(env, 'CREDENTIALS_SECRET_ARN'),
    credentialsTtlSeconds: readInt(env, 'CREDENTIALS_TTL_SECONDS', 3600),
    processingDelaySeconds: Math.min(readInt(env, 'PROCESSING_DELAY_SECONDS', 120), MAX_DELAY_SECONDS),
    deviceMetadataJson: readString(env, 'DEVICE_METADATA'),
    downloadDirectory: readString(env, 'DOWNLOAD_DIRECTORY') ?? '/tmp',
    timeZone: readTimeZone(env),
    latestSearchDays: readInt(env, 'LATEST_SEARCH_DAYS', 30),
    eventSearchDays: readInt(env, 'EVENT_SEARCH_DAYS', 90),
    signedUrlExpirySeconds: readInt(env, 'SIGNED_URL_EXPIRY_SECONDS', 3600),
    videoPollIntervalMs: readInt(env, 'VIDEO_POLL_INTERVAL_MS', 1000),
    videoDownloadTimeoutMs: readInt(env, 'VIDEO_DOWNLOAD_TIMEOUT_MS', 100_000),
    chromiumPath: readString(env, 'CHROMIUM_PATH'),
    metricsNamespace: readString(env, 'METRICS_NAMESPACE') ?? 'AlarmVideoService',
  };
}

type OptionalSetting = {
  [K in keyof AppConfig]-?: undefined extends AppConfig[K] ? K : never;
}[keyof AppConfig];

const SETTING_NAMES: Record<OptionalSetting, string> = {
  storageBucket: 'STORAGE_BUCKET',
  alarmQueueUrl: 'ALARM_QUEUE_URL',
  alarmDlqUrl: 'ALARM_DLQ_URL',
  credentialsSecretArn: 'CREDENTIALS_SECRET_ARN',
  deviceMetadataJson: 'DEVICE_METADATA',
  timeZone: 'TIME_ZONE',
  chromiumPath: 'CHROMIUM_PATH',
};

/**
 * Returns a deployment setting or throws ConfigurationError naming the
 * environment variable that is missing.
 */
export function requireSetting<K extends OptionalSetting>(config: AppConfig, key: K): NonNullable<AppConfig[K]> {
  const value = config[key];
  if (value === undefined || value === null) {
    throw new ConfigurationError(`${SETTING_NAMES[key]} environment variable is not configured`);
  }
  return value;
}
