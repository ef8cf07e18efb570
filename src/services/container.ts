/**
 * Wires the services of the receiver function from its configuration.
 *
 * AWS clients are created once per cold start and reused across
 * invocations. Services are built on first use, so a missing setting only
 * fails the route or message that needs it.
 */

import { CloudWatchClient } from '@aws-sdk/client-cloudwatch';
import { S3Client } from '@aws-sdk/client-s3';
import { SecretsManagerClient } from '@aws-sdk/client-secrets-manager';
import { SQSClient } from '@aws-sdk/client-sqs';
import { puppeteerSessionFactory } from '../acquisition/browser-session';
import { localWorkspaceFactory } from '../acquisition/download-workspace';
import { PollingVideoAcquirer } from '../acquisition/video-acquirer';
import { AppConfig, requireSetting } from '../config/config';
import { Logger } from '../utils/logger';
import { CloudWatchMetrics, MetricsPublisher } from '../utils/metrics';
import { AlarmProcessor } from './alarm-processor';
import { AlarmQueue, SqsAlarmQueue } from './alarm-queue';
import { CachedCredentialsProvider, CredentialsProvider, secretsManagerSource } from './credentials';
import { DeviceRegistry } from './device-registry';
import { IngestionService } from './ingestion';
import { ObjectStore, S3ObjectStore } from './object-store';
import { RequestRouter } from './router';
import { EventVideoFinder, LatestVideoFinder } from './video-finder';

const NAVIGATION_TIMEOUT_MS = 60_000;

export interface AwsClients {
  s3: S3Client;
  sqs: SQSClient;
  secrets: SecretsManagerClient;
  cloudwatch: CloudWatchClient;
}

export function createAwsClients(): AwsClients {
  return {
    s3: new S3Client({}),
    sqs: new SQSClient({}),
    secrets: new SecretsManagerClient({}),
    cloudwatch: new CloudWatchClient({}),
  };
}

function memoize<T>(build: () => T): () => T {
  let built: { value: T } | undefined;
  return () => {
    if (!built) {
      built = { value: build() };
    }
    return built.value;
  };
}

/**
 * Services of one invocation. Stateful pieces (credentials cache, device
 * registry) are shared through the ServiceContainer that created them.
 */
export interface InvocationServices {
  router: RequestRouter;
  processor: () => AlarmProcessor;
}

export class ServiceContainer {
  readonly devices: () => DeviceRegistry;
  readonly credentials: () => CredentialsProvider;

  constructor(
    readonly config: AppConfig,
    private readonly clients: AwsClients,
    private readonly baseLogger: Logger
  ) {
    this.devices = memoize(() => DeviceRegistry.fromJson(config.deviceMetadataJson, baseLogger));
    this.credentials = memoize(
      () =>
        new CachedCredentialsProvider(
          secretsManagerSource(clients.secrets, requireSetting(config, 'credentialsSecretArn'), baseLogger),
          config.credentialsTtlSeconds * 1000
        )
    );
  }

  metrics(logger: Logger): MetricsPublisher {
    return new CloudWatchMetrics(this.clients.cloudwatch, this.config.metricsNamespace, logger);
  }

  store(logger: Logger): ObjectStore {
    return new S3ObjectStore(this.clients.s3, requireSetting(this.config, 'storageBucket'), logger);
  }

  queue(logger: Logger): AlarmQueue {
    return new SqsAlarmQueue(
      this.clients.sqs,
      requireSetting(this.config, 'alarmQueueUrl'),
      this.config.alarmDlqUrl,
      logger
    );
  }

  forInvocation(logger: Logger): InvocationServices {
    const config = this.config;
    const metrics = this.metrics(logger);
    const store = memoize(() => this.store(logger));
    const finderOptions = { timeZone: config.timeZone, signedUrlExpirySeconds: config.signedUrlExpirySeconds };

    const router = new RequestRouter({
      ingestion: memoize(
        () =>
          new IngestionService(this.queue(logger), metrics, logger, {
            processingDelaySeconds: config.processingDelaySeconds,
          })
      ),
      latestVideoFinder: memoize(
        () => new LatestVideoFinder(store(), logger, { ...finderOptions, searchDays: config.latestSearchDays })
      ),
      eventVideoFinder: memoize(
        () => new EventVideoFinder(store(), logger, { ...finderOptions, searchDays: config.eventSearchDays })
      ),
      metrics,
      logger,
    });

    const processor = memoize(() => {
      const devices = this.devices();
      const acquirer = new PollingVideoAcquirer(
        puppeteerSessionFactory(devices, { executablePath: config.chromiumPath, navigationTimeoutMs: NAVIGATION_TIMEOUT_MS }, logger),
        localWorkspaceFactory(config.downloadDirectory),
        logger
      );

      return new AlarmProcessor(
        { store: store(), acquirer, credentials: this.credentials(), devices, metrics, logger },
        {
          timeZone: config.timeZone,
          videoTimeoutMs: config.videoDownloadTimeoutMs,
          pollIntervalMs: config.videoPollIntervalMs,
        }
      );
    });

    return { router, processor };
  }
}
