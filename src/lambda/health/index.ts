/**
 * Health Check Lambda Function
 * Checks the storage bucket and the dead-letter queue of the alarm pipeline
 */

import { S3Client } from '@aws-sdk/client-s3';
import { SQSClient } from '@aws-sdk/client-sqs';
import { APIGatewayProxyResult } from 'aws-lambda';
import { loadConfig, requireSetting } from '../../config/config';
import { getQueueDepth } from '../../services/alarm-queue';
import { ObjectStore, S3ObjectStore } from '../../services/object-store';
import { ComponentHealth, HealthCheckResponse } from '../../types/alarm';
import { Logger, describeError } from '../../utils/logger';
import { jsonResponse } from '../../utils/http';

// More dead-lettered alarms than this means videos are being lost
export const DLQ_DEGRADED_THRESHOLD = 10;

export interface HealthDependencies {
  store: () => ObjectStore;
  // Resolves the dead-letter queue depth; omitted when no DLQ is configured
  dlqDepth?: () => Promise<number>;
  logger: Logger;
}

async function checkStorageHealth(deps: HealthDependencies): Promise<ComponentHealth> {
  try {
    await deps.store().checkAccess();
    return 'healthy';
  } catch (error) {
    deps.logger.error('Error checking storage health', describeError(error));
    return 'unhealthy';
  }
}

async function checkDlqHealth(
  dlqDepth: () => Promise<number>,
  logger: Logger
): Promise<{ status: ComponentHealth; depth: number }> {
  try {
    const depth = await dlqDepth();
    return { status: depth > DLQ_DEGRADED_THRESHOLD ? 'degraded' : 'healthy', depth };
  } catch (error) {
    // An unreadable DLQ does not fail the health check
    logger.error('Error checking DLQ health', describeError(error));
    return { status: 'healthy', depth: 0 };
  }
}

export function createHealthHandler(deps: HealthDependencies) {
  return async (): Promise<APIGatewayProxyResult> => {
    const [storage, dlqHealth] = await Promise.all([
      checkStorageHealth(deps),
      deps.dlqDepth ? checkDlqHealth(deps.dlqDepth, deps.logger) : Promise.resolve(undefined),
    ]);

    const response: HealthCheckResponse = {
      status: storage === 'unhealthy' ? 'unhealthy' : dlqHealth?.status === 'degraded' ? 'degraded' : 'healthy',
      components: { storage },
    };

    if (dlqHealth) {
      response.components.dlq = dlqHealth.status;
      response.components.dlqDepth = dlqHealth.depth;
    }

    deps.logger.info('Health check completed', response);
    return jsonResponse(200, response);
  };
}

const config = loadConfig();
const logger = new Logger({ functionName: config.functionName });
const sqsClient = new SQSClient({});
const s3Client = new S3Client({});
const dlqUrl = config.alarmDlqUrl;

export const handler = createHealthHandler({
  store: () => new S3ObjectStore(s3Client, requireSetting(config, 'storageBucket'), logger),
  dlqDepth: dlqUrl ? () => getQueueDepth(sqsClient, dlqUrl) : undefined,
  logger,
});
