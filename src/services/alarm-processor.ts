/**
 * Delayed processor: consumes the alarm queue once the delay has passed.
 *
 * Each message is recorded first (metadata, thumbnail), then its video is
 * fetched. Keys are derived from the alarm alone, so a redelivered message
 * overwrites the same objects with the same bytes.
 */

import { SQSBatchResponse, SQSEvent, SQSRecord } from 'aws-lambda';
import { VideoAcquirer } from '../acquisition/video-acquirer';
import { AlarmRecord, Credentials, Trigger } from '../types/alarm';
import { AcquisitionAuthError, ServiceError } from '../utils/errors';
import { deriveKeys, fileName, formatLocalDateTime } from '../utils/key-scheme';
import { Logger, describeError } from '../utils/logger';
import { MetricsPublisher } from '../utils/metrics';
import { validateQueuedAlarm } from '../utils/validation';
import { CredentialsProvider } from './credentials';
import { DeviceRegistry } from './device-registry';
import { ObjectStore } from './object-store';

export type ProcessingStatus = 'Recorded' | 'VideoStored' | 'Dropped' | 'Failed';

export interface ProcessorOptions {
  timeZone?: string;
  videoTimeoutMs: number;
  pollIntervalMs: number;
}

export interface ProcessorDependencies {
  store: ObjectStore;
  acquirer: VideoAcquirer;
  credentials: CredentialsProvider;
  devices: DeviceRegistry;
  metrics: MetricsPublisher;
  logger: Logger;
}

const DATA_URL_PREFIX = /^data:[^,]*;base64,/;

/**
 * Link to the event page on the video system. Hostnames are stored without a
 * scheme, so https is assumed unless one is given.
 */
export function buildEventLink(hostname: string, eventPath: string): string {
  const base = /^https?:\/\//i.test(hostname) ? hostname : `https://${hostname}`;
  return base.replace(/\/+$/, '') + (eventPath.startsWith('/') ? eventPath : `/${eventPath}`);
}

export function decodeThumbnail(thumbnail: string): Buffer {
  return Buffer.from(thumbnail.replace(DATA_URL_PREFIX, ''), 'base64');
}

export class AlarmProcessor {
  constructor(
    private readonly deps: ProcessorDependencies,
    private readonly options: ProcessorOptions
  ) {}

  /**
   * Processes records one at a time. A failed record is reported back so SQS
   * redelivers only that message; the rest of the batch still completes.
   */
  async processBatch(event: SQSEvent): Promise<SQSBatchResponse> {
    const response: SQSBatchResponse = { batchItemFailures: [] };

    for (const record of event.Records) {
      try {
        await this.processMessage(record);
      } catch (error) {
        this.deps.logger.error('Failed to process alarm message', {
          messageId: record.messageId,
          receiveCount: record.attributes.ApproximateReceiveCount,
          ...describeError(error),
        });
        response.batchItemFailures.push({ itemIdentifier: record.messageId });
      }
    }

    return response;
  }

  /**
   * Malformed messages are logged and dropped: redelivery cannot fix them.
   */
  async processMessage(record: SQSRecord): Promise<ProcessingStatus> {
    const logger = this.deps.logger.child({ messageId: record.messageId });

    let body: unknown;
    try {
      body = JSON.parse(record.body);
    } catch (error) {
      logger.error('Dropping message with unparseable body', describeError(error));
      await this.deps.metrics.count('AlarmsProcessed', { Status: 'Dropped' });
      return 'Dropped';
    }

    const result = validateQueuedAlarm(body);
    if (!result.isValid) {
      logger.error('Dropping invalid alarm message', { reason: result.rejectionReason, error: result.error });
      await this.deps.metrics.count('AlarmsProcessed', { Status: 'Dropped' });
      return 'Dropped';
    }

    return this.processAlarm(result.alarm, logger);
  }

  async processAlarm(alarm: AlarmRecord, parentLogger: Logger = this.deps.logger): Promise<ProcessingStatus> {
    const startTime = Date.now();
    const [first] = alarm.triggers;
    const logger = parentLogger.child({ eventId: first.eventId });
    const { metrics } = this.deps;

    try {
      const credentials = await this.deps.credentials.getCredentials();
      const keys = deriveKeys(first.eventId, first.device, alarm.timestamp, this.options.timeZone);
      const enriched = this.enrich(alarm, credentials, keys.metadataKey, keys.videoKey);

      await this.deps.store.putJson(keys.metadataKey, JSON.stringify(enriched));
      logger.info('Stored alarm metadata', { metadataKey: keys.metadataKey });

      if (first.thumbnail) {
        await this.storeThumbnail(first.thumbnail, keys.thumbnailKey, logger);
      }

      let status: ProcessingStatus = 'Recorded';
      if (enriched.eventLocalLink) {
        const video = await this.acquireVideo(enriched.eventLocalLink, credentials, enriched.triggers[0], logger);
        await this.deps.store.putBinary(keys.videoKey, video, 'video/mp4');
        await metrics.count('VideosStored');
        logger.info('Stored alarm video', { videoKey: keys.videoKey, size: video.length });
        status = 'VideoStored';
      } else {
        logger.info('Alarm has no event path, skipping video');
      }

      await metrics.count('AlarmsProcessed', { Status: status });
      return status;
    } catch (error) {
      await metrics.count('AlarmsProcessed', { Status: 'Failed' });
      throw error;
    } finally {
      await metrics.duration('ProcessingDuration', Date.now() - startTime);
    }
  }

  // Returns a copy; the input alarm is left as received
  private enrich(alarm: AlarmRecord, credentials: Credentials, metadataKey: string, videoKey: string): AlarmRecord {
    const [first, ...rest] = alarm.triggers;
    const trigger: Trigger = {
      ...first,
      date: formatLocalDateTime(alarm.timestamp, this.options.timeZone),
      deviceName: this.deps.devices.getDeviceName(first.device),
      eventKey: fileName(metadataKey),
      videoKey,
    };

    return {
      ...alarm,
      triggers: [trigger, ...rest],
      ...(alarm.eventPath ? { eventLocalLink: buildEventLink(credentials.hostname, alarm.eventPath) } : {}),
    };
  }

  private async storeThumbnail(thumbnail: string, thumbnailKey: string, logger: Logger): Promise<void> {
    try {
      const image = decodeThumbnail(thumbnail);
      if (image.length === 0) {
        logger.warn('Thumbnail is empty, skipping', { thumbnailKey });
        return;
      }
      await this.deps.store.putBinary(thumbnailKey, image, 'image/jpeg');
    } catch (error) {
      logger.warn('Failed to store thumbnail', { thumbnailKey, ...describeError(error) });
    }
  }

  private async acquireVideo(url: string, credentials: Credentials, trigger: Trigger, logger: Logger): Promise<Buffer> {
    try {
      return await this.deps.acquirer.fetch(url, credentials, {
        trigger,
        timeoutMs: this.options.videoTimeoutMs,
        pollIntervalMs: this.options.pollIntervalMs,
      });
    } catch (error) {
      if (error instanceof AcquisitionAuthError) {
        this.deps.credentials.invalidate();
      }
      const reason = error instanceof ServiceError ? error.code : 'UNKNOWN';
      await this.deps.metrics.count('VideoAcquisitionFailures', { Reason: reason });
      logger.error('Video acquisition failed, message will be retried', { reason, ...describeError(error) });
      throw error;
    }
  }
}
