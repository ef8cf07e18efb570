/**
 * Webhook ingestion: validate, queue for delayed processing, acknowledge.
 *
 * The webhook sender never waits for the video. Once an alarm is queued every
 * later failure is handled by queue redelivery and the dead-letter queue.
 */

import { AlarmRecord, IngestAck } from '../types/alarm';
import { ValidationError } from '../utils/errors';
import { Logger } from '../utils/logger';
import { MetricsPublisher } from '../utils/metrics';
import { validateAlarmPayload } from '../utils/validation';
import { AlarmQueue, messageAttributesFor } from './alarm-queue';

export interface IngestionOptions {
  processingDelaySeconds: number;
  now?: () => Date;
}

function formatUtc(date: Date): string {
  return date.toISOString().replace('T', ' ').replace(/\.\d{3}Z$/, ' UTC');
}

export class IngestionService {
  private readonly now: () => Date;

  constructor(
    private readonly queue: AlarmQueue,
    private readonly metrics: MetricsPublisher,
    private readonly logger: Logger,
    private readonly options: IngestionOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Validates a parsed webhook envelope and returns the canonical alarm.
   * @throws ValidationError
   */
  async validate(envelope: unknown): Promise<AlarmRecord> {
    const result = validateAlarmPayload(envelope);

    if (!result.isValid) {
      this.logger.warn('Validation error', { reason: result.rejectionReason, error: result.error });
      await this.metrics.count('AlarmsRejected', { Reason: result.rejectionReason });
      throw new ValidationError(result.rejectionReason, result.error);
    }

    return result.alarm;
  }

  async ingest(envelope: unknown): Promise<IngestAck> {
    const alarm = await this.validate(envelope);
    const { eventId, device } = messageAttributesFor(alarm);
    const delaySeconds = this.options.processingDelaySeconds;

    const messageId = await this.queue.enqueue(alarm, delaySeconds);
    await this.metrics.count('AlarmsQueued');

    this.logger.info('Queued alarm for delayed processing', { eventId, device, delaySeconds, messageId });

    return {
      msg: 'Alarm event has been queued for processing',
      eventId,
      device,
      processingDelay: delaySeconds,
      messageId,
      estimatedProcessingTime: formatUtc(new Date(this.now().getTime() + delaySeconds * 1000)),
    };
  }
}
