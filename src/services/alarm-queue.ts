/**
 * Delay queue carrying canonical alarms from ingestion to the processor.
 */

import {
  GetQueueAttributesCommand,
  SendMessageCommand,
  SendMessageCommandInput,
  SQSClient,
} from '@aws-sdk/client-sqs';
import { AlarmRecord, QueueMessageAttributes } from '../types/alarm';
import { QueueError } from '../utils/errors';
import { Logger, describeError } from '../utils/logger';

export interface AlarmQueue {
  // Resolves the queue's message id
  enqueue(alarm: AlarmRecord, delaySeconds: number): Promise<string>;
  getDlqDepth(): Promise<number>;
}

export function messageAttributesFor(alarm: AlarmRecord): QueueMessageAttributes {
  const [trigger] = alarm.triggers;
  return {
    eventId: trigger.eventId,
    device: trigger.device,
    timestamp: alarm.timestamp,
  };
}

/**
 * Builds the SendMessage request: the serialized alarm plus the triage
 * attributes, so a dead-lettered message can be identified without reading
 * its body.
 */
export function toSendMessageInput(queueUrl: string, alarm: AlarmRecord, delaySeconds: number): SendMessageCommandInput {
  const attributes = messageAttributesFor(alarm);

  return {
    QueueUrl: queueUrl,
    MessageBody: JSON.stringify(alarm),
    DelaySeconds: delaySeconds,
    MessageAttributes: {
      EventId: { DataType: 'String', StringValue: attributes.eventId },
      Device: { DataType: 'String', StringValue: attributes.device },
      Timestamp: { DataType: 'Number', StringValue: String(attributes.timestamp) },
    },
  };
}

export class SqsAlarmQueue implements AlarmQueue {
  constructor(
    private readonly client: Pick<SQSClient, 'send'>,
    private readonly queueUrl: string,
    private readonly dlqUrl: string | undefined,
    private readonly logger: Logger
  ) {}

  async enqueue(alarm: AlarmRecord, delaySeconds: number): Promise<string> {
    const input = toSendMessageInput(this.queueUrl, alarm, delaySeconds);

    try {
      const result = await this.client.send(new SendMessageCommand(input));
      if (!result.MessageId) {
        throw new Error('SQS returned no MessageId');
      }
      return result.MessageId;
    } catch (error) {
      this.logger.error('Failed to queue alarm', { ...messageAttributesFor(alarm), ...describeError(error) });
      throw new QueueError('Failed to queue alarm for processing', { cause: error });
    }
  }

  // Messages waiting in the dead-letter queue; 0 when no DLQ is configured
  async getDlqDepth(): Promise<number> {
    if (!this.dlqUrl) {
      return 0;
    }

    return getQueueDepth(this.client, this.dlqUrl);
  }
}

// Approximate number of visible messages in a queue
export async function getQueueDepth(client: Pick<SQSClient, 'send'>, queueUrl: string): Promise<number> {
  const response = await client.send(
    new GetQueueAttributesCommand({
      QueueUrl: queueUrl,
      AttributeNames: ['ApproximateNumberOfMessages'],
    })
  );
  return parseInt(response.Attributes?.ApproximateNumberOfMessages || '0', 10);
}
