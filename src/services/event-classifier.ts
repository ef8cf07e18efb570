/**
 * Classifies what invoked the receiver function.
 *
 * One function serves API Gateway, the SQS delay queue and the keep-alive
 * schedule. The kind is decided from the structure of the invocation object
 * and handed on as a discriminated union, so nothing downstream re-inspects
 * the raw payload.
 */

import { APIGatewayProxyEvent, EventBridgeEvent, SQSEvent } from 'aws-lambda';
import { isRecord } from '../utils/guards';

export type Invocation =
  | { kind: 'ScheduledPing'; event: EventBridgeEvent<string, unknown> }
  | { kind: 'QueueBatch'; event: SQSEvent }
  | { kind: 'HttpRequest'; event: APIGatewayProxyEvent }
  | { kind: 'Unrecognized' };

export type InvocationKind = Invocation['kind'];

export const SCHEDULED_EVENT_SOURCE = 'aws.events';
export const SQS_EVENT_SOURCE = 'aws:sqs';

function isScheduledEvent(event: Record<string, unknown>): event is Record<string, unknown> & EventBridgeEvent<string, unknown> {
  return event.source === SCHEDULED_EVENT_SOURCE && typeof event['detail-type'] === 'string';
}

function isSqsEvent(event: Record<string, unknown>): event is Record<string, unknown> & SQSEvent {
  const records = event.Records;
  return (
    Array.isArray(records) &&
    records.length > 0 &&
    records.every((record) => isRecord(record) && record.eventSource === SQS_EVENT_SOURCE)
  );
}

function isHttpEvent(event: Record<string, unknown>): event is Record<string, unknown> & APIGatewayProxyEvent {
  return typeof event.httpMethod === 'string' && typeof event.path === 'string';
}

export function classifyInvocation(event: unknown): Invocation {
  if (!isRecord(event)) {
    return { kind: 'Unrecognized' };
  }

  if (isScheduledEvent(event)) {
    return { kind: 'ScheduledPing', event };
  }

  if (isSqsEvent(event)) {
    return { kind: 'QueueBatch', event };
  }

  if (isHttpEvent(event)) {
    return { kind: 'HttpRequest', event };
  }

  return { kind: 'Unrecognized' };
}
