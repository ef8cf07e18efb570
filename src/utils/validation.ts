/**
 * Alarm payload validation
 *
 * Turns the raw webhook envelope into a canonical AlarmRecord. Pure: no I/O.
 */

import { AlarmRecord, Condition, SourceRef, Trigger } from '../types/alarm';
import { ValidationReason } from './errors';
import { isNonEmptyString, isRecord, optionalString } from './guards';

export const ERROR_MISSING_BODY = 'you must have a valid body object in your request';
export const ERROR_MISSING_TRIGGERS = 'you must have triggers in your payload';

export type ValidationResult =
  | { isValid: true; alarm: AlarmRecord }
  | { isValid: false; error: string; rejectionReason: ValidationReason };

// Validates the millisecond timestamp carried by the envelope
export function isValidTimestamp(timestamp: unknown): timestamp is number {
  return typeof timestamp === 'number' && Number.isSafeInteger(timestamp) && timestamp >= 0;
}

function toTrigger(raw: Record<string, unknown>): Trigger | undefined {
  if (!isNonEmptyString(raw.key) || !isNonEmptyString(raw.device) || !isNonEmptyString(raw.eventId)) {
    return undefined;
  }

  const trigger: Trigger = {
    key: raw.key,
    device: raw.device,
    eventId: raw.eventId,
  };

  const thumbnail = optionalString(raw.thumbnail);
  if (thumbnail) {
    trigger.thumbnail = thumbnail;
  }

  return trigger;
}

function toSources(raw: unknown): SourceRef[] | undefined {
  if (!Array.isArray(raw)) {
    return undefined;
  }

  return raw.filter(isRecord).map((source) => ({
    device: String(source.device ?? ''),
    type: String(source.type ?? ''),
  }));
}

function toConditions(raw: unknown): Condition[] | undefined {
  if (!Array.isArray(raw)) {
    return undefined;
  }

  return raw.filter(isRecord).map((condition) => ({
    type: optionalString(condition.type),
    source: optionalString(condition.source),
  }));
}

/**
 * Validates a webhook envelope `{ alarm, timestamp }`.
 *
 * The envelope timestamp is authoritative and overwrites any timestamp found
 * inside the nested alarm object. Only the first trigger is used for keying,
 * so it must carry `key`, `device` and `eventId`; later triggers missing them
 * are dropped.
 */
export function validateAlarmPayload(raw: unknown): ValidationResult {
  if (!isRecord(raw) || !isRecord(raw.alarm)) {
    return {
      isValid: false,
      error: ERROR_MISSING_BODY,
      rejectionReason: 'MissingBody',
    };
  }

  const alarm = raw.alarm;
  const rawTriggers: unknown = alarm.triggers;

  if (!Array.isArray(rawTriggers) || rawTriggers.length === 0) {
    return {
      isValid: false,
      error: ERROR_MISSING_TRIGGERS,
      rejectionReason: 'MissingTriggers',
    };
  }

  const [first, ...rest]: unknown[] = rawTriggers;
  const canonical = isRecord(first) ? toTrigger(first) : undefined;
  if (!canonical) {
    return {
      isValid: false,
      error: 'the first trigger must have a key, device and eventId',
      rejectionReason: 'InvalidTrigger',
    };
  }

  const timestamp = raw.timestamp;
  if (!isValidTimestamp(timestamp)) {
    return {
      isValid: false,
      error: 'timestamp must be a non-negative integer of milliseconds since epoch',
      rejectionReason: 'InvalidTimestamp',
    };
  }

  const triggers = [canonical];
  for (const candidate of rest) {
    const trigger = isRecord(candidate) ? toTrigger(candidate) : undefined;
    if (trigger) {
      triggers.push(trigger);
    }
  }

  const record: AlarmRecord = {
    name: optionalString(alarm.name),
    sources: toSources(alarm.sources),
    conditions: toConditions(alarm.conditions),
    triggers,
    timestamp,
    eventPath: isNonEmptyString(alarm.eventPath) ? alarm.eventPath : undefined,
  };

  return { isValid: true, alarm: record };
}

/**
 * Validates an alarm that already went through the queue. The queued body is
 * the canonical record itself, so its own timestamp is authoritative.
 */
export function validateQueuedAlarm(raw: unknown): ValidationResult {
  if (!isRecord(raw)) {
    return validateAlarmPayload(raw);
  }

  return validateAlarmPayload({ alarm: raw, timestamp: raw.timestamp });
}

/**
 * Recognizes an alarm record as stored by the processor, enrichment fields
 * included, without rebuilding it.
 */
export function isAlarmRecord(value: unknown): value is AlarmRecord {
  return (
    isRecord(value) &&
    isValidTimestamp(value.timestamp) &&
    Array.isArray(value.triggers) &&
    value.triggers.length > 0 &&
    value.triggers.every(
      (trigger) =>
        isRecord(trigger) &&
        isNonEmptyString(trigger.key) &&
        isNonEmptyString(trigger.device) &&
        isNonEmptyString(trigger.eventId)
    )
  );
}
