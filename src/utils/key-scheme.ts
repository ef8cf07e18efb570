/**
 * Storage key scheme and the canonical time zone policy.
 *
 * Every artifact of one alarm shares the stem `{eventId}_{device}_{timestamp}`
 * inside the day folder of the alarm time. All day and date arithmetic in the
 * service goes through this module so that ingestion, processing and lookups
 * bucket an instant into the same day. `timeZone` is an IANA zone name; when
 * it is undefined the process local zone is used.
 */

import { StorageKeyPair } from '../types/alarm';

export const METADATA_EXTENSION = '.json';
export const VIDEO_EXTENSION = '.mp4';
export const THUMBNAIL_EXTENSION = '.jpg';

const DAY_MS = 24 * 60 * 60 * 1000;

interface CalendarParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

function calendarParts(instant: Date, timeZone?: string): CalendarParts {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hourCycle: 'h23',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
  });

  const parts: Record<string, number> = {};
  for (const part of formatter.formatToParts(instant)) {
    if (part.type !== 'literal') {
      parts[part.type] = Number(part.value);
    }
  }

  return {
    year: parts.year,
    month: parts.month,
    day: parts.day,
    hour: parts.hour,
    minute: parts.minute,
    second: parts.second,
  };
}

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

function formatDate(parts: Pick<CalendarParts, 'year' | 'month' | 'day'>): string {
  return `${pad(parts.year, 4)}-${pad(parts.month)}-${pad(parts.day)}`;
}

/**
 * Day folder (`YYYY-MM-DD`) holding everything stored for an instant.
 */
export function formatDayFolder(timestampMillis: number, timeZone?: string): string {
  return formatDate(calendarParts(new Date(timestampMillis), timeZone));
}

// `YYYY-MM-DDTHH:mm:ss` wall-clock time, stored on the trigger
export function formatLocalDateTime(timestampMillis: number, timeZone?: string): string {
  const parts = calendarParts(new Date(timestampMillis), timeZone);
  return `${formatDate(parts)}T${pad(parts.hour)}:${pad(parts.minute)}:${pad(parts.second)}`;
}

// `YYYY-MM-DD HH:mm:ss` wall-clock time, returned by the query routes
export function formatDisplayDateTime(timestampMillis: number, timeZone?: string): string {
  return formatLocalDateTime(timestampMillis, timeZone).replace('T', ' ');
}

/**
 * Day folders starting at the calendar day of `now` and walking back one day
 * at a time. Uses calendar arithmetic, so DST transitions never skip or
 * repeat a day.
 */
export function previousDayFolders(now: Date, count: number, timeZone?: string): string[] {
  const today = calendarParts(now, timeZone);
  const anchor = Date.UTC(today.year, today.month - 1, today.day);
  const folders: string[] = [];

  for (let offset = 0; offset < count; offset++) {
    folders.push(formatDayFolder(anchor - offset * DAY_MS, 'UTC'));
  }

  return folders;
}

export function keyStem(eventId: string, device: string, timestampMillis: number, timeZone?: string): string {
  return `${formatDayFolder(timestampMillis, timeZone)}/${eventId}_${device}_${timestampMillis}`;
}

/**
 * Derives the storage keys of an alarm. Pure: the same inputs always give
 * the same keys, which is what makes reprocessing a message safe.
 */
export function deriveKeys(
  eventId: string,
  device: string,
  timestampMillis: number,
  timeZone?: string
): StorageKeyPair {
  const stem = keyStem(eventId, device, timestampMillis, timeZone);

  return {
    metadataKey: `${stem}${METADATA_EXTENSION}`,
    videoKey: `${stem}${VIDEO_EXTENSION}`,
    thumbnailKey: `${stem}${THUMBNAIL_EXTENSION}`,
  };
}

function replaceExtension(key: string, from: string, to: string): string {
  return key.endsWith(from) ? key.slice(0, -from.length) + to : key;
}

export function toMetadataKey(videoKey: string): string {
  return replaceExtension(videoKey, VIDEO_EXTENSION, METADATA_EXTENSION);
}

export function toVideoKey(metadataKey: string): string {
  return replaceExtension(metadataKey, METADATA_EXTENSION, VIDEO_EXTENSION);
}

export function fileName(key: string): string {
  return key.slice(key.lastIndexOf('/') + 1);
}

/**
 * Reads the millisecond timestamp embedded between the last `_` and the
 * extension of a key. Returns undefined for keys not written by deriveKeys.
 */
export function extractTimestamp(key: string): number | undefined {
  const name = fileName(key);
  const underscoreIndex = name.lastIndexOf('_');
  const dotIndex = name.lastIndexOf('.');

  if (underscoreIndex <= 0 || dotIndex <= underscoreIndex + 1) {
    return undefined;
  }

  const digits = name.slice(underscoreIndex + 1, dotIndex);
  if (!/^\d+$/.test(digits)) {
    return undefined;
  }

  const timestamp = Number(digits);
  return Number.isSafeInteger(timestamp) ? timestamp : undefined;
}
