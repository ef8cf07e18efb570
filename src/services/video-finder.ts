/**
 * Video lookups over the day-partitioned store.
 *
 * Both searches walk day folders backwards from today and stop at the first
 * day that answers, so their cost grows with the age of the newest match
 * rather than with the size of the bucket.
 */

import { AlarmRecord, VideoLookup } from '../types/alarm';
import { NotFoundError, VideoNotAvailableError } from '../utils/errors';
import {
  METADATA_EXTENSION,
  VIDEO_EXTENSION,
  extractTimestamp,
  fileName,
  formatDisplayDateTime,
  previousDayFolders,
  toMetadataKey,
  toVideoKey,
} from '../utils/key-scheme';
import { Logger, describeError } from '../utils/logger';
import { isAlarmRecord } from '../utils/validation';
import { ObjectStore } from './object-store';

export interface FinderOptions {
  timeZone?: string;
  searchDays: number;
  signedUrlExpirySeconds: number;
  now?: () => Date;
}

interface FoundVideo {
  videoKey: string;
  metadataKey: string;
  timestamp: number;
}

const DOWNLOAD_MESSAGE = 'Use the downloadUrl to download the video file directly.';

abstract class DayScanningFinder {
  protected readonly now: () => Date;

  constructor(
    protected readonly store: ObjectStore,
    protected readonly logger: Logger,
    protected readonly options: FinderOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  protected dayFolders(): string[] {
    return previousDayFolders(this.now(), this.options.searchDays, this.options.timeZone);
  }

  // Metadata is optional: a video without it is still returned
  protected async readMetadata(metadataKey: string): Promise<AlarmRecord | null> {
    try {
      const json = await this.store.getText(metadataKey);
      if (json === undefined) {
        this.logger.info('No event data found', { metadataKey });
        return null;
      }

      const parsed: unknown = JSON.parse(json);
      if (!isAlarmRecord(parsed)) {
        this.logger.warn('Event data is not an alarm record', { metadataKey });
        return null;
      }
      return parsed;
    } catch (error) {
      this.logger.warn('Error retrieving event data', { metadataKey, ...describeError(error) });
      return null;
    }
  }

  protected async buildLookup(found: FoundVideo, eventData: AlarmRecord | null): Promise<VideoLookup> {
    const expiresInSeconds = this.options.signedUrlExpirySeconds;
    const filename = fileName(found.videoKey);
    const downloadUrl = await this.store.signGetUrl(found.videoKey, { expiresInSeconds, downloadFileName: filename });
    const expiresAt = new Date(this.now().getTime() + expiresInSeconds * 1000);

    return {
      downloadUrl,
      filename,
      videoKey: found.videoKey,
      eventKey: found.metadataKey,
      timestamp: found.timestamp,
      eventDate: formatDisplayDateTime(found.timestamp, this.options.timeZone),
      expiresAt: formatDisplayDateTime(expiresAt.getTime(), 'UTC') + ' UTC',
      eventData,
      message: `${DOWNLOAD_MESSAGE} URL expires in ${Math.round(expiresInSeconds / 60)} minutes.`,
    };
  }
}

/**
 * Finds the most recent video: the greatest embedded timestamp within the
 * newest day folder holding any video.
 */
export class LatestVideoFinder extends DayScanningFinder {
  async findLatest(): Promise<VideoLookup> {
    const found = await this.search();
    if (!found) {
      this.logger.info('No video files found', { searchDays: this.options.searchDays });
      throw new NotFoundError('No video files found');
    }

    const eventData = await this.readMetadata(found.metadataKey);
    return this.buildLookup(found, eventData);
  }

  private async search(): Promise<FoundVideo | undefined> {
    for (const dayFolder of this.dayFolders()) {
      const keys = await this.store.listKeys(`${dayFolder}/`);
      let latest: FoundVideo | undefined;

      for (const key of keys) {
        if (!key.endsWith(VIDEO_EXTENSION)) {
          continue;
        }
        const timestamp = extractTimestamp(key);
        if (timestamp !== undefined && (!latest || timestamp > latest.timestamp)) {
          latest = { videoKey: key, metadataKey: toMetadataKey(key), timestamp };
        }
      }

      if (latest) {
        this.logger.info('Found latest video', { dayFolder, videoKey: latest.videoKey });
        return latest;
      }
      this.logger.debug('No videos in day folder', { dayFolder });
    }

    return undefined;
  }
}

/**
 * Finds the video of one event. The metadata object proves the event was
 * recorded; a missing video next to it is reported as VideoNotAvailable,
 * distinct from an event that was never recorded.
 */
export class EventVideoFinder extends DayScanningFinder {
  async findByEventId(eventId: string): Promise<VideoLookup> {
    const found = await this.search(eventId);
    if (!found) {
      this.logger.info('Event not found', { eventId, searchDays: this.options.searchDays });
      throw new NotFoundError(`Event with eventId ${eventId} not found`);
    }

    if (!(await this.store.exists(found.videoKey))) {
      this.logger.info('Video missing for recorded event', { eventId, videoKey: found.videoKey });
      throw new VideoNotAvailableError(
        `Video file for event ${eventId} is not available. The video may have expired under the retention policy or its download may have failed during event processing.`
      );
    }

    const eventData = await this.readMetadata(found.metadataKey);
    const lookup = await this.buildLookup(found, eventData);
    return { ...lookup, eventId };
  }

  private async search(eventId: string): Promise<FoundVideo | undefined> {
    for (const dayFolder of this.dayFolders()) {
      const keys = await this.store.listKeys(`${dayFolder}/${eventId}_`);
      const metadataKey = keys.find((key) => key.endsWith(METADATA_EXTENSION));

      if (metadataKey) {
        this.logger.info('Found event', { eventId, dayFolder, metadataKey });
        return {
          metadataKey,
          videoKey: toVideoKey(metadataKey),
          timestamp: extractTimestamp(metadataKey) ?? 0,
        };
      }
    }

    return undefined;
  }
}
