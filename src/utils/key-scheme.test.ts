import * as fc from 'fast-check';
import {
  deriveKeys,
  extractTimestamp,
  fileName,
  formatDayFolder,
  formatDisplayDateTime,
  formatLocalDateTime,
  previousDayFolders,
  toMetadataKey,
  toVideoKey,
} from './key-scheme';

// Ids never contain the folder separator
const segment = fc.string({ minLength: 1 }).filter((value) => !value.includes('/'));

describe('Key scheme', () => {
  describe('deriveKeys', () => {
    it('should place all artifacts of an alarm under the same stem', () => {
      expect(deriveKeys('evt1', 'AA:BB', 1700000000000, 'UTC')).toEqual({
        metadataKey: '2023-11-14/evt1_AA:BB_1700000000000.json',
        videoKey: '2023-11-14/evt1_AA:BB_1700000000000.mp4',
        thumbnailKey: '2023-11-14/evt1_AA:BB_1700000000000.jpg',
      });
    });

    it('should bucket by the calendar day of the configured time zone', () => {
      // 22:13 UTC is already the next morning in Tokyo
      expect(deriveKeys('evt1', 'AA:BB', 1700000000000, 'Asia/Tokyo').metadataKey).toBe(
        '2023-11-15/evt1_AA:BB_1700000000000.json'
      );
    });

    it('should be pure and embed the timestamp it was given', () => {
      fc.assert(
        fc.property(
          segment,
          segment,
          fc.integer({ min: 0, max: 4102444800000 }),
          (eventId, device, timestamp) => {
            const first = deriveKeys(eventId, device, timestamp, 'UTC');
            const second = deriveKeys(eventId, device, timestamp, 'UTC');

            expect(second).toEqual(first);
            expect(toVideoKey(first.metadataKey)).toBe(first.videoKey);
            expect(toMetadataKey(first.videoKey)).toBe(first.metadataKey);
            expect(extractTimestamp(first.videoKey)).toBe(timestamp);
          }
        ),
        { numRuns: 100 }
      );
    });
  });

  describe('date formatting', () => {
    it('should format the day folder and wall-clock times', () => {
      expect(formatDayFolder(1700000000000, 'UTC')).toBe('2023-11-14');
      expect(formatLocalDateTime(1700000000000, 'UTC')).toBe('2023-11-14T22:13:20');
      expect(formatDisplayDateTime(1700000000000, 'UTC')).toBe('2023-11-14 22:13:20');
    });

    it('should apply the offset of the time zone', () => {
      expect(formatLocalDateTime(1700000000000, 'America/New_York')).toBe('2023-11-14T17:13:20');
    });

    it('should print midnight as hour 00', () => {
      expect(formatLocalDateTime(Date.UTC(2024, 0, 2, 0, 0, 5), 'UTC')).toBe('2024-01-02T00:00:05');
    });
  });

  describe('previousDayFolders', () => {
    it('should walk back from today across month ends and leap days', () => {
      expect(previousDayFolders(new Date('2024-03-01T12:00:00Z'), 3, 'UTC')).toEqual([
        '2024-03-01',
        '2024-02-29',
        '2024-02-28',
      ]);
    });

    it('should neither skip nor repeat a day across a DST change', () => {
      // Clocks in New York went forward on 2024-03-10
      expect(previousDayFolders(new Date('2024-03-11T12:00:00Z'), 3, 'America/New_York')).toEqual([
        '2024-03-11',
        '2024-03-10',
        '2024-03-09',
      ]);
    });

    it('should return nothing for a zero-day window', () => {
      expect(previousDayFolders(new Date('2024-03-11T12:00:00Z'), 0, 'UTC')).toEqual([]);
    });
  });

  describe('extractTimestamp', () => {
    it('should read the digits between the last underscore and the extension', () => {
      expect(extractTimestamp('2023-11-14/evt1_AA:BB_1700000000000.mp4')).toBe(1700000000000);
      expect(extractTimestamp('2023-11-14/evt_1_cam_2_100.json')).toBe(100);
    });

    it('should reject keys without a numeric timestamp', () => {
      expect(extractTimestamp('2023-11-14/notes.mp4')).toBeUndefined();
      expect(extractTimestamp('2023-11-14/evt1_AA:BB_.mp4')).toBeUndefined();
      expect(extractTimestamp('2023-11-14/evt1_AA:BB_12ab.mp4')).toBeUndefined();
    });
  });

  it('should take the file name after the last slash', () => {
    expect(fileName('2023-11-14/evt1_AA:BB_1700000000000.json')).toBe('evt1_AA:BB_1700000000000.json');
    expect(fileName('plain.json')).toBe('plain.json');
  });
});
