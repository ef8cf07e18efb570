import {
  FixedCredentialsProvider,
  InMemoryObjectStore,
  RecordingMetrics,
  captureLogger,
} from '../testing/fakes';
import { NotFoundError, VideoNotAvailableError } from '../utils/errors';
import { AlarmProcessor } from './alarm-processor';
import { DeviceRegistry } from './device-registry';
import { EventVideoFinder, LatestVideoFinder } from './video-finder';

// 2024-03-10 12:00:00 UTC
const NOW = new Date(1710072000000);

const options = {
  timeZone: 'UTC',
  searchDays: 30,
  signedUrlExpirySeconds: 3600,
  now: () => NOW,
};

async function seed(store: InMemoryObjectStore, keys: string[]): Promise<void> {
  for (const key of keys) {
    if (key.endsWith('.json')) {
      await store.putJson(key, JSON.stringify({ triggers: [{ key: 'motion', device: 'cam', eventId: 'e' }], timestamp: 1 }));
    } else {
      await store.putBinary(key, Buffer.from('video'), 'video/mp4');
    }
  }
}

describe('LatestVideoFinder', () => {
  it('should return the newest video of the most recent day that has one', async () => {
    const store = new InMemoryObjectStore();
    await seed(store, [
      '2024-03-07/e3_cam_1709800000000.mp4',
      '2024-03-09/e2_cam_1709950000000.mp4',
      '2024-03-09/e1_cam_1709990000000.mp4',
      '2024-03-09/e1_cam_1709990000000.json',
    ]);
    const finder = new LatestVideoFinder(store, captureLogger().logger, options);

    const lookup = await finder.findLatest();

    expect(lookup).toEqual({
      downloadUrl: 'https://signed.example/2024-03-09/e1_cam_1709990000000.mp4?expires=3600',
      filename: 'e1_cam_1709990000000.mp4',
      videoKey: '2024-03-09/e1_cam_1709990000000.mp4',
      eventKey: '2024-03-09/e1_cam_1709990000000.json',
      timestamp: 1709990000000,
      eventDate: '2024-03-09 13:13:20',
      expiresAt: '2024-03-10 13:00:00 UTC',
      eventData: { triggers: [{ key: 'motion', device: 'cam', eventId: 'e' }], timestamp: 1 },
      message: 'Use the downloadUrl to download the video file directly. URL expires in 60 minutes.',
    });
    expect(store.listedPrefixes).toEqual(['2024-03-10/', '2024-03-09/']);
  });

  it('should return the video without event data when its metadata is missing or unreadable', async () => {
    const store = new InMemoryObjectStore();
    await seed(store, ['2024-03-10/e1_cam_1710070000000.mp4']);
    await store.putJson('2024-03-10/e2_cam_1710071000000.json', '{broken');
    await seed(store, ['2024-03-10/e2_cam_1710071000000.mp4']);
    const finder = new LatestVideoFinder(store, captureLogger().logger, options);

    const lookup = await finder.findLatest();

    expect(lookup.videoKey).toBe('2024-03-10/e2_cam_1710071000000.mp4');
    expect(lookup.eventData).toBeNull();
  });

  it('should ignore metadata and thumbnails when looking for videos', async () => {
    const store = new InMemoryObjectStore();
    await seed(store, ['2024-03-10/e1_cam_1710070000000.json', '2024-03-08/e0_cam_1709900000000.mp4']);
    await store.putBinary('2024-03-10/e1_cam_1710070000000.jpg', Buffer.from('jpg'), 'image/jpeg');
    const finder = new LatestVideoFinder(store, captureLogger().logger, options);

    expect((await finder.findLatest()).videoKey).toBe('2024-03-08/e0_cam_1709900000000.mp4');
  });

  it('should report not found when the window holds no video', async () => {
    const store = new InMemoryObjectStore();
    await seed(store, ['2024-01-01/e1_cam_1704100000000.mp4']);
    const finder = new LatestVideoFinder(store, captureLogger().logger, { ...options, searchDays: 3 });

    await expect(finder.findLatest()).rejects.toThrow(new NotFoundError('No video files found'));
    expect(store.listedPrefixes).toHaveLength(3);
  });
});

describe('EventVideoFinder', () => {
  it('should find an event by id and add the id to the lookup', async () => {
    const store = new InMemoryObjectStore();
    await seed(store, ['2024-03-05/X_dev_1709600000000.json', '2024-03-05/X_dev_1709600000000.mp4']);
    const finder = new EventVideoFinder(store, captureLogger().logger, options);

    const lookup = await finder.findByEventId('X');

    expect(lookup.eventId).toBe('X');
    expect(lookup.videoKey).toBe('2024-03-05/X_dev_1709600000000.mp4');
    expect(lookup.filename).toBe('X_dev_1709600000000.mp4');
    expect(store.listedPrefixes).toEqual([
      '2024-03-10/X_',
      '2024-03-09/X_',
      '2024-03-08/X_',
      '2024-03-07/X_',
      '2024-03-06/X_',
      '2024-03-05/X_',
    ]);
  });

  it('should report a recorded event without its video as not available', async () => {
    const store = new InMemoryObjectStore();
    await seed(store, ['2024-03-10/X_dev_100.json']);
    const finder = new EventVideoFinder(store, captureLogger().logger, options);

    await expect(finder.findByEventId('X')).rejects.toThrow(VideoNotAvailableError);
  });

  it('should report an unknown event as not found', async () => {
    const store = new InMemoryObjectStore();
    await seed(store, ['2024-03-10/X_dev_100.json', '2024-03-10/X_dev_100.mp4']);
    const finder = new EventVideoFinder(store, captureLogger().logger, options);

    await expect(finder.findByEventId('Y')).rejects.toThrow(new NotFoundError('Event with eventId Y not found'));
  });

  it('should return stored metadata as byte-identical JSON', async () => {
    const store = new InMemoryObjectStore();
    const { logger } = captureLogger();
    const processor = new AlarmProcessor(
      {
        store,
        acquirer: { fetch: async () => Buffer.from('video') },
        credentials: new FixedCredentialsProvider(),
        devices: new DeviceRegistry(),
        metrics: new RecordingMetrics(),
        logger,
      },
      { timeZone: 'UTC', videoTimeoutMs: 1000, pollIntervalMs: 100 }
    );
    await processor.processAlarm({
      name: 'Front door motion',
      sources: [{ device: 'AA:BB', type: 'include' }],
      triggers: [{ key: 'motion', device: 'AA:BB', eventId: 'evt1' }],
      timestamp: 1700000000000,
      eventPath: '/protect/events/evt1',
    });
    const finder = new EventVideoFinder(store, logger, { ...options, now: () => new Date(1700003600000) });

    const lookup = await finder.findByEventId('evt1');

    expect(JSON.stringify(lookup.eventData)).toBe(await store.getText('2023-11-14/evt1_AA:BB_1700000000000.json'));
  });
});
