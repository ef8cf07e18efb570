import { TEST_CREDENTIALS, captureLogger } from '../testing/fakes';
import { Credentials, Trigger } from '../types/alarm';
import {
  AcquisitionAuthError,
  AcquisitionFailedError,
  AcquisitionTimeoutError,
} from '../utils/errors';
import { DownloadedFile, DownloadWorkspace } from './download-workspace';
import { BrowserSession, PollingClock, PollingVideoAcquirer, findStableVideo } from './video-acquirer';

const trigger: Trigger = { key: 'motion', device: 'AA:BB', eventId: 'evt1' };

class FakeClock implements PollingClock {
  current = 0;
  sleeps: number[] = [];

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }
}

// Returns one scripted listing per poll, repeating the last one
class ScriptedWorkspace implements DownloadWorkspace {
  readonly path = '/tmp/video_evt1_test';
  disposed = false;
  polls = 0;

  constructor(private readonly listings: DownloadedFile[][]) {}

  async listFiles(): Promise<DownloadedFile[]> {
    const listing = this.listings[Math.min(this.polls, this.listings.length - 1)];
    this.polls++;
    return listing;
  }

  async readFile(name: string): Promise<Buffer> {
    return Buffer.from(`contents of ${name}`);
  }

  async dispose(): Promise<void> {
    this.disposed = true;
  }
}

class ScriptedSession implements BrowserSession {
  opened?: { url: string; credentials: Credentials };
  downloadRequested = false;
  closed = false;
  openFailure?: Error;

  async open(url: string, credentials: Credentials): Promise<void> {
    if (this.openFailure) {
      throw this.openFailure;
    }
    this.opened = { url, credentials };
  }

  async requestDownload(): Promise<void> {
    this.downloadRequested = true;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

function createAcquirer(listings: DownloadedFile[][]) {
  const clock = new FakeClock();
  const workspace = new ScriptedWorkspace(listings);
  const session = new ScriptedSession();
  const { logger } = captureLogger();
  const acquirer = new PollingVideoAcquirer(
    async () => session,
    async () => workspace,
    logger,
    clock
  );
  return { acquirer, clock, workspace, session };
}

const request = { trigger, timeoutMs: 10_000, pollIntervalMs: 1000 };

describe('PollingVideoAcquirer', () => {
  it('should return the clip once its size is stable across two polls', async () => {
    const { acquirer, clock, workspace, session } = createAcquirer([
      [],
      [{ name: 'clip.mp4.crdownload', size: 100 }],
      [{ name: 'clip.mp4', size: 500 }],
      [{ name: 'clip.mp4', size: 500 }],
    ]);

    const data = await acquirer.fetch('https://nvr.test/protect/events/evt1', TEST_CREDENTIALS, request);

    expect(data.toString()).toBe('contents of clip.mp4');
    expect(session.opened).toEqual({ url: 'https://nvr.test/protect/events/evt1', credentials: TEST_CREDENTIALS });
    expect(session.downloadRequested).toBe(true);
    expect(workspace.polls).toBe(4);
    expect(clock.sleeps).toEqual([1000, 1000, 1000]);
    expect(session.closed).toBe(true);
    expect(workspace.disposed).toBe(true);
  });

  it('should keep waiting while the clip is still growing', async () => {
    const { acquirer, workspace } = createAcquirer([
      [{ name: 'clip.mp4', size: 100 }],
      [{ name: 'clip.mp4', size: 200 }],
      [{ name: 'clip.mp4', size: 300 }],
      [{ name: 'clip.mp4', size: 300 }],
    ]);

    await acquirer.fetch('https://nvr.test/e', TEST_CREDENTIALS, request);
    expect(workspace.polls).toBe(4);
  });

  it('should time out when only partial files appear', async () => {
    const { acquirer, clock, session, workspace } = createAcquirer([[{ name: 'clip.mp4.crdownload', size: 10 }]]);

    await expect(acquirer.fetch('https://nvr.test/e', TEST_CREDENTIALS, request)).rejects.toThrow(
      AcquisitionTimeoutError
    );
    expect(clock.current).toBe(10_000);
    expect(workspace.polls).toBe(11);
    expect(session.closed).toBe(true);
    expect(workspace.disposed).toBe(true);
  });

  it('should never accept an empty clip', async () => {
    const { acquirer } = createAcquirer([[{ name: 'clip.mp4', size: 0 }]]);

    await expect(acquirer.fetch('https://nvr.test/e', TEST_CREDENTIALS, request)).rejects.toThrow(
      AcquisitionTimeoutError
    );
  });

  it('should pass sign-in failures through and still release resources', async () => {
    const { acquirer, session, workspace } = createAcquirer([[]]);
    session.openFailure = new AcquisitionAuthError('Sign-in to nvr.test was rejected');

    await expect(acquirer.fetch('https://nvr.test/e', TEST_CREDENTIALS, request)).rejects.toThrow(
      AcquisitionAuthError
    );
    expect(session.closed).toBe(true);
    expect(workspace.disposed).toBe(true);
  });

  it('should wrap unexpected browser errors', async () => {
    const { acquirer, session } = createAcquirer([[]]);
    session.openFailure = new Error('net::ERR_NAME_NOT_RESOLVED');

    await expect(acquirer.fetch('https://nvr.test/e', TEST_CREDENTIALS, request)).rejects.toThrow(
      new AcquisitionFailedError('Video download failed: net::ERR_NAME_NOT_RESOLVED')
    );
  });
});

describe('findStableVideo', () => {
  it('should prefer the largest stable clip', () => {
    const listing = [
      { name: 'a.mp4', size: 10 },
      { name: 'b.MP4', size: 20 },
      { name: 'c.tmp', size: 30 },
    ];

    expect(findStableVideo(listing, listing)).toEqual({ name: 'b.MP4', size: 20 });
  });

  it('should ignore clips missing from the previous listing', () => {
    expect(findStableVideo([], [{ name: 'a.mp4', size: 10 }])).toBeUndefined();
  });
});
