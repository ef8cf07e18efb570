/**
 * Video acquisition from the remote video system.
 *
 * The video system only offers clips through its web UI, so acquisition
 * drives a browser session that downloads into a scratch workspace, then
 * polls that workspace until a finished clip appears. The browser mechanics
 * live behind BrowserSession; this module owns the timeout contract and the
 * guaranteed release of the session and workspace.
 */

import { Credentials, Trigger } from '../types/alarm';
import { AcquisitionFailedError, AcquisitionTimeoutError, ServiceError } from '../utils/errors';
import { Logger, describeError } from '../utils/logger';
import { DownloadedFile, DownloadWorkspace, WorkspaceFactory } from './download-workspace';

export const FINAL_VIDEO_EXTENSION = '.mp4';

export interface AcquisitionRequest {
  trigger: Trigger;
  timeoutMs: number;
  pollIntervalMs: number;
}

export interface VideoAcquirer {
  fetch(url: string, credentials: Credentials, request: AcquisitionRequest): Promise<Buffer>;
}

/**
 * One browser conversation with the video system.
 * `open` throws AcquisitionAuthError when sign-in is refused.
 */
export interface BrowserSession {
  open(url: string, credentials: Credentials): Promise<void>;
  requestDownload(): Promise<void>;
  close(): Promise<void>;
}

export type BrowserSessionFactory = (downloadDirectory: string, trigger: Trigger) => Promise<BrowserSession>;

export interface PollingClock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: PollingClock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

/**
 * Picks the finished clip from two consecutive listings: a final-extension
 * file whose non-zero size did not change between them. Partial downloads
 * (.crdownload, .tmp) never qualify.
 */
export function findStableVideo(previous: DownloadedFile[], current: DownloadedFile[]): DownloadedFile | undefined {
  const previousSizes = new Map(previous.map((file): [string, number] => [file.name, file.size]));

  return current
    .filter((file) => file.name.toLowerCase().endsWith(FINAL_VIDEO_EXTENSION))
    .filter((file) => file.size > 0 && previousSizes.get(file.name) === file.size)
    .sort((a, b) => b.size - a.size)[0];
}

export class PollingVideoAcquirer implements VideoAcquirer {
  constructor(
    private readonly openSession: BrowserSessionFactory,
    private readonly createWorkspace: WorkspaceFactory,
    private readonly logger: Logger,
    private readonly clock: PollingClock = systemClock
  ) {}

  async fetch(url: string, credentials: Credentials, request: AcquisitionRequest): Promise<Buffer> {
    const { trigger } = request;
    const deadline = this.clock.now() + request.timeoutMs;
    const workspace = await this.createWorkspace(trigger.eventId);
    let session: BrowserSession | undefined;

    try {
      session = await this.openSession(workspace.path, trigger);
      await session.open(url, credentials);
      await session.requestDownload();
      this.logger.info('Video download requested', { eventId: trigger.eventId });

      const video = await this.waitForVideo(workspace, deadline, request.pollIntervalMs);
      const data = await workspace.readFile(video.name);
      this.logger.info('Video download completed', { eventId: trigger.eventId, file: video.name, size: data.length });
      return data;
    } catch (error) {
      if (error instanceof ServiceError) {
        throw error;
      }
      throw new AcquisitionFailedError(
        `Video download failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    } finally {
      await this.release(session, workspace);
    }
  }

  private async waitForVideo(
    workspace: DownloadWorkspace,
    deadline: number,
    pollIntervalMs: number
  ): Promise<DownloadedFile> {
    let previous: DownloadedFile[] = [];

    for (;;) {
      const current = await workspace.listFiles();
      const video = findStableVideo(previous, current);
      if (video) {
        return video;
      }

      const partial = current.filter((file) => !file.name.toLowerCase().endsWith(FINAL_VIDEO_EXTENSION));
      if (partial.length > 0) {
        this.logger.debug('Download in progress', { files: partial.map((file) => file.name) });
      }

      if (this.clock.now() + pollIntervalMs > deadline) {
        throw new AcquisitionTimeoutError('No finished video was downloaded before the timeout');
      }

      previous = current;
      await this.clock.sleep(pollIntervalMs);
    }
  }

  private async release(session: BrowserSession | undefined, workspace: DownloadWorkspace): Promise<void> {
    if (session) {
      try {
        await session.close();
      } catch (error) {
        this.logger.warn('Failed to close browser session', describeError(error));
      }
    }

    try {
      await workspace.dispose();
    } catch (error) {
      this.logger.warn('Failed to remove download workspace', { path: workspace.path, ...describeError(error) });
    }
  }
}
