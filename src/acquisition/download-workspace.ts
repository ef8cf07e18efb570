/**
 * Scratch directory a browser session downloads into.
 */

import { mkdir, mkdtemp, readdir, readFile, rm, stat } from 'node:fs/promises';
import * as path from 'node:path';

export interface DownloadedFile {
  name: string;
  size: number;
}

export interface DownloadWorkspace {
  readonly path: string;
  listFiles(): Promise<DownloadedFile[]>;
  readFile(name: string): Promise<Buffer>;
  dispose(): Promise<void>;
}

export type WorkspaceFactory = (label: string) => Promise<DownloadWorkspace>;

class LocalDownloadWorkspace implements DownloadWorkspace {
  constructor(readonly path: string) {}

  async listFiles(): Promise<DownloadedFile[]> {
    const entries = await readdir(this.path, { withFileTypes: true });
    const files: DownloadedFile[] = [];

    for (const entry of entries) {
      if (!entry.isFile()) {
        continue;
      }
      try {
        const info = await stat(path.join(this.path, entry.name));
        files.push({ name: entry.name, size: info.size });
      } catch (error) {
        // Browsers rename partial downloads while we poll
        if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
          throw error;
        }
      }
    }

    return files;
  }

  readFile(name: string): Promise<Buffer> {
    return readFile(path.join(this.path, name));
  }

  dispose(): Promise<void> {
    return rm(this.path, { recursive: true, force: true });
  }
}

/**
 * Creates workspaces as fresh temporary directories under `root`, so
 * concurrent acquisitions in one process never see each other's files.
 */
export function localWorkspaceFactory(root: string): WorkspaceFactory {
  return async (label: string) => {
    await mkdir(root, { recursive: true });
    const safeLabel = label.replace(/[^A-Za-z0-9_-]/g, '_');
    const directory = await mkdtemp(path.join(root, `video_${safeLabel}_`));
    return new LocalDownloadWorkspace(directory);
  };
}
