import { cp, mkdir, stat } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { createLogger } from '../utils/logger.js';
import type { WorkspaceStorage } from './types.js';

const logger = createLogger('storage:local');

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Keeps workspace snapshots in a directory on the manager's host.
 */
export class LocalStorage implements WorkspaceStorage {
  readonly kind = 'local';

  async download(remote: string, localDir: string): Promise<boolean> {
    if (!(await isDirectory(remote))) {
      logger.debug({ remote }, 'No stored workspace to restore');
      return false;
    }

    await mkdir(localDir, { recursive: true });
    await cp(remote, localDir, { recursive: true, force: true });
    logger.debug({ remote, localDir }, 'Workspace restored');
    return true;
  }

  async upload(localDir: string, remote: string): Promise<void> {
    if (!(await isDirectory(localDir))) {
      logger.debug({ localDir }, 'Nothing to upload');
      return;
    }

    await mkdir(dirname(remote), { recursive: true });
    await cp(localDir, remote, { recursive: true, force: true });
    logger.debug({ localDir, remote }, 'Workspace stored');
  }

  join(...parts: string[]): string {
    return join(...parts);
  }
}
