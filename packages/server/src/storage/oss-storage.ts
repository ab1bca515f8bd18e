/**
 * Workspace storage on Alibaba Cloud OSS. Directories map to object
 * prefixes; each file is one object.
 */

import { mkdir, readdir } from 'node:fs/promises';
import { dirname, join, posix, relative, sep } from 'node:path';
import OSS from 'ali-oss';
import { createLogger } from '../utils/logger.js';
import type { WorkspaceStorage } from './types.js';

const logger = createLogger('storage:oss');

export interface OssStorageOptions {
  endpoint: string;
  accessKeyId: string;
  accessKeySecret: string;
  bucket: string;
}

async function listFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(fullPath)));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }
  return files;
}

export class OssStorage implements WorkspaceStorage {
  readonly kind = 'oss';
  private readonly client: OSS;

  constructor(options: OssStorageOptions) {
    this.client = new OSS({
      endpoint: options.endpoint,
      accessKeyId: options.accessKeyId,
      accessKeySecret: options.accessKeySecret,
      bucket: options.bucket,
    });
  }

  async download(remote: string, localDir: string): Promise<boolean> {
    const prefix = remote.endsWith('/') ? remote : `${remote}/`;
    let marker: string | undefined;
    let count = 0;

    do {
      const result = await this.client.list(
        {
          prefix,
          'max-keys': 1000,
          ...(marker !== undefined && { marker }),
        },
        {}
      );

      for (const object of result.objects ?? []) {
        if (object.name.endsWith('/')) {
          continue;
        }
        const target = join(localDir, ...object.name.slice(prefix.length).split('/'));
        await mkdir(dirname(target), { recursive: true });
        await this.client.get(object.name, target);
        count += 1;
      }

      marker = result.isTruncated && result.nextMarker ? result.nextMarker : undefined;
    } while (marker);

    logger.debug({ remote, localDir, count }, 'Workspace restored from OSS');
    return count > 0;
  }

  async upload(localDir: string, remote: string): Promise<void> {
    let files: string[];
    try {
      files = await listFiles(localDir);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        logger.debug({ localDir }, 'Nothing to upload');
        return;
      }
      throw error;
    }

    for (const file of files) {
      const key = this.join(remote, ...relative(localDir, file).split(sep));
      await this.client.put(key, file);
    }

    logger.debug({ localDir, remote, count: files.length }, 'Workspace stored in OSS');
  }

  join(...parts: string[]): string {
    return posix.join(...parts);
  }
}
