import type { StorageConfig } from '../config/index.js';
import { LocalStorage } from './local-storage.js';
import { OssStorage } from './oss-storage.js';
import type { WorkspaceStorage } from './types.js';

export type { WorkspaceStorage } from './types.js';
export { LocalStorage } from './local-storage.js';
export { OssStorage, type OssStorageOptions } from './oss-storage.js';

/**
 * Build workspace storage from configuration. Returns null when no
 * storage folder is configured.
 */
export function createWorkspaceStorage(config: StorageConfig): WorkspaceStorage | null {
  if (!config.folder) {
    return null;
  }

  if (config.kind === 'oss') {
    const { endpoint, accessKeyId, accessKeySecret, bucket } = config.oss;
    if (!endpoint || !accessKeyId || !accessKeySecret || !bucket) {
      throw new Error('OSS storage requires endpoint, accessKeyId, accessKeySecret and bucket');
    }
    return new OssStorage({ endpoint, accessKeyId, accessKeySecret, bucket });
  }

  return new LocalStorage();
}
