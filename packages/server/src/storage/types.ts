/**
 * Backing store for sandbox mount directories. A directory is restored
 * into the mount before the container starts and uploaded after the
 * container is destroyed.
 */
export interface WorkspaceStorage {
  readonly kind: 'local' | 'oss';

  /**
   * Copy `remote` into `localDir`. Resolves false when `remote` does not exist.
   */
  download(remote: string, localDir: string): Promise<boolean>;

  upload(localDir: string, remote: string): Promise<void>;

  join(...parts: string[]): string;
}
