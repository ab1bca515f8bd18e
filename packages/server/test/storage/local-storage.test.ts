/**
 * Workspace Storage Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { createWorkspaceStorage } from '../../src/storage/index.js';
import { LocalStorage } from '../../src/storage/local-storage.js';

describe('LocalStorage', () => {
  let tempDir: string;
  const storage = new LocalStorage();

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'storage-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should round-trip a workspace through the store', async () => {
    const workspace = path.join(tempDir, 'workspace');
    const remote = storage.join(tempDir, 'store', 'sandbox-1');
    await fs.mkdir(path.join(workspace, 'src'), { recursive: true });
    await fs.writeFile(path.join(workspace, 'src', 'main.py'), 'print("hi")\n');

    await storage.upload(workspace, remote);
    const restored = path.join(tempDir, 'restored');
    const found = await storage.download(remote, restored);

    expect(found).toBe(true);
    expect(await fs.readFile(path.join(restored, 'src', 'main.py'), 'utf-8')).toBe('print("hi")\n');
  });

  it('should report a missing remote on download', async () => {
    const target = path.join(tempDir, 'target');

    expect(await storage.download(path.join(tempDir, 'absent'), target)).toBe(false);
  });

  it('should skip uploading a missing workspace', async () => {
    const remote = path.join(tempDir, 'store', 'sandbox-1');

    await storage.upload(path.join(tempDir, 'absent'), remote);

    await expect(fs.stat(remote)).rejects.toThrow();
  });
});

describe('createWorkspaceStorage', () => {
  it('should return null without a storage folder', () => {
    expect(createWorkspaceStorage({ kind: 'local', oss: {} })).toBeNull();
  });

  it('should return local storage for the local kind', () => {
    expect(createWorkspaceStorage({ kind: 'local', folder: '/srv/warmbox', oss: {} })?.kind).toBe('local');
  });

  it('should require complete OSS settings', () => {
    expect(() =>
      createWorkspaceStorage({ kind: 'oss', folder: 'workspaces', oss: { endpoint: 'oss.example.com' } })
    ).toThrow('OSS storage requires endpoint, accessKeyId, accessKeySecret and bucket');
  });
});
