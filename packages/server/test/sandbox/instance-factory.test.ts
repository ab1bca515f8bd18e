/**
 * Instance Factory Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { ProvisioningError, UnknownTypeError } from '../../src/sandbox/errors.js';
import {
  InstanceFactory,
  LABELS,
  WORKSPACE_MOUNT,
  resolveEnvironment,
} from '../../src/sandbox/instance-factory.js';
import { PortAllocator } from '../../src/sandbox/port-allocator.js';
import { SandboxRegistry } from '../../src/sandbox/registry.js';
import type { SandboxTypeEntry } from '../../src/sandbox/types.js';
import { StateKeys } from '../../src/state/keys.js';
import { MemoryStateStore } from '../../src/state/memory-store.js';
import { LocalStorage } from '../../src/storage/local-storage.js';
import { FakeDriver, createTestConfig } from './test-utils.js';

describe('resolveEnvironment', () => {
  const entry: SandboxTypeEntry = {
    type: 'python',
    image: 'example/python:3',
    securityLevel: 'medium',
    timeoutSeconds: 300,
    env: { API_KEY: null, MODE: 'default' },
    description: '',
    containerPort: 80,
  };

  it('should fill required variables from the process environment', () => {
    expect(resolveEnvironment(entry, {}, { API_KEY: 'test-secret' })).toEqual({
      API_KEY: 'test-secret',
      MODE: 'default',
    });
  });

  it('should prefer overrides to declared values', () => {
    expect(resolveEnvironment(entry, { API_KEY: 'override', MODE: 'fast', EXTRA: '1' }, {})).toEqual({
      API_KEY: 'override',
      MODE: 'fast',
      EXTRA: '1',
    });
  });

  it('should throw when a required variable is missing', () => {
    expect(() => resolveEnvironment(entry, {}, {})).toThrow(
      'Failed to provision python sandbox: missing required environment variables: API_KEY'
    );
  });
});

describe('InstanceFactory', () => {
  let tempDir: string;
  let driver: FakeDriver;
  let store: MemoryStateStore;
  let registry: SandboxRegistry;
  let ports: PortAllocator;

  function createFactory(overrides: Record<string, unknown> = {}, withStorage = false): InstanceFactory {
    return new InstanceFactory({
      config: createTestConfig(overrides),
      driver,
      ports,
      registry,
      storage: withStorage ? new LocalStorage() : null,
      processEnv: {},
    });
  }

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'factory-test-'));
    driver = new FakeDriver();
    store = new MemoryStateStore();
    registry = new SandboxRegistry();
    registry.register({ type: 'base', image: 'example/base:1', containerPort: 8080 });
    ports = new PortAllocator({
      store,
      keys: new StateKeys('warmbox'),
      range: [49152, 49153],
      owner: 'worker-a',
      probe: async () => true,
    });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should create a running warm instance', async () => {
    const factory = createFactory();

    const instance = await factory.create('base');

    expect(instance.id).toMatch(/^warmbox_sandbox_[a-z0-9]{20}$/);
    expect(instance.state).toBe('warm');
    expect(instance.port).toBe(49152);
    expect(instance.baseUrl).toBe('http://localhost:49152');
    expect(await driver.isAlive(instance.handle)).toBe(true);

    const spec = driver.specFor(instance.id);
    expect(spec?.image).toBe('example/base:1');
    expect(spec?.containerPort).toBe(8080);
    expect(spec?.env).toEqual({ SECRET_TOKEN: instance.token });
    expect(spec?.labels).toEqual({
      [LABELS.managed]: 'true',
      [LABELS.type]: 'base',
      [LABELS.instance]: instance.id,
    });
  });

  it('should throw UnknownTypeError before reserving a port', async () => {
    const factory = createFactory();

    await expect(factory.create('missing')).rejects.toBeInstanceOf(UnknownTypeError);
    expect(await ports.held()).toEqual([]);
  });

  it('should release the port and container when start fails', async () => {
    class FailingStartDriver extends FakeDriver {
      override async start(): Promise<void> {
        throw new Error('port is already allocated');
      }
    }
    driver = new FailingStartDriver();
    const factory = createFactory();

    await expect(factory.create('base')).rejects.toThrow(
      'Failed to provision base sandbox: port is already allocated'
    );
    expect(await ports.held()).toEqual([]);
    expect(driver.containers.size).toBe(0);
  });

  it('should fail when the container exits right after starting', async () => {
    class ExitingDriver extends FakeDriver {
      override async isAlive(): Promise<boolean> {
        return false;
      }
    }
    driver = new ExitingDriver();
    const factory = createFactory();

    await expect(factory.create('base')).rejects.toBeInstanceOf(ProvisioningError);
    expect(driver.calls.destroy).toBe(1);
  });

  it('should mount a per-instance workspace and read-only mounts', async () => {
    const factory = createFactory({
      defaultMountDir: tempDir,
      readonlyMounts: { '/opt/models': '/models' },
    });

    const instance = await factory.create('base');

    expect(instance.mountDir).toBe(path.join(tempDir, instance.id));
    expect((await fs.stat(path.join(tempDir, instance.id))).isDirectory()).toBe(true);
    expect(driver.specFor(instance.id)?.mounts).toEqual([
      { hostPath: path.join(tempDir, instance.id), containerPath: WORKSPACE_MOUNT, readOnly: false },
      { hostPath: '/opt/models', containerPath: '/models', readOnly: true },
    ]);
  });

  it('should restore a stored workspace into the mount', async () => {
    const mountRoot = path.join(tempDir, 'mounts');
    const storageRoot = path.join(tempDir, 'storage');
    const factory = createFactory({ defaultMountDir: mountRoot, storage: { folder: storageRoot } }, true);

    const instance = await factory.create('base');

    expect(instance.storagePath).toBe(path.join(storageRoot, instance.id));
    expect(await fs.readdir(path.join(mountRoot, instance.id))).toEqual([]);
  });

  it('should apply the type configure hook', async () => {
    registry.register({
      type: 'gpu',
      image: 'example/gpu:1',
      configure: (spec) => ({ ...spec, labels: { ...spec.labels, gpu: 'true' } }),
    });
    const factory = createFactory();

    const instance = await factory.create('gpu');

    expect(driver.specFor(instance.id)?.labels['gpu']).toBe('true');
  });
});
