/**
 * Docker Driver Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { DockerClient } from '../../src/sandbox/docker-client.js';
import { DockerDriver, toCreateOptions } from '../../src/sandbox/drivers/docker-driver.js';
import type { ContainerSpec } from '../../src/sandbox/types.js';

const mockContainer = vi.hoisted(() => ({
  start: vi.fn(),
  stop: vi.fn(),
  remove: vi.fn(),
  inspect: vi.fn(),
}));

const mockDocker = vi.hoisted(() => ({
  ping: vi.fn(),
  version: vi.fn(),
  listImages: vi.fn(),
  pull: vi.fn(),
  modem: { followProgress: vi.fn() },
  createContainer: vi.fn(),
  getContainer: vi.fn(),
}));

vi.mock('dockerode', () => {
  return {
    default: vi.fn().mockImplementation(() => mockDocker),
  };
});

function createSpec(overrides: Partial<ContainerSpec> = {}): ContainerSpec {
  return {
    name: 'warmbox_sandbox_abc',
    image: 'example/base:1',
    env: { SECRET_TOKEN: 'test-secret' },
    hostPort: 49152,
    containerPort: 8080,
    mounts: [],
    labels: { 'warmbox.managed': 'true' },
    securityLevel: 'medium',
    ...overrides,
  };
}

describe('toCreateOptions', () => {
  it('should publish the service port and apply hardening', () => {
    const options = toCreateOptions(
      createSpec({
        securityLevel: 'high',
        mounts: [
          { hostPath: '/data/abc', containerPath: '/workspace', readOnly: false },
          { hostPath: '/opt/models', containerPath: '/models', readOnly: true },
        ],
        resourceLimits: { memoryMB: 512, cpuCount: 1.5 },
      })
    );

    expect(options).toEqual({
      name: 'warmbox_sandbox_abc',
      Image: 'example/base:1',
      Env: ['SECRET_TOKEN=test-secret'],
      Labels: { 'warmbox.managed': 'true' },
      ExposedPorts: { '8080/tcp': {} },
      HostConfig: {
        PortBindings: { '8080/tcp': [{ HostPort: '49152' }] },
        Binds: ['/data/abc:/workspace:rw', '/opt/models:/models:ro'],
        SecurityOpt: ['no-new-privileges'],
        CapDrop: ['ALL'],
        PidsLimit: 256,
        Memory: 536870912,
        NanoCpus: 1500000000,
      },
    });
  });

  it('should leave low-security containers unhardened', () => {
    const options = toCreateOptions(createSpec({ securityLevel: 'low' }));

    expect(options.HostConfig?.SecurityOpt).toBeUndefined();
    expect(options.HostConfig?.CapDrop).toBeUndefined();
  });
});

describe('DockerDriver', () => {
  let driver: DockerDriver;

  beforeEach(() => {
    vi.clearAllMocks();
    mockDocker.getContainer.mockReturnValue(mockContainer);
    driver = new DockerDriver({ client: new DockerClient(), stopTimeoutSeconds: 3 });
  });

  it('should pull, create and return a handle', async () => {
    mockDocker.listImages.mockResolvedValue([{ Id: 'sha256:abc' }]);
    mockDocker.createContainer.mockResolvedValue({ id: 'abc123' });

    const handle = await driver.create(createSpec());

    expect(handle).toEqual({ containerId: 'abc123', host: 'localhost' });
    expect(mockDocker.createContainer).toHaveBeenCalledWith(toCreateOptions(createSpec()));
  });

  it('should stop with the configured timeout', async () => {
    mockContainer.stop.mockResolvedValue(undefined);

    await driver.stop({ containerId: 'abc123', host: 'localhost' });

    expect(mockContainer.stop).toHaveBeenCalledWith({ t: 3 });
  });

  it('should force-remove on destroy', async () => {
    mockContainer.remove.mockResolvedValue(undefined);

    await driver.destroy({ containerId: 'abc123', host: 'localhost' });

    expect(mockContainer.remove).toHaveBeenCalledWith({ force: true, v: true });
  });

  it('should report liveness from the container state', async () => {
    mockContainer.inspect.mockResolvedValue({ State: { Running: false } });

    expect(await driver.isAlive({ containerId: 'abc123', host: 'localhost' })).toBe(false);
  });
});
