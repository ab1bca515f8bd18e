/**
 * Docker Client Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import Docker from 'dockerode';
import {
  DEFAULT_DOCKER_SOCKET,
  DockerClient,
  getDockerClient,
  isSupportedApiVersion,
  resetDockerClients,
  statusCodeOf,
} from '../../src/sandbox/docker-client.js';

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

// Mock dockerode
vi.mock('dockerode', () => {
  return {
    default: vi.fn().mockImplementation(() => mockDocker),
  };
});

function statusError(message: string, statusCode: number): Error {
  return Object.assign(new Error(message), { statusCode });
}

describe('DockerClient', () => {
  let client: DockerClient;

  beforeEach(() => {
    resetDockerClients();
    vi.clearAllMocks();
    mockDocker.ping.mockResolvedValue('OK');
    mockDocker.version.mockResolvedValue({ Version: '24.0.7', ApiVersion: '1.43', Os: 'linux', Arch: 'amd64' });
    mockDocker.getContainer.mockReturnValue(mockContainer);
    client = new DockerClient();
  });

  afterEach(() => {
    resetDockerClients();
  });

  describe('getDockerClient', () => {
    it('should share one client per socket', () => {
      expect(getDockerClient('/tmp/test.sock')).toBe(getDockerClient('/tmp/test.sock'));
      expect(getDockerClient('/tmp/test.sock')).not.toBe(getDockerClient());
    });

    it('should default to the standard socket', () => {
      expect(getDockerClient().socketPath).toBe(DEFAULT_DOCKER_SOCKET);
    });

    it('should connect dockerode to the given socket', () => {
      vi.clearAllMocks();

      getDockerClient('/tmp/test.sock');

      expect(Docker).toHaveBeenCalledWith({ socketPath: '/tmp/test.sock' });
    });

    it('should build new clients after a reset', () => {
      const first = getDockerClient();
      resetDockerClients();

      expect(getDockerClient()).not.toBe(first);
    });
  });

  describe('isAvailable', () => {
    it('should return true when Docker is running', async () => {
      expect(await client.isAvailable()).toBe(true);
    });

    it('should return false when the API version is too old', async () => {
      mockDocker.version.mockResolvedValue({ Version: '18.09', ApiVersion: '1.39', Os: 'linux', Arch: 'amd64' });

      expect(await client.isAvailable()).toBe(false);
    });

    it('should return false when the daemon does not answer', async () => {
      mockDocker.ping.mockRejectedValue(new Error('connect ENOENT /var/run/docker.sock'));

      expect(await client.isAvailable()).toBe(false);
      expect(mockDocker.version).not.toHaveBeenCalled();
    });
  });

  describe('ensureImage', () => {
    it('should skip images already present', async () => {
      mockDocker.listImages.mockResolvedValue([{ Id: 'sha256:abc' }]);

      await client.ensureImage('example/base:1');

      expect(mockDocker.listImages).toHaveBeenCalledWith({ filters: { reference: ['example/base:1'] } });
      expect(mockDocker.pull).not.toHaveBeenCalled();
    });

    it('should pull a missing image and wait for completion', async () => {
      mockDocker.listImages.mockResolvedValue([]);
      mockDocker.pull.mockResolvedValue('stream');
      mockDocker.modem.followProgress.mockImplementation((_stream: unknown, onFinished: (err: Error | null) => void) => {
        onFinished(null);
      });

      await client.ensureImage('example/base:1');

      expect(mockDocker.pull).toHaveBeenCalledWith('example/base:1');
    });

    it('should surface pull failures', async () => {
      mockDocker.listImages.mockResolvedValue([]);
      mockDocker.pull.mockResolvedValue('stream');
      mockDocker.modem.followProgress.mockImplementation((_stream: unknown, onFinished: (err: Error | null) => void) => {
        onFinished(new Error('manifest unknown'));
      });

      await expect(client.ensureImage('example/base:1')).rejects.toThrow('manifest unknown');
    });
  });

  describe('container operations', () => {
    it('should return the id of a created container', async () => {
      mockDocker.createContainer.mockResolvedValue({ id: 'abc123' });

      expect(await client.createContainer({ Image: 'example/base:1' })).toBe('abc123');
    });

    it('should treat starting a running container as success', async () => {
      mockContainer.start.mockRejectedValue(statusError('container already started', 304));

      await expect(client.startContainer('abc123')).resolves.toBeUndefined();
    });

    it('should rethrow other start failures', async () => {
      mockContainer.start.mockRejectedValue(statusError('port is already allocated', 500));

      await expect(client.startContainer('abc123')).rejects.toThrow('port is already allocated');
    });

    it('should pass the stop timeout to Docker', async () => {
      mockContainer.stop.mockResolvedValue(undefined);

      await client.stopContainer('abc123', 5);

      expect(mockContainer.stop).toHaveBeenCalledWith({ t: 5 });
    });

    it('should force-remove with volumes', async () => {
      mockContainer.remove.mockResolvedValue(undefined);

      await client.removeContainer('abc123');

      expect(mockContainer.remove).toHaveBeenCalledWith({ force: true, v: true });
    });

    it('should treat removing a missing container as success', async () => {
      mockContainer.remove.mockRejectedValue(statusError('no such container', 404));

      await expect(client.removeContainer('abc123')).resolves.toBeUndefined();
    });

    it('should rethrow other remove failures', async () => {
      mockContainer.remove.mockRejectedValue(statusError('removal in progress', 409));

      await expect(client.removeContainer('abc123')).rejects.toThrow('removal in progress');
    });

    it('should report whether a container is running', async () => {
      mockContainer.inspect.mockResolvedValueOnce({ State: { Running: true } });
      mockContainer.inspect.mockRejectedValueOnce(statusError('no such container', 404));

      expect(await client.isContainerRunning('abc123')).toBe(true);
      expect(await client.isContainerRunning('gone')).toBe(false);
    });
  });
});

describe('isSupportedApiVersion', () => {
  it('should accept 1.40 and newer', () => {
    expect(isSupportedApiVersion('1.40')).toBe(true);
    expect(isSupportedApiVersion('1.43')).toBe(true);
  });

  it('should reject older or missing versions', () => {
    expect(isSupportedApiVersion('1.39')).toBe(false);
    expect(isSupportedApiVersion(undefined)).toBe(false);
    expect(isSupportedApiVersion('unknown')).toBe(false);
  });
});

describe('statusCodeOf', () => {
  it('should read a numeric status code', () => {
    expect(statusCodeOf(statusError('not found', 404))).toBe(404);
  });

  it('should ignore values without one', () => {
    expect(statusCodeOf(new Error('plain'))).toBeUndefined();
    expect(statusCodeOf('text')).toBeUndefined();
  });
});
