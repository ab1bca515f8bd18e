/**
 * Docker Client
 *
 * Thin wrapper over dockerode for the calls the Docker driver makes.
 * One client is kept per daemon socket.
 */

import Docker from 'dockerode';
import type { ContainerCreateOptions } from 'dockerode';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('sandbox:docker-client');

export const DEFAULT_DOCKER_SOCKET = '/var/run/docker.sock';

// Docker 19.03+
const MIN_API_VERSION = 1.4;

/**
 * HTTP status attached to dockerode and Kubernetes client errors.
 */
export function statusCodeOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

/**
 * Whether a daemon reporting `apiVersion` is new enough.
 */
export function isSupportedApiVersion(apiVersion: string | undefined): boolean {
  const parsed = Number.parseFloat(apiVersion ?? '');
  return Number.isFinite(parsed) && parsed >= MIN_API_VERSION;
}

export class DockerClient {
  private readonly docker: Docker;

  constructor(readonly socketPath: string = DEFAULT_DOCKER_SOCKET) {
    this.docker = new Docker({ socketPath });
  }

  /**
   * Ping the daemon and check its API version.
   */
  async isAvailable(): Promise<boolean> {
    try {
      await this.docker.ping();
      const info = await this.docker.version();
      if (!isSupportedApiVersion(info.ApiVersion)) {
        logger.warn({ apiVersion: info.ApiVersion, socketPath: this.socketPath }, 'Docker API version too old');
        return false;
      }
      return true;
    } catch (error) {
      logger.debug({ err: error, socketPath: this.socketPath }, 'Docker daemon not reachable');
      return false;
    }
  }

  /**
   * Pull `image` unless the daemon already has it.
   */
  async ensureImage(image: string): Promise<void> {
    const present = await this.docker.listImages({ filters: { reference: [image] } });
    if (present.length > 0) {
      return;
    }

    logger.info({ image }, 'Pulling image');
    const stream = await this.docker.pull(image);
    await new Promise<void>((resolve, reject) => {
      this.docker.modem.followProgress(stream, (err: Error | null) => (err ? reject(err) : resolve()));
    });
    logger.info({ image }, 'Image pulled');
  }

  async createContainer(options: ContainerCreateOptions): Promise<string> {
    const container = await this.docker.createContainer(options);
    logger.debug({ containerId: container.id, name: options.name }, 'Container created');
    return container.id;
  }

  async startContainer(containerId: string): Promise<void> {
    // 304: already running
    await this.tolerating(304, 'start', containerId, () => this.docker.getContainer(containerId).start());
  }

  async stopContainer(containerId: string, timeoutSeconds: number): Promise<void> {
    // 304: already stopped
    await this.tolerating(304, 'stop', containerId, () =>
      this.docker.getContainer(containerId).stop({ t: timeoutSeconds })
    );
  }

  /**
   * Force-remove a container and its anonymous volumes. A container that
   * is already gone counts as removed.
   */
  async removeContainer(containerId: string): Promise<void> {
    await this.tolerating(404, 'remove', containerId, () =>
      this.docker.getContainer(containerId).remove({ force: true, v: true })
    );
  }

  async isContainerRunning(containerId: string): Promise<boolean> {
    try {
      const info = await this.docker.getContainer(containerId).inspect();
      return info.State.Running;
    } catch (error) {
      logger.debug({ containerId, err: error }, 'Container inspect failed');
      return false;
    }
  }

  private async tolerating(
    status: number,
    action: string,
    containerId: string,
    run: () => Promise<unknown>
  ): Promise<void> {
    try {
      await run();
    } catch (error) {
      if (statusCodeOf(error) === status) {
        logger.debug({ containerId, action }, 'Container already in requested state');
        return;
      }
      logger.error({ containerId, action, err: error }, 'Container operation failed');
      throw error;
    }
  }
}

const clients = new Map<string, DockerClient>();

/**
 * Shared client for a daemon socket.
 */
export function getDockerClient(socketPath: string = DEFAULT_DOCKER_SOCKET): DockerClient {
  let client = clients.get(socketPath);
  if (!client) {
    client = new DockerClient(socketPath);
    clients.set(socketPath, client);
  }
  return client;
}

/**
 * Forget cached clients (for testing).
 */
export function resetDockerClients(): void {
  clients.clear();
}
