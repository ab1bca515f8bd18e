/**
 * Docker Backend Driver
 *
 * Runs each sandbox as a local Docker container with its service port
 * published on the reserved host port.
 */

import type { ContainerCreateOptions, HostConfig } from 'dockerode';
import type { SecurityLevel } from '@warmbox/shared';
import { createLogger } from '../../utils/logger.js';
import type { DockerClient } from '../docker-client.js';
import type { BackendDriver, ContainerSpec, DriverHandle } from '../types.js';

const logger = createLogger('sandbox:docker-driver');

export interface DockerDriverOptions {
  client: DockerClient;
  /** Host the published ports are reachable on */
  host?: string;
  /** Seconds Docker waits for a graceful stop */
  stopTimeoutSeconds?: number;
}

/**
 * Container hardening per security level.
 */
function hardening(level: SecurityLevel): Partial<HostConfig> {
  switch (level) {
    case 'high':
      return { SecurityOpt: ['no-new-privileges'], CapDrop: ['ALL'], PidsLimit: 256 };
    case 'medium':
      return { SecurityOpt: ['no-new-privileges'], PidsLimit: 1024 };
    case 'low':
      return {};
  }
}

/**
 * Translate a container spec into dockerode create options.
 */
export function toCreateOptions(spec: ContainerSpec): ContainerCreateOptions {
  const portKey = `${spec.containerPort}/tcp`;

  const hostConfig: HostConfig = {
    PortBindings: { [portKey]: [{ HostPort: String(spec.hostPort) }] },
    Binds: spec.mounts.map(
      (mount) => `${mount.hostPath}:${mount.containerPath}:${mount.readOnly ? 'ro' : 'rw'}`
    ),
    ...hardening(spec.securityLevel),
  };

  if (spec.resourceLimits?.memoryMB !== undefined) {
    hostConfig.Memory = spec.resourceLimits.memoryMB * 1024 * 1024;
  }
  if (spec.resourceLimits?.cpuCount !== undefined) {
    hostConfig.NanoCpus = Math.round(spec.resourceLimits.cpuCount * 1e9);
  }

  return {
    name: spec.name,
    Image: spec.image,
    Env: Object.entries(spec.env).map(([key, value]) => `${key}=${value}`),
    Labels: spec.labels,
    ExposedPorts: { [portKey]: {} },
    HostConfig: hostConfig,
  };
}

export class DockerDriver implements BackendDriver {
  readonly name = 'docker';
  private readonly client: DockerClient;
  private readonly host: string;
  private readonly stopTimeoutSeconds: number;

  constructor(options: DockerDriverOptions) {
    this.client = options.client;
    this.host = options.host ?? 'localhost';
    this.stopTimeoutSeconds = options.stopTimeoutSeconds ?? 10;
  }

  async isAvailable(): Promise<boolean> {
    return this.client.isAvailable();
  }

  async create(spec: ContainerSpec): Promise<DriverHandle> {
    await this.client.ensureImage(spec.image);
    const containerId = await this.client.createContainer(toCreateOptions(spec));

    logger.debug({ containerId, name: spec.name, hostPort: spec.hostPort }, 'Sandbox container created');
    return { containerId, host: this.host };
  }

  async start(handle: DriverHandle): Promise<void> {
    await this.client.startContainer(handle.containerId);
  }

  async stop(handle: DriverHandle): Promise<void> {
    await this.client.stopContainer(handle.containerId, this.stopTimeoutSeconds);
  }

  async destroy(handle: DriverHandle): Promise<void> {
    await this.client.removeContainer(handle.containerId);
  }

  async isAlive(handle: DriverHandle): Promise<boolean> {
    return this.client.isContainerRunning(handle.containerId);
  }
}
