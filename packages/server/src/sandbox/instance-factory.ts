/**
 * Instance Factory
 *
 * Creates one warm sandbox instance: reserves its port, resolves its
 * environment, prepares its mount directory and brings the container up
 * through the backend driver.
 */

import { randomBytes } from 'node:crypto';
import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { customAlphabet } from 'nanoid';
import type { WarmboxConfig } from '../config/index.js';
import type { WorkspaceStorage } from '../storage/types.js';
import { createLogger } from '../utils/logger.js';
import { ProvisioningError, SandboxError, UnknownTypeError } from './errors.js';
import type { PortAllocator } from './port-allocator.js';
import type { SandboxRegistry } from './registry.js';
import type {
  BackendDriver,
  ContainerSpec,
  DriverHandle,
  MountSpec,
  SandboxInstance,
  SandboxTypeEntry,
} from './types.js';

const logger = createLogger('sandbox:factory');

/** Label keys put on every container warmbox creates */
export const LABELS = {
  managed: 'warmbox.managed',
  type: 'warmbox.type',
  instance: 'warmbox.instance',
} as const;

/** Mount point of the per-instance workspace inside the container */
export const WORKSPACE_MOUNT = '/workspace';

const instanceSuffix = customAlphabet('abcdefghijklmnopqrstuvwxyz0123456789', 20);

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Resolve a type's declared environment against acquire-time overrides
 * and the manager's own environment. A `null` default must be supplied by
 * one of the two.
 */
export function resolveEnvironment(
  entry: SandboxTypeEntry,
  overrides: Record<string, string>,
  processEnv: NodeJS.ProcessEnv
): Record<string, string> {
  const resolved: Record<string, string> = {};
  const missing: string[] = [];

  for (const [name, value] of Object.entries(entry.env)) {
    const supplied = overrides[name] ?? value ?? processEnv[name];
    if (supplied === undefined) {
      missing.push(name);
      continue;
    }
    resolved[name] = supplied;
  }

  if (missing.length > 0) {
    throw new ProvisioningError(entry.type, `missing required environment variables: ${missing.join(', ')}`);
  }

  return { ...resolved, ...overrides };
}

export interface InstanceFactoryOptions {
  config: Pick<WarmboxConfig, 'containerPrefix' | 'defaultMountDir' | 'readonlyMounts' | 'storage'>;
  driver: BackendDriver;
  ports: PortAllocator;
  registry: SandboxRegistry;
  storage: WorkspaceStorage | null;
  processEnv?: NodeJS.ProcessEnv;
}

export class InstanceFactory {
  private readonly options: InstanceFactoryOptions;
  private readonly processEnv: NodeJS.ProcessEnv;

  constructor(options: InstanceFactoryOptions) {
    this.options = options;
    this.processEnv = options.processEnv ?? process.env;
  }

  /**
   * Create and start a new instance in the warm state.
   *
   * @throws UnknownTypeError, ExhaustionError, StateStoreError or ProvisioningError
   */
  async create(type: string, overrides: Record<string, string> = {}): Promise<SandboxInstance> {
    const { config, driver, ports, registry, storage } = this.options;

    const entry = registry.get(type);
    if (!entry) {
      throw new UnknownTypeError(type);
    }

    const id = `${config.containerPrefix}${instanceSuffix()}`;
    const port = await ports.acquire(id);
    let handle: DriverHandle | null = null;

    try {
      const token = randomBytes(16).toString('hex');
      const env = { ...resolveEnvironment(entry, overrides, this.processEnv), SECRET_TOKEN: token };

      const mounts: MountSpec[] = [];
      let mountDir: string | null = null;
      let storagePath: string | null = null;

      if (config.defaultMountDir) {
        mountDir = join(config.defaultMountDir, id);
        await mkdir(mountDir, { recursive: true });

        if (storage && config.storage.folder) {
          storagePath = storage.join(config.storage.folder, id);
          await storage.download(storagePath, mountDir);
        }

        mounts.push({ hostPath: mountDir, containerPath: WORKSPACE_MOUNT, readOnly: false });
      }

      for (const [hostPath, containerPath] of Object.entries(config.readonlyMounts)) {
        mounts.push({ hostPath, containerPath, readOnly: true });
      }

      let spec: ContainerSpec = {
        name: id,
        image: entry.image,
        env,
        hostPort: port,
        containerPort: entry.containerPort,
        mounts,
        securityLevel: entry.securityLevel,
        labels: {
          [LABELS.managed]: 'true',
          [LABELS.type]: type,
          [LABELS.instance]: id,
        },
      };
      if (entry.resourceLimits) {
        spec.resourceLimits = entry.resourceLimits;
      }
      if (entry.configure) {
        spec = entry.configure(spec);
      }

      const created = await driver.create(spec).catch((error: unknown) => {
        throw new ProvisioningError(type, errorMessage(error), error);
      });
      handle = created;

      await driver.start(created).catch((error: unknown) => {
        throw new ProvisioningError(type, errorMessage(error), error);
      });

      if (!(await driver.isAlive(created))) {
        throw new ProvisioningError(type, 'container exited after start');
      }

      const now = new Date();
      const instance: SandboxInstance = {
        id,
        type,
        handle: created,
        port,
        baseUrl: `http://${created.host}:${port}`,
        token,
        state: 'warm',
        createdAt: now,
        lastActivityAt: now,
        expiresAt: null,
        leaseSeconds: null,
        mountDir,
        storagePath,
      };

      logger.info(
        { sandboxId: id, type, port, containerId: created.containerId, backend: driver.name },
        'Sandbox instance created'
      );

      return instance;
    } catch (error) {
      await this.cleanup(type, id, port, handle);
      if (error instanceof SandboxError) {
        throw error;
      }
      throw new ProvisioningError(type, errorMessage(error), error);
    }
  }

  private async cleanup(type: string, id: string, port: number, handle: DriverHandle | null): Promise<void> {
    const { driver, ports } = this.options;

    if (handle) {
      try {
        await driver.destroy(handle);
      } catch (error) {
        logger.warn({ err: error, type, containerId: handle.containerId }, 'Failed to remove partial container');
      }
    }

    try {
      await ports.release(port, id);
    } catch (error) {
      logger.error({ err: error, type, port }, 'Failed to release port after provisioning failure');
    }
  }
}
