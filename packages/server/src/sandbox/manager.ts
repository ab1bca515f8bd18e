/**
 * Sandbox Manager
 *
 * Lifecycle controller for sandbox instances. Owns the type registry,
 * the port allocator, the warm pool and the background fill and sweep
 * loops, and mirrors every instance to the shared state store so that
 * peer workers can inspect and release it.
 */

import { nanoid } from 'nanoid';
import type {
  HeartbeatResult,
  ManagerStatus,
  PoolStatus,
  SandboxHandle,
  SandboxInspection,
  SandboxSummary,
} from '@warmbox/shared';
import type { WarmboxConfig } from '../config/index.js';
import { createStateStore } from '../state/index.js';
import { StateKeys } from '../state/keys.js';
import type { SharedStateStore } from '../state/types.js';
import { createWorkspaceStorage } from '../storage/index.js';
import type { WorkspaceStorage } from '../storage/types.js';
import { createLogger } from '../utils/logger.js';
import { registerBuiltinTypes } from './builtin-types.js';
import { createDriver } from './drivers/index.js';
import {
  BackendUnavailableError,
  NotFoundError,
  ProvisioningError,
  StateStoreError,
  UnknownTypeError,
} from './errors.js';
import { InstanceFactory } from './instance-factory.js';
import { transitionInstance } from './instance-state.js';
import { SandboxPool, type PoolLifecycle, type TakeResult } from './pool.js';
import { PortAllocator, type PortProbe } from './port-allocator.js';
import { SandboxRegistry } from './registry.js';
import { FillRetryPolicy } from './retry-policy.js';
import {
  instanceRecordSchema,
  type BackendDriver,
  type InstanceRecord,
  type SandboxInstance,
} from './types.js';

const logger = createLogger('sandbox:manager');

export interface SandboxManagerOptions {
  config: WarmboxConfig;
  driver: BackendDriver;
  store: SharedStateStore;
  registry?: SandboxRegistry;
  storage?: WorkspaceStorage | null;
  /** Identifies this worker in port claims and instance records */
  workerId?: string;
  portProbe?: PortProbe;
  processEnv?: NodeJS.ProcessEnv;
}

export interface AcquireOptions {
  /** Lease length; defaults to the type's timeout */
  timeoutSeconds?: number;
  /** Environment overrides. Non-empty overrides bypass the warm pool. */
  env?: Record<string, string>;
}

/** Why an instance is being released */
export type ReleaseReason = 'caller' | 'expired';

export interface InitializeOptions {
  /** Start the background fill and sweep loops */
  maintenance?: boolean;
}

export interface ShutdownResult {
  destroyed: string[];
  /** Instances still present when the grace period ran out */
  abandoned: string[];
}

function parseRecord(raw: string): InstanceRecord | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    logger.warn({ err: error }, 'Instance record is not valid JSON');
    return null;
  }
  const result = instanceRecordSchema.safeParse(value);
  if (!result.success) {
    logger.warn({ errors: result.error.issues }, 'Instance record failed validation');
    return null;
  }
  return result.data;
}

function unknownInspection(id: string): SandboxInspection {
  return {
    id,
    type: null,
    state: 'unknown',
    port: null,
    ageMs: null,
    createdAt: null,
    lastActivityAt: null,
    expiresAt: null,
    local: false,
  };
}

export class SandboxManager {
  readonly config: WarmboxConfig;
  readonly registry: SandboxRegistry;
  readonly workerId: string;
  private readonly driver: BackendDriver;
  private readonly store: SharedStateStore;
  private readonly storage: WorkspaceStorage | null;
  private readonly keys: StateKeys;
  private readonly ports: PortAllocator;
  private readonly factory: InstanceFactory;
  private readonly pool: SandboxPool;

  /** Every live instance this worker owns, warm or assigned */
  private readonly instances = new Map<string, SandboxInstance>();
  /** Ids with an acquire or release in progress */
  private readonly busy = new Set<string>();

  private fillTimer: NodeJS.Timeout | null = null;
  private sweepTimer: NodeJS.Timeout | null = null;
  private fillInFlight: Promise<void> | null = null;
  /** Backend creations not yet settled, including their shutdown cleanup */
  private readonly creations = new Set<Promise<SandboxInstance>>();
  private sweeping = false;
  private lastSweep: Date | null = null;
  private shuttingDown = false;
  private shutdownPromise: Promise<ShutdownResult> | null = null;

  constructor(options: SandboxManagerOptions) {
    this.config = options.config;
    this.driver = options.driver;
    this.store = options.store;
    this.registry = options.registry ?? new SandboxRegistry();
    this.storage = options.storage ?? null;
    this.workerId = options.workerId ?? `worker-${process.pid}-${nanoid(6)}`;
    this.keys = new StateKeys(this.config.sharedState.namespace);

    this.ports = new PortAllocator({
      store: this.store,
      keys: this.keys,
      range: this.config.portRange,
      owner: this.workerId,
      ...(options.portProbe && { probe: options.portProbe }),
    });

    this.factory = new InstanceFactory({
      config: this.config,
      driver: this.driver,
      ports: this.ports,
      registry: this.registry,
      storage: this.storage,
      ...(options.processEnv && { processEnv: options.processEnv }),
    });

    this.pool = new SandboxPool({
      size: this.config.poolSize,
      lifecycle: this.createLifecycle(),
      retry: new FillRetryPolicy(this.config.fillRetry),
      store: this.store,
      keys: this.keys,
    });
  }

  get backendName(): string {
    return this.driver.name;
  }

  get isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  isBackendAvailable(): Promise<boolean> {
    return this.driver.isAvailable();
  }

  isStoreReachable(): Promise<boolean> {
    return this.store.ping();
  }

  /**
   * Check the backend and the shared store, register the built-in types
   * and pre-warm the default pools.
   *
   * @throws BackendUnavailableError if the backend cannot be reached
   * @throws StateStoreError if the shared store cannot be reached
   */
  async initialize(options: InitializeOptions = {}): Promise<void> {
    if (!(await this.store.ping())) {
      throw new StateStoreError('ping');
    }
    if (!(await this.driver.isAvailable())) {
      throw new BackendUnavailableError(this.driver.name);
    }

    registerBuiltinTypes(this.registry, this.config.images);

    for (const type of this.config.defaultSandboxTypes) {
      if (!this.registry.has(type)) {
        throw new UnknownTypeError(type);
      }
    }

    await this.fillPools();

    if (options.maintenance ?? true) {
      this.startMaintenance();
    }

    logger.info(
      {
        backend: this.driver.name,
        workerId: this.workerId,
        poolSize: this.config.poolSize,
        defaultSandboxTypes: this.config.defaultSandboxTypes,
        sharedState: this.store.kind,
      },
      'Sandbox manager initialized'
    );
  }

  /**
   * Hand out a sandbox, from the warm pool when one is available.
   */
  async acquire(type?: string, options: AcquireOptions = {}): Promise<SandboxHandle> {
    const sandboxType = type ?? this.config.defaultSandboxTypes[0] ?? 'base';
    const entry = this.registry.get(sandboxType);
    if (!entry) {
      throw new UnknownTypeError(sandboxType);
    }
    if (this.shuttingDown) {
      throw new BackendUnavailableError(this.driver.name);
    }

    let taken: TakeResult;
    try {
      taken = await this.pool.take(sandboxType, options.env ?? {});
    } catch (error) {
      if (error instanceof ProvisioningError && !(await this.driver.isAvailable())) {
        throw new BackendUnavailableError(this.driver.name, error);
      }
      throw error;
    }

    const { instance, fromPool } = taken;
    const lease = options.timeoutSeconds ?? entry.timeoutSeconds;
    const now = new Date();
    const expiresAt = new Date(now.getTime() + lease * 1000);
    instance.lastActivityAt = now;
    instance.leaseSeconds = lease;
    instance.expiresAt = expiresAt;

    this.busy.add(instance.id);
    try {
      await this.store.putRecord(this.keys.instances, instance.id, JSON.stringify(this.toRecord(instance)));
    } catch (error) {
      transitionInstance(instance, 'DESTROY');
      await this.destroyInstance(instance);
      throw new StateStoreError('record instance', error);
    } finally {
      this.busy.delete(instance.id);
    }

    logger.info(
      { sandboxId: instance.id, type: sandboxType, port: instance.port, fromPool, leaseSeconds: lease },
      'Sandbox acquired'
    );

    return {
      id: instance.id,
      type: instance.type,
      baseUrl: instance.baseUrl,
      bearerToken: instance.token,
      expiresAt: expiresAt.toISOString(),
    };
  }

  /**
   * Release an assigned sandbox. Releasing an unknown or already
   * released id is a no-op.
   *
   * @returns true when this call released the instance
   */
  async release(id: string, reason: ReleaseReason = 'caller'): Promise<boolean> {
    const instance = this.instances.get(id);

    if (instance) {
      if (instance.state !== 'assigned' || this.busy.has(id)) {
        logger.debug({ sandboxId: id, state: instance.state }, 'Release ignored');
        return false;
      }

      this.busy.add(id);
      try {
        const recycle = reason === 'caller' && this.config.autoCleanup;
        const recycled = await this.pool.giveBack(instance, recycle);
        logger.info({ sandboxId: id, type: instance.type, reason, recycled }, 'Sandbox released');
        return true;
      } finally {
        this.busy.delete(id);
      }
    }

    const record = await this.readRecord(id);
    if (!record || record.state !== 'assigned') {
      logger.debug({ sandboxId: id }, 'Release of unknown sandbox ignored');
      return false;
    }

    await this.releaseForeign(record);
    logger.info({ sandboxId: id, owner: record.owner, reason }, 'Released sandbox owned by peer worker');
    return true;
  }

  /**
   * Report an instance's state. Instances owned by a peer are read from
   * the shared store; when it cannot be read the state is 'unknown'.
   *
   * @throws NotFoundError when no worker knows the id
   */
  async inspect(id: string): Promise<SandboxInspection> {
    const now = Date.now();
    const instance = this.instances.get(id);

    if (instance) {
      return {
        id,
        type: instance.type,
        state: instance.state,
        port: instance.port,
        ageMs: now - instance.createdAt.getTime(),
        createdAt: instance.createdAt.toISOString(),
        lastActivityAt: instance.lastActivityAt.toISOString(),
        expiresAt: instance.expiresAt?.toISOString() ?? null,
        local: true,
      };
    }

    let raw: string | null;
    try {
      raw = await this.store.getRecord(this.keys.instances, id);
    } catch (error) {
      logger.warn({ err: error, sandboxId: id }, 'Shared state unreadable during inspect');
      return unknownInspection(id);
    }

    if (raw === null) {
      throw new NotFoundError(id);
    }

    const record = parseRecord(raw);
    if (!record) {
      return unknownInspection(id);
    }

    return {
      id,
      type: record.type,
      state: record.state,
      port: record.port,
      ageMs: now - Date.parse(record.createdAt),
      createdAt: record.createdAt,
      lastActivityAt: record.lastActivityAt,
      expiresAt: record.expiresAt,
      local: false,
    };
  }

  /**
   * Record activity on an assigned sandbox and extend its lease.
   *
   * @throws NotFoundError when the id is not an assigned sandbox
   */
  async heartbeat(id: string): Promise<HeartbeatResult> {
    const now = new Date();
    const instance = this.instances.get(id);

    if (instance) {
      if (instance.state !== 'assigned') {
        throw new NotFoundError(id);
      }
      instance.lastActivityAt = now;
      if (instance.leaseSeconds !== null) {
        instance.expiresAt = new Date(now.getTime() + instance.leaseSeconds * 1000);
      }
      await this.persist(instance);
      return { id, lastActivityAt: now.toISOString() };
    }

    const record = await this.readRecord(id);
    if (!record || record.state !== 'assigned') {
      throw new NotFoundError(id);
    }

    const updated: InstanceRecord = {
      ...record,
      lastActivityAt: now.toISOString(),
      expiresAt:
        record.leaseSeconds !== null
          ? new Date(now.getTime() + record.leaseSeconds * 1000).toISOString()
          : record.expiresAt,
    };

    try {
      await this.store.putRecord(this.keys.instances, id, JSON.stringify(updated));
    } catch (error) {
      throw new StateStoreError('record heartbeat', error);
    }

    return { id, lastActivityAt: updated.lastActivityAt };
  }

  /**
   * Instances owned by this worker, oldest first.
   */
  list(): SandboxSummary[] {
    return [...this.instances.values()]
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map((instance) => ({
        id: instance.id,
        type: instance.type,
        state: instance.state,
        port: instance.port,
        baseUrl: instance.baseUrl,
        createdAt: instance.createdAt.toISOString(),
        lastActivityAt: instance.lastActivityAt.toISOString(),
        expiresAt: instance.expiresAt?.toISOString() ?? null,
      }));
  }

  /**
   * Release assigned instances that have been idle longer than
   * `maxIdleMs` or whose lease has expired. Activity recorded by peer
   * workers counts.
   *
   * @returns ids of the released instances
   */
  async sweep(maxIdleMs: number = this.config.maxIdleSeconds * 1000): Promise<string[]> {
    let records: Map<string, string> | null = null;
    try {
      records = await this.store.records(this.keys.instances);
    } catch (error) {
      logger.warn({ err: error }, 'Shared state unreadable during sweep, using local activity');
    }

    const now = Date.now();
    const released: string[] = [];

    for (const instance of [...this.instances.values()]) {
      if (instance.state !== 'assigned' || this.busy.has(instance.id)) {
        continue;
      }

      if (records) {
        let raw = records.get(instance.id) ?? null;
        if (raw === null) {
          // The record may have been written after the snapshot
          try {
            raw = await this.store.getRecord(this.keys.instances, instance.id);
          } catch (error) {
            logger.warn({ err: error, sandboxId: instance.id }, 'Could not confirm missing record, skipping');
            continue;
          }
        }
        if (raw === null) {
          if (instance.state !== 'assigned' || this.busy.has(instance.id)) {
            continue;
          }
          // A peer released it through the shared store
          transitionInstance(instance, 'DESTROY');
          await this.destroyInstance(instance);
          released.push(instance.id);
          continue;
        }
        const record = parseRecord(raw);
        if (record) {
          this.syncActivity(instance, record);
        }
      }

      const idle = now - instance.lastActivityAt.getTime() > maxIdleMs;
      const expired = instance.expiresAt !== null && instance.expiresAt.getTime() <= now;
      if (!idle && !expired) {
        continue;
      }

      if (await this.release(instance.id, 'expired')) {
        released.push(instance.id);
      }
    }

    this.lastSweep = new Date();
    if (released.length > 0) {
      logger.info({ released: released.length }, 'Sweep released sandboxes');
    }
    return released;
  }

  /**
   * Stop the background loops and, when auto-cleanup is on, destroy every
   * instance this worker owns within the grace period. Safe to call twice.
   */
  shutdown(): Promise<ShutdownResult> {
    this.shutdownPromise ??= this.performShutdown();
    return this.shutdownPromise;
  }

  /**
   * Release the shared store connection. Call after `shutdown`.
   */
  async close(): Promise<void> {
    this.stopMaintenance();
    await this.store.close();
  }

  async getStatus(): Promise<ManagerStatus> {
    let heldPorts: number | null = null;
    try {
      heldPorts = (await this.ports.held()).length;
    } catch (error) {
      logger.warn({ err: error }, 'Failed to read port reservations');
    }

    const types = new Set<string>([
      ...this.config.defaultSandboxTypes,
      ...[...this.instances.values()].map((instance) => instance.type),
    ]);

    const pools: PoolStatus[] = [...types].sort().map((type) => ({
      type,
      warm: this.pool.warmCount(type),
      inflight: this.pool.inflightCount(type),
      assigned: [...this.instances.values()].filter(
        (instance) => instance.type === type && instance.state === 'assigned'
      ).length,
    }));

    return {
      backend: this.driver.name,
      backendAvailable: await this.driver.isAvailable(),
      workerId: this.workerId,
      sharedState: this.store.kind === 'redis',
      portRange: [this.config.portRange[0], this.config.portRange[1]],
      heldPorts,
      pools,
      lastSweep: this.lastSweep?.toISOString() ?? null,
      shuttingDown: this.shuttingDown,
    };
  }

  /**
   * Start the periodic fill and sweep loops
   */
  startMaintenance(): void {
    if (this.fillTimer || this.sweepTimer) {
      return;
    }

    this.fillTimer = setInterval(() => {
      this.fillPools().catch((error: unknown) => {
        logger.error({ err: error }, 'Pool fill tick failed');
      });
    }, this.config.fillIntervalMs);

    this.sweepTimer = setInterval(() => {
      this.runSweep().catch((error: unknown) => {
        logger.error({ err: error }, 'Sweep tick failed');
      });
    }, this.config.sweepIntervalMs);

    // Don't block process exit
    this.fillTimer.unref();
    this.sweepTimer.unref();

    logger.debug(
      { fillIntervalMs: this.config.fillIntervalMs, sweepIntervalMs: this.config.sweepIntervalMs },
      'Maintenance loops started'
    );
  }

  stopMaintenance(): void {
    if (this.fillTimer) {
      clearInterval(this.fillTimer);
      this.fillTimer = null;
    }
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  /**
   * Top up every default pool. Overlapping ticks are skipped.
   */
  async fillPools(): Promise<void> {
    if (this.fillInFlight || this.shuttingDown) {
      return;
    }
    this.fillInFlight = Promise.all(this.config.defaultSandboxTypes.map((type) => this.pool.fill(type))).then(
      () => undefined
    );
    try {
      await this.fillInFlight;
    } finally {
      this.fillInFlight = null;
    }
  }

  private async runSweep(): Promise<void> {
    if (this.sweeping) {
      return;
    }
    this.sweeping = true;
    try {
      await this.sweep();
    } finally {
      this.sweeping = false;
    }
  }

  private async performShutdown(): Promise<ShutdownResult> {
    this.shuttingDown = true;
    this.stopMaintenance();
    this.pool.close();

    if (!this.config.autoCleanup) {
      logger.info({ instances: this.instances.size }, 'Auto-cleanup disabled, leaving sandboxes running');
      return { destroyed: [], abandoned: [] };
    }

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), this.config.shutdownGraceMs);
      timer.unref();
    });

    // Creations still running either join the pool before it is drained
    // or are destroyed when they finish
    const settling = Promise.allSettled([this.fillInFlight, ...this.creations]);
    let outcome = await Promise.race([settling.then(() => 'done' as const), deadline]);

    const targets = [...this.instances.keys()];
    const assigned = [...this.instances.values()].filter((instance) => instance.state === 'assigned');

    if (outcome === 'done') {
      const work = Promise.all([
        this.pool.drain(),
        ...assigned.map(async (instance) => {
          transitionInstance(instance, 'DESTROY');
          await this.destroyInstance(instance);
        }),
      ]);
      outcome = await Promise.race([work.then(() => 'done' as const), deadline]);
    }
    clearTimeout(timer);

    const abandoned = targets.filter((id) => this.instances.has(id));
    const destroyed = targets.filter((id) => !this.instances.has(id));

    if (outcome === 'timeout') {
      logger.warn(
        { abandoned, graceMs: this.config.shutdownGraceMs },
        'Shutdown grace period elapsed with sandboxes still running'
      );
    }

    logger.info({ destroyed: destroyed.length, abandoned: abandoned.length }, 'Sandbox manager shut down');
    return { destroyed, abandoned };
  }

  private createLifecycle(): PoolLifecycle {
    return {
      create: async (type, env) => {
        const creation = this.createInstance(type, env);
        this.creations.add(creation);
        try {
          return await creation;
        } finally {
          this.creations.delete(creation);
        }
      },
      reset: async (instance) => {
        await this.driver.stop(instance.handle);
        await this.driver.start(instance.handle);
        if (!(await this.driver.isAlive(instance.handle))) {
          throw new Error(`Sandbox ${instance.id} did not come back after reset`);
        }
      },
      verify: (instance) => this.driver.isAlive(instance.handle),
      destroy: (instance) => this.destroyInstance(instance),
      persist: (instance) => this.persist(instance),
    };
  }

  /**
   * @throws BackendUnavailableError when shutdown began while the container was starting
   */
  private async createInstance(type: string, env?: Record<string, string>): Promise<SandboxInstance> {
    const instance = await this.factory.create(type, env);
    if (this.shuttingDown) {
      logger.info({ sandboxId: instance.id, type }, 'Discarding sandbox created during shutdown');
      transitionInstance(instance, 'DESTROY');
      await this.destroyInstance(instance);
      throw new BackendUnavailableError(this.driver.name);
    }
    this.instances.set(instance.id, instance);
    return instance;
  }

  private toRecord(instance: SandboxInstance): InstanceRecord {
    return {
      id: instance.id,
      type: instance.type,
      owner: this.workerId,
      backend: this.driver.name,
      containerId: instance.handle.containerId,
      host: instance.handle.host,
      port: instance.port,
      baseUrl: instance.baseUrl,
      state: instance.state,
      createdAt: instance.createdAt.toISOString(),
      lastActivityAt: instance.lastActivityAt.toISOString(),
      expiresAt: instance.expiresAt?.toISOString() ?? null,
      leaseSeconds: instance.leaseSeconds,
      mountDir: instance.mountDir,
      storagePath: instance.storagePath,
    };
  }

  private async persist(instance: SandboxInstance): Promise<void> {
    try {
      await this.store.putRecord(this.keys.instances, instance.id, JSON.stringify(this.toRecord(instance)));
    } catch (error) {
      logger.warn({ err: error, sandboxId: instance.id }, 'Failed to mirror instance record');
    }
  }

  /**
   * @throws StateStoreError when the store cannot be read
   */
  private async readRecord(id: string): Promise<InstanceRecord | null> {
    let raw: string | null;
    try {
      raw = await this.store.getRecord(this.keys.instances, id);
    } catch (error) {
      throw new StateStoreError('read instance record', error);
    }
    return raw === null ? null : parseRecord(raw);
  }

  private syncActivity(instance: SandboxInstance, record: InstanceRecord): void {
    const recorded = Date.parse(record.lastActivityAt);
    if (recorded <= instance.lastActivityAt.getTime()) {
      return;
    }
    instance.lastActivityAt = new Date(recorded);
    if (record.expiresAt !== null) {
      instance.expiresAt = new Date(record.expiresAt);
    }
  }

  /**
   * Tear down an instance and everything it holds. Each step is attempted
   * even when an earlier one fails.
   */
  private async destroyInstance(instance: SandboxInstance): Promise<void> {
    try {
      await this.driver.destroy(instance.handle);
    } catch (error) {
      logger.error({ err: error, sandboxId: instance.id }, 'Failed to destroy sandbox container');
    }

    try {
      await this.ports.release(instance.port, instance.id);
    } catch (error) {
      logger.error({ err: error, sandboxId: instance.id, port: instance.port }, 'Failed to release port');
    }

    try {
      await this.store.deleteRecord(this.keys.instances, instance.id);
    } catch (error) {
      logger.warn({ err: error, sandboxId: instance.id }, 'Failed to delete instance record');
    }

    this.instances.delete(instance.id);

    await this.uploadWorkspace(instance.id, instance.mountDir, instance.storagePath);
    logger.info({ sandboxId: instance.id, type: instance.type }, 'Sandbox destroyed');
  }

  private async releaseForeign(record: InstanceRecord): Promise<void> {
    try {
      await this.driver.destroy({ containerId: record.containerId, host: record.host });
    } catch (error) {
      logger.error({ err: error, sandboxId: record.id }, 'Failed to destroy peer sandbox container');
    }

    try {
      await this.ports.release(record.port, record.id, record.owner);
    } catch (error) {
      logger.error({ err: error, sandboxId: record.id, port: record.port }, 'Failed to release peer port');
    }

    try {
      await this.store.deleteRecord(this.keys.instances, record.id);
      await this.store.removeFromQueue(this.keys.pool(record.type), record.id);
    } catch (error) {
      logger.warn({ err: error, sandboxId: record.id }, 'Failed to clear peer instance record');
    }

    await this.uploadWorkspace(record.id, record.mountDir, record.storagePath);
  }

  private async uploadWorkspace(id: string, mountDir: string | null, storagePath: string | null): Promise<void> {
    if (!this.storage || !mountDir || !storagePath) {
      return;
    }
    try {
      await this.storage.upload(mountDir, storagePath);
    } catch (error) {
      logger.error({ err: error, sandboxId: id, storagePath }, 'Failed to upload sandbox workspace');
    }
  }
}

/**
 * Build a manager wired to the backend, shared store and workspace
 * storage that the configuration selects.
 */
export function createSandboxManager(config: WarmboxConfig): SandboxManager {
  return new SandboxManager({
    config,
    driver: createDriver(config),
    store: createStateStore(config.sharedState),
    storage: createWorkspaceStorage(config.storage),
  });
}
