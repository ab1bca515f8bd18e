/**
 * Sandbox Pool
 *
 * Keeps up to `size` warm instances per sandbox type so that acquire
 * hands over a running container instead of waiting for one to start.
 *
 * The bound counts warm instances plus creations and resets in flight.
 * Both are checked and incremented synchronously before any await, so
 * concurrent fills and give-backs cannot overshoot it.
 */

import type { SharedStateStore } from '../state/types.js';
import type { StateKeys } from '../state/keys.js';
import { createLogger } from '../utils/logger.js';
import { ProvisioningError, SandboxError } from './errors.js';
import { transitionInstance } from './instance-state.js';
import type { FillRetryPolicy } from './retry-policy.js';
import type { SandboxInstance } from './types.js';

const logger = createLogger('sandbox:pool');

/**
 * Instance operations the pool delegates to the lifecycle controller.
 */
export interface PoolLifecycle {
  /** Create a running instance in the warm state */
  create(type: string, env?: Record<string, string>): Promise<SandboxInstance>;
  /** Return an instance to a clean state for its next caller */
  reset(instance: SandboxInstance): Promise<void>;
  /** Check a warm instance is still running before handing it out */
  verify(instance: SandboxInstance): Promise<boolean>;
  destroy(instance: SandboxInstance): Promise<void>;
  /** Mirror the instance's current state to shared bookkeeping. Never throws. */
  persist(instance: SandboxInstance): Promise<void>;
}

export interface SandboxPoolOptions {
  size: number;
  lifecycle: PoolLifecycle;
  retry: FillRetryPolicy;
  store: SharedStateStore;
  keys: StateKeys;
}

export interface TakeResult {
  instance: SandboxInstance;
  /** True when served from warm capacity */
  fromPool: boolean;
}

export class SandboxPool {
  readonly size: number;
  private readonly lifecycle: PoolLifecycle;
  private readonly retry: FillRetryPolicy;
  private readonly store: SharedStateStore;
  private readonly keys: StateKeys;
  private readonly warm = new Map<string, SandboxInstance[]>();
  private readonly inflight = new Map<string, number>();
  private closed = false;

  constructor(options: SandboxPoolOptions) {
    this.size = options.size;
    this.lifecycle = options.lifecycle;
    this.retry = options.retry;
    this.store = options.store;
    this.keys = options.keys;
  }

  warmCount(type: string): number {
    return this.warm.get(type)?.length ?? 0;
  }

  inflightCount(type: string): number {
    return this.inflight.get(type) ?? 0;
  }

  warmInstances(type?: string): SandboxInstance[] {
    if (type !== undefined) {
      return [...(this.warm.get(type) ?? [])];
    }
    return [...this.warm.values()].flat();
  }

  /**
   * Stop filling and recycling. Instances created or reset after this
   * point are destroyed instead of joining the pool.
   */
  close(): void {
    this.closed = true;
  }

  /**
   * Take a slot if the type is below its bound. Synchronous on purpose.
   */
  private reserveSlot(type: string): boolean {
    if (this.warmCount(type) + this.inflightCount(type) >= this.size) {
      return false;
    }
    this.inflight.set(type, this.inflightCount(type) + 1);
    return true;
  }

  private releaseSlot(type: string): void {
    const count = this.inflightCount(type) - 1;
    if (count > 0) {
      this.inflight.set(type, count);
    } else {
      this.inflight.delete(type);
    }
  }

  private async enqueue(instance: SandboxInstance): Promise<void> {
    const queue = this.warm.get(instance.type) ?? [];
    queue.push(instance);
    this.warm.set(instance.type, queue);

    try {
      await this.store.pushQueue(this.keys.pool(instance.type), instance.id);
    } catch (error) {
      logger.warn({ err: error, sandboxId: instance.id }, 'Failed to mirror pool entry');
    }
  }

  private async dequeueMirror(instance: SandboxInstance): Promise<void> {
    try {
      await this.store.removeFromQueue(this.keys.pool(instance.type), instance.id);
    } catch (error) {
      logger.warn({ err: error, sandboxId: instance.id }, 'Failed to remove pool mirror entry');
    }
  }

  /**
   * Create instances until the type's warm count reaches the pool size.
   * Stops at the first failure and leaves the retry to the next tick,
   * and stops for good once the pool is closed.
   *
   * @returns number of instances created
   */
  async fill(type: string): Promise<number> {
    if (!this.retry.canAttempt(type)) {
      logger.debug({ type }, 'Fill suspended after repeated failures');
      return 0;
    }

    let created = 0;
    while (!this.closed && this.reserveSlot(type)) {
      let instance: SandboxInstance;
      try {
        instance = await this.lifecycle.create(type);
      } catch (error) {
        this.releaseSlot(type);
        if (this.closed) {
          logger.debug({ type, err: error }, 'Pool closed during fill');
          break;
        }
        const delay = this.retry.recordFailure(type);
        logger.warn(
          { err: error, type, failures: this.retry.failures(type), suspendedForMs: delay },
          'Pool fill failed'
        );
        break;
      }

      this.retry.recordSuccess(type);
      await this.lifecycle.persist(instance);
      // Slot release and queue push happen in the same tick
      this.releaseSlot(type);
      if (this.closed) {
        await this.discard(instance);
        break;
      }
      await this.enqueue(instance);
      created += 1;
    }

    if (created > 0) {
      logger.debug({ type, created, warm: this.warmCount(type) }, 'Pool filled');
    }
    return created;
  }

  /**
   * Hand out a warm instance in FIFO order, or create one on a miss.
   * Instances created for env overrides never come from the pool.
   */
  async take(type: string, env: Record<string, string> = {}): Promise<TakeResult> {
    if (Object.keys(env).length === 0) {
      const queue = this.warm.get(type);
      let instance = queue?.shift();

      while (instance) {
        await this.dequeueMirror(instance);

        if (await this.lifecycle.verify(instance)) {
          transitionInstance(instance, 'ASSIGN');
          logger.debug({ sandboxId: instance.id, type }, 'Served from pool');
          return { instance, fromPool: true };
        }

        logger.warn({ sandboxId: instance.id, type }, 'Warm instance is no longer running');
        await this.discard(instance);
        instance = queue?.shift();
      }
    }

    let instance: SandboxInstance;
    try {
      instance = await this.lifecycle.create(type, env);
    } catch (error) {
      if (error instanceof SandboxError) {
        throw error;
      }
      throw new ProvisioningError(type, error instanceof Error ? error.message : String(error), error);
    }

    transitionInstance(instance, 'ASSIGN');
    logger.debug({ sandboxId: instance.id, type }, 'Pool miss, created on demand');
    return { instance, fromPool: false };
  }

  /**
   * Return an assigned instance. It goes back to warm only when recycling
   * is requested and the type is below its bound; otherwise it is destroyed.
   *
   * @returns true when the instance was recycled
   */
  async giveBack(instance: SandboxInstance, recycle: boolean): Promise<boolean> {
    if (recycle && !this.closed && this.reserveSlot(instance.type)) {
      try {
        await this.lifecycle.reset(instance);
      } catch (error) {
        this.releaseSlot(instance.type);
        logger.warn({ err: error, sandboxId: instance.id }, 'Reset failed, destroying instance');
        await this.discard(instance);
        return false;
      }

      if (this.closed) {
        this.releaseSlot(instance.type);
        await this.discard(instance);
        return false;
      }

      transitionInstance(instance, 'RECYCLE');
      instance.expiresAt = null;
      instance.leaseSeconds = null;
      await this.lifecycle.persist(instance);
      this.releaseSlot(instance.type);
      await this.enqueue(instance);
      logger.debug({ sandboxId: instance.id, type: instance.type }, 'Instance recycled');
      return true;
    }

    await this.discard(instance);
    return false;
  }

  /**
   * Remove every warm instance (of one type, or of all) and destroy it.
   *
   * @returns ids of the destroyed instances
   */
  async drain(type?: string): Promise<string[]> {
    const types = type !== undefined ? [type] : [...this.warm.keys()];
    const drained: SandboxInstance[] = [];

    for (const key of types) {
      drained.push(...(this.warm.get(key) ?? []));
      this.warm.delete(key);
    }

    await Promise.all(
      drained.map(async (instance) => {
        await this.dequeueMirror(instance);
        await this.discard(instance);
      })
    );

    return drained.map((instance) => instance.id);
  }

  private async discard(instance: SandboxInstance): Promise<void> {
    if (instance.state !== 'destroyed') {
      transitionInstance(instance, 'DESTROY');
    }
    await this.lifecycle.destroy(instance);
  }
}
