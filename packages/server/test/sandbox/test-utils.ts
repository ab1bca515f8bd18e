/**
 * Sandbox Test Utilities
 */

import { parseConfig, type WarmboxConfig } from '../../src/config/index.js';
import { SandboxManager, type SandboxManagerOptions } from '../../src/sandbox/manager.js';
import type { RedisCommands } from '../../src/state/redis-store.js';
import { MemoryStateStore } from '../../src/state/memory-store.js';
import type { SharedStateStore } from '../../src/state/types.js';
import type { BackendDriver, ContainerSpec, DriverHandle } from '../../src/sandbox/types.js';

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

interface FakeContainer {
  spec: ContainerSpec;
  running: boolean;
}

/**
 * In-memory backend driver. Containers are plain map entries.
 */
export class FakeDriver implements BackendDriver {
  readonly name = 'fake';
  available = true;
  /** Thrown from the next `create` calls while set */
  createError: Error | null = null;
  /** Real-time delay before `create` returns */
  createDelayMs = 0;
  /** Real-time delay before `destroy` returns */
  destroyDelayMs = 0;
  /** Make `destroy` never settle */
  destroyHangs = false;
  readonly containers = new Map<string, FakeContainer>();
  readonly calls = { create: 0, start: 0, stop: 0, destroy: 0 };
  private nextId = 1;

  async isAvailable(): Promise<boolean> {
    return this.available;
  }

  async create(spec: ContainerSpec): Promise<DriverHandle> {
    this.calls.create += 1;
    if (this.createDelayMs > 0) {
      await sleep(this.createDelayMs);
    }
    if (this.createError) {
      throw this.createError;
    }
    const containerId = `container-${this.nextId++}`;
    this.containers.set(containerId, { spec, running: false });
    return { containerId, host: 'localhost' };
  }

  async start(handle: DriverHandle): Promise<void> {
    this.calls.start += 1;
    const container = this.containers.get(handle.containerId);
    if (!container) {
      throw new Error(`No such container: ${handle.containerId}`);
    }
    container.running = true;
  }

  async stop(handle: DriverHandle): Promise<void> {
    this.calls.stop += 1;
    const container = this.containers.get(handle.containerId);
    if (container) {
      container.running = false;
    }
  }

  async destroy(handle: DriverHandle): Promise<void> {
    this.calls.destroy += 1;
    if (this.destroyHangs) {
      await new Promise<never>(() => {});
    }
    if (this.destroyDelayMs > 0) {
      await sleep(this.destroyDelayMs);
    }
    this.containers.delete(handle.containerId);
  }

  async isAlive(handle: DriverHandle): Promise<boolean> {
    return this.containers.get(handle.containerId)?.running ?? false;
  }

  /** Spec of the container created for a sandbox id */
  specFor(sandboxId: string): ContainerSpec | undefined {
    return [...this.containers.values()].find((container) => container.spec.name === sandboxId)?.spec;
  }

  /** Simulate every container exiting on its own */
  killAll(): void {
    for (const container of this.containers.values()) {
      container.running = false;
    }
  }
}

/**
 * Configuration for tests: a small port range and no background loops.
 */
export function createTestConfig(overrides: Record<string, unknown> = {}): WarmboxConfig {
  return parseConfig({
    portRange: [49152, 49160],
    poolSize: 0,
    ...overrides,
  });
}

export interface TestManagerOptions extends Partial<SandboxManagerOptions> {
  driver?: FakeDriver;
}

/**
 * Manager over a fake driver and the in-process store. Every port probes free.
 */
export function createTestManager(options: TestManagerOptions = {}): {
  manager: SandboxManager;
  driver: FakeDriver;
  store: SharedStateStore;
} {
  const driver = options.driver ?? new FakeDriver();
  const store = options.store ?? new MemoryStateStore();
  const manager = new SandboxManager({
    ...options,
    config: options.config ?? createTestConfig(),
    driver,
    store,
    workerId: options.workerId ?? 'worker-a',
    portProbe: options.portProbe ?? (async () => true),
  });
  return { manager, driver, store };
}

/**
 * Enough of Redis for the state store: hashes, lists and the owner-checked unclaim script.
 */
export class FakeRedis implements RedisCommands {
  readonly hashes = new Map<string, Map<string, string>>();
  readonly lists = new Map<string, string[]>();
  reachable = true;
  closed = false;

  private hash(key: string): Map<string, string> {
    let hash = this.hashes.get(key);
    if (!hash) {
      hash = new Map();
      this.hashes.set(key, hash);
    }
    return hash;
  }

  private list(key: string): string[] {
    let list = this.lists.get(key);
    if (!list) {
      list = [];
      this.lists.set(key, list);
    }
    return list;
  }

  async hsetnx(key: string, field: string, value: string): Promise<number> {
    const hash = this.hash(key);
    if (hash.has(field)) {
      return 0;
    }
    hash.set(field, value);
    return 1;
  }

  async hset(key: string, field: string, value: string): Promise<number> {
    const hash = this.hash(key);
    const added = hash.has(field) ? 0 : 1;
    hash.set(field, value);
    return added;
  }

  async hget(key: string, field: string): Promise<string | null> {
    return this.hash(key).get(field) ?? null;
  }

  async hdel(key: string, field: string): Promise<number> {
    return this.hash(key).delete(field) ? 1 : 0;
  }

  async hgetall(key: string): Promise<Record<string, string>> {
    return Object.fromEntries(this.hash(key));
  }

  async rpush(key: string, element: string): Promise<number> {
    const list = this.list(key);
    list.push(element);
    return list.length;
  }

  async lrem(key: string, _count: number, element: string): Promise<number> {
    const list = this.list(key);
    const kept = list.filter((item) => item !== element);
    this.lists.set(key, kept);
    return list.length - kept.length;
  }

  async lrange(key: string, start: number, stop: number): Promise<string[]> {
    const list = this.list(key);
    return list.slice(start, stop === -1 ? undefined : stop + 1);
  }

  async eval(_script: string, _numkeys: number, ...args: string[]): Promise<unknown> {
    const [key, member, owner] = args;
    if (key === undefined || member === undefined) {
      return 0;
    }
    const hash = this.hash(key);
    if (hash.get(member) !== owner) {
      return 0;
    }
    hash.delete(member);
    return 1;
  }

  async ping(): Promise<string> {
    if (!this.reachable) {
      throw new Error('connect ECONNREFUSED 127.0.0.1:6379');
    }
    return 'PONG';
  }

  async quit(): Promise<string> {
    this.closed = true;
    return 'OK';
  }
}
