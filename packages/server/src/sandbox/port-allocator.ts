/**
 * Port Allocator
 *
 * Reserves host ports from the configured range. The shared store's
 * atomic claim is the reservation; a bind probe on top skips ports that
 * something outside warmbox already listens on.
 */

import { createServer } from 'node:net';
import { createLogger } from '../utils/logger.js';
import type { SharedStateStore } from '../state/types.js';
import type { StateKeys } from '../state/keys.js';
import { ExhaustionError, StateStoreError } from './errors.js';

const logger = createLogger('sandbox:ports');

/**
 * Resolves true when the port can be bound on this host.
 */
export type PortProbe = (port: number) => Promise<boolean>;

export function probeHostPort(port: number): Promise<boolean> {
  return new Promise((resolve) => {
    const server = createServer();
    server.once('error', (error: Error) => {
      logger.debug({ port, err: error }, 'Port busy on host');
      resolve(false);
    });
    server.once('listening', () => {
      server.close(() => resolve(true));
    });
    server.listen(port, '0.0.0.0');
  });
}

/**
 * Claim value recorded against a reserved port.
 */
export function portHolder(owner: string, instanceId: string): string {
  return `${owner}/${instanceId}`;
}

export interface PortAllocatorOptions {
  store: SharedStateStore;
  keys: StateKeys;
  range: readonly [number, number];
  /** Worker id recorded against each reservation */
  owner: string;
  probe?: PortProbe;
}

export class PortAllocator {
  private readonly store: SharedStateStore;
  private readonly keys: StateKeys;
  readonly range: readonly [number, number];
  readonly owner: string;
  private readonly probe: PortProbe;

  constructor(options: PortAllocatorOptions) {
    this.store = options.store;
    this.keys = options.keys;
    this.range = options.range;
    this.owner = options.owner;
    this.probe = options.probe ?? probeHostPort;
  }

  get size(): number {
    return this.range[1] - this.range[0] + 1;
  }

  /**
   * Reserve the lowest free port in the range for one instance.
   *
   * @throws ExhaustionError when every port is reserved
   * @throws StateStoreError when the reservation write fails
   */
  async acquire(instanceId: string): Promise<number> {
    const [low, high] = this.range;
    const holder = portHolder(this.owner, instanceId);

    for (let port = low; port <= high; port++) {
      let claimed: boolean;
      try {
        claimed = await this.store.claim(this.keys.ports, String(port), holder);
      } catch (error) {
        throw new StateStoreError('reserve port', error);
      }

      if (!claimed) {
        continue;
      }

      if (await this.probe(port)) {
        logger.debug({ port, holder }, 'Port reserved');
        return port;
      }

      // Taken by a process outside warmbox
      await this.release(port, instanceId);
    }

    logger.warn({ range: this.range }, 'Port range exhausted');
    throw new ExhaustionError(this.range);
  }

  /**
   * Clear an instance's reservation. Releasing a free port, or one now
   * held by a different instance, is a no-op.
   */
  async release(port: number, instanceId: string, owner: string = this.owner): Promise<boolean> {
    const holder = portHolder(owner, instanceId);
    try {
      const released = await this.store.unclaim(this.keys.ports, String(port), holder);
      if (released) {
        logger.debug({ port, holder }, 'Port released');
      }
      return released;
    } catch (error) {
      throw new StateStoreError('release port', error);
    }
  }

  /**
   * Every reserved port across all workers.
   */
  async held(): Promise<number[]> {
    const claims = await this.store.claims(this.keys.ports);
    return [...claims.keys()].map(Number).sort((a, b) => a - b);
  }
}
