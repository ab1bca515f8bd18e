import type { SharedStateConfig } from '../config/index.js';
import { MemoryStateStore } from './memory-store.js';
import { RedisStateStore, createRedisClient } from './redis-store.js';
import type { SharedStateStore } from './types.js';

export type { SharedStateStore } from './types.js';
export { StateKeys } from './keys.js';
export { MemoryStateStore } from './memory-store.js';
export { RedisStateStore, createRedisClient, type RedisCommands } from './redis-store.js';

/**
 * Pick the store for the configured deployment mode.
 */
export function createStateStore(config: SharedStateConfig): SharedStateStore {
  if (!config.enabled) {
    return new MemoryStateStore();
  }
  return new RedisStateStore(createRedisClient(config));
}
