/**
 * Redis-backed shared state for multi-worker deployments.
 */

import { Redis } from 'ioredis';
import type { SharedStateConfig } from '../config/index.js';
import { createLogger } from '../utils/logger.js';
import type { SharedStateStore } from './types.js';

const logger = createLogger('state:redis');

/**
 * The subset of the ioredis command surface this store uses.
 */
export interface RedisCommands {
  hsetnx(key: string, field: string, value: string): Promise<number>;
  hset(key: string, field: string, value: string): Promise<number>;
  hget(key: string, field: string): Promise<string | null>;
  hdel(key: string, field: string): Promise<number>;
  hgetall(key: string): Promise<Record<string, string>>;
  rpush(key: string, element: string): Promise<number>;
  lrem(key: string, count: number, element: string): Promise<number>;
  lrange(key: string, start: number, stop: number): Promise<string[]>;
  eval(script: string, numkeys: number, ...args: string[]): Promise<unknown>;
  ping(): Promise<string>;
  quit(): Promise<string>;
}

/** Deletes a hash field only while it still holds the expected owner */
const UNCLAIM_IF_OWNER = `
if redis.call('HGET', KEYS[1], ARGV[1]) == ARGV[2] then
  return redis.call('HDEL', KEYS[1], ARGV[1])
end
return 0
`;

/**
 * Create an ioredis connection from the shared state configuration.
 */
export function createRedisClient(config: SharedStateConfig): RedisCommands {
  const client = new Redis({
    host: config.host,
    port: config.port,
    db: config.db,
    ...(config.username !== undefined && { username: config.username }),
    ...(config.password !== undefined && { password: config.password }),
    maxRetriesPerRequest: 3,
    lazyConnect: false,
  });

  client.on('error', (error: unknown) => {
    logger.warn({ err: error, host: config.host, port: config.port }, 'Redis connection error');
  });

  return client;
}

export class RedisStateStore implements SharedStateStore {
  readonly kind = 'redis';

  constructor(private readonly client: RedisCommands) {}

  async claim(key: string, member: string, owner: string): Promise<boolean> {
    return (await this.client.hsetnx(key, member, owner)) === 1;
  }

  async unclaim(key: string, member: string, owner?: string): Promise<boolean> {
    if (owner === undefined) {
      return (await this.client.hdel(key, member)) > 0;
    }
    const removed = await this.client.eval(UNCLAIM_IF_OWNER, 1, key, member, owner);
    return removed === 1;
  }

  async claims(key: string): Promise<Map<string, string>> {
    return new Map(Object.entries(await this.client.hgetall(key)));
  }

  async putRecord(key: string, id: string, value: string): Promise<void> {
    await this.client.hset(key, id, value);
  }

  async getRecord(key: string, id: string): Promise<string | null> {
    return this.client.hget(key, id);
  }

  async deleteRecord(key: string, id: string): Promise<boolean> {
    return (await this.client.hdel(key, id)) > 0;
  }

  async records(key: string): Promise<Map<string, string>> {
    return new Map(Object.entries(await this.client.hgetall(key)));
  }

  async pushQueue(key: string, id: string): Promise<void> {
    await this.client.rpush(key, id);
  }

  async removeFromQueue(key: string, id: string): Promise<boolean> {
    return (await this.client.lrem(key, 0, id)) > 0;
  }

  async queueMembers(key: string): Promise<string[]> {
    return this.client.lrange(key, 0, -1);
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.client.ping()) === 'PONG';
    } catch (error) {
      logger.debug({ err: error }, 'Redis ping failed');
      return false;
    }
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}
