import type { SharedStateStore } from './types.js';

/**
 * In-process store for single-worker deployments.
 *
 * Every operation touches the maps synchronously before its promise
 * resolves, so no two callers can interleave inside one operation.
 */
export class MemoryStateStore implements SharedStateStore {
  readonly kind = 'memory';

  private readonly hashes = new Map<string, Map<string, string>>();
  private readonly lists = new Map<string, string[]>();

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

  async claim(key: string, member: string, owner: string): Promise<boolean> {
    const hash = this.hash(key);
    if (hash.has(member)) {
      return false;
    }
    hash.set(member, owner);
    return true;
  }

  async unclaim(key: string, member: string, owner?: string): Promise<boolean> {
    const hash = this.hash(key);
    const holder = hash.get(member);
    if (holder === undefined) {
      return false;
    }
    if (owner !== undefined && holder !== owner) {
      return false;
    }
    return hash.delete(member);
  }

  async claims(key: string): Promise<Map<string, string>> {
    return new Map(this.hash(key));
  }

  async putRecord(key: string, id: string, value: string): Promise<void> {
    this.hash(key).set(id, value);
  }

  async getRecord(key: string, id: string): Promise<string | null> {
    return this.hash(key).get(id) ?? null;
  }

  async deleteRecord(key: string, id: string): Promise<boolean> {
    return this.hash(key).delete(id);
  }

  async records(key: string): Promise<Map<string, string>> {
    return new Map(this.hash(key));
  }

  async pushQueue(key: string, id: string): Promise<void> {
    this.list(key).push(id);
  }

  async removeFromQueue(key: string, id: string): Promise<boolean> {
    const list = this.list(key);
    const index = list.indexOf(id);
    if (index === -1) {
      return false;
    }
    list.splice(index, 1);
    return true;
  }

  async queueMembers(key: string): Promise<string[]> {
    return [...this.list(key)];
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.hashes.clear();
    this.lists.clear();
  }
}
