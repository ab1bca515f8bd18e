/**
 * Shared State Store
 *
 * Key/value surface shared by every worker process of one deployment.
 * Port reservations go through `claim`, which is the only operation that
 * needs cross-process atomicity.
 */
export interface SharedStateStore {
  /** 'memory' for the in-process store, 'redis' for the external one */
  readonly kind: 'memory' | 'redis';

  /**
   * Atomically record `member` as held by `owner` if nobody holds it.
   * Returns true when this call took the claim.
   */
  claim(key: string, member: string, owner: string): Promise<boolean>;

  /**
   * Drop a claim. With `owner`, only drops it while that owner still holds it.
   * Returns true when a claim was removed.
   */
  unclaim(key: string, member: string, owner?: string): Promise<boolean>;

  /** Current claims as member -> owner */
  claims(key: string): Promise<Map<string, string>>;

  putRecord(key: string, id: string, value: string): Promise<void>;

  getRecord(key: string, id: string): Promise<string | null>;

  deleteRecord(key: string, id: string): Promise<boolean>;

  records(key: string): Promise<Map<string, string>>;

  pushQueue(key: string, id: string): Promise<void>;

  removeFromQueue(key: string, id: string): Promise<boolean>;

  queueMembers(key: string): Promise<string[]>;

  ping(): Promise<boolean>;

  close(): Promise<void>;
}
