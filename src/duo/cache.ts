import type { CacheConfig, UserAccount } from './types.js';

interface CacheEntry {
  value: UserAccount;
  insertedAt: number;
}

export type Clock = () => number;

/**
 * LRU cache of resolved accounts with expire-after-write TTL.
 */
export class AccountStatusCache {
  private cache: Map<string, CacheEntry>;
  private maxSize: number;
  private ttlMs: number;
  private now: Clock;

  constructor(config: CacheConfig, now: Clock = Date.now) {
    this.cache = new Map();
    this.maxSize = config.maxEntries;
    this.ttlMs = config.ttlSeconds * 1000;
    this.now = now;
  }

  private isExpired(entry: CacheEntry): boolean {
    return this.now() - entry.insertedAt >= this.ttlMs;
  }

  get(username: string): UserAccount | undefined {
    const entry = this.cache.get(username);
    if (!entry) return undefined;

    if (this.isExpired(entry)) {
      this.cache.delete(username);
      return undefined;
    }

    // Move to end (most recently used)
    this.cache.delete(username);
    this.cache.set(username, entry);
    return entry.value;
  }

  put(username: string, account: UserAccount): void {
    // Delete existing to update position
    this.cache.delete(username);

    // Evict oldest if at capacity
    if (this.cache.size >= this.maxSize) {
      const firstKey = this.cache.keys().next().value;
      if (firstKey !== undefined) this.cache.delete(firstKey);
    }

    this.cache.set(username, { value: account, insertedAt: this.now() });
  }

  size(): number {
    return this.cache.size;
  }

  cleanupExpired(): number {
    let deleted = 0;

    for (const [key, entry] of this.cache) {
      if (this.isExpired(entry)) {
        this.cache.delete(key);
        deleted++;
      }
    }

    return deleted;
  }
}
