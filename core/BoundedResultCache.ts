// Filename: core/BoundedResultCache.ts

export type EvictionReason = "capacity" | "expired";

export interface BoundedResultCacheOptions {
  maxSize: number;
  ttlMs: number;
  now?: () => number;
  onEvict?: (key: string, reason: EvictionReason) => void;
}

export interface BoundedResultCacheStats {
  size: number;
  maxSize: number;
  ttlMs: number;
}

interface Slot<V> {
  value: V;
  expiresAt: number;
}

/**
 * Size-bounded LRU map with a per-entry TTL.
 * Map insertion order is the recency order: a read re-inserts the entry at the end,
 * so the first key is always the least recently used. Expiry is lazy.
 * Every method is synchronous, so no caller can observe a half-applied update.
 */
export class BoundedResultCache<V> {
  private readonly entries = new Map<string, Slot<V>>();
  private readonly maxSize: number;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly onEvict?: (key: string, reason: EvictionReason) => void;

  constructor(options: BoundedResultCacheOptions) {
    this.maxSize = Math.max(1, Math.floor(options.maxSize));
    this.ttlMs = Math.max(0, options.ttlMs);
    this.now = options.now ?? Date.now;
    this.onEvict = options.onEvict;
  }

  /**
   * Returns the live value for `key` and marks it most recently used.
   * Expired entries are removed and read as absent.
   */
  public get(key: string): V | undefined {
    const slot = this.entries.get(key);
    if (!slot) return undefined;

    this.entries.delete(key);
    if (this.now() >= slot.expiresAt) {
      this.onEvict?.(key, "expired");
      return undefined;
    }
    this.entries.set(key, slot);
    return slot.value;
  }

  public has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  /**
   * Inserts or replaces `key`. At capacity, expired entries are pruned first,
   * then the least recently used entry is evicted.
   */
  public set(key: string, value: V): void {
    this.entries.delete(key);

    if (this.entries.size >= this.maxSize) {
      this.pruneExpired();
    }
    while (this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.onEvict?.(oldest.value, "capacity");
    }

    this.entries.set(key, { value, expiresAt: this.now() + this.ttlMs });
  }

  public delete(key: string): boolean {
    return this.entries.delete(key);
  }

  public clear(): number {
    const removed = this.entries.size;
    this.entries.clear();
    return removed;
  }

  /** Keys in recency order, least recently used first. Includes not-yet-pruned expired keys. */
  public keys(): string[] {
    return [...this.entries.keys()];
  }

  public get size(): number {
    return this.entries.size;
  }

  public stats(): BoundedResultCacheStats {
    return { size: this.entries.size, maxSize: this.maxSize, ttlMs: this.ttlMs };
  }

  /**
   * Removes all expired entries.
   * @returns number of entries removed
   */
  public pruneExpired(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, slot] of this.entries) {
      if (now >= slot.expiresAt) {
        this.entries.delete(key);
        this.onEvict?.(key, "expired");
        removed++;
      }
    }
    return removed;
  }
}
