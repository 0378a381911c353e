interface CacheEntry<V> {
  value: V;
  insertedAt: number;
}

export interface ExpiringCacheOptions<V> {
  /** Entry lifetime in milliseconds; an entry is expired once its age reaches it */
  ttlMs: number;
  /** Clock in epoch milliseconds (default: `Date.now`) */
  now?: () => number;
  /** Extra liveness check, e.g. that a backing temp file still exists */
  isValid?: (value: V) => boolean;
  /** Called for every entry that leaves the cache other than by overwrite with the same value */
  onEvict?: (value: V, key: string) => void;
}

/**
 * Key/value store whose entries expire after a fixed TTL.
 *
 * Expired or invalid entries are dropped lazily on lookup and proactively by
 * `sweep()`. There is no size bound. Every method is synchronous, so a lookup
 * can never interleave with an insert or removal of the same key.
 */
export class ExpiringCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly isValid?: (value: V) => boolean;
  private readonly onEvict?: (value: V, key: string) => void;

  constructor(options: ExpiringCacheOptions<V>) {
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
    this.isValid = options.isValid;
    this.onEvict = options.onEvict;
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }

    if (this.isStale(entry)) {
      this.remove(key, entry);
      return undefined;
    }

    return entry.value;
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  set(key: string, value: V): void {
    const previous = this.entries.get(key);
    this.entries.set(key, { value, insertedAt: this.now() });
    if (previous && previous.value !== value) {
      this.onEvict?.(previous.value, key);
    }
  }

  delete(key: string): boolean {
    const entry = this.entries.get(key);
    if (!entry) {
      return false;
    }
    this.remove(key, entry);
    return true;
  }

  /**
   * Remove every entry.
   *
   * @returns Number of entries removed
   */
  clear(): number {
    const count = this.entries.size;
    for (const [key, entry] of [...this.entries]) {
      this.remove(key, entry);
    }
    return count;
  }

  /**
   * Remove every expired or invalid entry.
   *
   * @returns Number of entries removed
   */
  sweep(): number {
    let removed = 0;
    for (const [key, entry] of [...this.entries]) {
      if (this.isStale(entry)) {
        this.remove(key, entry);
        removed++;
      }
    }
    return removed;
  }

  private isStale(entry: CacheEntry<V>): boolean {
    if (this.now() - entry.insertedAt >= this.ttlMs) {
      return true;
    }
    return this.isValid ? !this.isValid(entry.value) : false;
  }

  private remove(key: string, entry: CacheEntry<V>): void {
    this.entries.delete(key);
    this.onEvict?.(entry.value, key);
  }
}
