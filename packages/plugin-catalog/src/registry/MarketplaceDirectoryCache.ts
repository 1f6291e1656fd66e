export const DEFAULT_CACHE_CAPACITY = 128;

export interface CacheStats {
  size: number;
  capacity: number;
  hits: number;
  misses: number;
}

export type CacheLookup =
  | { hit: true; directory: string | null }
  | { hit: false };

/**
 * Bounded LRU map from plugin name to the marketplace directory that
 * declares it. `null` records "no marketplace declares this plugin".
 *
 * Entries are never invalidated when the filesystem changes; a stale
 * directory only ever leads to "element not found" because loading
 * re-checks the files. All methods are synchronous, so concurrent
 * requests on the event loop can't interleave inside one of them.
 */
export class MarketplaceDirectoryCache {
  // Map iteration order is insertion order: first key = least recently used
  private entries = new Map<string, string | null>();
  private hits = 0;
  private misses = 0;

  constructor(readonly capacity: number = DEFAULT_CACHE_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Cache capacity must be a positive integer, got ${capacity}`);
    }
  }

  get(pluginName: string): CacheLookup {
    if (!this.entries.has(pluginName)) {
      this.misses++;
      return { hit: false };
    }
    const directory = this.entries.get(pluginName) ?? null;
    this.entries.delete(pluginName);
    this.entries.set(pluginName, directory);
    this.hits++;
    return { hit: true, directory };
  }

  set(pluginName: string, directory: string | null): void {
    this.entries.delete(pluginName);
    this.entries.set(pluginName, directory);

    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  stats(): CacheStats {
    return {
      size: this.entries.size,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
    };
  }
}
