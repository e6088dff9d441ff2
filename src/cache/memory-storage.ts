/**
 * In-process cache storage.
 *
 * Entries are kept as structured clones, so callers can never mutate what
 * is stored. An optional size bound evicts by LRU or FIFO order.
 *
 * @example Basic usage
 * ```typescript
 * const storage = new MemoryStorage();
 * const transport = withCache(new UndiciTransport(), { storage });
 * ```
 *
 * @example Bounded
 * ```typescript
 * const storage = new MemoryStorage({
 *   maxSize: 500,
 *   evictionPolicy: 'lru',
 *   enableStats: true,
 * });
 *
 * console.log(storage.getStats());
 * ```
 */

import { CacheEntry, CacheStorage } from '../types/index.js';

/**
 * Memory storage configuration options
 */
export interface MemoryStorageOptions {
  /**
   * Maximum number of entries to keep (0 = unbounded)
   * @default 0
   */
  maxSize?: number;

  /**
   * Eviction policy when the storage is full
   * - 'lru': Least Recently Used (default)
   * - 'fifo': First In First Out
   * @default 'lru'
   */
  evictionPolicy?: 'lru' | 'fifo';

  /**
   * Enable statistics tracking (hits, misses, etc.)
   * @default false
   */
  enableStats?: boolean;

  /**
   * Callback when an entry is evicted to make room
   */
  onEvict?: (key: string) => void;
}

/**
 * Storage statistics
 */
export interface MemoryStorageStats {
  enabled: boolean;
  hits: number;
  misses: number;
  sets: number;
  deletes: number;
  evictions: number;
  hitRate: number;
  totalItems: number;
}

type StatName = 'hits' | 'misses' | 'sets' | 'deletes' | 'evictions';

export class MemoryStorage implements CacheStorage {
  // Map iteration order doubles as eviction order
  private storage = new Map<string, CacheEntry>();

  private readonly maxSize: number;
  private readonly evictionPolicy: 'lru' | 'fifo';
  private readonly enableStats: boolean;
  private readonly onEvict?: (key: string) => void;

  private stats: Record<StatName, number> = {
    hits: 0,
    misses: 0,
    sets: 0,
    deletes: 0,
    evictions: 0,
  };

  constructor(options: MemoryStorageOptions = {}) {
    if (options.maxSize !== undefined && (!Number.isInteger(options.maxSize) || options.maxSize < 0)) {
      throw new RangeError('[MemoryStorage] maxSize must be a non-negative integer');
    }

    this.maxSize = options.maxSize ?? 0;
    this.evictionPolicy = options.evictionPolicy ?? 'lru';
    this.enableStats = options.enableStats ?? false;
    this.onEvict = options.onEvict;
  }

  async get(key: string): Promise<CacheEntry | undefined> {
    const entry = this.storage.get(key);

    if (!entry) {
      this.record('misses');
      return undefined;
    }

    if (this.evictionPolicy === 'lru') {
      this.storage.delete(key);
      this.storage.set(key, entry);
    }

    this.record('hits');
    return structuredClone(entry);
  }

  async set(key: string, value: CacheEntry): Promise<void> {
    // Re-inserting moves the key to the end for both policies
    this.storage.delete(key);

    while (this.maxSize > 0 && this.storage.size >= this.maxSize) {
      this.evictOldest();
    }

    this.storage.set(key, structuredClone(value));
    this.record('sets');
  }

  async delete(key: string): Promise<void> {
    if (this.storage.delete(key)) {
      this.record('deletes');
    }
  }

  async clear(): Promise<void> {
    this.storage.clear();
  }

  has(key: string): boolean {
    return this.storage.has(key);
  }

  keys(): string[] {
    return Array.from(this.storage.keys());
  }

  get size(): number {
    return this.storage.size;
  }

  getStats(): MemoryStorageStats {
    const lookups = this.stats.hits + this.stats.misses;
    return {
      enabled: this.enableStats,
      ...this.stats,
      hitRate: lookups > 0 ? this.stats.hits / lookups : 0,
      totalItems: this.storage.size,
    };
  }

  private evictOldest(): void {
    const oldest = this.storage.keys().next();
    if (oldest.done) return;

    this.storage.delete(oldest.value);
    this.record('evictions');
    this.onEvict?.(oldest.value);
  }

  private record(stat: StatName): void {
    if (this.enableStats) {
      this.stats[stat]++;
    }
  }
}
