import { CacheStorage, CacheEntry } from '../types/index.js';
import { ParseError } from '../core/errors.js';
import { parseCacheEntry } from './entry.js';

// Duck-typing interface for Redis client (ioredis/node-redis)
export interface RedisClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  del(key: string): Promise<unknown>;
}

/**
 * Entries as JSON strings under `prefix + key`. Expiry and eviction are
 * left to the Redis server's own policy.
 */
export class RedisStorage implements CacheStorage {
  constructor(private redis: RedisClient, private prefix: string = 'freshgate:') {}

  async get(key: string): Promise<CacheEntry | undefined> {
    const data = await this.redis.get(this.prefix + key);
    if (data === null) return undefined;

    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch {
      throw new ParseError(`Redis value for "${key}" is not valid JSON`, { format: 'json' });
    }
    return parseCacheEntry(parsed);
  }

  async set(key: string, value: CacheEntry): Promise<void> {
    await this.redis.set(this.prefix + key, JSON.stringify(value));
  }

  async delete(key: string): Promise<void> {
    await this.redis.del(this.prefix + key);
  }
}
