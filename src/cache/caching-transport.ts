import { CacheEntry, CacheStatus, CacheStorage, FreshgateRequest, FreshgateResponse, Method, Transport } from '../types/index.js';
import { Logger } from '../types/logger.js';
import { withoutCacheStatus } from '../core/response.js';
import { ParseError } from '../core/errors.js';
import { CacheConfig, CacheConfigInput, resolveCacheConfig } from '../config.js';
import { getLogger } from '../utils/logger.js';
import { CacheControl, NoCacheEquivalentPredicate, defaultNoCacheEquivalent, parseCacheControl } from './cache-control.js';
import { Clock, systemClock } from './clock.js';
import { entryHeaders, fromCacheEntry, parseCacheEntry, toCacheEntry } from './entry.js';
import { FreshnessPipeline, FreshnessStage, createFreshnessPipeline } from './freshness.js';
import { KeyBuilder, createKeyBuilder } from './key-builder.js';
import { MemoryStorage } from './memory-storage.js';
import { RevalidationResult, RevalidationValidator } from './revalidation.js';

export interface CachingTransportOptions extends CacheConfigInput {
  /** The fetch capability the cache sits in front of */
  transport: Transport;

  /**
   * Where entries live
   * @default new MemoryStorage()
   */
  storage?: CacheStorage;

  /**
   * Time source for freshness decisions
   * @default systemClock
   */
  clock?: Clock;

  /**
   * Logger instance (Pino, Winston, console, or custom)
   * @default getLogger() - silent unless DEBUG=freshgate
   */
  logger?: Logger;

  /**
   * Which directive combinations count as `no-cache`
   * @default defaultNoCacheEquivalent
   */
  noCacheEquivalent?: NoCacheEquivalentPredicate;

  /**
   * Custom key derivation. Overrides `keyPrefix` and `sortQuery`.
   */
  keyBuilder?: KeyBuilder;

  /**
   * Custom freshness stages, in evaluation order
   */
  stages?: readonly FreshnessStage[];
}

// Successful writes with these methods invalidate GET/HEAD entries for the URL
const UNSAFE_METHODS: ReadonlySet<Method> = new Set<Method>(['POST', 'PUT', 'PATCH', 'DELETE', 'PURGE']);

// Partial and not-modified responses are not complete representations
const UNSTORABLE_STATUSES: ReadonlySet<number> = new Set([206, 304]);

/**
 * Transport decorator implementing an HTTP cache.
 *
 * Lookup → freshness check → serve, revalidate or bypass → store or discard.
 * Fresh and validated responses carry `X-Cache: HIT`; anything fetched from
 * the origin is returned without that header (MISS), even if the origin set it.
 *
 * @example
 * ```typescript
 * const transport = new CachingTransport({
 *   transport: new UndiciTransport(),
 *   storage: new FileStorage('.cache/http'),
 * });
 *
 * const res = await transport.dispatch(new HttpRequest('https://example.com/data.json'));
 * isCacheHit(res); // false on first call, true while fresh
 * ```
 */
export class CachingTransport implements Transport {
  readonly config: CacheConfig;
  readonly storage: CacheStorage;

  private readonly transport: Transport;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly noCacheEquivalent: NoCacheEquivalentPredicate;
  private readonly keyBuilder: KeyBuilder;
  private readonly pipeline: FreshnessPipeline;
  private readonly validator: RevalidationValidator;

  constructor(options: CachingTransportOptions) {
    this.config = resolveCacheConfig(options);
    this.transport = options.transport;
    this.storage = options.storage ?? new MemoryStorage();
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? getLogger();
    this.noCacheEquivalent = options.noCacheEquivalent ?? defaultNoCacheEquivalent;
    this.keyBuilder = options.keyBuilder ?? createKeyBuilder({
      prefix: this.config.keyPrefix,
      sortQuery: this.config.sortQuery,
    });
    this.pipeline = createFreshnessPipeline({
      clock: this.clock,
      noCacheEquivalent: this.noCacheEquivalent,
      stages: options.stages,
    });
    this.validator = new RevalidationValidator(this.transport, {
      cacheStatusHeader: this.config.cacheStatusHeader,
    });
  }

  async dispatch(req: FreshgateRequest): Promise<FreshgateResponse> {
    const cacheable = this.config.methods.includes(req.method);

    if (!cacheable && UNSAFE_METHODS.has(req.method)) {
      return this.dispatchUnsafe(req);
    }
    if (!cacheable) {
      return this.fetchOrigin(req);
    }

    const key = this.keyBuilder(req);
    const entry = await this.lookup(key);

    if (!entry) {
      this.logger.debug({ key }, 'cache miss');
      return this.fetchAndStore(req, key);
    }

    const headers = entryHeaders(entry.headers);
    const freshness = this.pipeline.evaluate(headers, parseCacheControl(headers));
    this.logger.debug({ key, freshness }, 'cache lookup');

    switch (freshness) {
      case 'fresh':
        return this.serveStored(entry, 'HIT');
      case 'stale':
        return this.revalidate(req, key, entry);
      case 'transparent':
        return this.fetchOrigin(req);
    }
  }

  /**
   * Whether a response may be written to storage
   */
  isStorable(response: Pick<FreshgateResponse, 'status' | 'headers'>, directives: CacheControl = parseCacheControl(response.headers)): boolean {
    if (UNSTORABLE_STATUSES.has(response.status)) return false;
    if (!directives.isPresent()) return false;
    if (directives.noStore()) return false;
    if (directives.noCache() || directives.noCacheEquivalent(this.noCacheEquivalent)) return false;
    if (directives.isPrivate() && !this.config.cachePrivateResponses) return false;
    return true;
  }

  private async lookup(key: string): Promise<CacheEntry | undefined> {
    try {
      const raw = await this.storage.get(key);
      if (raw === undefined || raw === null) return undefined;
      return parseCacheEntry(raw);
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      this.logger.warn({ key, error: error.message }, 'discarding corrupt cache entry');
      await this.storage.delete(key);
      return undefined;
    }
  }

  private serveStored(entry: CacheEntry, status: CacheStatus): FreshgateResponse {
    const headers = entryHeaders(entry.headers);
    headers.set(this.config.cacheStatusHeader, status);
    return fromCacheEntry(entry, headers);
  }

  private async fetchOrigin(req: FreshgateRequest): Promise<FreshgateResponse> {
    return withoutCacheStatus(await this.transport.dispatch(req), this.config.cacheStatusHeader);
  }

  private async fetchAndStore(req: FreshgateRequest, key: string): Promise<FreshgateResponse> {
    const response = await this.fetchOrigin(req);
    if (this.isStorable(response)) {
      await this.store(key, response);
    }
    return response;
  }

  private async revalidate(req: FreshgateRequest, key: string, entry: CacheEntry): Promise<FreshgateResponse> {
    let result: RevalidationResult;
    try {
      result = await this.validator.validate(req, entry);
    } catch (error) {
      if (!this.config.serveStaleOnError) throw error;
      this.logger.warn(
        { key, error: error instanceof Error ? error.message : String(error) },
        'revalidation failed, serving stale entry'
      );
      return this.serveStored(entry, 'STALE');
    }

    const directives = parseCacheControl(result.response.headers);
    this.logger.debug({ key, outcome: result.outcome }, 'revalidated');

    if (result.outcome === 'validated') {
      if (directives.noStore()) {
        await this.remove(key);
      }
      return result.response;
    }

    if (this.isStorable(result.response, directives)) {
      await this.store(key, result.response);
    } else {
      await this.remove(key);
    }
    return result.response;
  }

  private async dispatchUnsafe(req: FreshgateRequest): Promise<FreshgateResponse> {
    const response = await this.fetchOrigin(req);
    if (response.ok) {
      await this.remove(this.keyBuilder({ method: 'GET', url: req.url }));
      await this.remove(this.keyBuilder({ method: 'HEAD', url: req.url }));
    }
    return response;
  }

  private async store(key: string, response: FreshgateResponse): Promise<void> {
    const entry = await toCacheEntry(response, this.clock.now().getTime());
    await this.storage.set(key, entry);
    this.logger.debug({ key, status: entry.status }, 'stored');
  }

  private async remove(key: string): Promise<void> {
    await this.storage.delete(key);
    this.logger.debug({ key }, 'deleted');
  }
}

export function createCachingTransport(options: CachingTransportOptions): CachingTransport {
  return new CachingTransport(options);
}

/**
 * Wrap a transport with a cache
 */
export function withCache(transport: Transport, options: Omit<CachingTransportOptions, 'transport'> = {}): CachingTransport {
  return new CachingTransport({ ...options, transport });
}
