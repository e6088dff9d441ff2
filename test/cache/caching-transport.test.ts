import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  CachingTransport,
  createCachingTransport,
  withCache,
  MemoryStorage,
  HttpRequest,
  CacheEntry,
  CacheStorage,
  ConfigurationError,
  NetworkError,
  ParseError,
  formatHttpDate,
  getCacheStatus,
  isCacheHit,
} from '../../src/index.js';
import { MockTransport, fixedClock, FixedClock } from '../../src/testing/index.js';

const URL_A = 'https://api.example.com/resource';
const GET_KEY = `GET:${URL_A}`;
const HEAD_KEY = `HEAD:${URL_A}`;
const NOW = new Date('2024-03-01T12:00:00Z');

function createLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function storedEntry(headers: CacheEntry['headers'], body = 'cached'): CacheEntry {
  return {
    status: 200,
    statusText: 'OK',
    headers,
    body: Buffer.from(body).toString('base64'),
    storedAt: NOW.getTime() - 120_000,
  };
}

describe('CachingTransport', () => {
  let origin: MockTransport;
  let storage: MemoryStorage;
  let clock: FixedClock;
  let logger: ReturnType<typeof createLogger>;
  let transport: CachingTransport;

  beforeEach(() => {
    origin = new MockTransport();
    storage = new MemoryStorage();
    clock = fixedClock(NOW);
    logger = createLogger();
    transport = new CachingTransport({ transport: origin, storage, clock, logger });
  });

  describe('lookup', () => {
    it('should fetch and store on a miss, then serve a fresh HIT', async () => {
      origin.setMockResponse('GET', URL_A, 200, 'hello', {
        'cache-control': 'max-age=60',
        date: formatHttpDate(NOW),
      });

      const first = await transport.dispatch(new HttpRequest(URL_A));
      expect(getCacheStatus(first)).toBeUndefined();
      expect(await first.text()).toBe('hello');
      expect(storage.has(GET_KEY)).toBe(true);

      const second = await transport.dispatch(new HttpRequest(URL_A));
      expect(second.headers.get('x-cache')).toBe('HIT');
      expect(second.status).toBe(200);
      expect(await second.text()).toBe('hello');
      expect(origin.getCallCount('GET', URL_A)).toBe(1);
    });

    it('should log misses at debug level', async () => {
      origin.setMockResponse('GET', URL_A, 200, 'hello', {});
      await transport.dispatch(new HttpRequest(URL_A));
      expect(logger.debug).toHaveBeenCalledWith({ key: GET_KEY }, 'cache miss');
    });

    it('should cache HEAD separately from GET', async () => {
      const headers = { 'cache-control': 'max-age=60', date: formatHttpDate(NOW) };
      origin.setMockResponse('GET', URL_A, 200, 'body', headers);
      origin.setMockResponse('HEAD', URL_A, 200, null, headers);

      await transport.dispatch(new HttpRequest(URL_A));
      const head = await transport.dispatch(new HttpRequest(URL_A, { method: 'HEAD' }));

      expect(isCacheHit(head)).toBe(false);
      expect(origin.getCallCount('HEAD', URL_A)).toBe(1);
      expect(storage.keys()).toEqual([GET_KEY, HEAD_KEY]);
    });

    it('should pass non-cacheable safe methods straight through', async () => {
      origin.setMockResponse('OPTIONS', URL_A, 200, null, { 'cache-control': 'max-age=60', date: formatHttpDate(NOW) });

      await transport.dispatch(new HttpRequest(URL_A, { method: 'OPTIONS' }));
      await transport.dispatch(new HttpRequest(URL_A, { method: 'OPTIONS' }));

      expect(origin.getCallCount('OPTIONS', URL_A)).toBe(2);
      expect(storage.size).toBe(0);
    });

    it('should bypass the cache for transparent entries', async () => {
      await storage.set(GET_KEY, storedEntry({ 'cache-control': 'public' }));
      origin.setMockResponse('GET', URL_A, 200, 'origin body', { 'cache-control': 'max-age=60', date: formatHttpDate(NOW) });

      const response = await transport.dispatch(new HttpRequest(URL_A));

      expect(await response.text()).toBe('origin body');
      expect(isCacheHit(response)).toBe(false);
      const entry = await storage.get(GET_KEY);
      expect(entry?.body).toBe(Buffer.from('cached').toString('base64'));
    });
  });

  describe('upstream cache status', () => {
    it('should drop an upstream cache status header on a miss', async () => {
      origin.setMockResponse('GET', URL_A, 200, 'hello', {
        'x-cache': 'HIT',
        'cache-control': 'max-age=60',
        date: formatHttpDate(NOW),
      });

      const first = await transport.dispatch(new HttpRequest(URL_A));
      expect(getCacheStatus(first)).toBeUndefined();
      expect(await first.text()).toBe('hello');
      const entry = await storage.get(GET_KEY);
      expect(entry?.headers['cache-control']).toBe('max-age=60');
      expect(entry?.headers['x-cache']).toBeUndefined();

      const second = await transport.dispatch(new HttpRequest(URL_A));
      expect(getCacheStatus(second)).toBe('HIT');
      expect(origin.getCallCount('GET', URL_A)).toBe(1);
    });

    it('should drop it from replacements', async () => {
      await storage.set(GET_KEY, storedEntry({ 'cache-control': 'max-age=0', etag: '"old"' }));
      origin.setMockResponse('GET', URL_A, 200, 'new', { 'x-cache': 'HIT', 'cache-control': 'max-age=60' });

      const response = await transport.dispatch(new HttpRequest(URL_A));

      expect(getCacheStatus(response)).toBeUndefined();
      expect(await response.text()).toBe('new');
      expect((await storage.get(GET_KEY))?.headers['x-cache']).toBeUndefined();
    });

    it('should drop it when bypassing the cache', async () => {
      await storage.set(GET_KEY, storedEntry({ 'cache-control': 'public' }));
      origin.setMockResponse('GET', URL_A, 200, 'origin body', { 'x-cache': 'STALE' });
      origin.setMockResponse('OPTIONS', URL_A, 200, null, { 'x-cache': 'HIT' });

      const transparent = await transport.dispatch(new HttpRequest(URL_A));
      const passThrough = await transport.dispatch(new HttpRequest(URL_A, { method: 'OPTIONS' }));

      expect(transparent.headers.has('x-cache')).toBe(false);
      expect(passThrough.headers.has('x-cache')).toBe(false);
    });

    it('should drop the configured header only', async () => {
      const custom = new CachingTransport({ transport: origin, storage, clock, logger, cacheStatusHeader: 'X-Cache-Status' });
      origin.setMockResponse('GET', URL_A, 200, 'hello', { 'x-cache-status': 'HIT', 'x-cache': 'HIT' });

      const response = await custom.dispatch(new HttpRequest(URL_A));

      expect(getCacheStatus(response, 'X-Cache-Status')).toBeUndefined();
      expect(response.headers.get('x-cache')).toBe('HIT');
    });
  });

  describe('set-cookie', () => {
    it('should serve every stored cookie on a hit', async () => {
      await storage.set(
        GET_KEY,
        storedEntry({ 'cache-control': 'max-age=60', date: formatHttpDate(NOW), 'set-cookie': ['a=1', 'b=2'] })
      );

      const response = await transport.dispatch(new HttpRequest(URL_A));

      expect(isCacheHit(response)).toBe(true);
      expect(response.headers.getSetCookie()).toEqual(['a=1', 'b=2']);
    });
  });

  describe('storability', () => {
    it('should never store a response without Cache-Control', async () => {
      origin.setMockResponse('GET', URL_A, 200, 'data', {
        etag: '"abc"',
        date: formatHttpDate(NOW),
        expires: formatHttpDate(new Date(NOW.getTime() + 3_600_000)),
        'last-modified': formatHttpDate(NOW),
      });

      await transport.dispatch(new HttpRequest(URL_A));
      await transport.dispatch(new HttpRequest(URL_A));

      expect(storage.size).toBe(0);
      expect(origin.getCallCount('GET', URL_A)).toBe(2);
    });

    it.each([
      ['no-store', 'no-store, max-age=60'],
      ['no-cache', 'no-cache'],
      ['must-revalidate with max-age=0', 'must-revalidate, max-age=0'],
      ['private', 'private, max-age=60'],
    ])('should not store %s responses', async (_label, cacheControl) => {
      origin.setMockResponse('GET', URL_A, 200, 'data', { 'cache-control': cacheControl, date: formatHttpDate(NOW) });
      await transport.dispatch(new HttpRequest(URL_A));
      expect(storage.size).toBe(0);
    });

    it('should store private responses when enabled', async () => {
      const privateCache = new CachingTransport({ transport: origin, storage, clock, logger, cachePrivateResponses: true });
      origin.setMockResponse('GET', URL_A, 200, 'mine', { 'cache-control': 'private, max-age=60', date: formatHttpDate(NOW) });

      await privateCache.dispatch(new HttpRequest(URL_A));

      expect(storage.has(GET_KEY)).toBe(true);
    });

    it('should not store partial content', async () => {
      origin.setMockResponse('GET', URL_A, 206, 'part', { 'cache-control': 'max-age=60', date: formatHttpDate(NOW) });
      await transport.dispatch(new HttpRequest(URL_A));
      expect(storage.size).toBe(0);
    });

    it('should store error statuses that carry Cache-Control', async () => {
      origin.setMockResponse('GET', URL_A, 404, 'missing', { 'cache-control': 'max-age=60', date: formatHttpDate(NOW) });
      await transport.dispatch(new HttpRequest(URL_A));
      expect((await storage.get(GET_KEY))?.status).toBe(404);
    });

    it('should use a custom no-cache-equivalent predicate', async () => {
      const strict = new CachingTransport({
        transport: origin,
        storage,
        clock,
        logger,
        noCacheEquivalent: (d) => d.has('must-revalidate'),
      });
      origin.setMockResponse('GET', URL_A, 200, 'data', {
        'cache-control': 'must-revalidate, max-age=60',
        date: formatHttpDate(NOW),
      });

      await strict.dispatch(new HttpRequest(URL_A));

      expect(storage.size).toBe(0);
    });

    it('should expose the storability check', () => {
      expect(transport.isStorable({ status: 200, headers: new Headers({ 'cache-control': 'max-age=1' }) })).toBe(true);
      expect(transport.isStorable({ status: 304, headers: new Headers({ 'cache-control': 'max-age=1' }) })).toBe(false);
      expect(transport.isStorable({ status: 200, headers: new Headers() })).toBe(false);
    });
  });

  describe('revalidation', () => {
    it('should revalidate a stale entry and serve the stored body on 304', async () => {
      origin.setMockResponse(
        'GET',
        URL_A,
        200,
        'v1',
        { 'cache-control': 'max-age=60', date: formatHttpDate(NOW), etag: '"v1"' },
        { times: 1 }
      );
      origin.setMockResponse('GET', URL_A, 304, null, { date: formatHttpDate(new Date(NOW.getTime() + 60_000)) });

      await transport.dispatch(new HttpRequest(URL_A));
      clock.advance(60_000);
      const response = await transport.dispatch(new HttpRequest(URL_A));

      expect(response.headers.get('x-cache')).toBe('HIT');
      expect(response.status).toBe(200);
      expect(await response.text()).toBe('v1');
      expect(origin.getCallCount('GET', URL_A)).toBe(2);
      expect(origin.lastRequest?.headers.get('if-none-match')).toBe('"v1"');
    });

    it('should replace the entry when the origin sends a new representation', async () => {
      await storage.set(
        GET_KEY,
        storedEntry({
          etag: '"123"',
          'cache-control': 'max-age=60',
          date: formatHttpDate(new Date(NOW.getTime() - 120_000)),
        })
      );
      origin.setMockResponse('GET', URL_A, 200, 'new', {
        etag: '"345"',
        'cache-control': 'max-age=60',
        date: formatHttpDate(NOW),
      });

      const response = await transport.dispatch(new HttpRequest(URL_A));

      expect(getCacheStatus(response)).toBeUndefined();
      expect(await response.text()).toBe('new');
      expect(origin.lastRequest?.headers.get('if-none-match')).toBe('"123"');

      const entry = await storage.get(GET_KEY);
      expect(entry?.headers.etag).toBe('"345"');
      expect(entry?.body).toBe(Buffer.from('new').toString('base64'));
      expect(entry?.storedAt).toBe(NOW.getTime());
    });

    it('should serve once then delete a validated no-store entry', async () => {
      await storage.set(GET_KEY, storedEntry({ 'cache-control': 'max-age=0, no-store', etag: '"x"' }));
      origin.setMockResponse('GET', URL_A, 304, null, {}, { times: 1 });
      origin.setMockResponse('GET', URL_A, 200, 'from origin', {});

      const first = await transport.dispatch(new HttpRequest(URL_A));
      expect(first.headers.get('x-cache')).toBe('HIT');
      expect(await first.text()).toBe('cached');
      expect(storage.has(GET_KEY)).toBe(false);

      const second = await transport.dispatch(new HttpRequest(URL_A));
      expect(getCacheStatus(second)).toBeUndefined();
      expect(await second.text()).toBe('from origin');
    });

    it('should delete the entry when the replacement is not storable', async () => {
      await storage.set(GET_KEY, storedEntry({ 'cache-control': 'max-age=0', etag: '"old"' }));
      origin.setMockResponse('GET', URL_A, 200, 'secret', { 'cache-control': 'no-store' });

      const response = await transport.dispatch(new HttpRequest(URL_A));

      expect(await response.text()).toBe('secret');
      expect(storage.has(GET_KEY)).toBe(false);
    });

    it('should surface transport errors and keep the entry (fail closed)', async () => {
      const entry = storedEntry({ 'cache-control': 'max-age=0', etag: '"old"' });
      await storage.set(GET_KEY, entry);
      origin.setMockError('GET', URL_A, new NetworkError('connection reset', 'ECONNRESET'));

      await expect(transport.dispatch(new HttpRequest(URL_A))).rejects.toBeInstanceOf(NetworkError);
      expect(await storage.get(GET_KEY)).toEqual(entry);
    });

    it('should serve the stale entry on error when enabled', async () => {
      const lenient = new CachingTransport({ transport: origin, storage, clock, logger, serveStaleOnError: true });
      await storage.set(GET_KEY, storedEntry({ 'cache-control': 'max-age=0', etag: '"old"' }));
      origin.setMockError('GET', URL_A, new NetworkError('connection reset', 'ECONNRESET'));

      const response = await lenient.dispatch(new HttpRequest(URL_A));

      expect(response.headers.get('x-cache')).toBe('STALE');
      expect(await response.text()).toBe('cached');
      expect(logger.warn).toHaveBeenCalledWith(
        { key: GET_KEY, error: 'connection reset' },
        'revalidation failed, serving stale entry'
      );
      expect(storage.has(GET_KEY)).toBe(true);
    });
  });

  describe('invalidation', () => {
    beforeEach(async () => {
      await storage.set(GET_KEY, storedEntry({ 'cache-control': 'max-age=60' }));
      await storage.set(HEAD_KEY, storedEntry({ 'cache-control': 'max-age=60' }));
    });

    it('should drop GET and HEAD entries after a successful unsafe request', async () => {
      origin.setMockResponse('POST', URL_A, 201, { id: 1 });

      await transport.dispatch(new HttpRequest(URL_A, { method: 'POST', body: '{}' }));

      expect(storage.has(GET_KEY)).toBe(false);
      expect(storage.has(HEAD_KEY)).toBe(false);
    });

    it('should keep entries when the unsafe request fails', async () => {
      origin.setMockResponse('DELETE', URL_A, 500, 'nope');

      await transport.dispatch(new HttpRequest(URL_A, { method: 'DELETE' }));

      expect(storage.has(GET_KEY)).toBe(true);
      expect(storage.has(HEAD_KEY)).toBe(true);
    });
  });

  describe('storage failures', () => {
    it('should discard corrupt entries and fetch again', async () => {
      const failing: CacheStorage = {
        get: vi.fn(async () => {
          throw new ParseError('Invalid cache entry');
        }),
        set: vi.fn(async () => {}),
        delete: vi.fn(async () => {}),
      };
      const cache = new CachingTransport({ transport: origin, storage: failing, clock, logger });
      origin.setMockResponse('GET', URL_A, 200, 'data', {});

      const response = await cache.dispatch(new HttpRequest(URL_A));

      expect(await response.text()).toBe('data');
      expect(failing.delete).toHaveBeenCalledWith(GET_KEY);
      expect(logger.warn).toHaveBeenCalledWith(
        { key: GET_KEY, error: 'Invalid cache entry' },
        'discarding corrupt cache entry'
      );
    });

    it('should propagate other storage errors', async () => {
      const failing: CacheStorage = {
        get: async () => {
          throw new Error('storage offline');
        },
        set: async () => {},
        delete: async () => {},
      };
      const cache = new CachingTransport({ transport: origin, storage: failing, clock, logger });

      await expect(cache.dispatch(new HttpRequest(URL_A))).rejects.toThrow('storage offline');
      expect(origin.requests).toHaveLength(0);
    });
  });

  describe('configuration', () => {
    it('should apply defaults', () => {
      expect(transport.config).toEqual({
        methods: ['GET', 'HEAD'],
        cachePrivateResponses: false,
        serveStaleOnError: false,
        cacheStatusHeader: 'X-Cache',
        keyPrefix: '',
        sortQuery: false,
      });
    });

    it('should reject invalid options', () => {
      expect(() => new CachingTransport({ transport: origin, cacheStatusHeader: 'bad header' })).toThrow(ConfigurationError);
    });

    it('should use a custom status header and key prefix', async () => {
      const custom = new CachingTransport({
        transport: origin,
        storage,
        clock,
        logger,
        cacheStatusHeader: 'X-Cache-Status',
        keyPrefix: 'api:',
      });
      origin.setMockResponse('GET', URL_A, 200, 'hello', { 'cache-control': 'max-age=60', date: formatHttpDate(NOW) });

      await custom.dispatch(new HttpRequest(URL_A));
      const hit = await custom.dispatch(new HttpRequest(URL_A));

      expect(storage.keys()).toEqual([`api:${GET_KEY}`]);
      expect(hit.headers.get('x-cache-status')).toBe('HIT');
      expect(isCacheHit(hit, 'X-Cache-Status')).toBe(true);
    });

    it('should use a custom key builder', async () => {
      const custom = new CachingTransport({ transport: origin, storage, clock, logger, keyBuilder: () => 'fixed' });
      origin.setMockResponse('GET', URL_A, 200, 'hello', { 'cache-control': 'max-age=60', date: formatHttpDate(NOW) });

      await custom.dispatch(new HttpRequest(URL_A));

      expect(storage.keys()).toEqual(['fixed']);
    });

    it('should default to in-memory storage', () => {
      expect(withCache(origin).storage).toBeInstanceOf(MemoryStorage);
      expect(createCachingTransport({ transport: origin })).toBeInstanceOf(CachingTransport);
    });
  });
});
