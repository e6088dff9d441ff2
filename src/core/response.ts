import { FreshgateResponse, CacheStatus } from '../types/index.js';

export const DEFAULT_CACHE_STATUS_HEADER = 'X-Cache';

export class HttpResponse<T = unknown> implements FreshgateResponse<T> {
  public readonly raw: Response; // Always a Web Response object

  constructor(raw: Response) {
    this.raw = raw;
  }

  get status() {
    return this.raw.status;
  }

  get statusText() {
    return this.raw.statusText;
  }

  get headers() {
    return this.raw.headers;
  }

  get ok() {
    return this.raw.ok;
  }

  get url() {
    return this.raw.url;
  }

  /**
   * Cache status set by the caching transport, if this response was served from cache
   */
  get cacheStatus(): CacheStatus | undefined {
    return getCacheStatus(this);
  }

  async json<R = T>(): Promise<R> {
    return (await this.raw.json()) as R;
  }

  async text(): Promise<string> {
    return this.raw.text();
  }

  async arrayBuffer(): Promise<ArrayBuffer> {
    return this.raw.arrayBuffer();
  }

  read(): ReadableStream<Uint8Array> | null {
    return this.raw.body;
  }

  clone(): FreshgateResponse<T> {
    return new HttpResponse<T>(this.raw.clone());
  }
}

/**
 * Read the cache status header from a response.
 * Returns undefined for responses that did not come from the cache (MISS).
 */
export function getCacheStatus(
  response: Pick<FreshgateResponse, 'headers'>,
  headerName: string = DEFAULT_CACHE_STATUS_HEADER
): CacheStatus | undefined {
  const value = response.headers.get(headerName)?.toUpperCase();
  if (value === 'HIT' || value === 'STALE') {
    return value;
  }
  return undefined;
}

export function isCacheHit(
  response: Pick<FreshgateResponse, 'headers'>,
  headerName: string = DEFAULT_CACHE_STATUS_HEADER
): boolean {
  return getCacheStatus(response, headerName) === 'HIT';
}

/**
 * Copy of `response` without the cache status header. Only the cache may
 * mark a response as served from cache, so an upstream marker is dropped.
 */
export function withoutCacheStatus(
  response: FreshgateResponse,
  headerName: string = DEFAULT_CACHE_STATUS_HEADER
): FreshgateResponse {
  if (!response.headers.has(headerName)) return response;

  const headers = new Headers(response.headers);
  headers.delete(headerName);
  return new HttpResponse(
    new Response(response.read(), {
      status: response.status,
      statusText: response.statusText,
      headers,
    })
  );
}
