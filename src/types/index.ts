export type Method =
  // Standard HTTP Methods
  | 'GET'
  | 'POST'
  | 'PUT'
  | 'DELETE'
  | 'PATCH'
  | 'HEAD'
  | 'OPTIONS'
  | 'TRACE'
  | 'CONNECT'
  // CDN/Cache Methods
  | 'PURGE';

export interface RequestOptions {
  method?: Method;
  headers?: HeadersInit;
  body?: BodyInit | null;
  signal?: AbortSignal;
  timeout?: number; // Timeout in milliseconds
}

export interface FreshgateRequest {
  url: string;
  method: Method;
  headers: Headers;
  body: BodyInit | null;
  signal?: AbortSignal;
  timeout?: number;

  // Helpers for immutability
  withHeader(name: string, value: string): FreshgateRequest;
}

export interface FreshgateResponse<T = unknown> {
  status: number;
  statusText: string;
  headers: Headers;
  ok: boolean;
  url: string;

  // Data access
  json<R = T>(): Promise<R>;
  text(): Promise<string>;
  arrayBuffer(): Promise<ArrayBuffer>;

  // Streaming & IO
  read(): ReadableStream<Uint8Array> | null; // Native Web Stream

  clone(): FreshgateResponse<T>;
  raw: Response; // Original fetch Response
}

/**
 * The fetch capability: executes a request against the origin.
 * Cache layers implement it too, so they can be stacked.
 */
export interface Transport {
  dispatch(req: FreshgateRequest): Promise<FreshgateResponse>;
}

/**
 * Snapshot of a response as handed to a {@link CacheStorage}.
 * `body` is base64 so that binary payloads survive JSON-backed storages.
 * Header values are combined, except `set-cookie`, which cannot be and is
 * kept as a list.
 */
export interface CacheEntry {
  status: number;
  statusText: string;
  headers: Record<string, string | string[]>;
  body: string;
  storedAt: number;
}

/**
 * Associative store behind the cache. No eviction, TTL or concurrency
 * contract is assumed; those belong to the implementation.
 */
export interface CacheStorage {
  get(key: string): Promise<CacheEntry | undefined | null>;
  set(key: string, value: CacheEntry): Promise<void>;
  delete(key: string): Promise<void>;
}

/**
 * Value of the cache status header set on responses served by the cache.
 * `HIT` covers fresh and validated responses; `STALE` is only used when
 * stale serving on revalidation failure is enabled.
 */
export type CacheStatus = 'HIT' | 'STALE';
