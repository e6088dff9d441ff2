import { FreshgateRequest } from '../types/index.js';

export interface KeyBuilderOptions {
  /**
   * Prepended verbatim to every key, e.g. to namespace a shared storage
   * @default ''
   */
  prefix?: string;

  /**
   * Sort query parameters by name so `?b=2&a=1` and `?a=1&b=2` share a key.
   * Parameters with the same name keep their relative order.
   * @default false
   */
  sortQuery?: boolean;
}

export type KeyBuilder = (req: Pick<FreshgateRequest, 'method' | 'url'>) => string;

/**
 * Derive the cache key for a request: `METHOD:scheme://host[:port]/path?query`.
 *
 * The URL goes through WHATWG normalisation, so scheme and host are
 * lower-cased, default ports and fragments are dropped and dot segments are
 * resolved. Headers never take part (no Vary support).
 *
 * @example
 * ```typescript
 * buildCacheKey({ method: 'GET', url: 'HTTPS://Example.com:443/a/../b?x=1#top' });
 * // 'GET:https://example.com/b?x=1'
 * ```
 */
export function buildCacheKey(
  req: Pick<FreshgateRequest, 'method' | 'url'>,
  options: KeyBuilderOptions = {}
): string {
  const url = new URL(req.url);
  url.hash = '';

  if (options.sortQuery) {
    url.searchParams.sort();
  }

  return `${options.prefix ?? ''}${req.method.toUpperCase()}:${url.href}`;
}

export function createKeyBuilder(options: KeyBuilderOptions = {}): KeyBuilder {
  return (req) => buildCacheKey(req, options);
}
