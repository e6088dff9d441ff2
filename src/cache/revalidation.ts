import { CacheEntry, FreshgateRequest, FreshgateResponse, Transport } from '../types/index.js';
import { DEFAULT_CACHE_STATUS_HEADER, withoutCacheStatus } from '../core/response.js';
import { entryHeaders, fromCacheEntry } from './entry.js';

export type RevalidationOutcome = 'validated' | 'replaced';

/**
 * `validated`: origin answered 304 and the stored body is still current.
 * `replaced`: origin sent a new representation.
 */
export interface RevalidationResult {
  outcome: RevalidationOutcome;
  response: FreshgateResponse;
}

export interface RevalidationOptions {
  /**
   * Header used to mark validated responses as served from cache
   * @default 'X-Cache'
   */
  cacheStatusHeader?: string;
}

// Describe the 304 message itself, not the stored representation
const FRAMING_HEADERS = new Set(['content-length', 'content-encoding', 'transfer-encoding']);

/**
 * Copy of `req` carrying the stored entry's validators
 */
export function createConditionalRequest(req: FreshgateRequest, entry: CacheEntry): FreshgateRequest {
  let conditional = req;
  const stored = entryHeaders(entry.headers);

  const etag = stored.get('etag');
  if (etag) {
    conditional = conditional.withHeader('If-None-Match', etag);
  }

  const lastModified = stored.get('last-modified');
  if (lastModified) {
    conditional = conditional.withHeader('If-Modified-Since', lastModified);
  }

  return conditional;
}

/**
 * Stored headers updated with those of a 304 response (RFC 9111 §4.3.4)
 */
export function refreshHeaders(stored: CacheEntry['headers'], notModified: Headers): Headers {
  const headers = entryHeaders(stored);
  notModified.forEach((value, name) => {
    if (!FRAMING_HEADERS.has(name) && name !== 'set-cookie') {
      headers.set(name, value);
    }
  });

  const cookies = notModified.getSetCookie();
  if (cookies.length > 0) {
    headers.delete('set-cookie');
    for (const cookie of cookies) headers.append('set-cookie', cookie);
  }
  return headers;
}

/**
 * Executes the conditional re-fetch for a stale entry.
 *
 * Exactly one dispatch per call. A transport failure is rethrown untouched
 * and the caller decides what happens to the stored entry.
 */
export class RevalidationValidator {
  private readonly cacheStatusHeader: string;

  constructor(
    private readonly transport: Transport,
    options: RevalidationOptions = {}
  ) {
    this.cacheStatusHeader = options.cacheStatusHeader ?? DEFAULT_CACHE_STATUS_HEADER;
  }

  async validate(req: FreshgateRequest, entry: CacheEntry): Promise<RevalidationResult> {
    const response = await this.transport.dispatch(createConditionalRequest(req, entry));

    if (response.status !== 304) {
      return { outcome: 'replaced', response: withoutCacheStatus(response, this.cacheStatusHeader) };
    }

    const headers = refreshHeaders(entry.headers, response.headers);
    headers.set(this.cacheStatusHeader, 'HIT');

    return { outcome: 'validated', response: fromCacheEntry(entry, headers) };
  }
}
