import { z } from 'zod';
import { CacheEntry, FreshgateResponse } from '../types/index.js';
import { HttpResponse } from '../core/response.js';
import { ParseError } from '../core/errors.js';

// Statuses whose Response may not carry a body
const NULL_BODY_STATUSES = new Set([101, 103, 204, 205, 304]);

export const cacheEntrySchema = z.object({
  status: z.number().int().min(200).max(599),
  statusText: z.string(),
  headers: z.record(z.union([z.string(), z.array(z.string())])),
  body: z.string(),
  storedAt: z.number(),
});

/**
 * Snapshot a response for storage. Reads a clone, so the given response
 * stays readable by the caller.
 */
export async function toCacheEntry(response: FreshgateResponse, storedAt: number): Promise<CacheEntry> {
  const headers: CacheEntry['headers'] = {};
  response.headers.forEach((value, name) => {
    if (name !== 'set-cookie') headers[name] = value;
  });

  const cookies = response.headers.getSetCookie();
  if (cookies.length > 0) {
    headers['set-cookie'] = cookies;
  }

  const bytes = await response.clone().arrayBuffer();

  return {
    status: response.status,
    statusText: response.statusText,
    headers,
    body: Buffer.from(bytes).toString('base64'),
    storedAt,
  };
}

/**
 * Validate a value read back from storage.
 * @throws ParseError when it is not a cache entry
 */
export function parseCacheEntry(value: unknown): CacheEntry {
  const result = cacheEntrySchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue ? issue.path.join('.') : '';
    throw new ParseError(`Invalid cache entry${path ? ` at "${path}"` : ''}: ${issue?.message ?? 'unknown error'}`, {
      format: 'cache-entry',
    });
  }
  return result.data;
}

/**
 * Headers of a stored entry, with each `set-cookie` value appended on its own
 */
export function entryHeaders(headers: CacheEntry['headers']): Headers {
  const result = new Headers();
  for (const [name, value] of Object.entries(headers)) {
    if (Array.isArray(value)) {
      for (const item of value) result.append(name, item);
    } else {
      result.set(name, value);
    }
  }
  return result;
}

/**
 * Rebuild a response from a stored entry. `headers` replaces the stored
 * headers when given.
 */
export function fromCacheEntry(entry: CacheEntry, headers: HeadersInit = entryHeaders(entry.headers)): HttpResponse {
  const body = NULL_BODY_STATUSES.has(entry.status) ? null : new Uint8Array(Buffer.from(entry.body, 'base64'));

  return new HttpResponse(
    new Response(body, {
      status: entry.status,
      statusText: entry.statusText,
      headers,
    })
  );
}
