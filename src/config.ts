import { z } from 'zod';
import { ConfigurationError } from './core/errors.js';
import { DEFAULT_CACHE_STATUS_HEADER } from './core/response.js';
import type { Method } from './types/index.js';

const METHODS = ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'HEAD', 'OPTIONS', 'TRACE', 'CONNECT', 'PURGE'] as const satisfies readonly Method[];

// RFC 9110 token characters
const HEADER_NAME = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;

export const cacheConfigSchema = z.object({
  /** Methods whose responses are cached. Others pass straight through. */
  methods: z.array(z.enum(METHODS)).nonempty().default(['GET', 'HEAD']),
  /** Store responses marked `Cache-Control: private` */
  cachePrivateResponses: z.boolean().default(false),
  /** Serve the stale copy when revalidation fails instead of rethrowing */
  serveStaleOnError: z.boolean().default(false),
  /** Header that marks responses served from cache */
  cacheStatusHeader: z.string().regex(HEADER_NAME, 'must be a valid header name').default(DEFAULT_CACHE_STATUS_HEADER),
  /** Namespace prepended to every cache key */
  keyPrefix: z.string().default(''),
  /** Sort query parameters when building keys */
  sortQuery: z.boolean().default(false),
});

export type CacheConfigInput = z.input<typeof cacheConfigSchema>;
export type CacheConfig = z.output<typeof cacheConfigSchema>;

/**
 * Apply defaults and validate.
 * @throws ConfigurationError naming the first offending key
 */
export function resolveCacheConfig(input: CacheConfigInput = {}): CacheConfig {
  const result = cacheConfigSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const configKey = issue ? issue.path.join('.') : undefined;
    throw new ConfigurationError(
      `Invalid cache configuration${configKey ? ` for "${configKey}"` : ''}: ${issue?.message ?? 'unknown error'}`,
      { configKey }
    );
  }
  return result.data;
}

function parseBoolean(name: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off', ''].includes(normalized)) return false;
  throw new ConfigurationError(`Environment variable ${name} must be a boolean, got "${value}"`, { configKey: name });
}

/**
 * Read cache configuration from environment variables:
 *
 * | Variable | Key |
 * |---|---|
 * | `FRESHGATE_CACHE_METHODS` | `methods` (comma separated) |
 * | `FRESHGATE_CACHE_PRIVATE` | `cachePrivateResponses` |
 * | `FRESHGATE_SERVE_STALE_ON_ERROR` | `serveStaleOnError` |
 * | `FRESHGATE_CACHE_STATUS_HEADER` | `cacheStatusHeader` |
 * | `FRESHGATE_KEY_PREFIX` | `keyPrefix` |
 * | `FRESHGATE_SORT_QUERY` | `sortQuery` |
 *
 * Unset variables are left out so that defaults (or explicit options merged
 * on top) apply.
 */
export function cacheConfigFromEnv(env: NodeJS.ProcessEnv = process.env): CacheConfigInput {
  const input: CacheConfigInput = {};

  const methods = env.FRESHGATE_CACHE_METHODS;
  if (methods !== undefined) {
    const list = methods.split(',').map((m) => m.trim().toUpperCase()).filter(Boolean);
    const parsed = cacheConfigSchema.shape.methods.safeParse(list);
    if (!parsed.success) {
      throw new ConfigurationError(`Environment variable FRESHGATE_CACHE_METHODS is invalid: "${methods}"`, {
        configKey: 'FRESHGATE_CACHE_METHODS',
      });
    }
    input.methods = parsed.data;
  }

  if (env.FRESHGATE_CACHE_PRIVATE !== undefined) {
    input.cachePrivateResponses = parseBoolean('FRESHGATE_CACHE_PRIVATE', env.FRESHGATE_CACHE_PRIVATE);
  }
  if (env.FRESHGATE_SERVE_STALE_ON_ERROR !== undefined) {
    input.serveStaleOnError = parseBoolean('FRESHGATE_SERVE_STALE_ON_ERROR', env.FRESHGATE_SERVE_STALE_ON_ERROR);
  }
  if (env.FRESHGATE_CACHE_STATUS_HEADER !== undefined) {
    input.cacheStatusHeader = env.FRESHGATE_CACHE_STATUS_HEADER;
  }
  if (env.FRESHGATE_KEY_PREFIX !== undefined) {
    input.keyPrefix = env.FRESHGATE_KEY_PREFIX;
  }
  if (env.FRESHGATE_SORT_QUERY !== undefined) {
    input.sortQuery = parseBoolean('FRESHGATE_SORT_QUERY', env.FRESHGATE_SORT_QUERY);
  }

  return input;
}
