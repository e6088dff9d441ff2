import { MissingDirectiveError, InvalidDirectiveError } from '../core/errors.js';
import { parseInteger } from '../utils/http-date.js';

/**
 * Decides whether a directive set mandates revalidation even though it
 * carries no literal `no-cache` token.
 */
export type NoCacheEquivalentPredicate = (directives: CacheControl) => boolean;

/**
 * `must-revalidate` or `proxy-revalidate` combined with a `max-age` of zero
 * or less: the response goes stale the moment it is received and may not be
 * served stale, which is the same contract as `no-cache`.
 */
export const defaultNoCacheEquivalent: NoCacheEquivalentPredicate = (directives) => {
  if (!directives.mustRevalidate() && !directives.proxyRevalidate()) {
    return false;
  }
  const maxAge = parseInteger(directives.get('max-age'));
  return maxAge !== undefined && maxAge <= 0;
};

/**
 * Parsed Cache-Control directive set.
 *
 * Names are lower-cased. Value-less directives (`no-store`) map to an empty
 * string, so `has()` is the presence check and absence never means "false".
 * Instances are immutable.
 */
export class CacheControl {
  private readonly directives: ReadonlyMap<string, string>;

  constructor(directives: Iterable<readonly [string, string]> = []) {
    const map = new Map<string, string>();
    for (const [name, value] of directives) {
      map.set(name.toLowerCase(), value);
    }
    this.directives = map;
  }

  get size(): number {
    return this.directives.size;
  }

  has(name: string): boolean {
    return this.directives.has(name.toLowerCase());
  }

  get(name: string): string | undefined {
    return this.directives.get(name.toLowerCase());
  }

  entries(): Array<[string, string]> {
    return Array.from(this.directives.entries());
  }

  /**
   * True when at least one directive was parsed
   */
  isPresent(): boolean {
    return this.directives.size > 0;
  }

  /**
   * max-age in seconds.
   * @throws MissingDirectiveError when not asserted
   * @throws InvalidDirectiveError when the value is not an integer
   */
  maxAge(): number {
    const raw = this.directives.get('max-age');
    if (raw === undefined) {
      throw new MissingDirectiveError('max-age');
    }
    const value = parseInteger(raw);
    if (value === undefined) {
      throw new InvalidDirectiveError('max-age', raw);
    }
    return value;
  }

  isPublic(): boolean {
    return this.directives.has('public');
  }

  isPrivate(): boolean {
    return this.directives.has('private');
  }

  noStore(): boolean {
    return this.directives.has('no-store');
  }

  noCache(): boolean {
    return this.directives.has('no-cache');
  }

  mustRevalidate(): boolean {
    return this.directives.has('must-revalidate');
  }

  proxyRevalidate(): boolean {
    return this.directives.has('proxy-revalidate');
  }

  noCacheEquivalent(predicate: NoCacheEquivalentPredicate = defaultNoCacheEquivalent): boolean {
    return predicate(this);
  }

  equals(other: CacheControl): boolean {
    if (other.size !== this.size) return false;
    for (const [name, value] of this.directives) {
      if (other.get(name) !== value) return false;
    }
    return true;
  }

  toString(): string {
    return this.entries()
      .map(([name, value]) => (value === '' ? name : `${name}=${value}`))
      .join(', ');
  }
}

function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1);
  }
  return value;
}

function splitDirectives(occurrence: string): Array<[string, string]> {
  const result: Array<[string, string]> = [];

  for (const token of occurrence.split(',')) {
    const trimmed = token.trim();
    if (!trimmed) continue;

    const equals = trimmed.indexOf('=');
    if (equals === -1) {
      result.push([trimmed.toLowerCase(), '']);
      continue;
    }

    const name = trimmed.slice(0, equals).trim().toLowerCase();
    if (!name) continue;
    result.push([name, unquote(trimmed.slice(equals + 1).trim())]);
  }

  return result;
}

/**
 * Parse Cache-Control header text into a directive set.
 *
 * Accepts a Headers collection, a single header value or one value per
 * header occurrence. Later occurrences of a directive overwrite earlier ones.
 *
 * @example
 * ```typescript
 * const cc = parseCacheControl('public, max-age=3600');
 * cc.isPublic();  // true
 * cc.maxAge();  // 3600
 * ```
 */
export function parseCacheControl(input: Headers | string | readonly string[] | null | undefined): CacheControl {
  if (input === null || input === undefined) {
    return new CacheControl();
  }

  let occurrences: readonly string[];
  if (typeof input === 'string') {
    occurrences = [input];
  } else if (input instanceof Headers) {
    const value = input.get('cache-control');
    occurrences = value === null ? [] : [value];
  } else {
    occurrences = input;
  }

  return new CacheControl(occurrences.flatMap(splitDirectives));
}
