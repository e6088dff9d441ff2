import { MissingDirectiveError, InvalidDirectiveError } from '../core/errors.js';
import { parseHttpDate, parseInteger } from '../utils/http-date.js';
import {
  CacheControl,
  NoCacheEquivalentPredicate,
  defaultNoCacheEquivalent,
  parseCacheControl,
} from './cache-control.js';
import { Clock } from './clock.js';

/**
 * - `fresh`: may be served without contacting the origin
 * - `stale`: must be revalidated before it is served
 * - `transparent`: no freshness signal at all; the cache offers no opinion
 */
export type Freshness = 'fresh' | 'stale' | 'transparent';

export interface FreshnessInput {
  headers: Headers;
  directives: CacheControl;
  clock: Clock;
  noCacheEquivalent: NoCacheEquivalentPredicate;
}

/**
 * One rule of the pipeline. Returns a verdict, or undefined to let the next
 * stage decide.
 */
export type FreshnessStage = (input: FreshnessInput) => Freshness | undefined;

/**
 * max-age, or undefined when it is missing or malformed. Other errors are
 * not directive problems and propagate.
 */
function maxAgeOf(directives: CacheControl): number | undefined {
  try {
    return directives.maxAge();
  } catch (error) {
    if (error instanceof MissingDirectiveError || error instanceof InvalidDirectiveError) {
      return undefined;
    }
    throw error;
  }
}

/**
 * no-cache, or an equivalent combination, forces revalidation whatever the
 * timing headers say.
 */
export const mandatoryRevalidationStage: FreshnessStage = ({ directives, noCacheEquivalent }) => {
  if (directives.noCache() || directives.noCacheEquivalent(noCacheEquivalent)) {
    return 'stale';
  }
  return undefined;
};

/**
 * Age header against max-age. The fresh window is open: Age == max-age is stale.
 */
export const ageStage: FreshnessStage = ({ headers, directives }) => {
  const maxAge = maxAgeOf(directives);
  if (maxAge === undefined) return undefined;

  const age = parseInteger(headers.get('age'));
  if (age === undefined) return undefined;

  return maxAge - age > 0 ? 'fresh' : 'stale';
};

/**
 * max-age counted from the Date header. Once max-age is known the verdict is
 * final: without a usable Date the response is stale.
 */
export const maxAgeDateStage: FreshnessStage = ({ headers, directives, clock }) => {
  const maxAge = maxAgeOf(directives);
  if (maxAge === undefined) return undefined;

  const date = parseHttpDate(headers.get('date'));
  if (!date) return 'stale';
  if (maxAge <= 0) return 'stale';

  const expiresAt = date.getTime() + maxAge * 1000;
  return clock.now().getTime() < expiresAt ? 'fresh' : 'stale';
};

/**
 * Legacy Expires header compared with Date. Unlike max-age, a missing or
 * malformed Expires defers to the next stage.
 */
export const expiresStage: FreshnessStage = ({ headers }) => {
  const expires = parseHttpDate(headers.get('expires'));
  if (!expires) return undefined;

  const date = parseHttpDate(headers.get('date'));
  if (!date) return undefined;

  return expires.getTime() >= date.getTime() ? 'fresh' : 'stale';
};

export const transparentStage: FreshnessStage = () => 'transparent';

export const defaultFreshnessStages: readonly FreshnessStage[] = [
  mandatoryRevalidationStage,
  ageStage,
  maxAgeDateStage,
  expiresStage,
  transparentStage,
];

export interface FreshnessOptions {
  clock: Clock;
  noCacheEquivalent?: NoCacheEquivalentPredicate;
  /**
   * Stages in evaluation order. When none of them decides, the result is
   * `transparent`.
   * @default defaultFreshnessStages
   */
  stages?: readonly FreshnessStage[];
}

export interface FreshnessPipeline {
  evaluate(headers: Headers, directives?: CacheControl): Freshness;
}

/**
 * Run stages in order and return the first verdict
 */
export function runFreshnessStages(stages: readonly FreshnessStage[], input: FreshnessInput): Freshness {
  for (const stage of stages) {
    const verdict = stage(input);
    if (verdict !== undefined) {
      return verdict;
    }
  }
  return 'transparent';
}

/**
 * Build a reusable freshness pipeline bound to a clock and policy.
 *
 * @example
 * ```typescript
 * const pipeline = createFreshnessPipeline({ clock: systemClock });
 * pipeline.evaluate(new Headers({
 *   'cache-control': 'max-age=120',
 *   date: new Date().toUTCString(),
 * })); // 'fresh'
 * ```
 */
export function createFreshnessPipeline(options: FreshnessOptions): FreshnessPipeline {
  const clock = options.clock;
  const noCacheEquivalent = options.noCacheEquivalent ?? defaultNoCacheEquivalent;
  const stages = options.stages ?? defaultFreshnessStages;

  return {
    evaluate(headers, directives = parseCacheControl(headers)) {
      return runFreshnessStages(stages, { headers, directives, clock, noCacheEquivalent });
    },
  };
}

export function evaluateFreshness(
  headers: Headers,
  directives: CacheControl,
  options: FreshnessOptions
): Freshness {
  return createFreshnessPipeline(options).evaluate(headers, directives);
}
