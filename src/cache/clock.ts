/**
 * Source of the current time. Freshness code never reads the wall clock
 * directly; it is handed a Clock.
 */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};
