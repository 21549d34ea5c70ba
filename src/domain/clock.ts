/**
 * Source of wall-clock time in epoch milliseconds
 */
export interface Clock {
  now(): number;
}

/**
 * Returns a uniform value in [0, 1)
 */
export type RandomSource = () => number;

/**
 * Wrap a time source so every reading is strictly greater than the last.
 * Readings that repeat or go backwards are bumped by one millisecond.
 */
export function createMonotonicClock(source: () => number = () => Date.now()): Clock {
  let last = Number.NEGATIVE_INFINITY;
  return {
    now() {
      const reading = source();
      last = reading > last ? reading : last + 1;
      return last;
    },
  };
}

// Spot timestamps double as snapshot keys, so no two readings may be equal.
export const systemClock: Clock = createMonotonicClock();

export const mathRandom: RandomSource = () => Math.random();

export function secondsBetween(from: number, to: number): number {
  return (to - from) / 1000;
}
