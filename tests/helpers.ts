/**
 * Deterministic sources shared by the tests
 */

import type { Clock, RandomSource } from '../src/types.js';

/**
 * Clock advancing by `step` nanoseconds on every read
 */
export function stepClock(step: bigint = 1000n): Clock {
  let now = 0n;
  return () => {
    now += step;
    return now;
  };
}

/**
 * Seeded uniform source in [0, 1) (mulberry32)
 */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Occurrences of each value
 */
export function frequencies<T>(values: readonly T[]): Map<T, number> {
  const counts = new Map<T, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return counts;
}
