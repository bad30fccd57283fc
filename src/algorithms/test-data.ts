/**
 * Synthetic inputs for the majority vote benchmarks
 */

import { RandomSource } from '../types.js';

/**
 * Value placed in the majority slots of generated arrays
 */
export const MAJORITY_SENTINEL = 1;

/**
 * Build an array of `size` integers.
 *
 * With `wantMajority` (and more than one slot) the first floor(size/2)+1
 * slots hold MAJORITY_SENTINEL and the rest hold distinct values from 2
 * upwards. Otherwise slot i holds i mod (floor(size/2)+1), so no value
 * repeats more than twice once size >= 4. A one-slot array always takes
 * the second branch, yet the engine reports a single element as a majority.
 */
export function generateTestArray(size: number, wantMajority: boolean): number[] {
  if (size <= 0) {
    return [];
  }

  const array = new Array<number>(size);
  const majorityCount = Math.floor(size / 2) + 1;

  if (wantMajority && size > 1) {
    for (let i = 0; i < majorityCount; i++) {
      array[i] = MAJORITY_SENTINEL;
    }
    for (let i = majorityCount; i < size; i++) {
      array[i] = i - majorityCount + 2;
    }
  } else {
    for (let i = 0; i < size; i++) {
      array[i] = i % majorityCount;
    }
  }

  return array;
}

/**
 * In-place Fisher-Yates shuffle
 */
export function shuffleArray<T>(
  array: T[] | null | undefined,
  random: RandomSource = Math.random
): void {
  if (!array || array.length <= 1) {
    return;
  }

  for (let i = array.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    const temp = array[i];
    array[i] = array[j];
    array[j] = temp;
  }
}
