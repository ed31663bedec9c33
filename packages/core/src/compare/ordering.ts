/**
 * Total-order comparisons on timing values.
 *
 * Incomparable values (NaN) compare as equal instead of throwing, so
 * sorting and min/max selection stay total.
 */

import type { BenchmarkResult } from '../types/result.js';

/** Compare two numbers, treating NaN as equal to anything. */
export function compareTimes(l: number, r: number): number {
  if (l < r) return -1;
  if (l > r) return 1;
  return 0;
}

/** Order results by ascending mean time. */
export function compareMeanTime(l: BenchmarkResult, r: BenchmarkResult): number {
  return compareTimes(l.mean, r.mean);
}

/**
 * Smallest value under {@link compareTimes}; the first one wins ties.
 * Throws a RangeError for an empty array.
 */
export function minOf(values: readonly number[]): number {
  return pickBy(values, (candidate, current) => compareTimes(candidate, current) < 0);
}

/**
 * Largest value under {@link compareTimes}; the last one wins ties.
 * Throws a RangeError for an empty array.
 */
export function maxOf(values: readonly number[]): number {
  return pickBy(values, (candidate, current) => compareTimes(candidate, current) >= 0);
}

function pickBy(
  values: readonly number[],
  replaces: (candidate: number, current: number) => boolean,
): number {
  const [first, ...rest] = values;
  if (first === undefined) {
    throw new RangeError('Cannot select from an empty list of values');
  }

  let picked = first;
  for (const value of rest) {
    if (replaces(value, picked)) picked = value;
  }
  return picked;
}
