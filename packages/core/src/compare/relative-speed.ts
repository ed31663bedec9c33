/**
 * Relative speed of benchmark results against the fastest one.
 *
 * Uncertainty of each ratio is propagated to first order, assuming the
 * two means are independent (zero covariance):
 *
 *   σ(a/b) = (a/b) · sqrt((σa/a)² + (σb/b)²)
 */

import { ComparisonError, type AnnotatedResult, type BenchmarkResult } from '../types/result.js';
import { compareMeanTime } from './ordering.js';

/**
 * Index of the first result with the smallest mean.
 * Results whose means cannot be compared are treated as ties.
 */
export function findFastestIndex(results: readonly BenchmarkResult[]): number {
  let fastest = 0;
  results.forEach((result, index) => {
    const current = results[fastest];
    if (current !== undefined && compareMeanTime(result, current) < 0) {
      fastest = index;
    }
  });
  return fastest;
}

/**
 * Annotate every result with its speed relative to the fastest one.
 *
 * The output is aligned index-for-index with the input; ranking is left
 * to the caller. The fastest result is picked by position, so two results
 * with identical statistics are never both flagged as fastest.
 *
 * @throws ComparisonError when `results` is empty.
 */
export function computeRelativeSpeed(results: readonly BenchmarkResult[]): AnnotatedResult[] {
  const fastestIndex = findFastestIndex(results);
  const fastest = results[fastestIndex];
  if (fastest === undefined) {
    throw new ComparisonError('At least one benchmark result is required for a comparison');
  }

  return results.map((result, index) => {
    const isFastest = index === fastestIndex;
    const ratio = result.mean / fastest.mean;
    const percentChange = (100 * (result.mean - fastest.mean)) / result.mean;

    // The fastest result is its own reference, so its ratio carries no uncertainty.
    const ratioStddev = isFastest
      ? 0
      : ratio *
        Math.sqrt((result.stddev / result.mean) ** 2 + (fastest.stddev / fastest.mean) ** 2);

    return {
      result,
      relativeSpeed: ratio,
      relativeSpeedStddev: ratioStddev,
      percentChange,
      isFastest,
    };
  });
}
