/**
 * Checks for results too short to be measured reliably.
 */

import type { BenchmarkResult } from '../types/result.js';
import { paletteFor } from './comparison-report.js';
import { minOf } from './ordering.js';

/** Mean execution time (seconds) below which results are flagged as unreliable. */
export const MIN_EXECUTION_TIME = 5e-3;

export interface TimingWarningOptions {
  readonly color?: boolean;
  readonly threshold?: number;
}

/** Results whose mean is below the threshold. NaN means are not flagged. */
export function findShortRuns(
  results: readonly BenchmarkResult[],
  threshold: number = MIN_EXECUTION_TIME,
): BenchmarkResult[] {
  return results.filter((result) => result.mean < threshold);
}

/**
 * One warning line per result below the threshold, naming the command and,
 * when individual run times are known, the shortest of them.
 */
export function formatTimingWarnings(
  results: readonly BenchmarkResult[],
  options: TimingWarningOptions = {},
): string[] {
  const threshold = options.threshold ?? MIN_EXECUTION_TIME;
  const c = paletteFor(options.color);

  return findShortRuns(results, threshold).map((result) => {
    const label = c.yellow.bold('Warning:');
    let line = `${label} '${result.command}' took less than ${formatMs(threshold)} on average; results might be inaccurate.`;
    if (result.times && result.times.length > 0) {
      line += ` Shortest run: ${formatMs(minOf(result.times))}.`;
    }
    return line;
  });
}

function formatMs(seconds: number): string {
  return `${(seconds * 1000).toFixed(1)} ms`;
}
