/**
 * Ranked, human-readable summary of a set of benchmark results.
 */

import chalk, { Chalk, type ChalkInstance } from 'chalk';
import type { AnnotatedResult, BenchmarkResult } from '../types/result.js';
import { compareMeanTime } from './ordering.js';
import { computeRelativeSpeed } from './relative-speed.js';

export interface ComparisonFormatOptions {
  /** Style the output with ANSI colors. Defaults to true. */
  readonly color?: boolean;
}

export interface ComparisonWriteOptions extends ComparisonFormatOptions {
  /** Line sink. Defaults to `console.log`. */
  readonly write?: (line: string) => void;
}

const plain = new Chalk({ level: 0 });

/** Pick the chalk instance for the requested color mode. */
export function paletteFor(color: boolean | undefined): ChalkInstance {
  return color === false ? plain : chalk;
}

/**
 * Annotate results with their relative speed and rank them by mean time,
 * fastest first. Tied means keep their input order.
 */
export function rankComparison(results: readonly BenchmarkResult[]): AnnotatedResult[] {
  if (results.length === 0) return [];
  return computeRelativeSpeed(results).sort((l, r) => compareMeanTime(l.result, r.result));
}

/**
 * Render the comparison as lines of text.
 *
 * Results are ranked by mean time; the first one is reported as the
 * baseline and every other one as "N ± M times faster than" it.
 * Returns no lines when fewer than two results are given.
 */
export function formatBenchmarkComparison(
  results: readonly BenchmarkResult[],
  options: ComparisonFormatOptions = {},
): string[] {
  if (results.length < 2) return [];

  const c = paletteFor(options.color);
  const [fastest, ...others] = rankComparison(results);
  if (fastest === undefined) return [];

  const lines: string[] = [];
  lines.push(c.bold('Summary'));
  lines.push(`  '${c.cyan(fastest.result.command)}' ran`);

  for (const item of others) {
    const speed = c.bold.green(item.relativeSpeed.toFixed(2).padStart(8));
    const stddev = c.green(item.relativeSpeedStddev.toFixed(2));
    const percent = c.bold.green(item.percentChange.toFixed(1));
    lines.push(`${speed} ± ${stddev} times faster than '${c.magenta(item.result.command)}', -${percent}%`);
  }

  return lines;
}

/** Print the comparison; does nothing for fewer than two results. */
export function writeBenchmarkComparison(
  results: readonly BenchmarkResult[],
  options: ComparisonWriteOptions = {},
): void {
  // eslint-disable-next-line no-console
  const write = options.write ?? ((line: string) => console.log(line));
  for (const line of formatBenchmarkComparison(results, options)) {
    write(line);
  }
}
