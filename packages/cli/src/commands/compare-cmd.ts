/**
 * CLI command: cmdbench compare
 *
 * Loads exported result files, warns about runs too short to measure
 * reliably, and prints a ranked relative-speed summary.
 */

import { Command, Option } from 'commander';
import chalk from 'chalk';
import { resolve } from 'node:path';
import {
  OUTPUT_STYLES,
  createProgressIndicator,
  describeResultsError,
  formatTimingWarnings,
  isOutputStyle,
  loadResultFiles,
  rankComparison,
  usesColor,
  writeBenchmarkComparison,
  type BenchmarkResult,
  type OutputStyle,
} from '@cmdbench/core';
import { loadConfigOrDefault } from '../config.js';

export interface CompareOptions {
  readonly style?: string;
  readonly json?: boolean;
}

/** One ranked entry of the JSON comparison output. */
export interface ComparisonEntry {
  readonly command: string;
  readonly mean: number;
  readonly relativeSpeed: number;
  readonly relativeSpeedStddev: number;
  readonly percentChange: number;
  readonly fastest: boolean;
}

/**
 * Rank results by mean and describe each against the fastest one.
 */
export function toComparisonEntries(results: readonly BenchmarkResult[]): ComparisonEntry[] {
  return rankComparison(results).map((item) => ({
    command: item.result.command,
    mean: item.result.mean,
    relativeSpeed: item.relativeSpeed,
    relativeSpeedStddev: item.relativeSpeedStddev,
    percentChange: item.percentChange,
    fastest: item.isFastest,
  }));
}

/**
 * Format the comparison as JSON.
 */
export function formatComparisonJSON(results: readonly BenchmarkResult[]): string {
  return JSON.stringify(toComparisonEntries(results), null, 2);
}

/**
 * Run the compare command. Returns the process exit code.
 */
export async function runCompare(
  files: readonly string[],
  options: CompareOptions,
  rootDir: string = process.cwd(),
): Promise<number> {
  const config = await loadConfigOrDefault(rootDir);

  let style: OutputStyle = config.output.style;
  if (options.style !== undefined) {
    if (!isOutputStyle(options.style)) {
      // eslint-disable-next-line no-console
      console.error(chalk.red(`Invalid --style value. Must be one of: ${OUTPUT_STYLES.join(', ')}.`));
      return 1;
    }
    style = options.style;
  }
  const color = usesColor(style);

  const paths = (files.length > 0 ? files : config.results.files).map((f) => resolve(rootDir, f));

  const progress = createProgressIndicator({
    length: paths.length,
    message: 'Loading results',
    style,
  });
  const loaded = await loadResultFiles(paths, () => progress.tick());
  progress.finish();

  if (loaded.isErr()) {
    // eslint-disable-next-line no-console
    console.error(chalk.red(describeResultsError(loaded.error)));
    return 1;
  }
  const results = loaded.value;

  if (options.json) {
    // eslint-disable-next-line no-console
    console.log(formatComparisonJSON(results));
    return 0;
  }

  for (const warning of formatTimingWarnings(results, { color })) {
    // eslint-disable-next-line no-console
    console.error(warning);
  }

  if (results.length < 2) {
    const notice = `Found ${results.length} result(s); at least two are needed for a comparison.`;
    // eslint-disable-next-line no-console
    console.log(color ? chalk.dim(notice) : notice);
    return 0;
  }

  writeBenchmarkComparison(results, { color });
  return 0;
}

export function registerCompareCommand(program: Command): void {
  program
    .command('compare')
    .description('Rank exported benchmark results by relative speed')
    .argument('[files...]', 'Result files to compare (defaults to results.files from .cmdbench.yaml)')
    .addOption(new Option('--style <style>', 'Output style').choices(OUTPUT_STYLES))
    .option('--json', 'Output the ranked comparison as JSON')
    .action(async (files: string[], options: CompareOptions) => {
      try {
        const code = await runCompare(files, options);
        if (code !== 0) process.exit(code);
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        // eslint-disable-next-line no-console
        console.error(chalk.red('Comparison failed:'), message);
        process.exit(1);
      }
    });
}
