/**
 * Loading of exported benchmark result files.
 *
 * A result file is the JSON export written by the measuring side:
 * `{ "results": [ { "command": ..., "mean": ..., ... } ] }`. This is the
 * boundary where results are validated, so everything past it can assume
 * positive, finite means.
 */

import { readFile } from 'node:fs/promises';
import { ok, err, type Result } from 'neverthrow';
import { z } from 'zod';
import type { BenchmarkResult } from '../types/result.js';
import { formatZodErrors } from '../config/config-parser.js';

/** Error types for result file operations. */
export type ResultsError =
  | { readonly kind: 'not_found'; readonly path: string }
  | { readonly kind: 'parse_error'; readonly path: string; readonly message: string }
  | { readonly kind: 'invalid_results'; readonly path: string; readonly message: string };

const seconds = z.number().finite().nonnegative();

const benchmarkResultSchema = z.object({
  command: z.string(),
  mean: z.number().finite().positive('mean must be positive'),
  stddev: seconds,
  median: seconds,
  user: seconds,
  system: seconds,
  min: seconds,
  max: seconds,
  times: z.array(seconds).nullable().optional(),
  parameter: z.string().nullable().optional(),
});

const resultsFileSchema = z.object({
  results: z.array(benchmarkResultSchema),
});

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/** Parse the contents of a result file. */
export function parseResults(
  content: string,
  path: string,
): Result<BenchmarkResult[], ResultsError> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    return err({ kind: 'parse_error', path, message });
  }

  const validation = resultsFileSchema.safeParse(parsed);
  if (!validation.success) {
    return err({ kind: 'invalid_results', path, message: formatZodErrors(validation.error) });
  }

  return ok(validation.data.results);
}

/** Read and validate one result file. */
export async function loadResults(
  filePath: string,
): Promise<Result<BenchmarkResult[], ResultsError>> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      return err({ kind: 'not_found', path: filePath });
    }
    const message = error instanceof Error ? error.message : String(error);
    return err({ kind: 'parse_error', path: filePath, message });
  }

  return parseResults(content, filePath);
}

/**
 * Read several result files and concatenate their results in argument
 * order. Stops at the first file that fails.
 *
 * @param onLoaded - Called after each file is read successfully.
 */
export async function loadResultFiles(
  filePaths: readonly string[],
  onLoaded?: (filePath: string) => void,
): Promise<Result<BenchmarkResult[], ResultsError>> {
  const all: BenchmarkResult[] = [];
  for (const filePath of filePaths) {
    const result = await loadResults(filePath);
    if (result.isErr()) return err(result.error);
    all.push(...result.value);
    onLoaded?.(filePath);
  }
  return ok(all);
}

/** Human-readable description of a result file error. */
export function describeResultsError(error: ResultsError): string {
  switch (error.kind) {
    case 'not_found':
      return `Result file not found: ${error.path}`;
    case 'parse_error':
      return `Could not read result file ${error.path}: ${error.message}`;
    case 'invalid_results':
      return `Invalid result file ${error.path}: ${error.message}`;
  }
}
