/**
 * Aggregate timing statistics for one repeatedly executed command.
 * All durations are in seconds.
 */
export interface BenchmarkResult {
  /** Display label; not guaranteed to be unique within a result set. */
  readonly command: string;
  readonly mean: number;
  readonly stddev: number;
  readonly median: number;
  /** Mean user-mode CPU time. */
  readonly user: number;
  /** Mean kernel-mode CPU time. */
  readonly system: number;
  readonly min: number;
  readonly max: number;
  /** Individual run times, when the collector kept them. */
  readonly times?: readonly number[] | null;
  /** Swept parameter value this run was made with. */
  readonly parameter?: string | null;
}

/** A benchmark result annotated with its speed relative to the fastest one. */
export interface AnnotatedResult {
  readonly result: BenchmarkResult;
  /** `mean / fastest.mean`; exactly 1 for the fastest result. */
  readonly relativeSpeed: number;
  /** Propagated standard deviation of `relativeSpeed`. */
  readonly relativeSpeedStddev: number;
  /** How much less time the fastest result took, relative to this result's mean. */
  readonly percentChange: number;
  readonly isFastest: boolean;
}

export class ComparisonError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ComparisonError';
  }
}
