// @cmdbench/core: relative-speed comparison and parameter tokenization
export type {
  BenchmarkResult,
  AnnotatedResult,
  OutputStyle,
  OutputConfig,
  ResultsConfig,
  CmdbenchConfig,
} from './types/index.js';
export { ComparisonError, OUTPUT_STYLES } from './types/index.js';

// Config
export {
  loadConfig,
  parseConfig,
  formatZodErrors,
  ConfigError,
  DEFAULT_CONFIG,
  CONFIG_FILE_NAME,
} from './config/config-parser.js';
export { isOutputStyle, usesColor } from './config/output-style.js';

// Parameter lists
export { tokenize } from './parameter/tokenizer.js';
export {
  parseParameterList,
  substituteParameter,
  expandCommands,
  ParameterError,
} from './parameter/parameter-list.js';
export type { ParameterList, ParameterBinding, ExpandedCommand } from './parameter/parameter-list.js';

// Comparison
export { compareTimes, compareMeanTime, minOf, maxOf } from './compare/ordering.js';
export { computeRelativeSpeed, findFastestIndex } from './compare/relative-speed.js';
export {
  rankComparison,
  formatBenchmarkComparison,
  writeBenchmarkComparison,
  paletteFor,
} from './compare/comparison-report.js';
export type { ComparisonFormatOptions, ComparisonWriteOptions } from './compare/comparison-report.js';
export {
  MIN_EXECUTION_TIME,
  findShortRuns,
  formatTimingWarnings,
} from './compare/timing-quality.js';
export type { TimingWarningOptions } from './compare/timing-quality.js';

// Progress
export {
  createProgressIndicator,
  progressModeForStyle,
  renderBar,
  BarProgress,
  SpinnerProgress,
  HiddenProgress,
} from './progress/progress-indicator.js';
export type { ProgressIndicator, ProgressMode, ProgressOptions } from './progress/progress-indicator.js';

// Result files
export {
  loadResults,
  loadResultFiles,
  parseResults,
  describeResultsError,
} from './results/results-loader.js';
export type { ResultsError } from './results/results-loader.js';
