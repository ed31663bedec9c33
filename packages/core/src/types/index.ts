export type { BenchmarkResult, AnnotatedResult } from './result.js';
export { ComparisonError } from './result.js';
export type { OutputStyle, OutputConfig, ResultsConfig, CmdbenchConfig } from './config.js';
export { OUTPUT_STYLES } from './config.js';
