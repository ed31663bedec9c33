/**
 * How much terminal decoration a run produces.
 *
 * - `basic`: no progress indicator, no color
 * - `full`: progress indicator and color
 * - `nocolor`: progress indicator, no color
 * - `color`: color, no progress indicator
 * - `none`: no progress indicator, no color
 */
export type OutputStyle = 'basic' | 'full' | 'nocolor' | 'color' | 'none';

export const OUTPUT_STYLES = [
  'basic',
  'full',
  'nocolor',
  'color',
  'none',
] as const satisfies readonly OutputStyle[];

export interface OutputConfig {
  style: OutputStyle;
}

export interface ResultsConfig {
  /** Result files compared when none are given on the command line. */
  files: string[];
}

export interface CmdbenchConfig {
  version: string;
  output: OutputConfig;
  results: ResultsConfig;
}
