import { OUTPUT_STYLES, type OutputStyle } from '../types/config.js';

export function isOutputStyle(value: string): value is OutputStyle {
  return OUTPUT_STYLES.some((style) => style === value);
}

/** Whether an output style allows ANSI colors. */
export function usesColor(style: OutputStyle): boolean {
  return style === 'full' || style === 'color';
}
