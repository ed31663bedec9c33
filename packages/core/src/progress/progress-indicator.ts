/**
 * Progress indicators for long-running loops, selected by output style.
 *
 * Every mode implements the same small capability interface, so callers
 * tick and finish without knowing whether anything is drawn.
 */

import ora from 'ora';
import type { OutputStyle } from '../types/config.js';
import { usesColor } from '../config/output-style.js';

export type ProgressMode = 'bar' | 'spinner' | 'hidden';

export interface ProgressIndicator {
  readonly mode: ProgressMode;
  /** Text currently shown next to the spinner; empty when hidden. */
  readonly text: string;
  /** Advance by one step, optionally replacing the message. */
  tick(message?: string): void;
  finish(): void;
}

export interface ProgressOptions {
  /** Number of steps; 0 when unknown. */
  readonly length: number;
  readonly message: string;
  readonly style: OutputStyle;
  /** Force drawing on or off. Defaults to ora's TTY detection. */
  readonly enabled?: boolean;
  readonly stream?: NodeJS.WritableStream;
}

const BAR_WIDTH = 20;

/** Which indicator an output style calls for. */
export function progressModeForStyle(style: OutputStyle, length: number): ProgressMode {
  switch (style) {
    case 'basic':
    case 'color':
    case 'none':
      return 'hidden';
    case 'full':
    case 'nocolor':
      return length > 0 ? 'bar' : 'spinner';
  }
}

/** Fixed-width text bar for `position` out of `length` steps. */
export function renderBar(position: number, length: number, width: number = BAR_WIDTH): string {
  if (length <= 0) return '░'.repeat(width);
  const clamped = Math.min(Math.max(position, 0), length);
  const filled = Math.round((clamped / length) * width);
  return '█'.repeat(filled) + '░'.repeat(width - filled);
}

function createSpinner(options: ProgressOptions, text: string): ReturnType<typeof ora> {
  return ora({
    text,
    spinner: 'dots',
    ...(usesColor(options.style) ? {} : { color: false }),
    ...(options.enabled !== undefined ? { isEnabled: options.enabled } : {}),
    ...(options.stream !== undefined ? { stream: options.stream } : {}),
  }).start();
}

export class HiddenProgress implements ProgressIndicator {
  readonly mode = 'hidden';
  readonly text = '';

  tick(): void {}

  finish(): void {}
}

export class SpinnerProgress implements ProgressIndicator {
  readonly mode = 'spinner';
  private readonly spinner: ReturnType<typeof ora>;

  constructor(options: ProgressOptions) {
    this.spinner = createSpinner(options, options.message);
  }

  get text(): string {
    return this.spinner.text;
  }

  tick(message?: string): void {
    if (message !== undefined) this.spinner.text = message;
  }

  finish(): void {
    this.spinner.stop();
  }
}

export class BarProgress implements ProgressIndicator {
  readonly mode = 'bar';
  private readonly spinner: ReturnType<typeof ora>;
  private readonly length: number;
  private message: string;
  private position = 0;

  constructor(options: ProgressOptions) {
    this.length = options.length;
    this.message = options.message;
    this.spinner = createSpinner(options, this.render());
  }

  get text(): string {
    return this.spinner.text;
  }

  tick(message?: string): void {
    this.position = Math.min(this.position + 1, this.length);
    if (message !== undefined) this.message = message;
    this.spinner.text = this.render();
  }

  finish(): void {
    this.spinner.stop();
  }

  private render(): string {
    return `${this.message} ${renderBar(this.position, this.length)} ${this.position}/${this.length}`;
  }
}

/** Create the indicator the output style calls for. */
export function createProgressIndicator(options: ProgressOptions): ProgressIndicator {
  switch (progressModeForStyle(options.style, options.length)) {
    case 'bar':
      return new BarProgress(options);
    case 'spinner':
      return new SpinnerProgress(options);
    case 'hidden':
      return new HiddenProgress();
  }
}
