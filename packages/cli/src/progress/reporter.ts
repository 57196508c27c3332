/**
 * Progress reporter with ora spinners
 */

import ora, { type Ora } from 'ora';

import {
  createColorFns,
  type ColorFunctions,
  type ProgressReporterOptions,
  type ReplOutput,
} from './types.js';

export type { ProgressReporterOptions } from './types.js';

/**
 * Terminal output for the CLI: plain lines plus one spinner at a time
 */
export class ProgressReporter implements ReplOutput {
  private spinner: Ora | null = null;
  private readonly silent: boolean;
  readonly colors: ColorFunctions;

  constructor(options: ProgressReporterOptions = {}) {
    this.silent = options.silent ?? false;
    this.colors = createColorFns(options.color ?? true);
  }

  /**
   * Print the version header
   */
  printHeader(version: string): void {
    if (this.silent) return;
    console.log(this.colors.bold(`chesslab v${version}`));
    console.log('');
  }

  print(text: string): void {
    if (this.silent) return;
    this.done();
    console.log(text);
  }

  success(text: string): void {
    this.print(this.colors.green(`✓ ${text}`));
  }

  warn(text: string): void {
    if (this.silent) return;
    this.done();
    console.warn(this.colors.yellow(`⚠ ${text}`));
  }

  error(text: string): void {
    if (this.silent) return;
    this.done();
    console.error(this.colors.red(`✗ ${text}`));
  }

  /**
   * Start (or retitle) the spinner
   */
  thinking(text: string): void {
    if (this.silent) return;
    if (this.spinner) {
      this.spinner.text = text;
      return;
    }
    // Leave stdin alone: the REPL keeps reading while a provider thinks
    this.spinner = ora({ text, color: 'cyan', discardStdin: false }).start();
  }

  done(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }
}
