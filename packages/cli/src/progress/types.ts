/**
 * Shared types for terminal output
 */

import chalk from 'chalk';

/**
 * Color function type for conditional colorization
 */
export type ColorFn = (text: string) => string;

/**
 * Color functions bundle
 */
export interface ColorFunctions {
  bold: ColorFn;
  dim: ColorFn;
  green: ColorFn;
  red: ColorFn;
  yellow: ColorFn;
  cyan: ColorFn;
}

/**
 * Where the REPL writes; implemented by ProgressReporter
 */
export interface ReplOutput {
  readonly colors: ColorFunctions;
  print(text: string): void;
  success(text: string): void;
  warn(text: string): void;
  error(text: string): void;
  /** Show that a provider is working (spinner) */
  thinking(text: string): void;
  /** Clear the thinking indicator */
  done(): void;
}

/**
 * Options for progress reporter
 */
export interface ProgressReporterOptions {
  /** Suppress all output */
  silent?: boolean;
  /** Enable colored output (default: true) */
  color?: boolean;
}

/**
 * Build color functions, or identity functions when color is off
 */
export function createColorFns(useColor: boolean): ColorFunctions {
  if (useColor) {
    return {
      bold: (text: string) => chalk.bold(text),
      dim: (text: string) => chalk.dim(text),
      green: (text: string) => chalk.green(text),
      red: (text: string) => chalk.red(text),
      yellow: (text: string) => chalk.yellow(text),
      cyan: (text: string) => chalk.cyan(text),
    };
  }
  // No colors - return text as-is
  const identity = (text: string): string => text;
  return {
    bold: identity,
    dim: identity,
    green: identity,
    red: identity,
    yellow: identity,
    cyan: identity,
  };
}
