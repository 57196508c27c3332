/**
 * Error handling utilities
 */

import chalk from 'chalk';

import { ConfigValidationError } from '../config/validation.js';

import { CliError } from './cli-errors.js';

/**
 * Format an error for CLI output
 */
export function formatError(error: unknown, useColor = true): string {
  const red = (text: string): string => (useColor ? chalk.red(text) : text);

  if (error instanceof ConfigValidationError) {
    return red(error.format());
  }

  if (error instanceof CliError) {
    return red(error.format());
  }

  if (error instanceof Error) {
    return red(`Error: ${error.message}`);
  }

  return red(`Error: ${String(error)}`);
}

/**
 * Handle an error and exit with appropriate code
 */
export function handleError(error: unknown): never {
  console.error(formatError(error));

  let exitCode = 1;
  if (error instanceof CliError) {
    exitCode = error.exitCode;
  }

  process.exit(exitCode);
}

/**
 * Wrap an async function with error handling
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>,
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (error) {
      handleError(error);
    }
  };
}
