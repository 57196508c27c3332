/**
 * CLI-specific error classes
 */

import * as path from 'node:path';

/**
 * Resolve a path to absolute for clearer error messages
 */
export function resolveAbsolutePath(filePath: string): string {
  return path.resolve(process.cwd(), filePath);
}

/**
 * Base CLI error class
 */
export class CliError extends Error {
  constructor(
    message: string,
    public readonly suggestion?: string,
    public readonly exitCode: number = 1,
  ) {
    super(message);
    this.name = 'CliError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    const lines = [`Error: ${this.message}`];
    if (this.suggestion) {
      lines.push('');
      lines.push(`Suggestion: ${this.suggestion}`);
    }
    return lines.join('\n');
  }
}

/**
 * Input file error
 */
export class InputError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, suggestion);
    this.name = 'InputError';
  }
}

/**
 * Output file error
 */
export class OutputError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, suggestion);
    this.name = 'OutputError';
  }
}

/**
 * A session refused to start (bad start position, unusable game)
 */
export class SessionStartError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, suggestion, 2);
    this.name = 'SessionStartError';
  }
}

/**
 * PGN that could not be loaded
 */
export class PgnError extends CliError {
  constructor(
    message: string,
    public readonly file?: string,
  ) {
    super(message);
    this.name = 'PgnError';
  }

  override format(): string {
    const location = this.file !== undefined ? ` (${this.file})` : '';
    return `PGN Error${location}: ${this.message}`;
  }
}
