/**
 * Error module exports
 */

export {
  CliError,
  InputError,
  OutputError,
  SessionStartError,
  PgnError,
  resolveAbsolutePath,
} from './cli-errors.js';

export { formatError, handleError, withErrorHandling } from './handler.js';
