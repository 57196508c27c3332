/**
 * Progress module exports
 */

export { ProgressReporter, type ProgressReporterOptions } from './reporter.js';
export { createColorFns, type ColorFn, type ColorFunctions, type ReplOutput } from './types.js';
export { formatConfigDisplay, formatScoreTable, formatMoveRecord } from './formatters.js';
