/**
 * CLI definition using Commander.js
 */

import { Command } from 'commander';
import { z } from 'zod';

import type { CliOptions, ExportOptions } from './config/schema.js';
import {
  sessionModeSchema,
  sourceKindSchema,
  toValidationError,
} from './config/validation.js';
import { withErrorHandling } from './errors/index.js';

export const VERSION = '0.1.0';

/**
 * Mode descriptions for help text
 */
const MODE_HELP = `Seat preset:
    practice - You play White against the advisor [default]
    analysis - You play both sides
    duel     - Engine (White) against the advisor (Black)`;

const SEAT_HELP = 'Who plays this side: human, engine or advisor (overrides --mode)';

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()
    .name('chesslab')
    .description('Play chess against a search engine and a language-model advisor')
    .version(VERSION);

  program
    .command('play')
    .description('Start an interactive game session')
    .option('-c, --config <file>', 'Path to config file')
    .option('-m, --mode <mode>', MODE_HELP)
    .option('--white <kind>', SEAT_HELP)
    .option('--black <kind>', SEAT_HELP)
    .option('--fen <fen>', 'Start from this position instead of the standard one')
    .option('--pgn <file>', 'Load a PGN game before play starts')
    .option('--engine-time <ms>', 'Engine search time per move', parseInt)
    .option('--model <model>', 'OpenAI model to use (e.g., gpt-4o-mini)')
    .option('--show-config', 'Print resolved configuration and exit')
    .option('--no-color', 'Disable colored output (useful for piping)')
    .action(
      withErrorHandling(async (options: Record<string, unknown>) => {
        // Import dynamically to avoid circular dependencies
        const { playCommand } = await import('./commands/play.js');
        await playCommand(options);
      }),
    );

  program
    .command('export')
    .description('Replay a PGN game and print it normalized, with its score table')
    .requiredOption('--pgn <file>', 'PGN file to read')
    .option('--white <name>', 'White player name')
    .option('--black <name>', 'Black player name')
    .option('--event <label>', 'Event name')
    .option('--no-color', 'Disable colored output (useful for piping)')
    .action(
      withErrorHandling(async (options: Record<string, unknown>) => {
        const { exportCommand } = await import('./commands/export.js');
        await exportCommand(options);
      }),
    );

  return program;
}

const playOptionsSchema = z.object({
  config: z.string().optional(),
  mode: sessionModeSchema.optional(),
  white: sourceKindSchema.optional(),
  black: sourceKindSchema.optional(),
  fen: z.string().optional(),
  pgn: z.string().optional(),
  engineTime: z.number().int().positive().optional(),
  model: z.string().optional(),
  showConfig: z.boolean().optional(),
  color: z.boolean().optional(),
});

const exportOptionsSchema = z.object({
  pgn: z.string().min(1),
  white: z.string().optional(),
  black: z.string().optional(),
  event: z.string().optional(),
  color: z.boolean().optional(),
});

/**
 * Parse `play` options from the command options object
 * @throws ConfigValidationError on an unknown mode or seat kind
 */
export function parseCliOptions(options: Record<string, unknown>): CliOptions {
  const parsed = playOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw toValidationError(parsed.error);
  }

  const { color, ...rest } = parsed.data;
  const result: CliOptions = { ...rest };
  // Note: Commander.js uses 'color' (negated) when --no-color is used
  if (color === false) result.noColor = true;

  return result;
}

/**
 * Parse `export` options from the command options object
 */
export function parseExportOptions(options: Record<string, unknown>): ExportOptions {
  const parsed = exportOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw toValidationError(parsed.error);
  }

  const { color, pgn, white, black, event } = parsed.data;
  return {
    pgn,
    ...(white !== undefined && { white }),
    ...(black !== undefined && { black }),
    ...(event !== undefined && { event }),
    ...(color === false && { noColor: true }),
  };
}
