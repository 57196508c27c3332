/**
 * Export command implementation
 */

import { TurnOrchestrator } from '@chesslab/core';
import type { GameMetadata } from '@chesslab/pgn';

import { parseExportOptions } from '../cli.js';
import type { ExportOptions } from '../config/schema.js';
import { PgnError } from '../errors/index.js';
import { formatScoreTable } from '../progress/formatters.js';
import { createColorFns } from '../progress/types.js';

import { readPgnFile } from './play.js';

export interface ExportedGame {
  pgn: string;
  scoreTable: string;
}

/**
 * Replay the first game of a PGN document and render it again
 *
 * Names given in the options replace the ones in the file. A decided
 * result in the file (e.g. a resignation) is kept; otherwise the result
 * comes from the final position.
 *
 * @throws PgnError if the game cannot be replayed
 */
export function exportGame(
  pgnText: string,
  names: Pick<ExportOptions, 'white' | 'black' | 'event'> = {},
): ExportedGame {
  const session = new TurnOrchestrator({ white: 'human', black: 'human' });

  const loaded = session.loadGame(pgnText);
  if (loaded.status === 'rejected') {
    throw new PgnError(loaded.error.message);
  }

  const original = loaded.metadata;
  const event = names.event ?? original.event;
  const metadata: Partial<GameMetadata> = {
    white: names.white ?? original.white,
    black: names.black ?? original.black,
    ...(event !== undefined && { event }),
    ...(original.site !== undefined && { site: original.site }),
    ...(original.date !== undefined && { date: original.date }),
    ...(original.round !== undefined && { round: original.round }),
    ...(original.result !== '*' && { result: original.result }),
  };

  return {
    pgn: session.exportPgn(metadata),
    scoreTable: formatScoreTable(session.moves.asScoreTable()),
  };
}

/**
 * Main export command handler
 */
export async function exportCommand(rawOptions: Record<string, unknown>): Promise<void> {
  const options = parseExportOptions(rawOptions);
  const c = createColorFns(!options.noColor);

  const text = readPgnFile(options.pgn);
  let exported: ExportedGame;
  try {
    exported = exportGame(text, options);
  } catch (err) {
    if (err instanceof PgnError) {
      throw new PgnError(err.message, options.pgn);
    }
    throw err;
  }

  process.stdout.write(`${exported.pgn}\n\n`);
  process.stdout.write(`${c.dim('Score table:')}\n${exported.scoreTable}\n`);
}
