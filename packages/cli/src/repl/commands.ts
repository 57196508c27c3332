/**
 * Parsing of REPL input lines
 */

import { isSquare, parseUci } from '@chesslab/pgn';

export type ReplCommand =
  | { kind: 'empty' }
  | { kind: 'select'; square: string }
  | { kind: 'move'; uci: string }
  | { kind: 'ask'; question: string }
  | { kind: 'summary' }
  | { kind: 'hint' }
  | { kind: 'board' }
  | { kind: 'moves' }
  | { kind: 'pgn' }
  | { kind: 'fen' }
  | { kind: 'reset' }
  | { kind: 'load'; fen: string }
  | { kind: 'save'; file: string }
  | { kind: 'help' }
  | { kind: 'quit' }
  | { kind: 'unknown'; reason: string };

type BareCommand = Extract<
  ReplCommand,
  { kind: 'summary' | 'hint' | 'board' | 'moves' | 'pgn' | 'fen' | 'reset' | 'help' | 'quit' }
>;

const BARE_COMMANDS = new Map<string, BareCommand>([
  ['summary', { kind: 'summary' }],
  ['hint', { kind: 'hint' }],
  ['board', { kind: 'board' }],
  ['moves', { kind: 'moves' }],
  ['pgn', { kind: 'pgn' }],
  ['fen', { kind: 'fen' }],
  ['reset', { kind: 'reset' }],
  ['help', { kind: 'help' }],
  ['quit', { kind: 'quit' }],
  ['exit', { kind: 'quit' }],
]);

export const HELP_TEXT = [
  'Commands:',
  '  e2            select a square (twice: from, then to)',
  '  e2e4, e7e8q   play a move in coordinate form',
  '  ask <text>    ask the advisor about the position',
  '  summary       biggest threat or opportunity right now',
  '  hint          engine suggestion for the side to move',
  '  board         show the board',
  '  moves         show the score table',
  '  pgn           print the game as PGN',
  '  fen           print the current position',
  '  reset         start a new game',
  '  load <fen>    start a new game from a position',
  '  save <file>   write the game as PGN',
  '  help          show this list',
  '  quit          leave',
].join('\n');

/**
 * Turn one input line into a command
 *
 * Keywords are case-insensitive; the text after `ask`, `load` and `save` is kept as typed.
 */
export function parseReplCommand(line: string): ReplCommand {
  const trimmed = line.trim();
  if (!trimmed) {
    return { kind: 'empty' };
  }

  const spaceAt = trimmed.search(/\s/);
  const word = (spaceAt === -1 ? trimmed : trimmed.slice(0, spaceAt)).toLowerCase();
  const rest = spaceAt === -1 ? '' : trimmed.slice(spaceAt).trim();

  switch (word) {
    case 'ask':
      return { kind: 'ask', question: rest };
    case 'load':
      return rest ? { kind: 'load', fen: rest } : { kind: 'unknown', reason: 'Usage: load <fen>' };
    case 'save':
      return rest ? { kind: 'save', file: rest } : { kind: 'unknown', reason: 'Usage: save <file>' };
  }

  const bare = BARE_COMMANDS.get(word);
  if (bare) {
    return bare;
  }

  if (!rest) {
    if (isSquare(word)) {
      return { kind: 'select', square: word };
    }
    if (parseUci(word)) {
      return { kind: 'move', uci: word };
    }
  }

  return { kind: 'unknown', reason: `Unknown command: ${word} (type "help" for commands)` };
}
