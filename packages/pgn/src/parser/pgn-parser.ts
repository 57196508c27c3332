import { parse } from '@mliebelt/pgn-parser';

import { ChessPosition, STARTING_FEN } from '../chess/position.js';
import { PgnParseError } from '../errors.js';
import type { GameMetadata, MoveInfo, ParsedGame } from '../index.js';

/**
 * Date object from pgn-parser
 */
interface RawDate {
  value: string;
  year?: number;
  month?: number;
  day?: number;
}

/**
 * Raw tags from pgn-parser (object format)
 */
interface RawTags {
  Event?: string;
  Site?: string;
  Date?: string | RawDate;
  Round?: string;
  White?: string;
  Black?: string;
  Result?: string;
  FEN?: string;
  [key: string]: unknown;
}

/**
 * Raw move from pgn-parser
 */
interface RawMove {
  notation?: {
    notation: string;
  };
  moveNumber?: number;
  turn?: 'w' | 'b';
}

/**
 * Raw game from pgn-parser
 */
interface RawGame {
  tags?: RawTags;
  moves?: RawMove[];
  gameComment?: { comment?: string };
}

/**
 * Parse a PGN string into an array of ParsedGame objects
 *
 * Each game is replayed from its FEN tag (or the standard start) so
 * every move is checked against the rules.
 *
 * @param pgnString - The PGN content to parse (can contain multiple games)
 * @returns Array of parsed games with metadata and moves
 * @throws PgnParseError if the PGN is malformed
 * @throws IllegalMoveError if a move is not legal in its position
 * @throws InvalidFenError if the FEN tag is invalid
 */
export function parsePgnString(pgnString: string): ParsedGame[] {
  if (!pgnString.trim()) {
    return [];
  }

  let parsed: RawGame[];
  try {
    parsed = parse(pgnString, { startRule: 'games' }) as RawGame[];
  } catch (err) {
    throw new PgnParseError(`Failed to parse PGN: ${err}`);
  }

  return parsed.map((game) => transformGame(game));
}

/**
 * Transform a raw parsed game into our ParsedGame format
 */
function transformGame(rawGame: RawGame): ParsedGame {
  const tags = rawGame.tags ?? {};
  const metadata = extractMetadata(tags);

  const startFen = typeof tags.FEN === 'string' ? tags.FEN.trim() : STARTING_FEN;
  const position = ChessPosition.fromFen(startFen);

  const game: ParsedGame = {
    metadata,
    startFen: position.fen(),
    moves: processMoves(rawGame.moves ?? [], position),
  };

  const comment = rawGame.gameComment?.comment;
  if (comment) {
    game.gameComment = comment;
  }

  return game;
}

/**
 * Extract game metadata from PGN tags
 */
function extractMetadata(tags: RawTags): GameMetadata {
  const metadata: GameMetadata = {
    white: (typeof tags.White === 'string' ? tags.White : undefined) ?? 'Unknown',
    black: (typeof tags.Black === 'string' ? tags.Black : undefined) ?? 'Unknown',
    result: (typeof tags.Result === 'string' ? tags.Result : undefined) ?? '*',
  };

  // Only set optional properties if they have values
  if (typeof tags.Event === 'string') metadata.event = tags.Event;
  if (typeof tags.Site === 'string') metadata.site = tags.Site;
  if (typeof tags.Round === 'string') metadata.round = tags.Round;

  // Handle Date - can be string or object with value property
  const date = tags.Date;
  if (typeof date === 'string') {
    metadata.date = date;
  } else if (date && typeof date === 'object' && 'value' in date) {
    metadata.date = date.value;
  }

  return metadata;
}

/**
 * Replay raw moves on the position, numbering them from its move counter
 */
function processMoves(rawMoves: RawMove[], position: ChessPosition): MoveInfo[] {
  const moves: MoveInfo[] = [];

  for (const rawMove of rawMoves) {
    // Skip if no notation (could be a comment-only entry)
    if (!rawMove.notation?.notation) {
      continue;
    }

    const san = rawMove.notation.notation;
    const moveNumber = position.moveNumber();
    const isWhiteMove = position.turn() === 'w';

    const result = position.playUci(position.sanToUci(san));

    moves.push({
      moveNumber,
      san: result.san,
      uci: result.uci,
      isWhiteMove,
      fenBefore: result.fenBefore,
      fenAfter: result.fenAfter,
    });
  }

  return moves;
}
