/**
 * Extraction of a coordinate move from free-form advisor replies
 */

import { InvalidResponseError } from '../errors.js';

/**
 * First token in coordinate-move form, with optional promotion letter
 */
export const MOVE_EXTRACTION_PATTERN = /\b([a-h][1-8][a-h][1-8])([qrbn])?\b/i;

const MAX_QUOTED_REPLY = 80;

/**
 * Find the first coordinate move in a reply, lower-cased
 *
 * @example extractCoordinateMove('I play E7E8Q!') // 'e7e8q'
 */
export function extractCoordinateMove(text: string): string | undefined {
  const match = MOVE_EXTRACTION_PATTERN.exec(text);
  if (!match?.[1]) {
    return undefined;
  }
  return `${match[1]}${match[2] ?? ''}`.toLowerCase();
}

/**
 * Extract the advisor's move and check it against the legal moves
 *
 * The extracted move must equal a legal move exactly, promotion piece
 * included.
 *
 * @throws InvalidResponseError if no move is found or it is not legal
 */
export function parseAdvisorMove(text: string, legalMoves: readonly string[]): string {
  const move = extractCoordinateMove(text);

  if (!move) {
    const quoted =
      text.length > MAX_QUOTED_REPLY ? `${text.slice(0, MAX_QUOTED_REPLY)}...` : text;
    throw new InvalidResponseError(`No move found in advisor reply: "${quoted.trim()}"`, text);
  }

  if (!legalMoves.includes(move)) {
    throw new InvalidResponseError(`Advisor suggested illegal move: ${move}`, text);
  }

  return move;
}
