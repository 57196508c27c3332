import type { Square } from 'chess.js';

/**
 * Piece a pawn may promote to
 */
export type PromotionPiece = 'q' | 'r' | 'b' | 'n';

/**
 * A move in coordinate form (origin, destination, optional promotion)
 */
export interface CoordinateMove {
  from: Square;
  to: Square;
  promotion?: PromotionPiece;
}

/**
 * Full coordinate move, e.g. "e2e4" or "e7e8q"
 */
export const COORDINATE_MOVE_PATTERN = /^([a-h][1-8])([a-h][1-8])([qrbn])?$/;

const SQUARE_PATTERN = /^[a-h][1-8]$/;

export function isSquare(value: string): value is Square {
  return SQUARE_PATTERN.test(value);
}

export function isPromotionPiece(value: string): value is PromotionPiece {
  return value === 'q' || value === 'r' || value === 'b' || value === 'n';
}

/**
 * Parse a coordinate move string
 *
 * Input is trimmed and lower-cased first, so "E7E8Q" parses as e7e8q.
 * @returns The move, or undefined if the text is not a coordinate move
 */
export function parseUci(text: string): CoordinateMove | undefined {
  const match = COORDINATE_MOVE_PATTERN.exec(text.trim().toLowerCase());
  if (!match) return undefined;

  const [, from, to, promotion] = match;
  if (!from || !to || !isSquare(from) || !isSquare(to)) return undefined;

  const move: CoordinateMove = { from, to };
  if (promotion && isPromotionPiece(promotion)) {
    move.promotion = promotion;
  }
  return move;
}

/**
 * Render a move in its canonical coordinate form
 */
export function moveToUci(move: CoordinateMove): string {
  return `${move.from}${move.to}${move.promotion ?? ''}`;
}

/**
 * Compare two moves including the promotion piece
 */
export function movesEqual(a: CoordinateMove, b: CoordinateMove): boolean {
  return moveToUci(a) === moveToUci(b);
}

/**
 * Rank index (1-8) of a square
 */
export function rankOf(square: Square): number {
  return Number(square[1]);
}
