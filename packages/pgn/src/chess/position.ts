import { Chess, type Square } from 'chess.js';

import { InvalidFenError, IllegalMoveError } from '../errors.js';

import { isSquare, parseUci, moveToUci } from './moves.js';

/**
 * Side to move
 */
export type Side = 'w' | 'b';

/**
 * A piece on the board
 */
export interface PieceInfo {
  type: string;
  color: Side;
}

/**
 * Result of applying a move to a position
 */
export interface MoveResult {
  /** The move in Standard Algebraic Notation */
  san: string;
  /** The move in coordinate form (e.g. "e7e8q") */
  uci: string;
  /** FEN before the move was made */
  fenBefore: string;
  /** FEN after the move was made */
  fenAfter: string;
}

/**
 * Standard starting position FEN
 */
export const STARTING_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

/**
 * A chess position wrapper around chess.js
 *
 * Provides a clean interface for position manipulation,
 * FEN handling, and move validation.
 */
export class ChessPosition {
  private chess: Chess;

  constructor(fen?: string) {
    if (fen) {
      try {
        this.chess = new Chess(fen);
      } catch {
        throw new InvalidFenError(`Invalid FEN: ${fen}`, fen);
      }
    } else {
      this.chess = new Chess();
    }
  }

  /**
   * Create a position from a FEN string
   * @throws InvalidFenError if the FEN is invalid
   */
  static fromFen(fen: string): ChessPosition {
    return new ChessPosition(fen);
  }

  /**
   * Get the current position as a FEN string
   */
  fen(): string {
    return this.chess.fen();
  }

  /**
   * Apply a move in coordinate form
   *
   * The move must appear verbatim in the legal move list, so a pawn
   * reaching the last rank without a promotion piece is rejected.
   * @throws IllegalMoveError if the move is not legal
   */
  playUci(uci: string): MoveResult {
    const fenBefore = this.chess.fen();
    const parsed = parseUci(uci);
    if (!parsed || !this.legalMoves().includes(moveToUci(parsed))) {
      throw new IllegalMoveError(uci, fenBefore);
    }

    const moveObj: { from: string; to: string; promotion?: string } = {
      from: parsed.from,
      to: parsed.to,
    };
    if (parsed.promotion) {
      moveObj.promotion = parsed.promotion;
    }

    try {
      const result = this.chess.move(moveObj);
      return {
        san: result.san,
        uci: moveToUci(parsed),
        fenBefore,
        fenAfter: this.chess.fen(),
      };
    } catch {
      throw new IllegalMoveError(uci, fenBefore);
    }
  }

  /**
   * Get all legal moves in coordinate form
   */
  legalMoves(): string[] {
    return this.chess
      .moves({ verbose: true })
      .map((m) => `${m.from}${m.to}${m.promotion ?? ''}`);
  }

  /**
   * Get whose turn it is
   */
  turn(): Side {
    return this.chess.turn();
  }

  /**
   * Get the current move number
   */
  moveNumber(): number {
    return this.chess.moveNumber();
  }

  /**
   * Plies since the last capture or pawn move
   */
  halfMoveClock(): number {
    const field = this.chess.fen().split(' ')[4];
    const clock = field !== undefined ? parseInt(field, 10) : 0;
    return isNaN(clock) ? 0 : clock;
  }

  /**
   * Check if the side that just moved left its own king attacked.
   * chess.js loads such positions but they cannot arise in play.
   */
  isOpponentInCheck(): boolean {
    const mover = this.chess.turn();
    const king = this.getAllPieces().find((p) => p.type === 'k' && p.color !== mover);
    return king !== undefined && this.chess.isAttacked(king.square, mover);
  }

  /**
   * Check if the current side is checkmated
   */
  isCheckmate(): boolean {
    return this.chess.isCheckmate();
  }

  /**
   * Check if the position is stalemate
   */
  isStalemate(): boolean {
    return this.chess.isStalemate();
  }

  /**
   * Check if neither side can deliver mate
   */
  isInsufficientMaterial(): boolean {
    return this.chess.isInsufficientMaterial();
  }

  /**
   * Create a copy of this position
   */
  clone(): ChessPosition {
    return new ChessPosition(this.fen());
  }

  /**
   * Convert a UCI move to SAN notation
   * @param uci - Move in UCI format (e.g., "e2e4", "e7e8q")
   * @returns Move in SAN format (e.g., "e4", "e8=Q")
   * @throws IllegalMoveError if the move is not legal
   */
  uciToSan(uci: string): string {
    const result = this.clone().playUci(uci);
    return result.san;
  }

  /**
   * Convert a SAN move to UCI notation
   * @param san - Move in SAN format (e.g., "e4", "Nf3", "e8=Q")
   * @returns Move in UCI format (e.g., "e2e4", "g1f3", "e7e8q")
   * @throws IllegalMoveError if the move is not legal
   */
  sanToUci(san: string): string {
    const fenBefore = this.chess.fen();
    try {
      const result = this.chess.move(san);
      if (!result) {
        throw new IllegalMoveError(san, fenBefore);
      }
      // Undo the move to keep position unchanged
      this.chess.undo();
      // Build UCI string from from/to squares
      let uci = result.from + result.to;
      // Add promotion piece if applicable (lowercase)
      if (result.promotion) {
        uci += result.promotion;
      }
      return uci;
    } catch (err) {
      if (err instanceof IllegalMoveError) {
        throw err;
      }
      throw new IllegalMoveError(san, fenBefore);
    }
  }

  /**
   * Get the piece at a square
   * @param square - Square in algebraic notation (e.g., "e4")
   * @returns Piece object or undefined if empty or not a square
   */
  getPiece(square: string): PieceInfo | undefined {
    if (!isSquare(square)) return undefined;
    const piece = this.chess.get(square);
    if (!piece) return undefined;
    return { type: piece.type, color: piece.color };
  }

  /**
   * Get the board as an 8x8 array
   * @returns 2D array where [0][0] is a8 and [7][7] is h1
   */
  board(): Array<Array<PieceInfo | null>> {
    return this.chess.board().map((row) =>
      row.map((piece) => (piece ? { type: piece.type, color: piece.color } : null)),
    );
  }

  /**
   * Get all pieces on the board
   * @returns Array of pieces with their squares
   */
  getAllPieces(): Array<{ square: Square; type: string; color: Side }> {
    const pieces: Array<{ square: Square; type: string; color: Side }> = [];

    for (const row of this.chess.board()) {
      for (const piece of row) {
        if (piece) {
          pieces.push({ square: piece.square, type: piece.type, color: piece.color });
        }
      }
    }

    return pieces;
  }
}
