import { InvalidFenError } from '../errors.js';

import { parseUci, moveToUci } from './moves.js';
import { ChessPosition, type PieceInfo, type Side } from './position.js';

/**
 * An externally validated position, held as a FEN string
 */
export type BoardState = string;

/**
 * Why a game ended in a draw
 */
export type DrawReason = 'insufficient-material' | 'fifty-move-rule' | 'threefold-repetition';

/**
 * Terminal state of a game
 */
export type TerminalStatus =
  | { kind: 'checkmate'; winner: Side }
  | { kind: 'stalemate' }
  | { kind: 'draw'; reason: DrawReason };

/**
 * Legality, transition and notation services over board states.
 * Moves are exchanged in coordinate form.
 */
export interface RulesOracle {
  legalMoves(state: BoardState): string[];
  isLegal(state: BoardState, move: string): boolean;
  /** @throws IllegalMoveError if the move is not legal */
  apply(state: BoardState, move: string): BoardState;
  /**
   * @param history - Earlier states of the same game, used for repetition
   */
  terminalStatus(state: BoardState, history?: readonly BoardState[]): TerminalStatus | null;
  /** @throws IllegalMoveError if the move is not legal */
  toNotation(state: BoardState, move: string): string;
  /** @throws InvalidFenError if the text is not a valid position */
  parsePosition(text: string): BoardState;
  sideToMove(state: BoardState): Side;
  pieceAt(state: BoardState, square: string): PieceInfo | undefined;
}

/**
 * Key identifying a position for repetition purposes
 * (placement, side to move, castling rights, en passant square)
 */
export function positionKey(state: BoardState): string {
  return state.split(' ').slice(0, 4).join(' ');
}

const FIFTY_MOVE_PLIES = 100;

function normalizeMove(move: string): string {
  const parsed = parseUci(move);
  return parsed ? moveToUci(parsed) : move;
}

/**
 * Rules oracle backed by chess.js
 */
export const chessRules: RulesOracle = {
  legalMoves(state) {
    return new ChessPosition(state).legalMoves();
  },

  isLegal(state, move) {
    return new ChessPosition(state).legalMoves().includes(normalizeMove(move));
  },

  apply(state, move) {
    return new ChessPosition(state).playUci(move).fenAfter;
  },

  terminalStatus(state, history = []) {
    const pos = new ChessPosition(state);

    if (pos.isCheckmate()) {
      return { kind: 'checkmate', winner: pos.turn() === 'w' ? 'b' : 'w' };
    }
    if (pos.isStalemate()) {
      return { kind: 'stalemate' };
    }
    if (pos.isInsufficientMaterial()) {
      return { kind: 'draw', reason: 'insufficient-material' };
    }

    const key = positionKey(state);
    const occurrences = history.filter((earlier) => positionKey(earlier) === key).length + 1;
    if (occurrences >= 3) {
      return { kind: 'draw', reason: 'threefold-repetition' };
    }

    if (pos.halfMoveClock() >= FIFTY_MOVE_PLIES) {
      return { kind: 'draw', reason: 'fifty-move-rule' };
    }

    return null;
  },

  toNotation(state, move) {
    return new ChessPosition(state).uciToSan(move);
  },

  parsePosition(text) {
    const fen = text.trim();
    const pos = new ChessPosition(fen);

    const kings = pos.getAllPieces().filter((p) => p.type === 'k');
    const whiteKings = kings.filter((k) => k.color === 'w').length;
    const blackKings = kings.filter((k) => k.color === 'b').length;
    if (whiteKings !== 1 || blackKings !== 1) {
      throw new InvalidFenError(`Invalid FEN: each side needs exactly one king: ${fen}`, fen);
    }
    if (pos.isOpponentInCheck()) {
      throw new InvalidFenError(`Invalid FEN: the side not to move is in check: ${fen}`, fen);
    }

    return pos.fen();
  },

  sideToMove(state) {
    return new ChessPosition(state).turn();
  },

  pieceAt(state, square) {
    return new ChessPosition(state).getPiece(square);
  },
};

/**
 * Human-readable description of a terminal status
 */
export function describeTerminalStatus(status: TerminalStatus): string {
  switch (status.kind) {
    case 'checkmate':
      return `Checkmate: ${status.winner === 'w' ? 'White' : 'Black'} wins`;
    case 'stalemate':
      return 'Draw by stalemate';
    case 'draw':
      return `Draw by ${status.reason.replace(/-/g, ' ')}`;
  }
}

/**
 * PGN result token for a terminal status (or "*" while the game continues)
 */
export function resultToken(status: TerminalStatus | null): string {
  if (!status) return '*';
  if (status.kind === 'checkmate') {
    return status.winner === 'w' ? '1-0' : '0-1';
  }
  return '1/2-1/2';
}
