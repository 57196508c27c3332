/**
 * Select-then-move input
 *
 * Turns a stream of square selections into candidate moves. Legality is
 * left to the orchestrator; the machine only checks that the first
 * square holds a piece of the side to move.
 */

import {
  chessRules,
  isSquare,
  rankOf,
  type BoardState,
  type CoordinateMove,
  type RulesOracle,
  type Square,
} from '@chesslab/pgn';

export type SelectionState = { kind: 'idle' } | { kind: 'armed'; origin: Square };

/**
 * What a single selection did
 */
export type SelectionResult =
  | { kind: 'ignored' }
  | { kind: 'armed'; origin: Square }
  | { kind: 'deselected' }
  | { kind: 'candidate'; move: CoordinateMove };

const IDLE: SelectionState = { kind: 'idle' };

export class SelectionMachine {
  private current: SelectionState = IDLE;

  constructor(private readonly rules: RulesOracle = chessRules) {}

  get state(): SelectionState {
    return this.current;
  }

  /**
   * Feed one selected square
   *
   * Text that is not a square is ignored and leaves the state alone.
   */
  select(square: string, board: BoardState): SelectionResult {
    const target = square.trim().toLowerCase();
    if (!isSquare(target)) {
      return { kind: 'ignored' };
    }

    if (this.current.kind === 'idle') {
      const piece = this.rules.pieceAt(board, target);
      if (!piece || piece.color !== this.rules.sideToMove(board)) {
        return { kind: 'ignored' };
      }
      this.current = { kind: 'armed', origin: target };
      return { kind: 'armed', origin: target };
    }

    const origin = this.current.origin;
    this.current = IDLE;

    if (target === origin) {
      return { kind: 'deselected' };
    }

    const move: CoordinateMove = { from: origin, to: target };
    if (this.isPromotionSquare(board, origin, target)) {
      // Pointer input always promotes to a queen
      move.promotion = 'q';
    }
    return { kind: 'candidate', move };
  }

  reset(): void {
    this.current = IDLE;
  }

  private isPromotionSquare(board: BoardState, origin: Square, target: Square): boolean {
    const piece = this.rules.pieceAt(board, origin);
    if (piece?.type !== 'p') return false;
    const lastRank = piece.color === 'w' ? 8 : 1;
    return rankOf(target) === lastRank;
  }
}
