/**
 * @chesslab/pgn - rules oracle and PGN handling for chesslab
 *
 * This package handles:
 * - Position validation, legal moves and move application (chess.js)
 * - Coordinate-move parsing and comparison
 * - Terminal-state detection
 * - PGN parsing and rendering
 * - ASCII board rendering
 */

export const VERSION = '0.1.0';

/**
 * Game metadata from PGN headers
 */
export interface GameMetadata {
  event?: string;
  site?: string;
  date?: string;
  round?: string;
  white: string;
  black: string;
  result: string;
}

/**
 * A single move with position information
 */
export interface MoveInfo {
  moveNumber: number;
  san: string;
  /** The move in coordinate form */
  uci: string;
  isWhiteMove: boolean;
  fenBefore: string;
  fenAfter: string;
}

/**
 * A fully parsed game
 */
export interface ParsedGame {
  metadata: GameMetadata;
  /** Position the game starts from (FEN tag, or the standard start) */
  startFen: string;
  moves: MoveInfo[];
  /** Comment appearing before the first move (game-level comment) */
  gameComment?: string;
}

// Re-export parsing functions
export { parsePgnString as parsePgn } from './parser/pgn-parser.js';

// Re-export rendering functions
export {
  renderPgnString as renderPgn,
  wrapMoveText,
  DEFAULT_MAX_LINE_LENGTH,
} from './renderer/pgn-renderer.js';
export type { RenderOptions } from './renderer/pgn-renderer.js';

// Re-export chess position utilities
export { ChessPosition, STARTING_FEN } from './chess/position.js';
export type { MoveResult, PieceInfo, Side } from './chess/position.js';

// Re-export coordinate move utilities
export {
  COORDINATE_MOVE_PATTERN,
  isSquare,
  isPromotionPiece,
  parseUci,
  moveToUci,
  movesEqual,
  rankOf,
} from './chess/moves.js';
export type { CoordinateMove, PromotionPiece } from './chess/moves.js';
export type { Square } from 'chess.js';

// Re-export the rules oracle
export {
  chessRules,
  positionKey,
  describeTerminalStatus,
  resultToken,
} from './chess/rules-oracle.js';
export type { BoardState, DrawReason, TerminalStatus, RulesOracle } from './chess/rules-oracle.js';

// Re-export board visualization utilities
export { renderBoard, formatBoardForPrompt } from './chess/board-visualizer.js';
export type { Perspective, BoardRenderOptions } from './chess/board-visualizer.js';

// Re-export error types
export { PgnParseError, InvalidFenError, IllegalMoveError } from './errors.js';
