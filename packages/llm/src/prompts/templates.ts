/**
 * Prompt templates for advisor requests
 *
 * Every prompt is grounded in the current position: FEN, side to move,
 * an ASCII board and a window of recent moves.
 */

import { formatBoardForPrompt } from '@chesslab/pgn';

/**
 * Default number of recent moves included in prompts
 */
export const DEFAULT_HISTORY_WINDOW = 10;

/**
 * A played move as shown in prompts
 */
export interface HistoryMove {
  /** Full-move number the move was played on */
  moveNumber: number;
  isWhiteMove: boolean;
  san: string;
}

/**
 * Position context shared by all prompts
 */
export interface PositionContext {
  fen: string;
  /** Moves played so far, oldest first */
  history: readonly HistoryMove[];
  /** How many of the latest moves to include (default: 10) */
  historyWindow?: number;
}

/**
 * Format the latest moves as numbered move text
 *
 * @example formatMoveHistory(moves, 3) // "11... Nf6 12. e5 Nd5"
 */
export function formatMoveHistory(
  history: readonly HistoryMove[],
  window: number = DEFAULT_HISTORY_WINDOW,
): string {
  const recent = window > 0 ? history.slice(-window) : [];
  if (recent.length === 0) {
    return '(no moves yet)';
  }

  const parts: string[] = [];
  recent.forEach((move, index) => {
    if (move.isWhiteMove) {
      parts.push(`${move.moveNumber}.`);
    } else if (index === 0) {
      parts.push(`${move.moveNumber}...`);
    }
    parts.push(move.san);
  });
  return parts.join(' ');
}

function groundPosition(context: PositionContext): string {
  return [
    formatBoardForPrompt(context.fen),
    '',
    `Recent moves: ${formatMoveHistory(context.history, context.historyWindow)}`,
  ].join('\n');
}

/**
 * Prompt asking the advisor to play a move
 */
export function buildMovePrompt(
  context: PositionContext & { side: 'white' | 'black'; legalMoves: readonly string[] },
): string {
  return `You are playing ${context.side === 'white' ? 'White' : 'Black'}.

${groundPosition(context)}

Legal moves: ${context.legalMoves.join(', ')}

Pick the single best strategic move.
Output ONLY the move in UCI format (e.g. e2e4, or e7e8q for a promotion). No other text.`;
}

/**
 * Prompt answering a player's question about the position
 */
export function buildQuestionPrompt(context: PositionContext, question: string): string {
  return `${groundPosition(context)}

User question: "${question.trim()}"

Explain the answer clearly. Focus on plans, weaknesses and key squares.
Do not just give engine lines. Explain the reasoning.`;
}

/**
 * Prompt for an unprompted look at the position
 */
export function buildSummaryPrompt(context: PositionContext): string {
  return `${groundPosition(context)}

Analyze this position. Briefly point out the biggest threat or opportunity.`;
}
