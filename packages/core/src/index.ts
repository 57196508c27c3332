/**
 * @chesslab/core - game session orchestration for chesslab
 *
 * This package contains:
 * - The turn orchestrator that owns the board and the move ledger
 * - Select-then-move input handling
 * - The advisory question-and-answer transcript
 * - The scheduler that plays automated sides
 */

export const VERSION = '0.1.0';

export * from './session/index.js';
