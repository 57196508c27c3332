/**
 * Board Visualization
 *
 * Renders chess positions as ASCII boards for the terminal and for
 * advisor prompts. Brackets distinguish pieces from empty squares.
 */

import { ChessPosition } from './position.js';

/**
 * Board orientation perspective
 */
export type Perspective = 'white' | 'black';

/**
 * Options for board rendering
 */
export interface BoardRenderOptions {
  /** Board orientation (default: 'white') */
  perspective?: Perspective;
  /** Square of an armed selection, drawn as `<x>` instead of `[x]` */
  selected?: string;
}

const FILES = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'];

/**
 * Render a chess position as an ASCII board
 *
 * Example output:
 * ```
 *    a   b   c   d   e   f   g   h
 * 8 [r] [n] [b] [q] [k] [b] [n] [r]  8
 * 7 [p] [p] [p] [p] [p] [p] [p] [p]  7
 * 6  .   .   .   .   .   .   .   .   6
 * 5  .   .   .   .   .   .   .   .   5
 * 4  .   .   .   .  [P]  .   .   .   4
 * 3  .   .   .   .   .   .   .   .   3
 * 2 [P] [P] [P] [P]  .  [P] [P] [P]  2
 * 1 [R] [N] [B] [Q] [K] [B] [N] [R]  1
 *    a   b   c   d   e   f   g   h
 * ```
 *
 * Uppercase is White, lowercase Black.
 */
export function renderBoard(fen: string, options?: BoardRenderOptions): string {
  const perspective = options?.perspective ?? 'white';
  const board = new ChessPosition(fen).board();

  const files = perspective === 'white' ? FILES : [...FILES].reverse();
  const rankIndices = perspective === 'white' ? [0, 1, 2, 3, 4, 5, 6, 7] : [7, 6, 5, 4, 3, 2, 1, 0];

  const lines: string[] = [];
  lines.push(`   ${files.join('   ')}`);

  for (const rankIdx of rankIndices) {
    const rankNum = 8 - rankIdx;
    const row = board[rankIdx] ?? [];
    const squares: string[] = [];

    for (let fileIdx = 0; fileIdx < 8; fileIdx++) {
      const actualFileIdx = perspective === 'white' ? fileIdx : 7 - fileIdx;
      const piece = row[actualFileIdx];
      const square = `${FILES[actualFileIdx]}${rankNum}`;

      if (piece) {
        const symbol = piece.color === 'w' ? piece.type.toUpperCase() : piece.type.toLowerCase();
        squares.push(square === options?.selected ? `<${symbol}>` : `[${symbol}]`);
      } else {
        squares.push(' . ');
      }
    }

    lines.push(`${rankNum} ${squares.join(' ')}  ${rankNum}`);
  }

  lines.push(`   ${files.join('   ')}`);

  return lines.join('\n');
}

/**
 * Format a position for inclusion in advisor prompts
 *
 * FEN comes first; the ASCII board is a supplementary visual aid.
 */
export function formatBoardForPrompt(
  fen: string,
  options?: BoardRenderOptions & { includeBoard?: boolean },
): string {
  const turn = new ChessPosition(fen).turn();

  const parts: string[] = [`FEN: ${fen}`, `Side to move: ${turn === 'w' ? 'White' : 'Black'}`];

  if (options?.includeBoard !== false) {
    parts.push('');
    parts.push('Board:');
    parts.push(renderBoard(fen, options));
  }

  return parts.join('\n');
}
