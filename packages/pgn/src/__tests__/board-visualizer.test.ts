import { describe, it, expect } from 'vitest';

import { renderBoard, formatBoardForPrompt, STARTING_FEN } from '../index.js';

describe('Board Visualizer', () => {
  describe('renderBoard', () => {
    it('renders the starting position from White', () => {
      const lines = renderBoard(STARTING_FEN).split('\n');

      expect(lines).toHaveLength(10);
      expect(lines[0]).toBe('   a   b   c   d   e   f   g   h');
      expect(lines[1]).toBe('8 [r] [n] [b] [q] [k] [b] [n] [r]  8');
      expect(lines[4]).toBe('5  .   .   .   .   .   .   .   .   5');
      expect(lines[8]).toBe('1 [R] [N] [B] [Q] [K] [B] [N] [R]  1');
    });

    it('flips files and ranks from Black', () => {
      const lines = renderBoard(STARTING_FEN, { perspective: 'black' }).split('\n');

      expect(lines[0]).toBe('   h   g   f   e   d   c   b   a');
      expect(lines[1]).toBe('1 [R] [N] [B] [K] [Q] [B] [N] [R]  1');
    });

    it('marks the selected square', () => {
      const lines = renderBoard(STARTING_FEN, { selected: 'e2' }).split('\n');

      expect(lines[7]).toBe('2 [P] [P] [P] [P] <P> [P] [P] [P]  2');
    });
  });

  describe('formatBoardForPrompt', () => {
    it('leads with the FEN and side to move', () => {
      const lines = formatBoardForPrompt(STARTING_FEN).split('\n');

      expect(lines[0]).toBe(`FEN: ${STARTING_FEN}`);
      expect(lines[1]).toBe('Side to move: White');
      expect(lines[3]).toBe('Board:');
    });

    it('can omit the board', () => {
      expect(formatBoardForPrompt(STARTING_FEN, { includeBoard: false })).toBe(
        `FEN: ${STARTING_FEN}\nSide to move: White`,
      );
    });
  });
});
