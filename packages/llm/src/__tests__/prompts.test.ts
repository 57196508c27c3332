import { STARTING_FEN } from '@chesslab/pgn';
import { describe, it, expect } from 'vitest';

import {
  buildMovePrompt,
  buildQuestionPrompt,
  buildSummaryPrompt,
  formatMoveHistory,
  type HistoryMove,
} from '../prompts/templates.js';

const AFTER_E4 = 'rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq - 0 1';

function sicilian(): HistoryMove[] {
  return [
    { moveNumber: 1, isWhiteMove: true, san: 'e4' },
    { moveNumber: 1, isWhiteMove: false, san: 'c5' },
    { moveNumber: 2, isWhiteMove: true, san: 'Nf3' },
    { moveNumber: 2, isWhiteMove: false, san: 'd6' },
  ];
}

describe('formatMoveHistory', () => {
  it('should number the moves', () => {
    expect(formatMoveHistory(sicilian())).toBe('1. e4 c5 2. Nf3 d6');
  });

  it('should keep only the latest moves of the window', () => {
    expect(formatMoveHistory(sicilian(), 3)).toBe('1... c5 2. Nf3 d6');
    expect(formatMoveHistory(sicilian(), 2)).toBe('2. Nf3 d6');
  });

  it('should say when there are no moves', () => {
    expect(formatMoveHistory([])).toBe('(no moves yet)');
    expect(formatMoveHistory(sicilian(), 0)).toBe('(no moves yet)');
  });
});

describe('buildMovePrompt', () => {
  it('should ground the request and list the legal moves', () => {
    const prompt = buildMovePrompt({
      fen: AFTER_E4,
      side: 'black',
      history: [{ moveNumber: 1, isWhiteMove: true, san: 'e4' }],
      legalMoves: ['e7e5', 'c7c5'],
    });
    const lines = prompt.split('\n');

    expect(lines[0]).toBe('You are playing Black.');
    expect(lines[2]).toBe(`FEN: ${AFTER_E4}`);
    expect(lines[3]).toBe('Side to move: Black');
    expect(lines).toContain('Recent moves: 1. e4');
    expect(lines).toContain('Legal moves: e7e5, c7c5');
    expect(lines[lines.length - 1]).toBe(
      'Output ONLY the move in UCI format (e.g. e2e4, or e7e8q for a promotion). No other text.',
    );
  });
});

describe('buildQuestionPrompt', () => {
  it('should quote the trimmed question after the position', () => {
    const prompt = buildQuestionPrompt(
      { fen: STARTING_FEN, history: [] },
      '  What is the plan?  ',
    );
    const lines = prompt.split('\n');

    expect(lines[0]).toBe(`FEN: ${STARTING_FEN}`);
    expect(lines).toContain('Recent moves: (no moves yet)');
    expect(lines).toContain('User question: "What is the plan?"');
  });
});

describe('buildSummaryPrompt', () => {
  it('should ask for the biggest threat or opportunity', () => {
    const prompt = buildSummaryPrompt({ fen: STARTING_FEN, history: sicilian(), historyWindow: 2 });
    const lines = prompt.split('\n');

    expect(lines).toContain('Recent moves: 2. Nf3 d6');
    expect(lines[lines.length - 1]).toBe(
      'Analyze this position. Briefly point out the biggest threat or opportunity.',
    );
  });
});
