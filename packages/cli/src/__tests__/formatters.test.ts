/**
 * Formatting utilities tests
 */

import type { MoveRecord } from '@chesslab/core';
import { describe, it, expect } from 'vitest';

import { DEFAULT_CONFIG } from '../config/defaults.js';
import {
  formatConfigDisplay,
  formatMoveRecord,
  formatScoreTable,
} from '../progress/formatters.js';
import { createColorFns } from '../progress/types.js';

const plain = createColorFns(false);

describe('formatScoreTable', () => {
  it('aligns full moves', () => {
    expect(
      formatScoreTable([
        { moveNumber: 1, white: 'e4', black: 'e5' },
        { moveNumber: 2, white: 'Nf3', black: 'Nc6' },
        { moveNumber: 3, white: 'Bb5' },
      ]),
    ).toBe(['  1. e4       e5', '  2. Nf3      Nc6', '  3. Bb5'].join('\n'));
  });

  it('marks a missing White move', () => {
    expect(formatScoreTable([{ moveNumber: 12, black: 'Rxe8+' }])).toBe(' 12. ...      Rxe8+');
  });

  it('renders nothing for no rows', () => {
    expect(formatScoreTable([])).toBe('');
  });
});

describe('formatMoveRecord', () => {
  const record: MoveRecord = {
    ordinal: 2,
    mover: 'black',
    uci: 'e7e5',
    san: 'e5',
    moveNumber: 1,
    fenBefore: 'rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq - 0 1',
    fenAfter: 'rnbqkbnr/pppp1ppp/8/4p3/4P3/8/PPPP1PPP/RNBQKBNR w KQkq - 0 2',
  };

  it('uses an ellipsis for Black', () => {
    expect(formatMoveRecord(record)).toBe('1... e5');
  });

  it('uses a dot for White', () => {
    expect(formatMoveRecord({ ...record, mover: 'white', san: 'Nf3' })).toBe('1. Nf3');
  });
});

describe('formatConfigDisplay', () => {
  it('describes seats, engine and advisor', () => {
    expect(formatConfigDisplay(DEFAULT_CONFIG, plain)).toBe(
      [
        'Configuration:',
        '',
        'Session:',
        '  White: Human',
        '  Black: Advisor',
        '  Start: standard position',
        '',
        'Engine:',
        '  UCI executable: stockfish',
        '  Time per move: 1000ms',
        '',
        'Advisor:',
        '  Model: gpt-4o-mini',
        '  API key: not set',
        '  Transcript cap: 50 turns',
        '  History window: 10 moves',
      ].join('\n'),
    );
  });

  it('shows the service address for a remote engine', () => {
    const config = {
      ...DEFAULT_CONFIG,
      engine: { ...DEFAULT_CONFIG.engine, kind: 'grpc' as const, skillLevel: 5 },
    };

    const text = formatConfigDisplay(config, plain);

    expect(text).toContain('  Service: localhost:50051\n');
    expect(text).toContain('  Skill level: 5\n');
  });
});
