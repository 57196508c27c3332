import { STARTING_FEN } from '@chesslab/pgn';
import { describe, it, expect, beforeEach } from 'vitest';

import { SelectionMachine } from '../session/selection-machine.js';

// White pawn on e7 about to promote
const WHITE_PROMOTION_FEN = '8/4P3/8/8/8/8/k7/4K3 w - - 0 1';
// Black pawn on d2 about to promote
const BLACK_PROMOTION_FEN = '4k3/8/8/8/8/8/3p4/K7 b - - 0 1';

describe('SelectionMachine', () => {
  let machine: SelectionMachine;

  beforeEach(() => {
    machine = new SelectionMachine();
  });

  it('starts idle', () => {
    expect(machine.state).toEqual({ kind: 'idle' });
  });

  it('arms on a piece of the side to move', () => {
    expect(machine.select('a2', STARTING_FEN)).toEqual({ kind: 'armed', origin: 'a2' });
    expect(machine.state).toEqual({ kind: 'armed', origin: 'a2' });
  });

  it('ignores an empty square while idle', () => {
    expect(machine.select('e4', STARTING_FEN)).toEqual({ kind: 'ignored' });
    expect(machine.state).toEqual({ kind: 'idle' });
  });

  it('ignores an opponent piece while idle', () => {
    expect(machine.select('e7', STARTING_FEN)).toEqual({ kind: 'ignored' });
    expect(machine.state).toEqual({ kind: 'idle' });
  });

  it('deselects when the origin is chosen again', () => {
    machine.select('a2', STARTING_FEN);
    expect(machine.select('a2', STARTING_FEN)).toEqual({ kind: 'deselected' });
    expect(machine.state).toEqual({ kind: 'idle' });
  });

  it('emits a candidate on the second square and returns to idle', () => {
    machine.select('a2', STARTING_FEN);
    expect(machine.select('a4', STARTING_FEN)).toEqual({
      kind: 'candidate',
      move: { from: 'a2', to: 'a4' },
    });
    expect(machine.state).toEqual({ kind: 'idle' });
  });

  it('emits a candidate without checking legality', () => {
    machine.select('e2', STARTING_FEN);
    expect(machine.select('d2', STARTING_FEN)).toEqual({
      kind: 'candidate',
      move: { from: 'e2', to: 'd2' },
    });
  });

  it('accepts squares in any case and with surrounding space', () => {
    expect(machine.select(' E2 ', STARTING_FEN)).toEqual({ kind: 'armed', origin: 'e2' });
  });

  it('ignores text that is not a square and stays armed', () => {
    machine.select('e2', STARTING_FEN);
    expect(machine.select('z9', STARTING_FEN)).toEqual({ kind: 'ignored' });
    expect(machine.state).toEqual({ kind: 'armed', origin: 'e2' });
  });

  describe('promotion', () => {
    it('promotes a white pawn to a queen on the eighth rank', () => {
      machine.select('e7', WHITE_PROMOTION_FEN);
      expect(machine.select('e8', WHITE_PROMOTION_FEN)).toEqual({
        kind: 'candidate',
        move: { from: 'e7', to: 'e8', promotion: 'q' },
      });
    });

    it('promotes a black pawn to a queen on the first rank', () => {
      machine.select('d2', BLACK_PROMOTION_FEN);
      expect(machine.select('d1', BLACK_PROMOTION_FEN)).toEqual({
        kind: 'candidate',
        move: { from: 'd2', to: 'd1', promotion: 'q' },
      });
    });

    it('does not add a promotion for other pieces reaching the last rank', () => {
      const rookFen = '8/7R/8/8/8/8/k7/4K3 w - - 0 1';
      machine.select('h7', rookFen);
      expect(machine.select('h8', rookFen)).toEqual({
        kind: 'candidate',
        move: { from: 'h7', to: 'h8' },
      });
    });

    it('does not add a promotion for pawn moves short of the last rank', () => {
      machine.select('e2', STARTING_FEN);
      expect(machine.select('e4', STARTING_FEN)).toEqual({
        kind: 'candidate',
        move: { from: 'e2', to: 'e4' },
      });
    });
  });

  it('reset returns to idle', () => {
    machine.select('e2', STARTING_FEN);
    machine.reset();
    expect(machine.state).toEqual({ kind: 'idle' });
  });
});
