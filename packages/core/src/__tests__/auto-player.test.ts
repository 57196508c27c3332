import { createDeferredEngine, createMockEngine } from '@chesslab/test-utils';
import { describe, it, expect, vi } from 'vitest';

import { AutoPlayer } from '../session/auto-player.js';
import { SessionError, SessionErrorCode } from '../session/errors.js';
import { TurnOrchestrator } from '../session/turn-orchestrator.js';

// 1. f3 e5 2. g4, Black mates with Qh4
const FOOLS_MATE_FEN = 'rnbqkbnr/pppp1ppp/8/4p3/6P1/5P2/PPPPP2P/RNBQKBNR b KQkq - 0 2';

describe('AutoPlayer', () => {
  it('plays the automated side and waits for the human', async () => {
    const engine = createMockEngine();
    const session = new TurnOrchestrator({ white: 'engine', black: 'human' }, { engine });
    const player = new AutoPlayer(session);

    player.start();
    await player.whenIdle();

    expect(session.moves.length).toBe(1);
    expect(session.currentTurn()).toBe('black');
    expect(player.state).toBe('idle');
  });

  it('answers a human move', async () => {
    const engine = createMockEngine();
    const session = new TurnOrchestrator({ white: 'engine', black: 'human' }, { engine });
    const player = new AutoPlayer(session);
    player.start();
    await player.whenIdle();

    session.submitMove('e7e5');
    await player.whenIdle();

    expect(session.moves.all().map((r) => r.mover)).toEqual(['white', 'black', 'white']);
    expect(engine.bestMove).toHaveBeenCalledTimes(2);
  });

  it('does nothing while a human is to move', async () => {
    const engine = createMockEngine();
    const session = new TurnOrchestrator({ white: 'human', black: 'engine' }, { engine });
    const player = new AutoPlayer(session);

    player.start();
    await player.whenIdle();

    expect(engine.bestMove).not.toHaveBeenCalled();
  });

  it('stops when the game ends', async () => {
    const engine = createMockEngine({ script: ['d8h4'] });
    const session = new TurnOrchestrator(
      { white: 'human', black: 'engine', startFen: FOOLS_MATE_FEN },
      { engine },
    );
    const player = new AutoPlayer(session);

    player.start();
    await player.whenIdle();

    expect(session.terminalStatus()).toEqual({ kind: 'checkmate', winner: 'b' });
    expect(engine.bestMove).toHaveBeenCalledTimes(1);
  });

  it('plays both sides of an automated game to the end', async () => {
    const engine = createMockEngine({ script: ['f2f3', 'e7e5', 'g2g4', 'd8h4'] });
    const session = new TurnOrchestrator({ white: 'engine', black: 'engine' }, { engine });
    const player = new AutoPlayer(session);

    player.start();
    await player.whenIdle();

    expect(session.moves.length).toBe(4);
    expect(session.isTerminal()).toBe(true);
  });

  it('retries failures and pauses after too many in a row', async () => {
    const onPause = vi.fn();
    const engine = createMockEngine({ failWith: new Error('socket closed') });
    const session = new TurnOrchestrator(
      { white: 'engine', black: 'human' },
      { engine, onWarning: vi.fn() },
    );
    const player = new AutoPlayer(session, { maxConsecutiveFailures: 2, onPause });

    player.start();
    await player.whenIdle();

    expect(engine.bestMove).toHaveBeenCalledTimes(2);
    expect(player.state).toBe('paused');
    expect(player.consecutiveFailures).toBe(2);
    expect(onPause).toHaveBeenCalledTimes(1);
    const error: unknown = onPause.mock.calls[0]?.[0];
    expect(error).toBeInstanceOf(SessionError);
    expect(error).toMatchObject({ code: SessionErrorCode.PROVIDER_FAILURE });
    expect(session.moves.length).toBe(0);
  });

  it('resumes after a reset', async () => {
    const engine = createMockEngine({ failWith: new Error('socket closed') });
    const session = new TurnOrchestrator(
      { white: 'engine', black: 'human' },
      { engine, onWarning: vi.fn() },
    );
    const player = new AutoPlayer(session, { maxConsecutiveFailures: 2 });
    player.start();
    await player.whenIdle();

    session.resetSession();
    await player.whenIdle();

    expect(engine.bestMove).toHaveBeenCalledTimes(4);
    expect(player.state).toBe('paused');
  });

  it('resumes after a human move', async () => {
    const engine = createMockEngine({ script: ['resign', 'resign', 'e7e5'] });
    const session = new TurnOrchestrator(
      { white: 'human', black: 'engine' },
      { engine, onWarning: vi.fn() },
    );
    const player = new AutoPlayer(session, { maxConsecutiveFailures: 1 });
    player.start();

    session.submitMove('e2e4');
    await player.whenIdle();
    expect(player.state).toBe('paused');

    // White is human after the reset, so nothing is requested
    session.resetSession({ black: 'engine' });
    await player.whenIdle();
    expect(player.state).toBe('idle');
    expect(engine.bestMove).toHaveBeenCalledTimes(1);

    session.submitMove('e2e4');
    await player.whenIdle();
    expect(session.moves.all().map((r) => r.uci)).toEqual(['e2e4']);
    expect(player.state).toBe('paused');

    // A move typed for the engine's side does not resume; White's reply does
    session.submitMove('d7d5');
    expect(player.state).toBe('paused');
    session.submitMove('d2d4');
    await player.whenIdle();
    expect(session.moves.all().map((r) => r.uci)).toEqual(['e2e4', 'd7d5', 'd2d4', 'e7e5']);
    expect(player.state).toBe('idle');
  });

  it('never runs two requests at once and skips stale results', async () => {
    const engine = createDeferredEngine();
    const session = new TurnOrchestrator({ white: 'engine', black: 'human' }, { engine });
    const player = new AutoPlayer(session);

    player.start();
    player.start();
    session.resetSession();
    expect(engine.bestMove).toHaveBeenCalledTimes(1);
    expect(player.state).toBe('thinking');

    engine.pending[0]?.resolve('e2e4');
    await vi.waitFor(() => expect(engine.bestMove).toHaveBeenCalledTimes(2));
    expect(session.moves.length).toBe(0);

    player.stop();
    engine.pending[1]?.resolve('d2d4');
    await player.whenIdle();

    expect(session.moves.all().map((r) => r.uci)).toEqual(['d2d4']);
    expect(engine.bestMove).toHaveBeenCalledTimes(2);
    expect(player.state).toBe('stopped');
  });
});
