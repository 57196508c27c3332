import { createFakeUciSpawn } from '@chesslab/test-utils';
import { describe, it, expect, vi, afterEach } from 'vitest';

import {
  EngineErrorCode,
  EngineProcessError,
  EngineTimeoutError,
  EngineUnavailableError,
  NoMoveError,
} from '../errors.js';
import { UciEngine, DEFAULT_UCI_ENGINE_CONFIG } from '../uci/uci-engine.js';

const START = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';
const AFTER_E4 = 'rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq - 0 1';

describe('UciEngine', () => {
  let engine: UciEngine | undefined;

  afterEach(() => {
    engine?.close();
    engine = undefined;
  });

  describe('DEFAULT_UCI_ENGINE_CONFIG', () => {
    it('should look for stockfish on the PATH', () => {
      expect(DEFAULT_UCI_ENGINE_CONFIG.path).toBe('stockfish');
      expect(DEFAULT_UCI_ENGINE_CONFIG.initTimeoutMs).toBe(5000);
      expect(DEFAULT_UCI_ENGINE_CONFIG.timeoutGraceMs).toBe(2000);
    });
  });

  describe('bestMove', () => {
    it('should handshake, send the position and return the move', async () => {
      const { spawn, processes } = createFakeUciSpawn({ defaultMove: 'g1f3' });
      engine = new UciEngine({ path: '/opt/engine' }, { spawn });

      const move = await engine.bestMove(START, 100);

      expect(move).toBe('g1f3');
      expect(spawn).toHaveBeenCalledWith('/opt/engine');
      expect(processes[0]!.commands).toEqual([
        'uci',
        'isready',
        `position fen ${START}`,
        'go movetime 100',
      ]);
    });

    it('should answer per position', async () => {
      const moves = new Map([
        [START, 'd2d4'],
        [AFTER_E4, 'c7c5'],
      ]);
      const { spawn } = createFakeUciSpawn({ moves });
      engine = new UciEngine({}, { spawn });

      expect(await engine.bestMove(START, 50)).toBe('d2d4');
      expect(await engine.bestMove(AFTER_E4, 50)).toBe('c7c5');
    });

    it('should keep one process across requests', async () => {
      const { spawn } = createFakeUciSpawn();
      engine = new UciEngine({}, { spawn });

      await engine.bestMove(START, 10);
      await engine.bestMove(START, 10);

      expect(spawn).toHaveBeenCalledTimes(1);
    });

    it('should run concurrent requests one at a time', async () => {
      const { spawn, processes } = createFakeUciSpawn();
      engine = new UciEngine({}, { spawn });

      const results = await Promise.all([engine.bestMove(START, 10), engine.bestMove(AFTER_E4, 20)]);

      expect(results).toEqual(['e2e4', 'e2e4']);
      expect(spawn).toHaveBeenCalledTimes(1);
      expect(processes[0]!.commands.slice(2)).toEqual([
        `position fen ${START}`,
        'go movetime 10',
        `position fen ${AFTER_E4}`,
        'go movetime 20',
      ]);
    });

    it('should set the skill level during startup', async () => {
      const { spawn, processes } = createFakeUciSpawn();
      engine = new UciEngine({ skillLevel: 5 }, { spawn });

      await engine.bestMove(START, 10);

      expect(processes[0]!.commands.slice(0, 3)).toEqual([
        'uci',
        'setoption name Skill Level value 5',
        'isready',
      ]);
    });

    it('should round the time budget to whole milliseconds', async () => {
      const { spawn, processes } = createFakeUciSpawn();
      engine = new UciEngine({}, { spawn });

      await engine.bestMove(START, 99.6);

      expect(processes[0]!.commands).toContain('go movetime 100');
    });

    it('should fail with NoMoveError when the engine has no move', async () => {
      const { spawn } = createFakeUciSpawn({ defaultMove: '(none)' });
      engine = new UciEngine({}, { spawn });

      const err = await engine.bestMove(START, 10).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(NoMoveError);
      expect(err).toMatchObject({ code: EngineErrorCode.NO_MOVE, details: 'bestmove (none)' });
    });
  });

  describe('failures', () => {
    it('should report a missing executable as unavailable', async () => {
      const { spawn } = createFakeUciSpawn({ missing: true });
      engine = new UciEngine({ path: 'no-such-engine' }, { spawn });

      const err = await engine.bestMove(START, 10).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(EngineUnavailableError);
      expect(err).toMatchObject({ code: EngineErrorCode.UNAVAILABLE });
      expect(engine.running).toBe(false);
    });

    it('should report a throwing spawn as unavailable', async () => {
      engine = new UciEngine(
        {},
        {
          spawn: () => {
            throw new Error('EACCES');
          },
        },
      );

      await expect(engine.bestMove(START, 10)).rejects.toThrow(
        "Engine at 'stockfish' is unavailable: EACCES",
      );
    });

    it('should time out, kill the process and restart on the next request', async () => {
      const { spawn, processes } = createFakeUciSpawn({ hang: true });
      engine = new UciEngine({ timeoutGraceMs: 20 }, { spawn });

      const err = await engine.bestMove(START, 10).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(EngineTimeoutError);
      expect(err).toMatchObject({ timeoutMs: 30, code: EngineErrorCode.TIMEOUT });
      expect(processes[0]!.killed).toBe(true);
      expect(engine.running).toBe(false);

      await engine.bestMove(START, 10).catch(() => undefined);
      expect(spawn).toHaveBeenCalledTimes(2);
    });

    it('should fail the pending search when the engine crashes', async () => {
      const { spawn, processes } = createFakeUciSpawn({ hang: true });
      engine = new UciEngine({ timeoutGraceMs: 5000 }, { spawn });

      const pending = engine.bestMove(START, 1000);
      await vi.waitFor(() => {
        expect(processes[0]?.commands).toContain('go movetime 1000');
      });
      processes[0]!.crash(3);

      await expect(pending).rejects.toBeInstanceOf(EngineProcessError);
      await expect(pending).rejects.toThrow('Engine exited unexpectedly (code 3)');
    });

    it('should warn when the engine exits while idle', async () => {
      const { spawn, processes } = createFakeUciSpawn();
      const onWarning = vi.fn();
      engine = new UciEngine({}, { spawn, onWarning });

      await engine.bestMove(START, 10);
      processes[0]!.crash(9);

      expect(onWarning).toHaveBeenCalledWith('Engine exited unexpectedly (code 9)');
      expect(engine.running).toBe(false);
    });
  });

  describe('healthCheck', () => {
    it('should report the engine name', async () => {
      const { spawn } = createFakeUciSpawn({ name: 'TestEngine 2' });
      engine = new UciEngine({}, { spawn });

      expect(await engine.healthCheck()).toEqual({ healthy: true, version: 'TestEngine 2' });
    });
  });

  describe('close', () => {
    it('should stop the process', async () => {
      const { spawn, processes } = createFakeUciSpawn();
      engine = new UciEngine({}, { spawn });
      await engine.bestMove(START, 10);

      engine.close();

      expect(processes[0]!.killed).toBe(true);
      expect(engine.running).toBe(false);
    });

    it('should be safe to call before start and multiple times', () => {
      engine = new UciEngine({}, { spawn: createFakeUciSpawn().spawn });
      engine.close();
      expect(() => engine?.close()).not.toThrow();
    });
  });
});
