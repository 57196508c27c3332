/**
 * Scripted engine provider for testing
 *
 * Implements the bestMove(fen, timeBudgetMs) contract the session uses
 */

import { chessRules } from '@chesslab/pgn';
import { vi } from 'vitest';

export interface MockEngineConfig {
  /** Replies for specific FEN positions */
  responses?: Map<string, string>;
  /** Replies handed out in order, before `responses` and the fallback */
  script?: string[];
  /** Simulate latency in milliseconds */
  latencyMs?: number;
  /** Every request fails with this error */
  failWith?: Error;
}

/**
 * Create an engine that answers from a script, then with the first legal move
 */
// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function createMockEngine(config: MockEngineConfig = {}) {
  const { responses = new Map<string, string>(), latencyMs = 0, failWith } = config;
  const script = [...(config.script ?? [])];

  const bestMove = vi.fn(async (fen: string, _timeBudgetMs: number): Promise<string> => {
    if (latencyMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, latencyMs));
    }

    if (failWith) {
      throw failWith;
    }

    const scripted = script.shift();
    if (scripted !== undefined) {
      return scripted;
    }

    const cached = responses.get(fen);
    if (cached) {
      return cached;
    }

    return chessRules.legalMoves(fen)[0] ?? '(none)';
  });

  return { bestMove };
}

export type MockEngine = ReturnType<typeof createMockEngine>;

/**
 * A provider request the test resolves by hand
 */
export interface PendingRequest<T> {
  readonly input: T;
  resolve(reply: string): void;
  reject(err: Error): void;
}

/**
 * Engine whose requests stay pending until the test settles them
 */
// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function createDeferredEngine() {
  const pending: Array<PendingRequest<{ fen: string; timeBudgetMs: number }>> = [];

  const bestMove = vi.fn(
    (fen: string, timeBudgetMs: number): Promise<string> =>
      new Promise<string>((resolve, reject) => {
        pending.push({ input: { fen, timeBudgetMs }, resolve, reject });
      }),
  );

  return { bestMove, pending };
}

export type DeferredEngine = ReturnType<typeof createDeferredEngine>;
