/**
 * Error model for game sessions
 *
 * Session operations do not throw for expected failures; they return a
 * rejection carrying one of these errors.
 */

import { EngineError, EngineErrorCode } from '@chesslab/engine';
import { LLMError, LLMErrorCode } from '@chesslab/llm';

import type { SourceKind } from './types.js';

/**
 * Why a session operation was rejected
 */
export enum SessionErrorCode {
  /** Candidate is not in the legal move set */
  ILLEGAL_MOVE = 'ILLEGAL_MOVE',
  /** The game has already ended */
  GAME_OVER = 'GAME_OVER',
  /** An automated move was requested on a human's turn */
  NOT_AUTOMATED_TURN = 'NOT_AUTOMATED_TURN',
  /** Engine or advisor not configured or not reachable */
  PROVIDER_UNAVAILABLE = 'PROVIDER_UNAVAILABLE',
  /** Engine or advisor failed during a request */
  PROVIDER_FAILURE = 'PROVIDER_FAILURE',
  /** Provider output is not a move, or not a legal one */
  MALFORMED_PROVIDER_OUTPUT = 'MALFORMED_PROVIDER_OUTPUT',
  /** A supplied start position or game failed validation */
  INVALID_IMPORTED_POSITION = 'INVALID_IMPORTED_POSITION',
  /** The board changed while a provider was thinking */
  STALE_RESULT = 'STALE_RESULT',
}

export class SessionError extends Error {
  constructor(
    message: string,
    public readonly code: SessionErrorCode,
    public override readonly cause?: Error,
  ) {
    super(message);
    this.name = 'SessionError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SessionError);
    }
  }

  /** Whether asking again later may succeed */
  get retryable(): boolean {
    return (
      this.code === SessionErrorCode.PROVIDER_UNAVAILABLE ||
      this.code === SessionErrorCode.PROVIDER_FAILURE ||
      this.code === SessionErrorCode.MALFORMED_PROVIDER_OUTPUT ||
      this.code === SessionErrorCode.STALE_RESULT
    );
  }
}

const PROVIDER_LABELS: Record<Exclude<SourceKind, 'human'>, string> = {
  engine: 'Engine',
  advisor: 'Advisor',
};

function classifyEngineCode(code: EngineErrorCode): SessionErrorCode {
  switch (code) {
    case EngineErrorCode.UNAVAILABLE:
      return SessionErrorCode.PROVIDER_UNAVAILABLE;
    case EngineErrorCode.NO_MOVE:
      return SessionErrorCode.MALFORMED_PROVIDER_OUTPUT;
    default:
      return SessionErrorCode.PROVIDER_FAILURE;
  }
}

function classifyLlmCode(code: LLMErrorCode): SessionErrorCode {
  switch (code) {
    case LLMErrorCode.UNAUTHENTICATED:
    case LLMErrorCode.CIRCUIT_OPEN:
      return SessionErrorCode.PROVIDER_UNAVAILABLE;
    case LLMErrorCode.INVALID_RESPONSE:
      return SessionErrorCode.MALFORMED_PROVIDER_OUTPUT;
    default:
      return SessionErrorCode.PROVIDER_FAILURE;
  }
}

/**
 * Turn anything a provider threw into a session error
 */
export function classifyProviderError(
  err: unknown,
  source: Exclude<SourceKind, 'human'>,
): SessionError {
  if (err instanceof SessionError) {
    return err;
  }

  const label = PROVIDER_LABELS[source];

  if (err instanceof EngineError) {
    return new SessionError(`${label}: ${err.message}`, classifyEngineCode(err.code), err);
  }

  if (err instanceof LLMError) {
    return new SessionError(`${label}: ${err.message}`, classifyLlmCode(err.code), err);
  }

  const cause = err instanceof Error ? err : new Error(String(err));
  return new SessionError(`${label}: ${cause.message}`, SessionErrorCode.PROVIDER_FAILURE, cause);
}
