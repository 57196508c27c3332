/**
 * Error classes for engine operations
 */

/**
 * Error codes for engine operations
 */
export enum EngineErrorCode {
  /** Engine binary not installed or service unreachable */
  UNAVAILABLE = 'UNAVAILABLE',
  /** Engine process crashed or the service reported an error */
  PROCESS_ERROR = 'PROCESS_ERROR',
  /** Engine did not answer within its time budget */
  TIMEOUT = 'TIMEOUT',
  /** Engine answered without a usable move */
  NO_MOVE = 'NO_MOVE',
}

/**
 * Base error class for engine errors
 */
export class EngineError extends Error {
  constructor(
    message: string,
    public readonly code: EngineErrorCode,
    public readonly details?: string,
  ) {
    super(message);
    this.name = 'EngineError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EngineError);
    }
  }
}

/**
 * Error thrown when the engine cannot be started or reached
 */
export class EngineUnavailableError extends EngineError {
  constructor(
    public readonly target: string,
    cause?: Error,
  ) {
    super(
      `Engine at '${target}' is unavailable${cause ? `: ${cause.message}` : ''}`,
      EngineErrorCode.UNAVAILABLE,
      cause?.message,
    );
    this.name = 'EngineUnavailableError';
  }
}

/**
 * Error thrown when the engine process fails mid-request
 */
export class EngineProcessError extends EngineError {
  constructor(message: string, details?: string) {
    super(message, EngineErrorCode.PROCESS_ERROR, details);
    this.name = 'EngineProcessError';
  }
}

/**
 * Error thrown when an engine request exceeds its deadline
 */
export class EngineTimeoutError extends EngineError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
  ) {
    super(`Operation '${operation}' timed out after ${timeoutMs}ms`, EngineErrorCode.TIMEOUT);
    this.name = 'EngineTimeoutError';
  }
}

/**
 * Error thrown when the engine returns no move
 */
export class NoMoveError extends EngineError {
  constructor(
    public readonly fen: string,
    output?: string,
  ) {
    super(`Engine returned no move for position: ${fen}`, EngineErrorCode.NO_MOVE, output);
    this.name = 'NoMoveError';
  }
}

/**
 * Map gRPC status code to appropriate error class
 */
export function mapGrpcError(code: number, message: string, details?: string): EngineError {
  switch (code) {
    case 4: // DEADLINE_EXCEEDED
      return new EngineTimeoutError(message, 0);
    case 14: // UNAVAILABLE
      return new EngineUnavailableError('service', new Error(message));
    default:
      return new EngineProcessError(message, details);
  }
}
