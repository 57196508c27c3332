/**
 * Error classes for LLM operations
 */

/**
 * Error codes for LLM operations
 */
export enum LLMErrorCode {
  /** Missing or rejected API key */
  UNAUTHENTICATED = 'UNAUTHENTICATED',
  /** API rate limit exceeded */
  RATE_LIMITED = 'RATE_LIMITED',
  /** Invalid response from LLM */
  INVALID_RESPONSE = 'INVALID_RESPONSE',
  /** General API error */
  API_ERROR = 'API_ERROR',
  /** Request timed out */
  TIMEOUT = 'TIMEOUT',
  /** Input validation failed */
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  /** Circuit breaker is open */
  CIRCUIT_OPEN = 'CIRCUIT_OPEN',
}

/**
 * Base error class for LLM operations
 */
export class LLMError extends Error {
  constructor(
    message: string,
    public readonly code: LLMErrorCode,
    public readonly retryable: boolean,
    public override readonly cause?: Error,
  ) {
    super(message);
    this.name = 'LLMError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LLMError);
    }
  }
}

/**
 * Error thrown when no API key is configured or the key is refused
 */
export class AuthenticationError extends LLMError {
  constructor(message: string, cause?: Error) {
    super(message, LLMErrorCode.UNAUTHENTICATED, false, cause);
    this.name = 'AuthenticationError';
  }
}

/**
 * Error thrown when API rate limit is exceeded
 */
export class RateLimitError extends LLMError {
  constructor(
    public readonly retryAfterMs: number,
    cause?: Error,
  ) {
    super(
      `Rate limited, retry after ${retryAfterMs}ms`,
      LLMErrorCode.RATE_LIMITED,
      true,
      cause,
    );
    this.name = 'RateLimitError';
  }
}

/**
 * Error thrown when a caller's input is rejected before any request is made
 */
export class ValidationError extends LLMError {
  constructor(
    message: string,
    public readonly field: string,
    public readonly value: unknown,
  ) {
    super(message, LLMErrorCode.VALIDATION_FAILED, false);
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when a reply cannot be used, e.g. it names no move
 */
export class InvalidResponseError extends LLMError {
  constructor(
    message: string,
    public readonly responseText: string,
  ) {
    super(message, LLMErrorCode.INVALID_RESPONSE, false);
    this.name = 'InvalidResponseError';
  }
}

/**
 * Error thrown when API request times out
 */
export class TimeoutError extends LLMError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
    cause?: Error,
  ) {
    super(
      `Operation '${operation}' timed out after ${timeoutMs}ms`,
      LLMErrorCode.TIMEOUT,
      true,
      cause,
    );
    this.name = 'TimeoutError';
  }
}

/**
 * Error thrown when circuit breaker is open
 */
export class CircuitOpenError extends LLMError {
  constructor(
    public readonly openedAt: Date,
    public readonly resetAfterMs: number,
  ) {
    super(
      `Circuit breaker is open since ${openedAt.toISOString()}, reset in ${resetAfterMs}ms`,
      LLMErrorCode.CIRCUIT_OPEN,
      true,
    );
    this.name = 'CircuitOpenError';
  }
}

/**
 * Error thrown for general API errors
 */
export class APIError extends LLMError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    cause?: Error,
  ) {
    super(message, LLMErrorCode.API_ERROR, statusCode !== 400, cause);
    this.name = 'APIError';
  }
}
