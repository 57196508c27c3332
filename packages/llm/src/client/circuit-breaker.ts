/**
 * Circuit breaker for advisor requests
 */

import type { CircuitBreakerConfig } from '../config/llm-config.js';
import { CircuitOpenError } from '../errors.js';

import type { CircuitState } from './types.js';

export interface CircuitBreakerOptions {
  /**
   * Whether a failure counts toward tripping the circuit
   * (default: every failure counts)
   */
  countsAsFailure?: (error: unknown) => boolean;
  /** Called on every state transition */
  onStateChange?: (from: CircuitState, to: CircuitState) => void;
}

/**
 * Fails requests fast while the provider keeps failing
 *
 * States:
 * - closed: requests pass through
 * - open: requests fail immediately with CircuitOpenError
 * - half-open: after the reset timeout, requests pass again; enough
 *   successes close the circuit, any counted failure reopens it
 */
export class CircuitBreaker {
  private state: CircuitState = 'closed';
  private failures = 0;
  private successes = 0;
  private openedAt: Date | undefined;
  private readonly countsAsFailure: (error: unknown) => boolean;
  private readonly onStateChange: ((from: CircuitState, to: CircuitState) => void) | undefined;

  constructor(
    private readonly config: CircuitBreakerConfig,
    options: CircuitBreakerOptions = {},
  ) {
    this.countsAsFailure = options.countsAsFailure ?? (() => true);
    this.onStateChange = options.onStateChange;
  }

  /**
   * Get current circuit state
   */
  getState(): CircuitState {
    this.checkReset();
    return this.state;
  }

  /**
   * Get number of consecutive counted failures
   */
  getFailureCount(): number {
    return this.failures;
  }

  /**
   * Execute an operation with circuit breaker protection
   */
  async execute<T>(operation: () => Promise<T>): Promise<T> {
    this.checkReset();

    if (this.state === 'open') {
      throw new CircuitOpenError(this.openedAt ?? new Date(), this.getRemainingResetTime());
    }

    let result: T;
    try {
      result = await operation();
    } catch (error) {
      if (this.countsAsFailure(error)) {
        this.recordFailure();
      }
      throw error;
    }

    this.recordSuccess();
    return result;
  }

  /**
   * Record a successful operation
   */
  recordSuccess(): void {
    this.failures = 0;

    if (this.state === 'half-open') {
      this.successes++;
      if (this.successes >= this.config.successThreshold) {
        this.transition('closed');
      }
    }
  }

  /**
   * Record a failed operation
   */
  recordFailure(): void {
    this.failures++;
    this.successes = 0;

    if (
      this.state === 'half-open' ||
      (this.state === 'closed' && this.failures >= this.config.failureThreshold)
    ) {
      this.transition('open');
    }
  }

  /**
   * Manually reset the circuit breaker
   */
  reset(): void {
    this.transition('closed');
  }

  private transition(to: CircuitState): void {
    const from = this.state;
    this.state = to;
    this.successes = 0;

    if (to === 'open') {
      this.openedAt = new Date();
    } else if (to === 'closed') {
      this.failures = 0;
      this.openedAt = undefined;
    }

    if (from !== to) {
      this.onStateChange?.(from, to);
    }
  }

  private checkReset(): void {
    if (this.state === 'open' && this.getRemainingResetTime() === 0) {
      this.transition('half-open');
    }
  }

  private getRemainingResetTime(): number {
    if (!this.openedAt) return 0;
    const elapsed = Date.now() - this.openedAt.getTime();
    return Math.max(0, this.config.resetTimeoutMs - elapsed);
  }
}
