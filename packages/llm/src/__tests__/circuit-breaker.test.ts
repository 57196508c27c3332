/**
 * Tests for circuit breaker
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { CircuitBreaker } from '../client/circuit-breaker.js';
import { AuthenticationError, CircuitOpenError } from '../errors.js';

async function fail(breaker: CircuitBreaker, error: Error = new Error('test error')): Promise<void> {
  await breaker
    .execute(async () => {
      throw error;
    })
    .catch(() => undefined);
}

describe('CircuitBreaker', () => {
  let breaker: CircuitBreaker;

  beforeEach(() => {
    breaker = new CircuitBreaker({
      failureThreshold: 3,
      successThreshold: 2,
      resetTimeoutMs: 1000,
    });
  });

  describe('closed state', () => {
    it('should start closed with zero failures', () => {
      expect(breaker.getState()).toBe('closed');
      expect(breaker.getFailureCount()).toBe(0);
    });

    it('should pass results and errors through', async () => {
      expect(await breaker.execute(async () => 'success')).toBe('success');
      await expect(
        breaker.execute(async () => {
          throw new Error('boom');
        }),
      ).rejects.toThrow('boom');
    });

    it('should open after threshold failures', async () => {
      await fail(breaker);
      await fail(breaker);
      expect(breaker.getState()).toBe('closed');

      await fail(breaker);
      expect(breaker.getState()).toBe('open');
    });

    it('should reset failure count on success', async () => {
      await fail(breaker);
      await fail(breaker);
      await breaker.execute(async () => 'success');

      expect(breaker.getFailureCount()).toBe(0);
    });
  });

  describe('open state', () => {
    beforeEach(async () => {
      vi.useFakeTimers();
      for (let i = 0; i < 3; i++) {
        await fail(breaker);
      }
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should reject operations immediately', async () => {
      const operation = vi.fn(async () => 'success');

      await expect(breaker.execute(operation)).rejects.toThrow(CircuitOpenError);
      expect(operation).not.toHaveBeenCalled();
    });

    it('should transition to half-open after timeout', () => {
      vi.advanceTimersByTime(999);
      expect(breaker.getState()).toBe('open');

      vi.advanceTimersByTime(1);
      expect(breaker.getState()).toBe('half-open');
    });

    it('should close after enough half-open successes', async () => {
      vi.advanceTimersByTime(1000);

      await breaker.execute(async () => 'success');
      expect(breaker.getState()).toBe('half-open');

      await breaker.execute(async () => 'success');
      expect(breaker.getState()).toBe('closed');
    });

    it('should open again on a half-open failure', async () => {
      vi.advanceTimersByTime(1000);

      await fail(breaker);

      expect(breaker.getState()).toBe('open');
    });
  });

  describe('countsAsFailure', () => {
    it('should ignore failures the predicate rejects', async () => {
      breaker = new CircuitBreaker(
        { failureThreshold: 1, successThreshold: 1, resetTimeoutMs: 1000 },
        { countsAsFailure: (error) => !(error instanceof AuthenticationError) },
      );

      await fail(breaker, new AuthenticationError('bad key'));
      expect(breaker.getState()).toBe('closed');

      await fail(breaker);
      expect(breaker.getState()).toBe('open');
    });
  });

  describe('onStateChange', () => {
    it('should report transitions', async () => {
      const onStateChange = vi.fn();
      breaker = new CircuitBreaker(
        { failureThreshold: 1, successThreshold: 1, resetTimeoutMs: 1000 },
        { onStateChange },
      );

      await fail(breaker);
      breaker.reset();

      expect(onStateChange.mock.calls).toEqual([
        ['closed', 'open'],
        ['open', 'closed'],
      ]);
    });
  });

  describe('reset', () => {
    it('should reset to closed state', async () => {
      for (let i = 0; i < 3; i++) {
        await fail(breaker);
      }
      expect(breaker.getState()).toBe('open');

      breaker.reset();

      expect(breaker.getState()).toBe('closed');
      expect(breaker.getFailureCount()).toBe(0);
    });
  });
});
