/**
 * Tests for Retry and Circuit Breaker logic
 */

import {
  withRetry,
  CircuitBreaker,
  DEFAULT_RETRY_CONFIG,
  RetryLog,
  createErrorLog,
  isRetryableError,
} from '../src/utils/retry.js';

const FAST = { ...DEFAULT_RETRY_CONFIG, initialDelayMs: 5, maxDelayMs: 10 };

async function openCircuit(breaker: CircuitBreaker, times: number): Promise<void> {
  const fn = jest.fn().mockRejectedValue(new Error('Fail'));
  for (let i = 0; i < times; i++) {
    await expect(breaker.execute(fn)).rejects.toThrow('Fail');
  }
}

describe('Retry Logic', () => {
  describe('withRetry - Success Cases', () => {
    it('should succeed on first attempt', async () => {
      const fn = jest.fn().mockResolvedValue('success');
      const result = await withRetry(fn);

      expect(result).toBe('success');
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should retry on failure and eventually succeed', async () => {
      const fn = jest
        .fn()
        .mockRejectedValueOnce(new Error('Temporary failure'))
        .mockRejectedValueOnce(new Error('Temporary failure'))
        .mockResolvedValueOnce('success');

      const result = await withRetry(fn, { ...FAST, maxAttempts: 3 });
      expect(result).toBe('success');
      expect(fn).toHaveBeenCalledTimes(3);
    });
  });

  describe('withRetry - Failure Cases', () => {
    it('should make a single attempt by default', async () => {
      const fn = jest.fn().mockRejectedValue(new Error('Always fails'));

      await expect(withRetry(fn)).rejects.toThrow(
        'Failed after 1 attempt(s). Last error: Always fails'
      );
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should throw after max attempts', async () => {
      const fn = jest.fn().mockRejectedValue(new Error('Always fails'));

      await expect(withRetry(fn, { ...FAST, maxAttempts: 3 })).rejects.toThrow(
        'Failed after 3 attempt(s)'
      );
      expect(fn).toHaveBeenCalledTimes(3);
    });

    it('should stop early when the error is not retryable', async () => {
      const fn = jest.fn().mockRejectedValue(new Error('HTTP 400'));

      await expect(
        withRetry(fn, { ...FAST, maxAttempts: 3 }, undefined, isRetryableError)
      ).rejects.toThrow('Last error: HTTP 400');
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should log retry attempts', async () => {
      const logs: RetryLog[] = [];
      const fn = jest
        .fn()
        .mockRejectedValueOnce(new Error('Fail 1'))
        .mockResolvedValueOnce('success');

      await withRetry(fn, { ...FAST, maxAttempts: 2 }, (log) => logs.push(log));

      expect(logs).toHaveLength(2);
      expect(logs[0]).toMatchObject({ attempt: 1, success: false, error: 'Fail 1', nextRetryInMs: 5 });
      expect(logs[1]).toMatchObject({ attempt: 2, success: true });
    });
  });

  describe('Timeout Handling', () => {
    it('should timeout if function takes too long', async () => {
      const fn = jest.fn(
        () =>
          new Promise<string>((resolve) => {
            setTimeout(() => resolve('slow'), 200);
          })
      );

      await expect(
        withRetry(fn, { ...FAST, maxAttempts: 1, timeoutMs: 20 })
      ).rejects.toThrow('Timeout after 20ms');
    });
  });
});

describe('Circuit Breaker', () => {
  let breaker: CircuitBreaker;

  beforeEach(() => {
    breaker = new CircuitBreaker(3, 50); // 3 failures to open, 50ms reset
  });

  describe('States', () => {
    it('should start in closed state', () => {
      expect(breaker.getState()).toBe('closed');
    });

    it('should open after failure threshold', async () => {
      await openCircuit(breaker, 3);
      expect(breaker.getState()).toBe('open');

      const fn = jest.fn().mockResolvedValue('ok');
      await expect(breaker.execute(fn)).rejects.toThrow('Circuit breaker is OPEN');
      expect(fn).not.toHaveBeenCalled();
    });

    it('should close after successful recovery', async () => {
      await openCircuit(breaker, 3);
      await new Promise((resolve) => setTimeout(resolve, 80));

      const successFn = jest.fn().mockResolvedValue('ok');
      await breaker.execute(successFn);
      expect(breaker.getState()).toBe('half-open');

      await breaker.execute(successFn);
      expect(breaker.getState()).toBe('closed');
    });

    it('should reopen if fails during half-open', async () => {
      await openCircuit(breaker, 3);
      await new Promise((resolve) => setTimeout(resolve, 80));

      await expect(breaker.execute(jest.fn().mockRejectedValue(new Error('Fail')))).rejects.toThrow(
        'Fail'
      );
      expect(breaker.getState()).toBe('open');
    });
  });

  describe('Statistics', () => {
    it('should track statistics', async () => {
      await openCircuit(breaker, 2);

      const stats = breaker.getStats();
      expect(stats.state).toBe('closed');
      expect(stats.failureCount).toBe(2);
    });

    it('should record state transitions', async () => {
      await openCircuit(breaker, 3);

      const stats = breaker.getStats();
      expect(stats.state).toBe('open');
      expect(stats.lastFailureTime).toBeInstanceOf(Date);
      expect(stats.logs.map((entry) => entry.state)).toEqual(['open']);
      expect(stats.logs[0].reason).toBe('Failure threshold (3) reached');
    });
  });
});

describe('Error Classification', () => {
  it('should identify retryable errors', () => {
    expect(isRetryableError(new Error('Connection timeout'))).toBe(true);
    expect(isRetryableError(new Error('ECONNREFUSED'))).toBe(true);
    expect(isRetryableError(new Error('HTTP 503'))).toBe(true);
    expect(isRetryableError(new Error('HTTP 429'))).toBe(true);
  });

  it('should identify non-retryable errors', () => {
    expect(isRetryableError(new Error('HTTP 400'))).toBe(false);
    expect(isRetryableError(new Error('Authentication failed'))).toBe(false);
    expect(isRetryableError('timeout')).toBe(false);
  });
});

describe('createErrorLog', () => {
  it('should raise severity from the third attempt', () => {
    const at = new Date('2024-01-01T00:00:00.000Z');
    expect(createErrorLog(at, 1, 'generate', 'HTTP 500')).toEqual({
      timestamp: '2024-01-01T00:00:00.000Z',
      attempt: 1,
      endpoint: 'generate',
      error: 'HTTP 500',
      next_retry_in_ms: undefined,
      severity: 'MEDIUM',
    });
    expect(createErrorLog(at, 3, 'generate', 'HTTP 500').severity).toBe('HIGH');
  });
});
