/**
 * Retry and Circuit Breaker patterns for calls to the generator service
 */

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  timeoutMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 1,
  initialDelayMs: 1000,
  maxDelayMs: 8000,
  multiplier: 2,
  timeoutMs: 30000,
};

export interface RetryLog {
  timestamp: Date;
  attempt: number;
  delay: number;
  success: boolean;
  error?: string;
  nextRetryInMs?: number;
}

/**
 * Executes a function with a per-attempt timeout and exponential backoff
 * @param shouldRetry - Decides whether a failed attempt is worth repeating
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  onLog?: (log: RetryLog) => void,
  shouldRetry: (error: unknown) => boolean = () => true
): Promise<T> {
  let lastError: Error | null = null;
  let lastDelay = config.initialDelayMs;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    let timer: NodeJS.Timeout | undefined;
    try {
      const timeoutPromise = new Promise<never>((_, reject) => {
        timer = setTimeout(
          () => reject(new Error(`Timeout after ${config.timeoutMs}ms`)),
          config.timeoutMs
        );
      });

      const result = await Promise.race([fn(), timeoutPromise]);

      onLog?.({
        timestamp: new Date(),
        attempt,
        delay: 0,
        success: true,
      });

      return result;
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      const willRetry = attempt < config.maxAttempts && shouldRetry(error);

      onLog?.({
        timestamp: new Date(),
        attempt,
        delay: lastDelay,
        success: false,
        error: lastError.message,
        nextRetryInMs: willRetry ? lastDelay : undefined,
      });

      if (!willRetry) {
        break;
      }

      await sleep(lastDelay);
      lastDelay = Math.min(lastDelay * config.multiplier, config.maxDelayMs);
    } finally {
      clearTimeout(timer);
    }
  }

  throw new Error(
    `Failed after ${config.maxAttempts} attempt(s). Last error: ${lastError?.message}`
  );
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export type CircuitState = 'closed' | 'open' | 'half-open';

export interface CircuitTransition {
  timestamp: Date;
  state: CircuitState;
  reason: string;
}

export interface CircuitBreakerStats {
  state: CircuitState;
  failureCount: number;
  successCount: number;
  lastFailureTime: Date | null;
  logs: CircuitTransition[];
}

/**
 * Circuit Breaker Pattern
 * Stops calling the generator while it keeps failing
 */
export class CircuitBreaker {
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime: number | null = null;
  private state: CircuitState = 'closed';
  private logs: CircuitTransition[] = [];

  constructor(
    private failureThreshold: number = 5,
    private resetTimeout: number = 60000
  ) {}

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === 'open') {
      const now = Date.now();
      if (this.lastFailureTime !== null && now - this.lastFailureTime > this.resetTimeout) {
        this.state = 'half-open';
        this.logStateChange('half-open', 'Reset timeout reached');
        this.successCount = 0;
      } else {
        const waitMs = this.resetTimeout - (now - (this.lastFailureTime ?? now));
        throw new Error(
          `Circuit breaker is OPEN. Service is temporarily unavailable. Try again in ${waitMs}ms`
        );
      }
    }

    try {
      const result = await fn();

      if (this.state === 'half-open') {
        this.successCount++;
        if (this.successCount >= 2) {
          this.state = 'closed';
          this.failureCount = 0;
          this.logStateChange('closed', 'Recovered from temporary failure');
        }
      } else if (this.state === 'closed') {
        this.failureCount = Math.max(0, this.failureCount - 1);
      }

      return result;
    } catch (error) {
      this.onFailure();
      throw error;
    }
  }

  private onFailure() {
    this.failureCount++;
    this.lastFailureTime = Date.now();

    if (this.state === 'half-open') {
      this.state = 'open';
      this.logStateChange('open', 'Failed while in half-open state');
    } else if (this.failureCount >= this.failureThreshold) {
      this.state = 'open';
      this.logStateChange('open', `Failure threshold (${this.failureThreshold}) reached`);
    }
  }

  private logStateChange(newState: CircuitState, reason: string) {
    this.logs.push({
      timestamp: new Date(),
      state: newState,
      reason,
    });

    // Keep last 100 logs
    if (this.logs.length > 100) {
      this.logs = this.logs.slice(-100);
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  getStats(): CircuitBreakerStats {
    return {
      state: this.state,
      failureCount: this.failureCount,
      successCount: this.successCount,
      lastFailureTime: this.lastFailureTime ? new Date(this.lastFailureTime) : null,
      logs: [...this.logs],
    };
  }
}

/**
 * Structured, single-line error record for generator failures
 */
export function createErrorLog(
  timestamp: Date,
  attempt: number,
  endpoint: string,
  error: string,
  nextRetryInMs?: number
) {
  return {
    timestamp: timestamp.toISOString(),
    attempt,
    endpoint,
    error,
    next_retry_in_ms: nextRetryInMs,
    severity: attempt >= 3 ? 'HIGH' : 'MEDIUM',
  };
}

/**
 * Transport-level failures worth another attempt
 */
export function isRetryableError(error: unknown): boolean {
  const errorMessage = error instanceof Error ? error.message.toLowerCase() : '';

  const retryablePatterns = [
    'timeout',
    'econnrefused',
    'econnreset',
    'service unavailable',
    'temporarily unavailable',
    'connection refused',
    'getaddrinfo enotfound',
    'socket hang up',
    'http 429',
    'http 503',
  ];

  return retryablePatterns.some((pattern) => errorMessage.includes(pattern));
}
