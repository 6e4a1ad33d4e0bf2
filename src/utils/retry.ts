/**
 * Retry, backoff and circuit breaker helpers for calls that can fail transiently
 */

import { errorMessage } from '../core/errors.js';

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  timeoutMs: number;
  /**
   * Errors for which this returns false are rethrown at once
   */
  retryIf?: (error: unknown) => boolean;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 4,
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
 * Delay before retry number `retryNumber` (1-based):
 * initialDelayMs * multiplier^(retryNumber - 1), capped at maxDelayMs
 */
export function computeBackoffDelay(
  retryNumber: number,
  config: Pick<RetryConfig, 'initialDelayMs' | 'maxDelayMs' | 'multiplier'>
): number {
  const exponent = Math.max(0, retryNumber - 1);
  return Math.min(config.initialDelayMs * Math.pow(config.multiplier, exponent), config.maxDelayMs);
}

/**
 * Executes a function with exponential backoff retry logic
 * @param fn - Async function to execute
 * @param config - Retry configuration
 * @param onLog - Optional callback for retry logging
 * @returns Promise with the function result
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  onLog?: (log: RetryLog) => void
): Promise<T> {
  let lastError: unknown = null;
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

      if (onLog) {
        onLog({
          timestamp: new Date(),
          attempt,
          delay: 0,
          success: true,
        });
      }

      return result;
    } catch (error) {
      lastError = error;
      const retryable = config.retryIf ? config.retryIf(error) : true;
      const willRetry = retryable && attempt < config.maxAttempts;

      if (onLog) {
        onLog({
          timestamp: new Date(),
          attempt,
          delay: lastDelay,
          success: false,
          error: errorMessage(error),
          nextRetryInMs: willRetry ? lastDelay : undefined,
        });
      }

      if (!retryable) {
        throw error;
      }
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
    `Failed after ${config.maxAttempts} attempts. Last error: ${errorMessage(lastError)}`
  );
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export type CircuitState = 'closed' | 'open' | 'half-open';

export interface CircuitStateChange {
  timestamp: Date;
  state: CircuitState;
  reason: string;
}

export interface CircuitBreakerStats {
  state: CircuitState;
  failureCount: number;
  successCount: number;
  lastFailureTime: Date | null;
  logs: CircuitStateChange[];
}

/**
 * Circuit Breaker Pattern
 * Stops calling a backend after repeated failures until the reset timeout passes
 */
export class CircuitBreaker {
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime: number | null = null;
  private state: CircuitState = 'closed';
  private logs: CircuitStateChange[] = [];

  constructor(
    private failureThreshold: number = 5,
    private resetTimeout: number = 60000
  ) {}

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === 'open') {
      const now = Date.now();
      if (this.lastFailureTime && now - this.lastFailureTime > this.resetTimeout) {
        this.state = 'half-open';
        this.logStateChange('half-open', 'Reset timeout reached');
        this.successCount = 0;
      } else {
        throw new Error(
          `Circuit breaker is OPEN. Service is temporarily unavailable. Try again in ${this.resetTimeout - (now - (this.lastFailureTime || now))}ms`
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
 * Check if an error is worth retrying (network and availability failures,
 * HTTP 429 and 5xx)
 */
export function isRetryableError(error: unknown): boolean {
  const message = errorMessage(error).toLowerCase();

  const retryablePatterns = [
    'timeout',
    'econnrefused',
    'econnreset',
    'service unavailable',
    'temporarily unavailable',
    'connection refused',
    'getaddrinfo enotfound',
    'socket hang up',
  ];

  return /status:? (429|5\d\d)\b/.test(message) || retryablePatterns.some((pattern) => message.includes(pattern));
}
