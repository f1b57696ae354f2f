import {
  DEFAULT_BACKOFF_MULTIPLIER,
  DEFAULT_INITIAL_DELAY_MS,
  DEFAULT_MAX_RETRIES,
} from './constants.js';
import { OptimizationError, errorMessage, isTransientError } from './errors.js';

export interface RetryOptions {
  /** Retries after the initial attempt (default: 5) */
  maxRetries?: number;
  /** Delay before the first retry, in milliseconds (default: 1000) */
  initialDelayMs?: number;
  /** Multiplier applied from the second retry on (default: 3) */
  backoffMultiplier?: number;
  /** Which errors are worth another attempt (default: transient provider errors) */
  isRetryable?: (error: unknown) => boolean;
  /** Invoked before each retry sleep */
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
  /** Replaceable for tests */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Outcome of a call run under a retry policy.
 */
export type RetryOutcome<T> =
  | { status: 'succeeded'; value: T; attempts: number }
  | { status: 'exhausted'; error: unknown; attempts: number }
  | { status: 'fatal'; error: unknown; attempts: number };

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Bounded retry with exponential backoff. The first retry waits the initial
 * delay unchanged; every later retry multiplies the previous delay.
 */
export class RetryPolicy {
  readonly maxRetries: number;
  readonly initialDelayMs: number;
  readonly backoffMultiplier: number;
  private readonly isRetryable: (error: unknown) => boolean;
  private readonly onRetry?: RetryOptions['onRetry'];
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: RetryOptions = {}) {
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.initialDelayMs = options.initialDelayMs ?? DEFAULT_INITIAL_DELAY_MS;
    this.backoffMultiplier =
      options.backoffMultiplier ?? DEFAULT_BACKOFF_MULTIPLIER;
    this.isRetryable = options.isRetryable ?? isTransientError;
    this.onRetry = options.onRetry;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Delay before retry number `retry` (1-based).
   */
  delayFor(retry: number): number {
    return this.initialDelayMs * this.backoffMultiplier ** Math.max(0, retry - 1);
  }

  /**
   * Same policy, also notifying `listener` before each retry. An existing
   * callback is kept and runs first.
   */
  withOnRetry(listener: NonNullable<RetryOptions['onRetry']>): RetryPolicy {
    const previous = this.onRetry;
    return new RetryPolicy({
      maxRetries: this.maxRetries,
      initialDelayMs: this.initialDelayMs,
      backoffMultiplier: this.backoffMultiplier,
      isRetryable: this.isRetryable,
      onRetry: (attempt, error, delayMs) => {
        previous?.(attempt, error, delayMs);
        listener(attempt, error, delayMs);
      },
      sleep: this.sleep,
    });
  }

  async execute<T>(fn: () => Promise<T>): Promise<RetryOutcome<T>> {
    let attempts = 0;

    while (true) {
      attempts++;
      try {
        const value = await fn();
        return { status: 'succeeded', value, attempts };
      } catch (error) {
        if (!this.isRetryable(error)) {
          return { status: 'fatal', error, attempts };
        }
        if (attempts > this.maxRetries) {
          return { status: 'exhausted', error, attempts };
        }
        const delayMs = this.delayFor(attempts);
        this.onRetry?.(attempts, error, delayMs);
        await this.sleep(delayMs);
      }
    }
  }

  /**
   * Run `fn` and unwrap the outcome: fatal errors propagate unchanged,
   * exhaustion becomes an OptimizationError wrapping the last error.
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    const outcome = await this.execute(fn);
    switch (outcome.status) {
      case 'succeeded':
        return outcome.value;
      case 'fatal':
        throw outcome.error;
      case 'exhausted':
        throw new OptimizationError(
          `API call failed after ${this.maxRetries} retries. Last error: ${errorMessage(outcome.error)}`,
          { cause: outcome.error }
        );
    }
  }
}
