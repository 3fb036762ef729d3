/**
 * Retry executor with exponential backoff and jitter
 */

import {
  parseConfig,
  retryPolicySchema,
  type RetryPolicy,
  type RetryPolicyInput,
} from '../config/schema.js';
import {
  RetryExhaustedError,
  isRetriableError,
  settle,
  type ErrorClassifier,
} from '../errors/index.js';
import { NoopLogger, type Logger } from '../observability/index.js';
import type { CircuitBreaker } from './circuit-breaker.js';
import { percent, roundMs, sleep } from './timing.js';

/**
 * Observer invoked before each backoff sleep. It cannot change control flow.
 */
export type RetryCallback = (error: unknown, attempt: number, delayMs: number) => void;

export interface RetryOptions {
  policy?: RetryPolicyInput;
  classify?: ErrorClassifier;
  /** When set, every attempt is dispatched through this breaker */
  breaker?: CircuitBreaker;
  onRetry?: RetryCallback;
  logger?: Logger;
  /** Uniform random source in [0, 1) used for jitter */
  random?: () => number;
}

export interface RetryStats {
  /** Failed attempts, retriable or not */
  readonly totalAttempts: number;
  /** Operations that succeeded after at least one retry */
  readonly successfulRetries: number;
  /** Operations that ultimately failed */
  readonly failedAfterRetries: number;
  readonly totalDelayMs: number;
  readonly maxDelayMs: number;
  readonly avgDelayMs: number;
  /** successfulRetries as a percentage of totalAttempts */
  readonly successRate: number;
}

/**
 * Validate a retry policy and freeze it
 * @throws ConfigurationError on out-of-range values
 */
export function createRetryPolicy(input: RetryPolicyInput = {}): RetryPolicy {
  return Object.freeze(parseConfig(retryPolicySchema, input, 'retry'));
}

/**
 * Apply jitter to a base delay: base ± base × jitterFraction, capped at
 * maxDelayMs and never negative
 */
export function computeRetryDelay(
  baseDelayMs: number,
  policy: RetryPolicy,
  random: () => number = Math.random
): number {
  const jitter = baseDelayMs * policy.jitterFraction * (random() * 2 - 1);
  return Math.max(0, Math.min(policy.maxDelayMs, baseDelayMs + jitter));
}

/**
 * Base delay for the attempt after the one that used `baseDelayMs`
 */
export function nextBaseDelay(baseDelayMs: number, policy: RetryPolicy): number {
  return Math.min(policy.maxDelayMs, baseDelayMs * policy.multiplier);
}

/**
 * Executes operations with bounded retries and exponential backoff
 */
export class RetryExecutor {
  private readonly policy: RetryPolicy;
  private readonly classify: ErrorClassifier;
  private readonly breaker?: CircuitBreaker;
  private readonly onRetry?: RetryCallback;
  private readonly logger: Logger;
  private readonly random: () => number;

  private totalAttempts = 0;
  private successfulRetries = 0;
  private failedAfterRetries = 0;
  private totalDelayMs = 0;
  private maxDelayMs = 0;

  constructor(options: RetryOptions = {}) {
    this.policy = createRetryPolicy(options.policy);
    this.classify = options.classify ?? isRetriableError;
    this.breaker = options.breaker;
    this.onRetry = options.onRetry;
    this.logger = options.logger ?? new NoopLogger();
    this.random = options.random ?? Math.random;
  }

  /**
   * Execute an operation with retry logic
   * @returns The result of the first successful attempt
   * @throws The original error when it is not retriable
   * @throws RetryExhaustedError when every attempt failed with a retriable error
   */
  async run<T>(operation: () => Promise<T>): Promise<T> {
    const maxAttempts = this.policy.maxRetries + 1;
    let baseDelayMs = this.policy.initialDelayMs;
    let attempt = 0;

    while (true) {
      attempt++;
      const outcome = await settle(() => this.dispatch(operation), this.classify);

      if (outcome.kind === 'ok') {
        if (attempt > 1) {
          this.successfulRetries++;
        }
        return outcome.value;
      }

      this.totalAttempts++;
      const { error } = outcome;

      if (outcome.kind === 'permanent') {
        this.failedAfterRetries++;
        this.logger.warn('retry_non_retriable_error', {
          attempt,
          ...describeError(error),
        });
        throw error;
      }

      if (attempt >= maxAttempts) {
        this.failedAfterRetries++;
        this.logger.error('retry_exhausted', {
          attempts: attempt,
          ...describeError(error),
        });
        throw new RetryExhaustedError(attempt, error);
      }

      const delayMs = computeRetryDelay(baseDelayMs, this.policy, this.random);
      this.totalDelayMs += delayMs;
      this.maxDelayMs = Math.max(this.maxDelayMs, delayMs);

      this.logger.info('retry_attempt', {
        attempt,
        maxRetries: this.policy.maxRetries,
        delayMs: roundMs(delayMs),
        ...describeError(error),
      });
      this.notify(error, attempt, delayMs);

      await sleep(delayMs);
      baseDelayMs = nextBaseDelay(baseDelayMs, this.policy);
    }
  }

  getPolicy(): RetryPolicy {
    return this.policy;
  }

  getCircuitBreaker(): CircuitBreaker | undefined {
    return this.breaker;
  }

  getStats(): RetryStats {
    return {
      totalAttempts: this.totalAttempts,
      successfulRetries: this.successfulRetries,
      failedAfterRetries: this.failedAfterRetries,
      totalDelayMs: roundMs(this.totalDelayMs),
      maxDelayMs: roundMs(this.maxDelayMs),
      avgDelayMs: this.totalAttempts > 0 ? roundMs(this.totalDelayMs / this.totalAttempts) : 0,
      successRate: percent(this.successfulRetries, this.totalAttempts),
    };
  }

  resetStats(): void {
    this.totalAttempts = 0;
    this.successfulRetries = 0;
    this.failedAfterRetries = 0;
    this.totalDelayMs = 0;
    this.maxDelayMs = 0;
  }

  private dispatch<T>(operation: () => Promise<T>): Promise<T> {
    return this.breaker ? this.breaker.call(operation) : operation();
  }

  private notify(error: unknown, attempt: number, delayMs: number): void {
    if (!this.onRetry) return;
    try {
      this.onRetry(error, attempt, delayMs);
    } catch (callbackError) {
      this.logger.warn('retry_callback_failed', describeError(callbackError));
    }
  }
}

/**
 * Run a single operation with retries
 */
export function withRetry<T>(operation: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  return new RetryExecutor(options).run(operation);
}

/**
 * Wrap a function so every call is retried according to `options`.
 * All calls share one executor and therefore one set of stats.
 */
export function retryable<A extends unknown[], T>(
  fn: (...args: A) => Promise<T>,
  options: RetryOptions = {}
): (...args: A) => Promise<T> {
  const executor = new RetryExecutor(options);
  return (...args: A) => executor.run(() => fn(...args));
}

function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return { error: error.message, errorType: error.name };
  }
  return { error: String(error) };
}
