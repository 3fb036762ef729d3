/**
 * Resilience pipeline that combines caching, rate limiting, circuit breaking and retry
 */

import type { CacheStats, ResponseCache } from '../cache/index.js';
import { NoopLogger, type Logger } from '../observability/index.js';
import type { CircuitBreaker, CircuitBreakerStats } from './circuit-breaker.js';
import type { RateLimitStats, TokenBucketLimiter } from './rate-limiter.js';
import type { RetryExecutor, RetryStats } from './retry.js';

export interface ResiliencePipelineOptions<T> {
  /** Executor for every dispatched call. Its breaker, if any, guards each attempt. */
  retry: RetryExecutor;
  cache?: ResponseCache<T>;
  limiter?: TokenBucketLimiter;
  /** Deadline for a rate limit token; omit to wait as long as needed */
  acquireTimeoutMs?: number;
  logger?: Logger;
}

export interface ExecuteOptions {
  /** Look up and store the result in the cache. Defaults to true. */
  useCache?: boolean;
}

export interface PipelineResult<T> {
  readonly value: T;
  readonly cached: boolean;
  readonly durationMs: number;
}

export interface ResilienceDiagnostics {
  readonly retry: RetryStats;
  readonly circuitBreaker?: CircuitBreakerStats;
  readonly rateLimiter?: RateLimitStats;
  readonly cache?: CacheStats;
}

/**
 * Runs one logical request through every configured layer
 *
 * Execution order:
 * 1. Cache - a hit returns immediately and bypasses everything below
 * 2. Rate limiter - acquire a token, possibly waiting for one
 * 3. Retry executor - each attempt dispatched through the circuit breaker
 * 4. Cache - store the successful result
 */
export class ResiliencePipeline<T> {
  private readonly retry: RetryExecutor;
  private readonly cache?: ResponseCache<T>;
  private readonly limiter?: TokenBucketLimiter;
  private readonly acquireTimeoutMs?: number;
  private readonly logger: Logger;

  constructor(options: ResiliencePipelineOptions<T>) {
    this.retry = options.retry;
    this.cache = options.cache;
    this.limiter = options.limiter;
    this.acquireTimeoutMs = options.acquireTimeoutMs;
    this.logger = options.logger ?? new NoopLogger();
  }

  /**
   * Execute an operation through all resilience layers
   * @param payload - Content identifying the request, used as the cache key
   * @returns The result of the operation
   * @throws RateLimitTimeoutError when no token is granted before acquireTimeoutMs
   * @throws CircuitOpenError, RetryExhaustedError or the operation's own permanent error
   */
  async execute(payload: string, operation: () => Promise<T>, options: ExecuteOptions = {}): Promise<T> {
    const result = await this.run(payload, operation, options);
    return result.value;
  }

  /**
   * Like execute, but also reports whether the value came from the cache
   */
  async run(
    payload: string,
    operation: () => Promise<T>,
    options: ExecuteOptions = {}
  ): Promise<PipelineResult<T>> {
    const startTime = Date.now();
    const useCache = (options.useCache ?? true) && this.cache !== undefined;

    if (useCache && this.cache) {
      const hit = this.cache.get(payload);
      if (hit !== undefined) {
        return { value: hit, cached: true, durationMs: Date.now() - startTime };
      }
    }

    if (this.limiter) {
      if (this.acquireTimeoutMs === undefined) {
        await this.limiter.acquire();
      } else {
        await this.limiter.acquireOrThrow(this.acquireTimeoutMs);
      }
    }

    const value = await this.retry.run(operation);

    if (useCache && this.cache) {
      this.cache.set(payload, value);
    }

    const durationMs = Date.now() - startTime;
    this.logger.debug('pipeline_completed', { durationMs, cached: false });
    return { value, cached: false, durationMs };
  }

  getRetryExecutor(): RetryExecutor {
    return this.retry;
  }

  getCircuitBreaker(): CircuitBreaker | undefined {
    return this.retry.getCircuitBreaker();
  }

  getRateLimiter(): TokenBucketLimiter | undefined {
    return this.limiter;
  }

  getCache(): ResponseCache<T> | undefined {
    return this.cache;
  }

  /**
   * Snapshot of every configured component's stats
   */
  getDiagnostics(): ResilienceDiagnostics {
    return {
      retry: this.retry.getStats(),
      circuitBreaker: this.getCircuitBreaker()?.getStats(),
      rateLimiter: this.limiter?.getStats(),
      cache: this.cache?.getStats(),
    };
  }

  resetStats(): void {
    this.retry.resetStats();
    this.getCircuitBreaker()?.resetStats();
    this.limiter?.resetStats();
    this.cache?.resetStats();
  }
}

/**
 * One-line-per-component summary of diagnostics, rates with one decimal
 */
export function formatDiagnostics(diagnostics: ResilienceDiagnostics): string[] {
  const lines: string[] = [];
  const { retry, circuitBreaker, rateLimiter, cache } = diagnostics;

  lines.push(
    `retry: failedAttempts=${retry.totalAttempts} recovered=${retry.successfulRetries} ` +
      `exhausted=${retry.failedAfterRetries} successRate=${retry.successRate.toFixed(1)}%`
  );
  if (circuitBreaker) {
    lines.push(
      `circuit_breaker: state=${circuitBreaker.state} failures=${circuitBreaker.consecutiveFailures} ` +
        `rejected=${circuitBreaker.rejectedCount}`
    );
  }
  if (rateLimiter) {
    lines.push(
      `rate_limiter: requests=${rateLimiter.totalRequests} throttled=${rateLimiter.throttledRequests} ` +
        `throttleRate=${rateLimiter.throttleRate.toFixed(1)}%`
    );
  }
  if (cache) {
    lines.push(
      `cache: size=${cache.size}/${cache.maxEntries} hits=${cache.hits} misses=${cache.misses} ` +
        `hitRate=${cache.hitRate.toFixed(1)}%`
    );
  }
  return lines;
}
