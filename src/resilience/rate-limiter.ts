/**
 * Token bucket rate limiter
 */

import {
  parseConfig,
  rateLimiterConfigSchema,
  type RateLimiterConfigInput,
} from '../config/schema.js';
import { RateLimitTimeoutError } from '../errors/index.js';
import { NoopLogger, type Logger } from '../observability/index.js';
import { percent, roundMs, sleep } from './timing.js';

export interface RateLimitStats {
  readonly totalRequests: number;
  readonly throttledRequests: number;
  readonly totalWaitTimeMs: number;
  readonly maxWaitTimeMs: number;
  readonly avgWaitTimeMs: number;
  /** throttledRequests as a percentage of totalRequests */
  readonly throttleRate: number;
  readonly windowStart: number;
  readonly windowDurationMs: number;
}

/**
 * Token bucket limiter that gates how many operations may start per unit time
 *
 * - Tokens are a continuous quantity refilled lazily from elapsed time
 * - Each admitted operation consumes exactly one token
 * - The bucket never holds more than `capacity` tokens
 * - Elapsed time comes from `performance.now()`, not the wall clock
 *
 * Waiters are not served in arrival order: every waiter sleeps for its own
 * estimate and re-checks, so under contention a later caller can win a token
 * an earlier one was waiting for.
 */
export class TokenBucketLimiter {
  readonly capacity: number;
  readonly refillRatePerSecond: number;
  readonly requestsPerMinute: number;

  private tokens: number;
  private lastRefill: number;
  private isEnabled: boolean;
  private readonly logger: Logger;

  private totalRequests = 0;
  private throttledRequests = 0;
  private totalWaitTimeMs = 0;
  private maxWaitTimeMs = 0;
  private windowStart = Date.now();

  constructor(config: RateLimiterConfigInput = {}, logger: Logger = new NoopLogger()) {
    const parsed = parseConfig(rateLimiterConfigSchema, config, 'rate limiter');

    this.requestsPerMinute = parsed.requestsPerMinute;
    this.refillRatePerSecond = parsed.requestsPerMinute / 60;
    this.capacity = parsed.burstCapacity ?? Math.max(1, Math.floor(parsed.requestsPerMinute / 6));
    this.tokens = this.capacity;
    this.lastRefill = performance.now();
    this.isEnabled = parsed.enabled;
    this.logger = logger;

    this.logger.info('rate_limiter_initialized', {
      requestsPerMinute: this.requestsPerMinute,
      burst: this.capacity,
      enabled: this.isEnabled,
    });
  }

  get enabled(): boolean {
    return this.isEnabled;
  }

  set enabled(value: boolean) {
    this.isEnabled = value;
    this.logger.info('rate_limiter_enabled_changed', { enabled: value });
  }

  /**
   * Current token count after refill, without consuming one
   */
  get availableTokens(): number {
    this.refill();
    return this.tokens;
  }

  /**
   * Wait for a token
   * @param timeoutMs - Maximum time to wait; omit to wait as long as needed
   * @returns true once a token was consumed, false if it could not be granted in time
   */
  async acquire(timeoutMs?: number): Promise<boolean> {
    if (!this.isEnabled) {
      this.totalRequests++;
      return true;
    }

    const startTime = performance.now();
    let throttled = false;

    while (true) {
      const waitMs = this.take();
      if (waitMs === 0) {
        if (throttled) {
          const waitedMs = performance.now() - startTime;
          this.totalWaitTimeMs += waitedMs;
          this.maxWaitTimeMs = Math.max(this.maxWaitTimeMs, waitedMs);
        }
        return true;
      }

      if (timeoutMs !== undefined && performance.now() - startTime + waitMs > timeoutMs) {
        this.logger.debug('rate_limit_timeout', { timeoutMs, waitTimeMs: roundMs(waitMs) });
        return false;
      }

      // counted once per acquire, however many times it sleeps
      if (!throttled) {
        throttled = true;
        this.throttledRequests++;
      }
      this.logger.debug('rate_limit_throttle', {
        waitTimeMs: roundMs(waitMs),
        tokens: roundMs(this.tokens),
      });

      await sleep(waitMs);
    }
  }

  /**
   * Like acquire, but rejects instead of resolving false
   * @throws RateLimitTimeoutError when no token is granted within timeoutMs
   */
  async acquireOrThrow(timeoutMs: number): Promise<void> {
    if (!(await this.acquire(timeoutMs))) {
      throw new RateLimitTimeoutError(timeoutMs);
    }
  }

  /**
   * Take a token only if one is available right now
   */
  tryAcquire(): boolean {
    if (!this.isEnabled) {
      this.totalRequests++;
      return true;
    }
    return this.take() === 0;
  }

  getStats(): RateLimitStats {
    const now = Date.now();
    return {
      totalRequests: this.totalRequests,
      throttledRequests: this.throttledRequests,
      totalWaitTimeMs: roundMs(this.totalWaitTimeMs),
      maxWaitTimeMs: roundMs(this.maxWaitTimeMs),
      avgWaitTimeMs:
        this.throttledRequests > 0 ? roundMs(this.totalWaitTimeMs / this.throttledRequests) : 0,
      throttleRate: percent(this.throttledRequests, this.totalRequests),
      windowStart: this.windowStart,
      windowDurationMs: now - this.windowStart,
    };
  }

  resetStats(): void {
    this.totalRequests = 0;
    this.throttledRequests = 0;
    this.totalWaitTimeMs = 0;
    this.maxWaitTimeMs = 0;
    this.windowStart = Date.now();
  }

  /**
   * Refill the bucket to capacity
   */
  reset(): void {
    this.tokens = this.capacity;
    this.lastRefill = performance.now();
  }

  /**
   * Refill, then consume a token if possible.
   * @returns 0 when a token was consumed, otherwise the whole milliseconds
   * until one will be available
   */
  private take(): number {
    this.refill();

    if (this.tokens >= 1) {
      this.tokens -= 1;
      this.totalRequests++;
      return 0;
    }

    return Math.max(1, Math.ceil(((1 - this.tokens) / this.refillRatePerSecond) * 1000));
  }

  private refill(): void {
    const now = performance.now();
    const elapsedSeconds = (now - this.lastRefill) / 1000;
    this.tokens = Math.min(this.capacity, this.tokens + elapsedSeconds * this.refillRatePerSecond);
    this.lastRefill = now;
  }
}
