/**
 * Per-dependency breakers and limiters
 *
 * A registry lives as long as whatever owns it (usually one agent or one
 * process entry point). There is no module-level instance.
 */

import type { CircuitBreakerConfigInput, RateLimiterConfigInput } from '../config/schema.js';
import { NoopLogger, type Logger } from '../observability/index.js';
import { CircuitBreaker, type CircuitBreakerHook, type CircuitBreakerStats } from './circuit-breaker.js';
import { TokenBucketLimiter, type RateLimitStats } from './rate-limiter.js';

export interface ResilienceRegistryOptions {
  circuitBreaker?: CircuitBreakerConfigInput;
  rateLimiter?: RateLimiterConfigInput;
  logger?: Logger;
}

export interface RegistryStats {
  readonly circuitBreakers: Record<string, CircuitBreakerStats>;
  readonly rateLimiters: Record<string, RateLimitStats>;
}

/**
 * Get-or-create accessor keyed by dependency name
 */
export class ResilienceRegistry {
  private readonly breakers = new Map<string, CircuitBreaker>();
  private readonly limiters = new Map<string, TokenBucketLimiter>();
  private readonly globalHooks: CircuitBreakerHook[] = [];
  private readonly options: ResilienceRegistryOptions;
  private readonly logger: Logger;

  constructor(options: ResilienceRegistryOptions = {}) {
    this.options = options;
    this.logger = options.logger ?? new NoopLogger();
  }

  /**
   * Get or create the circuit breaker for a dependency
   */
  breaker(name: string): CircuitBreaker {
    let breaker = this.breakers.get(name);
    if (!breaker) {
      breaker = new CircuitBreaker(this.options.circuitBreaker, { name, logger: this.logger });
      for (const hook of this.globalHooks) {
        breaker.addHook(hook);
      }
      this.breakers.set(name, breaker);
    }
    return breaker;
  }

  /**
   * Get or create the rate limiter for a dependency
   */
  limiter(name: string): TokenBucketLimiter {
    let limiter = this.limiters.get(name);
    if (!limiter) {
      limiter = new TokenBucketLimiter(this.options.rateLimiter, this.logger.child({ limiter: name }));
      this.limiters.set(name, limiter);
    }
    return limiter;
  }

  /**
   * Add a hook to all current and future circuit breakers
   */
  addGlobalHook(hook: CircuitBreakerHook): void {
    this.globalHooks.push(hook);
    for (const breaker of this.breakers.values()) {
      breaker.addHook(hook);
    }
  }

  getAllStats(): RegistryStats {
    const circuitBreakers: Record<string, CircuitBreakerStats> = {};
    for (const [name, breaker] of this.breakers) {
      circuitBreakers[name] = breaker.getStats();
    }
    const rateLimiters: Record<string, RateLimitStats> = {};
    for (const [name, limiter] of this.limiters) {
      rateLimiters[name] = limiter.getStats();
    }
    return { circuitBreakers, rateLimiters };
  }

  /**
   * Close every breaker, refill every bucket and zero all stats
   */
  resetAll(): void {
    for (const breaker of this.breakers.values()) {
      breaker.reset();
      breaker.resetStats();
    }
    for (const limiter of this.limiters.values()) {
      limiter.reset();
      limiter.resetStats();
    }
  }
}
