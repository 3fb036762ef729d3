/**
 * Circuit breaker following the three-state pattern
 */

import {
  circuitBreakerConfigSchema,
  parseConfig,
  type CircuitBreakerConfig,
  type CircuitBreakerConfigInput,
} from '../config/schema.js';
import { CircuitOpenError } from '../errors/index.js';
import { NoopLogger, type Logger } from '../observability/index.js';

export type CircuitState = 'closed' | 'open' | 'half_open';

export interface CircuitBreakerHook {
  onStateChange(from: CircuitState, to: CircuitState): void;
}

export interface CircuitBreakerOptions {
  /** Name of the protected dependency, used in logs */
  name?: string;
  logger?: Logger;
}

export interface CircuitBreakerStats {
  readonly name: string;
  readonly state: CircuitState;
  readonly consecutiveFailures: number;
  readonly failureCount: number;
  readonly successCount: number;
  readonly rejectedCount: number;
  readonly stateChanges: number;
  readonly lastFailureTime: number | undefined;
  readonly lastStateChange: number;
  readonly timeUntilHalfOpenMs: number | undefined;
  readonly config: CircuitBreakerConfig;
}

/**
 * Circuit breaker that stops dispatching to a consistently failing dependency
 *
 * States:
 * - Closed: operations pass through, consecutive failures are counted
 * - Open: calls are rejected until resetTimeoutMs has passed since the last failure
 * - Half-Open: up to halfOpenMaxCalls trial calls; success closes, failure reopens
 *
 * Every state read-and-update happens synchronously, before or after the
 * awaited operation, so concurrent calls never observe a partial transition.
 */
export class CircuitBreaker {
  private state: CircuitState = 'closed';
  private consecutiveFailures = 0;
  private lastFailureTime: number | undefined = undefined;
  private halfOpenCallsInFlight = 0;

  private failureCount = 0;
  private successCount = 0;
  private rejectedCount = 0;
  private stateChanges = 0;
  private lastStateChange = Date.now();

  private readonly config: CircuitBreakerConfig;
  private readonly hooks: CircuitBreakerHook[] = [];
  private readonly logger: Logger;
  readonly name: string;

  constructor(config: CircuitBreakerConfigInput = {}, options: CircuitBreakerOptions = {}) {
    this.config = Object.freeze(parseConfig(circuitBreakerConfigSchema, config, 'circuit breaker'));
    this.name = options.name ?? 'default';
    this.logger = (options.logger ?? new NoopLogger()).child({ breaker: this.name });

    this.logger.info('circuit_breaker_initialized', {
      threshold: this.config.threshold,
      resetTimeoutMs: this.config.resetTimeoutMs,
      halfOpenMaxCalls: this.config.halfOpenMaxCalls,
    });
  }

  /**
   * Add a hook to be called on state changes
   */
  addHook(hook: CircuitBreakerHook): void {
    this.hooks.push(hook);
  }

  /**
   * Execute an operation through the circuit breaker
   * @throws CircuitOpenError if the breaker refuses to dispatch
   * @throws The operation's own error, unchanged
   */
  async call<T>(operation: () => Promise<T>): Promise<T> {
    const admittedAs = this.admit();

    let result: T;
    try {
      result = await operation();
    } catch (error) {
      this.onFailure(admittedAs);
      throw error;
    }

    this.onSuccess(admittedAs);
    return result;
  }

  getState(): CircuitState {
    return this.state;
  }

  getConsecutiveFailures(): number {
    return this.consecutiveFailures;
  }

  getConfig(): CircuitBreakerConfig {
    return this.config;
  }

  getStats(): CircuitBreakerStats {
    return {
      name: this.name,
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      failureCount: this.failureCount,
      successCount: this.successCount,
      rejectedCount: this.rejectedCount,
      stateChanges: this.stateChanges,
      lastFailureTime: this.lastFailureTime,
      lastStateChange: this.lastStateChange,
      timeUntilHalfOpenMs: this.getTimeUntilHalfOpen(),
      config: this.config,
    };
  }

  resetStats(): void {
    this.failureCount = 0;
    this.successCount = 0;
    this.rejectedCount = 0;
    this.stateChanges = 0;
  }

  /**
   * Administrative override back to the closed state
   */
  reset(): void {
    this.consecutiveFailures = 0;
    this.lastFailureTime = undefined;
    this.halfOpenCallsInFlight = 0;
    if (this.state !== 'closed') {
      this.transitionTo('closed');
    }
    this.logger.info('circuit_breaker_reset');
  }

  /**
   * Decide whether a call may be dispatched and reserve a half-open slot if so
   */
  private admit(): CircuitState {
    if (this.state === 'open' && this.shouldAttemptReset()) {
      this.transitionTo('half_open');
    }

    if (this.state === 'open') {
      this.rejectedCount++;
      this.logger.warn('circuit_breaker_rejected', {
        state: this.state,
        consecutiveFailures: this.consecutiveFailures,
      });
      throw new CircuitOpenError(
        `Circuit breaker is open (failures: ${this.consecutiveFailures})`,
        'open',
        this.getTimeUntilHalfOpen()
      );
    }

    if (this.state === 'half_open') {
      if (this.halfOpenCallsInFlight >= this.config.halfOpenMaxCalls) {
        this.rejectedCount++;
        this.logger.warn('circuit_breaker_rejected', {
          state: this.state,
          halfOpenCallsInFlight: this.halfOpenCallsInFlight,
        });
        throw new CircuitOpenError(
          'Circuit breaker is half-open (max calls reached)',
          'half_open'
        );
      }
      this.halfOpenCallsInFlight++;
    }

    return this.state;
  }

  private onSuccess(admittedAs: CircuitState): void {
    this.successCount++;

    if (this.state === 'half_open' && admittedAs === 'half_open') {
      this.halfOpenCallsInFlight--;
      this.consecutiveFailures = 0;
      this.transitionTo('closed');
    } else if (this.state === 'closed') {
      this.consecutiveFailures = 0;
    }
  }

  private onFailure(admittedAs: CircuitState): void {
    this.failureCount++;
    this.consecutiveFailures++;
    this.lastFailureTime = Date.now();

    if (this.state === 'half_open') {
      if (admittedAs === 'half_open') {
        this.halfOpenCallsInFlight--;
      }
      this.transitionTo('open');
    } else if (this.state === 'closed' && this.consecutiveFailures >= this.config.threshold) {
      this.transitionTo('open');
    }
  }

  private shouldAttemptReset(): boolean {
    if (this.lastFailureTime === undefined) return false;
    return Date.now() - this.lastFailureTime >= this.config.resetTimeoutMs;
  }

  private transitionTo(newState: CircuitState): void {
    const oldState = this.state;
    this.state = newState;
    this.stateChanges++;
    this.lastStateChange = Date.now();

    if (newState === 'half_open') {
      this.halfOpenCallsInFlight = 0;
    }

    if (newState === 'open') {
      this.logger.warn('circuit_breaker_opened', {
        from: oldState,
        consecutiveFailures: this.consecutiveFailures,
        threshold: this.config.threshold,
      });
    } else {
      this.logger.info(newState === 'closed' ? 'circuit_breaker_closed' : 'circuit_breaker_half_open', {
        from: oldState,
      });
    }

    for (const hook of this.hooks) {
      try {
        hook.onStateChange(oldState, newState);
      } catch (error) {
        this.logger.warn('circuit_breaker_hook_failed', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  private getTimeUntilHalfOpen(): number | undefined {
    if (this.state !== 'open' || this.lastFailureTime === undefined) {
      return undefined;
    }
    const remaining = this.config.resetTimeoutMs - (Date.now() - this.lastFailureTime);
    return remaining > 0 ? remaining : 0;
  }
}
