import { ResilienceError } from './error.js';

/**
 * Error thrown when configuration values are invalid
 */
export class ConfigurationError extends ResilienceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      type: 'configuration_error',
      message,
      isRetryable: false,
      details,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * A failure that is expected to clear up on its own (network, timeout, 5xx-class)
 */
export class TransientFailureError extends ResilienceError {
  constructor(
    message: string,
    options?: { status?: number; cause?: unknown; details?: Record<string, unknown> }
  ) {
    super({
      type: 'transient_failure',
      message,
      status: options?.status,
      isRetryable: true,
      details: options?.details,
      cause: options?.cause,
    });
    this.name = 'TransientFailureError';
  }
}

/**
 * A failure the caller has to fix (validation, auth, 4xx other than 429)
 */
export class PermanentFailureError extends ResilienceError {
  constructor(
    message: string,
    options?: { status?: number; cause?: unknown; details?: Record<string, unknown> }
  ) {
    super({
      type: 'permanent_failure',
      message,
      status: options?.status,
      isRetryable: false,
      details: options?.details,
      cause: options?.cause,
    });
    this.name = 'PermanentFailureError';
  }
}

/**
 * Error thrown when every allowed attempt failed with a retriable error.
 * The last underlying error is available as `cause`.
 */
export class RetryExhaustedError extends ResilienceError {
  public readonly attempts: number;

  constructor(attempts: number, lastError: unknown) {
    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    super({
      type: 'retry_exhausted',
      message: `Failed after ${attempts} attempts: ${reason}`,
      isRetryable: false,
      details: { attempts },
      cause: lastError,
    });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
  }
}

/**
 * Error thrown when the circuit breaker refuses to dispatch an operation
 */
export class CircuitOpenError extends ResilienceError {
  public readonly state: 'open' | 'half_open';
  public readonly retryAfterMs?: number;

  constructor(message: string, state: 'open' | 'half_open', retryAfterMs?: number) {
    super({
      type: 'circuit_open',
      message,
      isRetryable: false,
      details: { state, retryAfterMs },
    });
    this.name = 'CircuitOpenError';
    this.state = state;
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * Error thrown when the rate limiter cannot grant a token before the deadline
 */
export class RateLimitTimeoutError extends ResilienceError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super({
      type: 'rate_limit_timeout',
      message: `Rate limit timeout exceeded (${timeoutMs}ms)`,
      isRetryable: false,
      details: { timeoutMs },
    });
    this.name = 'RateLimitTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export const SERVICE_UNAVAILABLE_MESSAGE =
  'The assistant is temporarily unavailable, please try again shortly.';

/**
 * User-facing error the agent raises in place of breaker, retry and rate-limit failures
 */
export class ServiceUnavailableError extends ResilienceError {
  constructor(cause: unknown) {
    super({
      type: 'service_unavailable',
      message: SERVICE_UNAVAILABLE_MESSAGE,
      status: 503,
      isRetryable: false,
      cause,
    });
    this.name = 'ServiceUnavailableError';
  }
}
