/**
 * Base error type for the resilience layer and the agent built on it
 */

export interface ResilienceErrorOptions {
  type: string;
  message: string;
  status?: number;
  isRetryable?: boolean;
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Base error class for every error raised by this package
 */
export class ResilienceError extends Error {
  public readonly type: string;
  public readonly status?: number;
  public readonly isRetryable: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(options: ResilienceErrorOptions) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ResilienceError';
    this.type = options.type;
    this.status = options.status;
    this.isRetryable = options.isRetryable ?? false;
    this.details = options.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      type: this.type,
      message: this.message,
      status: this.status,
      isRetryable: this.isRetryable,
      details: this.details,
    };
  }
}
