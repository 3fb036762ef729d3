/**
 * Failure classification
 *
 * Classification is a pure mapping from an error value to a retry decision,
 * independent of where the error was thrown.
 */

import { ResilienceError } from './error.js';

/**
 * Decides whether an error may be retried
 */
export type ErrorClassifier = (error: unknown) => boolean;

/**
 * Result of a single attempt
 */
export type Outcome<T> =
  | { readonly kind: 'ok'; readonly value: T }
  | { readonly kind: 'transient'; readonly error: unknown }
  | { readonly kind: 'permanent'; readonly error: unknown };

export const RETRIABLE_STATUS_CODES: ReadonlySet<number> = new Set([429, 502, 503, 504]);

const RETRIABLE_ERROR_CODES: ReadonlySet<string> = new Set([
  'ETIMEDOUT',
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_SOCKET',
]);

const TIMEOUT_ERROR_NAMES: ReadonlySet<string> = new Set(['TimeoutError', 'AbortError']);

const MAX_CAUSE_DEPTH = 5;

function readProperty(value: object, key: string): unknown {
  return key in value ? Reflect.get(value, key) : undefined;
}

function statusOf(error: object): number | undefined {
  for (const key of ['status', 'statusCode']) {
    const status = readProperty(error, key);
    if (typeof status === 'number') {
      return status;
    }
  }
  const response = readProperty(error, 'response');
  if (typeof response === 'object' && response !== null) {
    const status = readProperty(response, 'status');
    if (typeof status === 'number') {
      return status;
    }
  }
  return undefined;
}

/**
 * Default classification: timeouts, connection failures and HTTP
 * 429/502/503/504 are retriable, everything else is not.
 */
export function isRetriableError(error: unknown): boolean {
  let current: unknown = error;

  for (let depth = 0; depth < MAX_CAUSE_DEPTH; depth++) {
    if (typeof current !== 'object' || current === null) {
      return false;
    }

    // Our own errors carry an explicit decision
    if (current instanceof ResilienceError) {
      return current.isRetryable;
    }

    const status = statusOf(current);
    if (status !== undefined) {
      return RETRIABLE_STATUS_CODES.has(status);
    }

    const code = readProperty(current, 'code');
    if (typeof code === 'string' && RETRIABLE_ERROR_CODES.has(code)) {
      return true;
    }

    if (current instanceof Error && TIMEOUT_ERROR_NAMES.has(current.name)) {
      return true;
    }

    // fetch wraps socket errors: TypeError('fetch failed', { cause })
    current = readProperty(current, 'cause');
  }

  return false;
}

/**
 * Turn a thrown value into an explicit outcome
 */
export function classifyFailure<T>(error: unknown, classify: ErrorClassifier): Outcome<T> {
  return classify(error) ? { kind: 'transient', error } : { kind: 'permanent', error };
}

/**
 * Run an operation and report its outcome instead of throwing
 */
export async function settle<T>(
  operation: () => Promise<T>,
  classify: ErrorClassifier
): Promise<Outcome<T>> {
  try {
    return { kind: 'ok', value: await operation() };
  } catch (error) {
    return classifyFailure<T>(error, classify);
  }
}
