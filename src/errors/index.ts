export { ResilienceError, type ResilienceErrorOptions } from './error.js';
export {
  ConfigurationError,
  TransientFailureError,
  PermanentFailureError,
  RetryExhaustedError,
  CircuitOpenError,
  RateLimitTimeoutError,
  ServiceUnavailableError,
  SERVICE_UNAVAILABLE_MESSAGE,
} from './categories.js';
export {
  isRetriableError,
  classifyFailure,
  settle,
  RETRIABLE_STATUS_CODES,
  type ErrorClassifier,
  type Outcome,
} from './classify.js';
