/**
 * Resilience patterns: retry, circuit breaker, rate limiting and their composition
 */

export {
  CircuitBreaker,
  type CircuitState,
  type CircuitBreakerHook,
  type CircuitBreakerOptions,
  type CircuitBreakerStats,
} from './circuit-breaker.js';
export {
  RetryExecutor,
  withRetry,
  retryable,
  createRetryPolicy,
  computeRetryDelay,
  nextBaseDelay,
  type RetryCallback,
  type RetryOptions,
  type RetryStats,
} from './retry.js';
export { TokenBucketLimiter, type RateLimitStats } from './rate-limiter.js';
export {
  ResiliencePipeline,
  formatDiagnostics,
  type ResiliencePipelineOptions,
  type ExecuteOptions,
  type PipelineResult,
  type ResilienceDiagnostics,
} from './orchestrator.js';
export {
  ResilienceRegistry,
  type ResilienceRegistryOptions,
  type RegistryStats,
} from './registry.js';
