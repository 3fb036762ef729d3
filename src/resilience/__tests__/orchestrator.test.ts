/**
 * Tests for ResiliencePipeline and the composed behaviour of its layers
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ResiliencePipeline, formatDiagnostics } from '../orchestrator.js';
import { CircuitBreaker } from '../circuit-breaker.js';
import { RetryExecutor } from '../retry.js';
import { TokenBucketLimiter } from '../rate-limiter.js';
import { ResponseCache } from '../../cache/index.js';
import {
  CircuitOpenError,
  RateLimitTimeoutError,
  RetryExhaustedError,
  TransientFailureError,
} from '../../errors/index.js';

describe('retry with circuit breaker', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should recover after two transient failures with 50ms and 100ms backoff', async () => {
    const delays: number[] = [];
    const operation = vi
      .fn()
      .mockRejectedValueOnce(new TransientFailureError('connection reset'))
      .mockRejectedValueOnce(new TransientFailureError('connection reset'))
      .mockResolvedValueOnce('answer');
    const executor = new RetryExecutor({
      policy: { maxRetries: 2, initialDelayMs: 50, jitterFraction: 0 },
      breaker: new CircuitBreaker(),
      onRetry: (_error, _attempt, delayMs) => delays.push(delayMs),
    });

    const promise = executor.run(operation);
    await vi.advanceTimersByTimeAsync(150);

    await expect(promise).resolves.toBe('answer');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([50, 100]);
  });

  it('should open the breaker during retries and then reject without invoking', async () => {
    const operation = vi.fn().mockRejectedValue(new TransientFailureError('Service unavailable', { status: 503 }));
    const breaker = new CircuitBreaker({ threshold: 2, resetTimeoutMs: 60_000 });
    const executor = new RetryExecutor({
      policy: { maxRetries: 1, initialDelayMs: 10, jitterFraction: 0 },
      breaker,
    });

    const first = executor.run(operation);
    const firstAssertion = expect(first).rejects.toBeInstanceOf(RetryExhaustedError);
    await vi.advanceTimersByTimeAsync(10);
    await firstAssertion;

    expect(operation).toHaveBeenCalledTimes(2);
    expect(breaker.getState()).toBe('open');

    operation.mockClear();
    await expect(executor.run(operation)).rejects.toBeInstanceOf(CircuitOpenError);
    expect(operation).not.toHaveBeenCalled();
  });
});

describe('ResiliencePipeline', () => {
  let cache: ResponseCache<string>;
  let limiter: TokenBucketLimiter;
  let breaker: CircuitBreaker;
  let retry: RetryExecutor;

  beforeEach(() => {
    vi.useFakeTimers();
    cache = new ResponseCache<string>({ maxEntries: 10 });
    limiter = new TokenBucketLimiter({ requestsPerMinute: 60 });
    breaker = new CircuitBreaker();
    retry = new RetryExecutor({ policy: { initialDelayMs: 10, jitterFraction: 0 }, breaker });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should serve a repeated payload from the cache without dispatching', async () => {
    const pipeline = new ResiliencePipeline({ retry, cache, limiter });
    const operation = vi.fn().mockResolvedValue('reply');

    await expect(pipeline.run('hello', operation)).resolves.toMatchObject({ value: 'reply', cached: false });
    await expect(pipeline.run('hello', operation)).resolves.toMatchObject({ value: 'reply', cached: true });

    expect(operation).toHaveBeenCalledTimes(1);
    expect(limiter.getStats().totalRequests).toBe(1);
    expect(breaker.getStats().successCount).toBe(1);
  });

  it('should bypass the cache when asked', async () => {
    const pipeline = new ResiliencePipeline({ retry, cache });
    const operation = vi.fn().mockResolvedValue('reply');

    await pipeline.execute('hello', operation, { useCache: false });
    await pipeline.execute('hello', operation, { useCache: false });

    expect(operation).toHaveBeenCalledTimes(2);
    expect(cache.size).toBe(0);
  });

  it('should not cache failures', async () => {
    const pipeline = new ResiliencePipeline({ retry, cache });
    const error = new Error('validation failed');

    await expect(pipeline.execute('hello', () => Promise.reject(error))).rejects.toBe(error);
    expect(cache.size).toBe(0);
  });

  it('should fail with RateLimitTimeoutError when no token arrives before the deadline', async () => {
    const drained = new TokenBucketLimiter({ requestsPerMinute: 60, burstCapacity: 1 });
    drained.tryAcquire();
    const pipeline = new ResiliencePipeline({ retry, limiter: drained, acquireTimeoutMs: 100 });
    const operation = vi.fn().mockResolvedValue('reply');

    await expect(pipeline.execute('hello', operation)).rejects.toBeInstanceOf(RateLimitTimeoutError);
    expect(operation).not.toHaveBeenCalled();
  });

  it('should wait for a token when no deadline is configured', async () => {
    const drained = new TokenBucketLimiter({ requestsPerMinute: 60, burstCapacity: 1 });
    drained.tryAcquire();
    const pipeline = new ResiliencePipeline({ retry, limiter: drained });

    const pending = pipeline.execute('hello', async () => 'reply');
    await vi.advanceTimersByTimeAsync(1000);

    await expect(pending).resolves.toBe('reply');
  });

  it('should expose the breaker of its retry executor', () => {
    const pipeline = new ResiliencePipeline({ retry });
    expect(pipeline.getCircuitBreaker()).toBe(breaker);
    expect(pipeline.getCache()).toBeUndefined();
  });

  it('should aggregate and reset diagnostics', async () => {
    const pipeline = new ResiliencePipeline({ retry, cache, limiter });
    await pipeline.execute('a', async () => 'A');
    await pipeline.execute('a', async () => 'A');

    expect(formatDiagnostics(pipeline.getDiagnostics())).toEqual([
      'retry: failedAttempts=0 recovered=0 exhausted=0 successRate=0.0%',
      'circuit_breaker: state=closed failures=0 rejected=0',
      'rate_limiter: requests=1 throttled=0 throttleRate=0.0%',
      'cache: size=1/10 hits=1 misses=1 hitRate=50.0%',
    ]);

    pipeline.resetStats();
    const diagnostics = pipeline.getDiagnostics();
    expect(diagnostics.cache).toMatchObject({ hits: 0, misses: 0, size: 1 });
    expect(diagnostics.rateLimiter?.totalRequests).toBe(0);
    expect(diagnostics.circuitBreaker?.successCount).toBe(0);
  });
});
