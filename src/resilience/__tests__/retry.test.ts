/**
 * Tests for RetryExecutor
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { RetryExecutor, computeRetryDelay, createRetryPolicy, retryable, withRetry } from '../retry.js';
import {
  ConfigurationError,
  PermanentFailureError,
  RetryExhaustedError,
  TransientFailureError,
} from '../../errors/index.js';
import { InMemoryLogger } from '../../observability/index.js';

const noJitter = { jitterFraction: 0 };

describe('RetryExecutor', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should succeed on first attempt', async () => {
    const operation = vi.fn().mockResolvedValue(42);
    const executor = new RetryExecutor();

    await expect(executor.run(operation)).resolves.toBe(42);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(executor.getStats().totalAttempts).toBe(0);
  });

  it('should make exactly maxRetries + 1 attempts before giving up', async () => {
    const error = new TransientFailureError('Service unavailable', { status: 503 });
    const operation = vi.fn().mockRejectedValue(error);
    const executor = new RetryExecutor({ policy: { maxRetries: 3, initialDelayMs: 10, ...noJitter } });

    const promise = executor.run(operation);
    const assertion = expect(promise).rejects.toMatchObject({
      name: 'RetryExhaustedError',
      attempts: 4,
      cause: error,
    });
    await vi.advanceTimersByTimeAsync(1000);
    await assertion;

    expect(operation).toHaveBeenCalledTimes(4);
  });

  it('should raise RetryExhaustedError even without retries', async () => {
    const operation = vi.fn().mockRejectedValue(new TransientFailureError('timeout'));
    const executor = new RetryExecutor({ policy: { maxRetries: 0 } });

    await expect(executor.run(operation)).rejects.toBeInstanceOf(RetryExhaustedError);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should not retry non-retriable errors', async () => {
    const error = new PermanentFailureError('Invalid request', { status: 400 });
    const operation = vi.fn().mockRejectedValue(error);
    const logger = new InMemoryLogger();
    const executor = new RetryExecutor({ logger });

    await expect(executor.run(operation)).rejects.toBe(error);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(logger.getMessages()).toEqual(['retry_non_retriable_error']);
    expect(executor.getStats().failedAfterRetries).toBe(1);
  });

  it('should back off exponentially between attempts', async () => {
    const operation = vi
      .fn()
      .mockRejectedValueOnce(new TransientFailureError('flaky'))
      .mockRejectedValueOnce(new TransientFailureError('flaky'))
      .mockResolvedValueOnce('ok');
    const onRetry = vi.fn();
    const executor = new RetryExecutor({
      policy: { maxRetries: 2, initialDelayMs: 50, ...noJitter },
      onRetry,
    });

    const promise = executor.run(operation);

    await vi.advanceTimersByTimeAsync(49);
    expect(operation).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(operation).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(99);
    expect(operation).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(1);

    await expect(promise).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(onRetry.mock.calls.map((call) => [call[1], call[2]])).toEqual([
      [1, 50],
      [2, 100],
    ]);
  });

  it('should never wait longer than maxDelayMs', async () => {
    const delays: number[] = [];
    const executor = new RetryExecutor({
      policy: { maxRetries: 3, initialDelayMs: 100, maxDelayMs: 250, multiplier: 10, ...noJitter },
      onRetry: (_error, _attempt, delayMs) => delays.push(delayMs),
    });

    const promise = executor.run(() => Promise.reject(new TransientFailureError('down')));
    const assertion = expect(promise).rejects.toBeInstanceOf(RetryExhaustedError);
    await vi.advanceTimersByTimeAsync(1000);
    await assertion;

    expect(delays).toEqual([100, 250, 250]);
  });

  it('should keep retrying when the retry callback throws', async () => {
    const logger = new InMemoryLogger();
    const operation = vi
      .fn()
      .mockRejectedValueOnce(new TransientFailureError('flaky'))
      .mockResolvedValueOnce('recovered');
    const executor = new RetryExecutor({
      policy: { initialDelayMs: 10, ...noJitter },
      logger,
      onRetry: () => {
        throw new Error('observer broke');
      },
    });

    const promise = executor.run(operation);
    await vi.advanceTimersByTimeAsync(10);

    await expect(promise).resolves.toBe('recovered');
    expect(logger.getMessages()).toEqual(['retry_attempt', 'retry_callback_failed']);
    expect(logger.getEntriesByLevel('warn')[0]?.context).toEqual({
      error: 'observer broke',
      errorType: 'Error',
    });
  });

  it('should honour a custom classifier', async () => {
    const operation = vi.fn().mockRejectedValue(new Error('anything'));
    const executor = new RetryExecutor({ policy: { maxRetries: 1, initialDelayMs: 5 }, classify: () => true });

    const promise = executor.run(operation);
    const assertion = expect(promise).rejects.toBeInstanceOf(RetryExhaustedError);
    await vi.advanceTimersByTimeAsync(100);
    await assertion;

    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('should track stats', async () => {
    const operation = vi
      .fn()
      .mockRejectedValueOnce(new TransientFailureError('flaky'))
      .mockRejectedValueOnce(new TransientFailureError('flaky'))
      .mockResolvedValueOnce('ok');
    const executor = new RetryExecutor({ policy: { maxRetries: 2, initialDelayMs: 50, ...noJitter } });

    const promise = executor.run(operation);
    await vi.advanceTimersByTimeAsync(150);
    await promise;

    expect(executor.getStats()).toEqual({
      totalAttempts: 2,
      successfulRetries: 1,
      failedAfterRetries: 0,
      totalDelayMs: 150,
      maxDelayMs: 100,
      avgDelayMs: 75,
      successRate: 50,
    });

    executor.resetStats();
    expect(executor.getStats().totalAttempts).toBe(0);
  });

  it('should reject an invalid policy at construction', () => {
    expect(() => new RetryExecutor({ policy: { initialDelayMs: 0 } })).toThrow(ConfigurationError);
    expect(() => new RetryExecutor({ policy: { initialDelayMs: 5000, maxDelayMs: 1000 } })).toThrow(
      ConfigurationError
    );
  });
});

describe('computeRetryDelay', () => {
  const policy = createRetryPolicy({ initialDelayMs: 1000, maxDelayMs: 30000, jitterFraction: 0.1 });

  it('should spread the delay by up to the jitter fraction', () => {
    expect(computeRetryDelay(1000, policy, () => 0)).toBe(900);
    expect(computeRetryDelay(1000, policy, () => 0.5)).toBe(1000);
    expect(computeRetryDelay(1000, policy, () => 0.75)).toBe(1050);
  });

  it('should cap jittered delays at maxDelayMs', () => {
    expect(computeRetryDelay(30000, policy, () => 0.99)).toBe(30000);
  });

  it('should freeze the policy', () => {
    expect(Object.isFrozen(policy)).toBe(true);
  });
});

describe('withRetry', () => {
  it('should run a single operation', async () => {
    await expect(withRetry(async () => 'done')).resolves.toBe('done');
  });
});

describe('retryable', () => {
  it('should wrap a function and forward its arguments', async () => {
    const fn = vi
      .fn<(a: number, b: number) => Promise<number>>()
      .mockRejectedValueOnce(new TransientFailureError('flaky'))
      .mockImplementation(async (a, b) => a + b);
    const add = retryable(fn, { policy: { initialDelayMs: 1, ...noJitter } });

    await expect(add(2, 3)).resolves.toBe(5);
    expect(fn).toHaveBeenCalledTimes(2);
    expect(fn).toHaveBeenLastCalledWith(2, 3);
  });
});
