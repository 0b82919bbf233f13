/**
 * Backoff and retry tests
 *
 * - Delays grow geometrically, are capped, and stay inside the jitter band
 * - Retryable errors are retried up to the attempt budget, others are not
 * - Cancellation interrupts both attempts and sleeps
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { calculateBackoffDelay, isRetryableError, retryWithBackoff, sleep } from '../../src/server/utils/retry.js';
import { ServiceConnectionError, ServiceRateLimitError } from '../../src/server/utils/serviceErrors.js';
import { RunCancelledError } from '../../src/server/types/errors.js';

describe('calculateBackoffDelay', () => {
  const policy = { initialDelay: 2000, multiplier: 2, maxDelay: 30000 };

  it('doubles the delay per attempt', () => {
    expect(calculateBackoffDelay(0, policy)).toBe(2000);
    expect(calculateBackoffDelay(1, policy)).toBe(4000);
    expect(calculateBackoffDelay(3, policy)).toBe(16000);
  });

  it('caps the delay at maxDelay', () => {
    expect(calculateBackoffDelay(4, policy)).toBe(30000);
    expect(calculateBackoffDelay(10, policy)).toBe(30000);
  });

  it('spreads the delay by the jitter ratio', () => {
    expect(calculateBackoffDelay(0, { ...policy, jitterRatio: 0.2, random: () => 0 })).toBe(1600);
    expect(calculateBackoffDelay(0, { ...policy, jitterRatio: 0.2, random: () => 0.75 })).toBe(2200);
  });

  it('never exceeds maxDelay after jitter', () => {
    expect(calculateBackoffDelay(4, { ...policy, jitterRatio: 0.2, random: () => 0.99 })).toBe(30000);
  });
});

describe('retryWithBackoff', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('retries transient failures until the operation succeeds', async () => {
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new ServiceConnectionError('OpenAI', 503, 'unavailable'))
      .mockRejectedValueOnce(new ServiceConnectionError('OpenAI', 502, 'bad gateway'))
      .mockResolvedValue('done');

    const result = await retryWithBackoff(operation, { maxAttempts: 5, initialDelay: 0 });

    expect(result).toBe('done');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(operation.mock.calls.map(([attempt]) => attempt)).toEqual([0, 1, 2]);
  });

  it('rethrows a non-retryable error without retrying', async () => {
    const error = new ServiceConnectionError('OpenAI', 400, 'bad request');
    const operation = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(error);

    await expect(retryWithBackoff(operation, { maxAttempts: 5, initialDelay: 0 })).rejects.toBe(error);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('uses exactly maxAttempts attempts before giving up', async () => {
    const error = new ServiceConnectionError('OpenAI', 503, 'unavailable');
    const operation = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(error);

    await expect(retryWithBackoff(operation, { maxAttempts: 3, initialDelay: 0 })).rejects.toBe(error);
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('honours a Retry-After hint', async () => {
    vi.useFakeTimers();
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new ServiceRateLimitError('OpenAI', 2))
      .mockResolvedValue('done');

    const pending = retryWithBackoff(operation, { maxAttempts: 3, initialDelay: 1, maxDelay: 60000 });

    await vi.advanceTimersByTimeAsync(1999);
    expect(operation).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(operation).toHaveBeenCalledTimes(2);
    await expect(pending).resolves.toBe('done');
  });

  it('does not start when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const operation = vi.fn<(attempt: number) => Promise<string>>().mockResolvedValue('done');

    await expect(retryWithBackoff(operation, { signal: controller.signal })).rejects.toBeInstanceOf(RunCancelledError);
    expect(operation).not.toHaveBeenCalled();
  });

  it('stops sleeping when the signal aborts', async () => {
    const controller = new AbortController();
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValue(new ServiceConnectionError('OpenAI', 503, 'unavailable'));

    const pending = retryWithBackoff(operation, {
      maxAttempts: 5,
      initialDelay: 60000,
      signal: controller.signal,
    });
    setTimeout(() => controller.abort(), 10);

    await expect(pending).rejects.toBeInstanceOf(RunCancelledError);
    expect(operation).toHaveBeenCalledTimes(1);
  });
});

describe('sleep', () => {
  it('rejects with RunCancelledError on abort', async () => {
    const controller = new AbortController();
    const pending = sleep(60000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(RunCancelledError);
  });
});

describe('isRetryableError', () => {
  it('treats throttling, timeouts and server errors as transient', () => {
    expect(isRetryableError({ statusCode: 429 })).toBe(true);
    expect(isRetryableError({ statusCode: 408 })).toBe(true);
    expect(isRetryableError({ statusCode: 503 })).toBe(true);
    expect(isRetryableError(new ServiceRateLimitError('OpenAI'))).toBe(true);
    expect(isRetryableError({ code: 'ECONNRESET' })).toBe(true);
    expect(isRetryableError(new Error('socket timeout'))).toBe(true);
  });

  it('treats other client errors as permanent', () => {
    expect(isRetryableError({ statusCode: 400 })).toBe(false);
    expect(isRetryableError({ statusCode: 404 })).toBe(false);
    expect(isRetryableError(new Error('invalid prompt'))).toBe(false);
  });
});
