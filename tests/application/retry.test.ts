import { describe, it, expect, vi } from 'vitest';
import {
  RetryExhaustedError,
  StorageUnavailableError,
  TransactionConflictError,
} from '../../src/domain/index.js';
import { DEFAULT_RETRY_POLICY, sleepUntilAborted, withRetry } from '../../src/application/index.js';
import { FAST_RETRY, fakeLogger } from '../helpers.js';

describe('withRetry', () => {
  it('returns the first successful result without sleeping', async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);
    const op = vi.fn().mockResolvedValue('ok');

    const result = await withRetry(op, { ...FAST_RETRY, sleep }, fakeLogger(), { operation: 'test' });

    expect(result).toBe('ok');
    expect(op).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('retries retryable failures and reports each attempt', async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);
    const attempts: number[] = [];
    const op = vi.fn()
      .mockRejectedValueOnce(new TransactionConflictError('conflict'))
      .mockRejectedValueOnce(new TransactionConflictError('conflict'))
      .mockResolvedValueOnce(42);
    const log = fakeLogger();

    const result = await withRetry(
      op,
      { ...FAST_RETRY, sleep, onAttempt: (n) => attempts.push(n) },
      log,
      { operation: 'merge', batch_id: 7 },
    );

    expect(result).toBe(42);
    expect(attempts).toEqual([1, 2, 3]);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenNthCalledWith(1, FAST_RETRY.initialDelayMs);
    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ operation: 'merge', batch_id: 7, attempt: 1, maxAttempts: 3 }),
      'Retry attempt 1/3 failed for merge',
    );
  });

  it('never waits longer than maxDelayMs', async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);
    const op = vi.fn().mockRejectedValue(new TransactionConflictError('conflict'));

    await expect(
      withRetry(
        op,
        { maxAttempts: 6, initialDelayMs: 10, maxDelayMs: 25, backoffMultiplier: 2, sleep },
        fakeLogger(),
        { operation: 'merge' },
      ),
    ).rejects.toBeInstanceOf(RetryExhaustedError);

    const delays = sleep.mock.calls.map(([ms]) => Number(ms));
    expect(delays).toHaveLength(5);
    expect(delays[0]).toBe(10);
    expect(Math.max(...delays)).toBeLessThanOrEqual(25);
    expect(delays.at(-1)).toBe(25);
  });

  it('wraps the last retryable failure in RetryExhaustedError', async () => {
    const last = new TransactionConflictError('still conflicting');
    const op = vi.fn().mockRejectedValue(last);

    const err: unknown = await withRetry(
      op,
      { ...FAST_RETRY, sleep: () => Promise.resolve() },
      fakeLogger(),
      { operation: 'merge' },
    ).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RetryExhaustedError);
    expect(err).toMatchObject({ operation: 'merge', attempts: 3, cause: last });
    expect(op).toHaveBeenCalledTimes(3);
  });

  it('rethrows non-retryable failures immediately', async () => {
    const outage = new StorageUnavailableError('down');
    const op = vi.fn().mockRejectedValue(outage);

    await expect(
      withRetry(op, { ...FAST_RETRY, sleep: () => Promise.resolve() }, fakeLogger(), { operation: 'merge' }),
    ).rejects.toBe(outage);
    expect(op).toHaveBeenCalledTimes(1);
  });

  it('honours a custom retryable predicate', async () => {
    const op = vi.fn()
      .mockRejectedValueOnce(new Error('plain'))
      .mockResolvedValueOnce('done');

    const result = await withRetry(
      op,
      { ...FAST_RETRY, retryable: () => true, sleep: () => Promise.resolve() },
      fakeLogger(),
      { operation: 'append' },
    );

    expect(result).toBe('done');
  });

  it('ships a bounded default policy', () => {
    expect(DEFAULT_RETRY_POLICY.maxAttempts).toBeGreaterThan(1);
    expect(DEFAULT_RETRY_POLICY.initialDelayMs).toBeLessThan(DEFAULT_RETRY_POLICY.maxDelayMs);
  });
});

describe('sleepUntilAborted', () => {
  it('resolves early when the signal aborts', async () => {
    vi.useFakeTimers();
    try {
      const controller = new AbortController();
      let done = false;
      const pending = sleepUntilAborted(60_000, controller.signal).then(() => { done = true; });

      controller.abort();
      await pending;

      expect(done).toBe(true);
    } finally {
      vi.useRealTimers();
    }
  });

  it('resolves after the delay when not aborted', async () => {
    vi.useFakeTimers();
    try {
      const controller = new AbortController();
      let done = false;
      const pending = sleepUntilAborted(1000, controller.signal).then(() => { done = true; });

      await vi.advanceTimersByTimeAsync(999);
      expect(done).toBe(false);
      await vi.advanceTimersByTimeAsync(1);
      await pending;
      expect(done).toBe(true);
    } finally {
      vi.useRealTimers();
    }
  });
});
