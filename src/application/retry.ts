import type { Logger } from 'pino';
import { RetryExhaustedError, isRetryable } from '../domain/index.js';

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

export interface RetryOptions extends RetryPolicy {
  /** Decides whether a failure is worth another attempt. Defaults to the error's own `retryable` flag. */
  retryable?: (err: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  onAttempt?: (attempt: number) => void;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  initialDelayMs: 200,
  maxDelayMs: 10_000,
  backoffMultiplier: 2,
};

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Sleeps for `ms` or until `signal` aborts, whichever comes first.
 * Resolves (never rejects) on abort; callers check `signal.aborted`.
 */
export function sleepUntilAborted(ms: number, signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    }
    signal.addEventListener('abort', done, { once: true });
  });
}

/**
 * Runs `operation` with bounded exponential backoff and jitter.
 *
 * Non-retryable failures are rethrown unchanged. A retryable failure on
 * the last attempt is wrapped in RetryExhaustedError with the failure as `cause`.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  options: RetryOptions,
  log: Logger,
  context: { operation: string; batch_id?: number },
): Promise<T> {
  const retryable = options.retryable ?? isRetryable;
  const wait = options.sleep ?? sleep;
  let delay = options.initialDelayMs;

  for (let attempt = 1; ; attempt++) {
    options.onAttempt?.(attempt);
    try {
      return await operation();
    } catch (err: unknown) {
      if (!retryable(err)) throw err;
      if (attempt >= options.maxAttempts) {
        throw new RetryExhaustedError(context.operation, attempt, { cause: err });
      }

      log.warn(
        { err, ...context, attempt, maxAttempts: options.maxAttempts, nextRetryDelayMs: Math.round(delay) },
        `Retry attempt ${attempt}/${options.maxAttempts} failed for ${context.operation}`,
      );

      await wait(delay);

      delay = Math.min(
        delay * options.backoffMultiplier * (1 + Math.random() * 0.1),
        options.maxDelayMs,
      );
    }
  }
}
