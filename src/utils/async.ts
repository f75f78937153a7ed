/**
 * Async utility functions
 */

import { CancelledError } from '../errors.js';

/**
 * Throw a CancelledError when the signal has already fired.
 * @param signal Optional abort signal
 * @param operation Name of the operation, recorded in the error context
 */
export function throwIfAborted(signal: AbortSignal | undefined, operation?: string): void {
  if (signal?.aborted) {
    throw new CancelledError(`Operation ${operation ?? 'request'} was cancelled`, { operation }, signal.reason);
  }
}

/**
 * Sleep for the specified duration; rejects with CancelledError if the signal fires first.
 * @param ms Duration in milliseconds
 * @param signal Optional abort signal
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError('Sleep was cancelled', {}, signal.reason));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError('Sleep was cancelled', {}, signal?.reason));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Delay before the next attempt: base * 2^attempt, capped.
 * @param attempt Current attempt number (0-indexed)
 * @param baseMs Base delay in milliseconds (default: 100)
 * @param maxMs Maximum delay in milliseconds (default: 10000)
 */
export function backoffDelay(attempt: number, baseMs = 100, maxMs = 10000): number {
  return Math.min(Math.pow(2, attempt) * baseMs, maxMs);
}

export interface RetryOptions {
  /** Maximum number of attempts, including the first (default: 3) */
  attempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Errors for which this returns false are rethrown immediately. */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  signal?: AbortSignal;
}

export class RetryExhaustedError extends Error {
  constructor(public readonly attempts: number, public readonly lastError: unknown) {
    super(`Gave up after ${attempts} attempt(s)`, { cause: lastError });
    this.name = 'RetryExhaustedError';
  }
}

/**
 * Retry an async operation with exponential backoff.
 *
 * Non-retryable errors and cancellation propagate as they are; when every
 * attempt failed with a retryable error a RetryExhaustedError wraps the last one.
 */
export async function retry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const attempts = Math.max(1, Math.floor(options.attempts ?? 3));
  const baseMs = options.baseDelayMs ?? 100;
  const maxMs = options.maxDelayMs ?? 10000;
  const shouldRetry = options.shouldRetry ?? (() => true);

  let lastError: unknown;
  for (let attempt = 0; attempt < attempts; attempt++) {
    throwIfAborted(options.signal);
    try {
      return await fn(attempt);
    } catch (e) {
      if (e instanceof CancelledError || !shouldRetry(e, attempt)) {
        throw e;
      }
      lastError = e;
      if (attempt < attempts - 1) {
        const delay = backoffDelay(attempt, baseMs, maxMs);
        options.onRetry?.(e, attempt, delay);
        await sleep(delay, options.signal);
      }
    }
  }
  throw new RetryExhaustedError(attempts, lastError);
}

export interface Deadline {
  signal: AbortSignal | undefined;
  /** Detach listeners and clear the timer. Safe to call more than once. */
  release(): void;
}

/**
 * Combine a caller's signal with an optional timeout into one signal.
 * @param signal Caller-supplied abort signal
 * @param timeoutMs Timeout in milliseconds; no timer when omitted
 */
export function withDeadline(signal?: AbortSignal, timeoutMs?: number): Deadline {
  if (timeoutMs === undefined || timeoutMs <= 0) {
    return { signal, release: () => {} };
  }

  const controller = new AbortController();
  const onAbort = () => controller.abort(signal?.reason);
  const timer = setTimeout(() => {
    controller.abort(new Error(`Timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  if (signal?.aborted) {
    controller.abort(signal.reason);
  } else {
    signal?.addEventListener('abort', onAbort, { once: true });
  }

  return {
    signal: controller.signal,
    release: () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  };
}
