import { describe, expect, it, vi } from 'vitest';
import { backoffDelay, retry, RetryExhaustedError, sleep, throwIfAborted, withDeadline } from '../../utils/async.js';
import { CancelledError } from '../../errors.js';

describe('async utils', () => {
  it('should double the backoff delay up to the cap', () => {
    expect(backoffDelay(0, 100)).toBe(100);
    expect(backoffDelay(3, 100)).toBe(800);
    expect(backoffDelay(10, 100, 5000)).toBe(5000);
  });

  describe('retry', () => {
    it('should retry until the operation succeeds', async () => {
      const fn = vi.fn().mockRejectedValueOnce(new Error('flaky')).mockResolvedValue('done');
      const onRetry = vi.fn();

      await expect(retry(fn, { attempts: 3, baseDelayMs: 0, onRetry })).resolves.toBe('done');
      expect(fn).toHaveBeenCalledTimes(2);
      expect(onRetry).toHaveBeenCalledWith(new Error('flaky'), 0, 0);
    });

    it('should rethrow errors that are not worth retrying', async () => {
      const fn = vi.fn().mockRejectedValue(new Error('fatal'));

      await expect(retry(fn, { baseDelayMs: 0, shouldRetry: () => false })).rejects.toThrow('fatal');
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should wrap the last error once attempts run out', async () => {
      const fn = vi.fn().mockRejectedValue(new Error('still down'));

      const error = await retry(fn, { attempts: 2, baseDelayMs: 0 }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RetryExhaustedError);
      expect(error).toMatchObject({ attempts: 2, message: 'Gave up after 2 attempt(s)' });
      expect(fn).toHaveBeenCalledTimes(2);
    });

    it('should never retry a cancellation', async () => {
      const fn = vi.fn().mockRejectedValue(new CancelledError());

      await expect(retry(fn, { baseDelayMs: 0 })).rejects.toBeInstanceOf(CancelledError);
      expect(fn).toHaveBeenCalledTimes(1);
    });
  });

  it('should cancel a sleep when the signal fires', async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });

  it('should throw only for an aborted signal', () => {
    const controller = new AbortController();
    expect(() => throwIfAborted(controller.signal, 'query')).not.toThrow();
    controller.abort();
    expect(() => throwIfAborted(controller.signal, 'query')).toThrow('Operation query was cancelled');
  });

  describe('withDeadline', () => {
    it('should pass the caller signal through when there is no timeout', () => {
      const controller = new AbortController();
      const deadline = withDeadline(controller.signal);

      expect(deadline.signal).toBe(controller.signal);
      deadline.release();
    });

    it('should abort when the timeout expires', async () => {
      const deadline = withDeadline(undefined, 10);
      await sleep(30);

      expect(deadline.signal?.aborted).toBe(true);
      deadline.release();
    });

    it('should follow the caller signal', () => {
      const controller = new AbortController();
      const deadline = withDeadline(controller.signal, 10_000);

      controller.abort();

      expect(deadline.signal?.aborted).toBe(true);
      deadline.release();
    });
  });
});
