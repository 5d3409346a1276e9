/**
 * Unit Tests for withRetry and KeyedLock
 */

import { RetryBudgetExceeded, backoffDelay, withRetry } from '../../src/utils/retry';
import { KeyedLock } from '../../src/utils/keyed-lock';
import { RequestCancelledError, TransientBackendError } from '../../src/utils/errors';
import { deferred } from '../fixtures/events';

describe('withRetry', () => {
  const fast = { maxRetries: 3, initialDelayMs: 1, maxDelayMs: 1, jitter: false, operationName: 'executeQuery' };

  it('should return once a transient failure clears', async () => {
    const onAttemptFailed = jest.fn();
    const fn = jest.fn()
      .mockRejectedValueOnce(new TransientBackendError('executeQuery'))
      .mockRejectedValueOnce(new TransientBackendError('executeQuery'))
      .mockResolvedValue('ok');

    const result = await withRetry(fn, { ...fast, maxRetries: 3, onAttemptFailed });

    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(onAttemptFailed).toHaveBeenCalledTimes(2);
    expect(onAttemptFailed).toHaveBeenLastCalledWith(expect.any(TransientBackendError), 1);
  });

  it('should rethrow a non-retryable error immediately', async () => {
    const failure = new Error('bad mapping');
    const fn = jest.fn().mockRejectedValue(failure);

    await expect(withRetry(fn, { ...fast, maxRetries: 3 })).rejects.toBe(failure);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should give up after the retry budget', async () => {
    const fn = jest.fn().mockRejectedValue(new TransientBackendError('applyMutation', 'timeout'));

    const error = await withRetry(fn, { ...fast, maxRetries: 2, operationName: 'applyMutation' }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RetryBudgetExceeded);
    if (error instanceof RetryBudgetExceeded) {
      expect(error.attempts).toBe(3);
      expect(error.message).toBe('applyMutation exhausted 3 attempts: timeout');
    }
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should stop when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = jest.fn().mockResolvedValue('ok');

    await expect(withRetry(fn, { ...fast, signal: controller.signal })).rejects.toBeInstanceOf(RequestCancelledError);
    expect(fn).not.toHaveBeenCalled();
  });

  it('should stop waiting between attempts when aborted', async () => {
    const controller = new AbortController();
    const fn = jest.fn().mockRejectedValue(new TransientBackendError('executeQuery'));

    const pending = withRetry(fn, { ...fast, initialDelayMs: 10_000, maxDelayMs: 10_000, signal: controller.signal });
    await new Promise((resolve) => setImmediate(resolve));
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(RequestCancelledError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should not retry errors that carry a network code', async () => {
    const fn = jest.fn().mockRejectedValue(Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' }));

    await expect(withRetry(fn, fast)).rejects.toThrow('socket hang up');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  describe('backoffDelay', () => {
    it('should back off exponentially up to the cap', () => {
      const settings = { initialDelayMs: 50, maxDelayMs: 2000, jitter: false };

      expect(backoffDelay(0, settings)).toBe(50);
      expect(backoffDelay(3, settings)).toBe(400);
      expect(backoffDelay(10, settings)).toBe(2000);
    });

    it('should keep jittered delays within 30% of the base', () => {
      for (let i = 0; i < 20; i++) {
        const delay = backoffDelay(2, { initialDelayMs: 100, maxDelayMs: 2000, jitter: true });
        expect(delay).toBeGreaterThanOrEqual(280);
        expect(delay).toBeLessThanOrEqual(520);
      }
    });
  });
});

describe('KeyedLock', () => {
  it('should run work for one key strictly in arrival order', async () => {
    const lock = new KeyedLock();
    const gate = deferred<void>();
    const order: string[] = [];

    const first = lock.run('e1', async () => {
      await gate.promise;
      order.push('first');
    });
    const second = lock.run('e1', async () => {
      order.push('second');
    });

    await new Promise((resolve) => setImmediate(resolve));
    expect(order).toEqual([]);
    expect(lock.isLocked('e1')).toBe(true);

    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first', 'second']);
    expect(lock.size).toBe(0);
  });

  it('should not make different keys wait on each other', async () => {
    const lock = new KeyedLock();
    const gate = deferred<void>();

    const blocked = lock.run('e1', () => gate.promise);
    const other = await lock.run('e2', async () => 'done');

    expect(other).toBe('done');
    gate.resolve();
    await blocked;
  });

  it('should release the key when work throws', async () => {
    const lock = new KeyedLock();

    await expect(lock.run('e1', async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    expect(await lock.run('e1', async () => 'next')).toBe('next');
    expect(lock.size).toBe(0);
  });
});
