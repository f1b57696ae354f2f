import { describe, it, expect, vi } from 'vitest';
import { RetryPolicy } from '../retry.js';
import { OptimizationError, ProviderError } from '../errors.js';

const timeout = () => new ProviderError('timed out', { category: 'timeout' });

function flaky<T>(failures: number, value: T, error: () => Error = timeout) {
  let calls = 0;
  return vi.fn(async () => {
    calls++;
    if (calls <= failures) throw error();
    return value;
  });
}

describe('RetryPolicy', () => {
  describe('delayFor', () => {
    it('waits the initial delay first, then multiplies', () => {
      const policy = new RetryPolicy();
      expect([1, 2, 3, 4, 5].map((n) => policy.delayFor(n))).toEqual([
        1000, 3000, 9000, 27000, 81000,
      ]);
    });
  });

  describe('execute', () => {
    it('succeeds after transient failures with escalating sleeps', async () => {
      const sleep = vi.fn(async (_ms: number) => {});
      const policy = new RetryPolicy({ sleep });
      const fn = flaky(5, 'ok');

      const outcome = await policy.execute(fn);

      expect(outcome).toEqual({ status: 'succeeded', value: 'ok', attempts: 6 });
      expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 3000, 9000, 27000, 81000]);
    });

    it('reports exhaustion after maxRetries retries', async () => {
      const sleep = vi.fn(async (_ms: number) => {});
      const policy = new RetryPolicy({ sleep });
      const fn = flaky(Infinity, 'never');

      const outcome = await policy.execute(fn);

      expect(outcome.status).toBe('exhausted');
      expect(outcome.attempts).toBe(6);
      expect(fn).toHaveBeenCalledTimes(6);
      expect(sleep).toHaveBeenCalledTimes(5);
    });

    it('does not retry non-transient errors', async () => {
      const sleep = vi.fn(async (_ms: number) => {});
      const policy = new RetryPolicy({ sleep });
      const fn = flaky(1, 'ok', () => new Error('bad input'));

      const outcome = await policy.execute(fn);

      expect(outcome.status).toBe('fatal');
      expect(outcome.attempts).toBe(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    it('retries a raw rate-limit error', async () => {
      const policy = new RetryPolicy({ sleep: async () => {} });
      const fn = flaky(1, 'ok', () => Object.assign(new Error('Too many requests'), { status: 429 }));

      const outcome = await policy.execute(fn);

      expect(outcome).toEqual({ status: 'succeeded', value: 'ok', attempts: 2 });
    });

    it('treats a provider api_error as fatal', async () => {
      const policy = new RetryPolicy({ sleep: async () => {} });
      const fn = flaky(1, 'ok', () => new ProviderError('bad request', { category: 'api_error' }));

      const outcome = await policy.execute(fn);

      expect(outcome.status).toBe('fatal');
    });

    it('notifies onRetry before each sleep', async () => {
      const onRetry = vi.fn();
      const policy = new RetryPolicy({ sleep: async () => {}, onRetry, initialDelayMs: 10 });

      await policy.execute(flaky(2, 'ok'));

      expect(onRetry).toHaveBeenCalledTimes(2);
      expect(onRetry.mock.calls[0][0]).toBe(1);
      expect(onRetry.mock.calls[0][2]).toBe(10);
      expect(onRetry.mock.calls[1][0]).toBe(2);
      expect(onRetry.mock.calls[1][2]).toBe(30);
    });

    it('keeps the existing callback when another listener is added', async () => {
      const first = vi.fn();
      const second = vi.fn();
      const policy = new RetryPolicy({ sleep: async () => {}, onRetry: first }).withOnRetry(second);

      await policy.execute(flaky(1, 'ok'));

      expect(first).toHaveBeenCalledTimes(1);
      expect(second).toHaveBeenCalledTimes(1);
    });
  });

  describe('run', () => {
    it('returns the value on success', async () => {
      const policy = new RetryPolicy({ sleep: async () => {} });
      await expect(policy.run(flaky(1, 42))).resolves.toBe(42);
    });

    it('wraps exhaustion in an OptimizationError with the last error as cause', async () => {
      const policy = new RetryPolicy({ sleep: async () => {}, maxRetries: 2 });

      const error = await policy.run(flaky(Infinity, 'never')).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(OptimizationError);
      expect(error).toMatchObject({
        message: 'API call failed after 2 retries. Last error: timed out',
      });
      expect(error instanceof Error && error.cause).toBeInstanceOf(ProviderError);
    });

    it('rethrows fatal errors unchanged', async () => {
      const fatal = new Error('bad input');
      const policy = new RetryPolicy({ sleep: async () => {} });

      await expect(
        policy.run(async () => {
          throw fatal;
        })
      ).rejects.toBe(fatal);
    });
  });
});
