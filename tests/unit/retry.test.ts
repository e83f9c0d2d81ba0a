import { describe, it, expect, vi } from 'vitest';

import { backoffDelay, withRetry, type RetryPolicy } from '../../src/core/retry.js';

const policy: RetryPolicy = { attempts: 4, baseDelayMs: 100, maxDelayMs: 250 };

describe('backoffDelay', () => {
  it('doubles from the base and caps at the maximum', () => {
    expect([1, 2, 3, 4].map((attempt) => backoffDelay(policy, attempt))).toEqual([
      100, 200, 250, 250,
    ]);
  });
});

describe('withRetry', () => {
  it('returns the first success', async () => {
    const sleep = vi.fn(async () => {});
    const operation = vi.fn(async () => 'ok');

    await expect(withRetry(operation, { policy, isRetryable: () => true, sleep })).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('retries retryable errors with backoff until one succeeds', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    let calls = 0;
    const operation = async () => {
      calls++;
      if (calls < 3) throw new Error('timeout');
      return calls;
    };

    await expect(withRetry(operation, { policy, isRetryable: () => true, sleep })).resolves.toBe(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
  });

  it('stops at the attempt cap and rethrows the last error', async () => {
    const sleep = vi.fn(async () => {});
    let calls = 0;
    const operation = async () => {
      calls++;
      throw new Error(`failure ${calls}`);
    };

    await expect(withRetry(operation, { policy, isRetryable: () => true, sleep })).rejects.toThrow(
      'failure 4'
    );
    expect(calls).toBe(4);
    expect(sleep).toHaveBeenCalledTimes(3);
  });

  it('does not retry errors that are not retryable', async () => {
    const sleep = vi.fn(async () => {});
    const operation = vi.fn(async () => {
      throw new Error('invalid api key');
    });

    await expect(withRetry(operation, { policy, isRetryable: () => false, sleep })).rejects.toThrow(
      'invalid api key'
    );
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });
});
