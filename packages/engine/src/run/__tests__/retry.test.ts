import { describe, it, expect, vi, afterEach } from 'vitest';
import { CancellationToken, CancelledError } from '../cancellation.js';
import { computeBackoffDelay, NO_RETRY, resolveRetryPolicy, sleep } from '../retry.js';

describe('resolveRetryPolicy', () => {
  it('defaults to a single attempt', () => {
    expect(resolveRetryPolicy()).toEqual(NO_RETRY);
    expect(NO_RETRY.maxAttempts).toBe(1);
  });

  it('lets earlier sources take precedence, key by key', () => {
    expect(resolveRetryPolicy({ maxAttempts: 3 }, { maxAttempts: 5, initialDelayMs: 10 }, undefined)).toEqual({
      maxAttempts: 3,
      initialDelayMs: 10,
      backoffMultiplier: 2,
      maxDelayMs: 5000,
    });
  });
});

describe('computeBackoffDelay', () => {
  const policy = { maxAttempts: 5, initialDelayMs: 100, backoffMultiplier: 3, maxDelayMs: 1000 };

  it('grows exponentially up to the cap', () => {
    expect([1, 2, 3, 4].map((attempt) => computeBackoffDelay(policy, attempt))).toEqual([100, 300, 900, 1000]);
  });
});

describe('sleep', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves after the delay', async () => {
    vi.useFakeTimers();
    const done = vi.fn();
    const pending = sleep(200).then(done);

    await vi.advanceTimersByTimeAsync(199);
    expect(done).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toHaveBeenCalledOnce();
  });

  it('rejects when the token is cancelled', async () => {
    const token = new CancellationToken();
    const pending = sleep(60_000, token);
    token.cancel({ initiator: 'user', reason: 'stop', requestedAt: new Date() });

    await expect(pending).rejects.toThrow(CancelledError);
  });

  it('returns at once for non-positive delays', async () => {
    await expect(sleep(0)).resolves.toBeUndefined();
  });
});
