/**
 * Retry Policy
 *
 * Exponential backoff between node attempts.
 *
 * @module @stepgraph/engine/run/retry
 */

import type { RetryPolicy } from '../graph/schema.js';
import type { CancellationToken } from './cancellation.js';

export const NO_RETRY: RetryPolicy = {
  maxAttempts: 1,
  initialDelayMs: 100,
  backoffMultiplier: 2,
  maxDelayMs: 5000,
};

/**
 * Merge partial policies over NO_RETRY; earlier sources take precedence
 */
export function resolveRetryPolicy(...sources: Array<Partial<RetryPolicy> | undefined>): RetryPolicy {
  const policy: RetryPolicy = { ...NO_RETRY };
  for (const source of [...sources].reverse()) {
    if (!source) continue;
    for (const key of ['maxAttempts', 'initialDelayMs', 'backoffMultiplier', 'maxDelayMs'] as const) {
      const value = source[key];
      if (value !== undefined) {
        policy[key] = value;
      }
    }
  }
  return policy;
}

/**
 * Delay before the attempt after `attempt` failed
 */
export function computeBackoffDelay(policy: RetryPolicy, attempt: number): number {
  const delay = policy.initialDelayMs * Math.pow(policy.backoffMultiplier, attempt - 1);
  return Math.min(delay, policy.maxDelayMs);
}

/**
 * Wait `ms`, rejecting with CancelledError if the token is cancelled first
 */
export function sleep(ms: number, token?: CancellationToken): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise<void>((resolve, reject) => {
    let unsubscribe = (): void => {};
    const timer = setTimeout(() => {
      unsubscribe();
      resolve();
    }, ms);
    if (token) {
      unsubscribe = token.onCancelled(() => {
        clearTimeout(timer);
        unsubscribe();
        try {
          token.throwIfCancelled();
        } catch (error) {
          reject(error);
        }
      });
    }
  });
}

/**
 * Block the calling thread for `ms`
 */
export function sleepSync(ms: number): void {
  if (ms <= 0) {
    return;
  }
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
}
