import type { ErrorRecord } from '@ocrflow/model';

import { describe, expect, test } from 'vitest';

import { RetryPolicy } from './retry-policy';

const transient: ErrorRecord = {
  kind: 'Transient',
  message: 'connection reset',
  retryable: true,
};

describe('RetryPolicy', () => {
  test('gives up on non-retryable errors right away', () => {
    const policy = new RetryPolicy();

    expect(
      policy.decide(
        { kind: 'InvalidRequest', message: 'bad', retryable: false },
        1,
      ),
    ).toEqual({ action: 'give-up' });
  });

  test('doubles the delay on each attempt', () => {
    const policy = new RetryPolicy({ maxAttempts: 5 });

    expect(policy.decide(transient, 1)).toEqual({
      action: 'retry',
      delayMs: 1000,
    });
    expect(policy.decide(transient, 2)).toEqual({
      action: 'retry',
      delayMs: 2000,
    });
    expect(policy.decide(transient, 4)).toEqual({
      action: 'retry',
      delayMs: 8000,
    });
  });

  test('gives up once the attempt budget is spent', () => {
    const policy = new RetryPolicy();

    expect(policy.decide(transient, 2).action).toBe('retry');
    expect(policy.decide(transient, 3)).toEqual({ action: 'give-up' });
  });

  test('caps the computed delay', () => {
    const policy = new RetryPolicy({
      maxAttempts: 10,
      baseDelayMs: 1000,
      maxDelayMs: 5000,
    });

    expect(policy.decide(transient, 6)).toEqual({
      action: 'retry',
      delayMs: 5000,
    });
  });

  test('uses a larger retry-after hint, beyond the cap', () => {
    const policy = new RetryPolicy({ maxDelayMs: 5000 });

    expect(
      policy.decide(
        {
          kind: 'RateLimited',
          message: 'slow down',
          retryable: true,
          backendStatus: 429,
          retryAfterMs: 60000,
        },
        1,
      ),
    ).toEqual({ action: 'retry', delayMs: 60000 });
  });

  test('clamps a retry-after hint to the longest timer delay', () => {
    const policy = new RetryPolicy();

    expect(
      policy.decide(
        {
          kind: 'RateLimited',
          message: 'slow down',
          retryable: true,
          retryAfterMs: 3_000_000_000,
        },
        1,
      ),
    ).toEqual({ action: 'retry', delayMs: 2_147_483_647 });
  });

  test('ignores a smaller retry-after hint', () => {
    const policy = new RetryPolicy();

    expect(
      policy.decide(
        {
          kind: 'RateLimited',
          message: 'slow down',
          retryable: true,
          retryAfterMs: 10,
        },
        2,
      ),
    ).toEqual({ action: 'retry', delayMs: 2000 });
  });

  test('never retries when maxAttempts is 1', () => {
    expect(new RetryPolicy({ maxAttempts: 1 }).decide(transient, 1)).toEqual({
      action: 'give-up',
    });
  });
});
