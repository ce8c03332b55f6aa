import type { ErrorRecord } from '@ocrflow/model';

import type { RetryConfig } from '../config/engine-config';

import { OCR_ENGINE, RETRY_POLICY } from '../config/constants';

export type RetryDecision =
  | { action: 'retry'; delayMs: number }
  | { action: 'give-up' };

/**
 * RetryPolicy
 *
 * Decides, from the latest failure and the number of attempts made so far,
 * whether an item gets another attempt and how long it waits first.
 *
 * Backoff is exponential and capped: `min(maxDelayMs, baseDelayMs * 2^(n-1))`.
 * A larger retry-after hint on a RateLimited failure replaces the computed
 * delay; it is not capped by maxDelayMs, only by the longest timer delay.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;

  constructor(config: Partial<RetryConfig> = {}) {
    this.maxAttempts = config.maxAttempts ?? RETRY_POLICY.DEFAULT_MAX_ATTEMPTS;
    this.baseDelayMs = config.baseDelayMs ?? RETRY_POLICY.DEFAULT_BASE_DELAY_MS;
    this.maxDelayMs = config.maxDelayMs ?? RETRY_POLICY.DEFAULT_MAX_DELAY_MS;
  }

  decide(error: ErrorRecord, attemptsSoFar: number): RetryDecision {
    if (!error.retryable || attemptsSoFar >= this.maxAttempts) {
      return { action: 'give-up' };
    }

    const computed = this.backoffDelay(attemptsSoFar);

    if (
      error.kind === 'RateLimited' &&
      error.retryAfterMs !== undefined &&
      error.retryAfterMs > computed
    ) {
      return {
        action: 'retry',
        delayMs: Math.min(error.retryAfterMs, OCR_ENGINE.MAX_TIMER_DELAY_MS),
      };
    }

    return { action: 'retry', delayMs: computed };
  }

  private backoffDelay(attemptsSoFar: number): number {
    const exponent = Math.max(0, attemptsSoFar - 1);
    return Math.min(this.maxDelayMs, this.baseDelayMs * 2 ** exponent);
  }
}
