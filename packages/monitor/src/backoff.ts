import type { PipewatchError } from '@pipewatch/shared/errors';
import { RateLimitedError } from '@pipewatch/shared/errors';

export interface BackoffPolicy {
  /** Consecutive retryable failures tolerated before giving up. */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitter: boolean;
}

export const DEFAULT_BACKOFF: BackoffPolicy = {
  maxRetries: 5,
  baseDelayMs: 1_000,
  maxDelayMs: 30_000,
  jitter: true
};

/**
 * Delay before retrying after the `attempt`-th consecutive failure
 * (0-based). A rate limit dictates its own delay.
 */
export function computeDelay(
  attempt: number,
  error: PipewatchError,
  policy: BackoffPolicy,
  random: () => number = Math.random
): number {
  if (error instanceof RateLimitedError) {
    return error.retryAfterMs;
  }

  const exponentialDelay = Math.min(policy.baseDelayMs * Math.pow(2, attempt), policy.maxDelayMs);

  if (policy.jitter) {
    // Between 0.5 and 1.5 times the delay
    const jitterFactor = 0.5 + random();
    return Math.floor(exponentialDelay * jitterFactor);
  }

  return exponentialDelay;
}
