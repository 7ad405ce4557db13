export interface BackoffPolicy {
  baseMs: number;
  maxMs: number;
}

export const DEFAULT_BACKOFF: BackoffPolicy = {
  baseMs: 1_000,
  maxMs: 24 * 60 * 60 * 1_000,
};

/** Delay before the next attempt after `failureCount` consecutive failures (1-based). */
export function computeBackoffMs(failureCount: number, policy: BackoffPolicy = DEFAULT_BACKOFF): number {
  const exponent = Math.max(0, failureCount - 1);
  return Math.min(policy.baseMs * 2 ** exponent, policy.maxMs);
}
