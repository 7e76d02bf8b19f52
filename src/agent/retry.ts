export interface RetryPolicy {
  /** Total attempts, including the first */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Fraction of the exponential delay added as random jitter */
  jitterFactor: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
  jitterFactor: 0.2,
};

/**
 * Delay before the retry that follows failed attempt `attempt` (1-based):
 * min(base * 2^(attempt-1), max) plus up to `jitterFactor` of that.
 */
export function computeBackoffDelay(attempt: number, policy: RetryPolicy, random: () => number = Math.random): number {
  const exponential = Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
  return Math.round(exponential + exponential * policy.jitterFactor * random());
}
