// =====================================================
// Retry Backoff
// =====================================================
// Retries are not sleeps: the dispatcher stores the result
// as next_retry_at and a later poll picks the entry up, so a
// restart in between loses nothing.

export interface BackoffPolicy {
  baseMs: number;
  maxMs: number;
  /** Fraction of the delay applied as ± random spread (0-1) */
  jitter: number;
  factor?: number;
}

/**
 * Delay before the next attempt, where `attempt` is the number
 * of attempts already made (1 after the first failure).
 */
export function computeBackoffDelay(
  policy: BackoffPolicy,
  attempt: number,
  random: () => number = Math.random
): number {
  const exponent = Math.max(attempt - 1, 0);
  const base = policy.baseMs * Math.pow(policy.factor ?? 2, exponent);
  const capped = Math.min(base, policy.maxMs);

  // Apply jitter: ±jitter% of the computed delay
  const jitterRange = capped * policy.jitter;
  const jitterOffset = (random() * 2 - 1) * jitterRange;

  return Math.max(0, Math.round(capped + jitterOffset));
}

export function nextRetryAt(policy: BackoffPolicy, attempt: number, now: Date, random?: () => number): Date {
  return new Date(now.getTime() + computeBackoffDelay(policy, attempt, random));
}
