/**
 * Reconnect backoff policy: linear growth with a cap.
 *
 * delay = min(baseMs * attempts, capMs), attempts counted from 1.
 */

export interface BackoffPolicy {
  baseMs: number;
  capMs: number;
}

export const DEFAULT_BACKOFF_POLICY: BackoffPolicy = {
  baseMs: 1_000,
  capMs: 30_000,
};

export function computeBackoffDelayMs(attempts: number, policy: BackoffPolicy = DEFAULT_BACKOFF_POLICY): number {
  const n = Math.max(1, Math.floor(attempts));
  return Math.min(policy.baseMs * n, policy.capMs);
}
