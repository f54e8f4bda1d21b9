/**
 * Calculate exponential backoff delay.
 * delay = min(initialBackoff * 2^(attempt-1), maxBackoff)
 */
export function calculateBackoff(
  attempt: number,
  initialBackoffMs: number,
  maxBackoffMs: number,
): number {
  const delay = initialBackoffMs * Math.pow(2, Math.max(attempt, 1) - 1);
  return Math.min(delay, maxBackoffMs);
}
