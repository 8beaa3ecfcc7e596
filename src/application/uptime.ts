import type { HealthCheckResult } from '../domain/index.js';

/**
 * Uptime percentage over the first `windowSize` entries of `newestFirst`.
 * Rounded to two decimals; null when there is nothing to measure.
 */
export function computeUptime(
  newestFirst: readonly Pick<HealthCheckResult, 'status'>[],
  windowSize: number,
): number | null {
  const recent = newestFirst.slice(0, windowSize);
  if (recent.length === 0) return null;

  const healthy = recent.filter((r) => r.status === 'healthy').length;
  return Math.round((healthy / recent.length) * 10_000) / 100;
}
