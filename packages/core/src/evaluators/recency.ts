import { POINTS, RECENCY } from '../constants.js';
import type { EvaluatorResult, GateConfig, ImageInspection, Probe } from '../types/index.js';

const DAY_MS = 86_400_000;

/** Whole days between `created` and `now`; future timestamps count as 0. */
export function ageInDays(created: Date, now: Date): number {
  return Math.max(0, Math.floor((now.getTime() - created.getTime()) / DAY_MS));
}

/**
 * Recency from the last-published timestamp.
 *   age ≤ recentDays → 15, age ≤ staleDays → 5, older → 0.
 * No usable timestamp is a degraded 0, never an error.
 */
export function evaluateRecency(
  inspection: Probe<ImageInspection>,
  now: Date,
  config: Pick<GateConfig, 'recency'>,
): EvaluatorResult {
  const max = POINTS.recency;
  const { recentDays, staleDays } = config.recency;
  const result = (points: number, detail: string): EvaluatorResult => ({
    criterion: 'recency',
    points,
    max_points: max,
    detail,
  });

  if (inspection.status === 'unavailable') {
    const reasons: Record<typeof inspection.reason, string> = {
      absent:  'Image inspector not available, skipping recency check',
      timeout: `Image inspection timed out (${inspection.message})`,
      failed:  `Image inspection failed, image may not be publicly accessible (${inspection.message})`,
    };
    return result(0, reasons[inspection.reason]);
  }

  const created = inspection.value.created;
  const createdAt = created ? new Date(created) : undefined;
  if (!createdAt || Number.isNaN(createdAt.getTime())) {
    return result(0, 'Could not determine image creation date');
  }

  const days = ageInDays(createdAt, now);

  if (days <= recentDays) {
    return result(max, `Last published ${days} days ago (within ${recentDays}d threshold)`);
  }
  if (days <= staleDays) {
    return result(
      RECENCY.AGING_POINTS,
      `Last published ${days} days ago (older than ${recentDays}d but within ${staleDays}d)`,
    );
  }
  return result(0, `Last published ${days} days ago (STALE: over ${staleDays}d old)`);
}
