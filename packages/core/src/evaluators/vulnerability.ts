import { POINTS, VULNERABILITY } from '../constants.js';
import type { EvaluatorResult, Probe, VulnerabilityCounts } from '../types/index.js';

export interface VulnerabilityEvaluation {
  critical: EvaluatorResult;
  high: EvaluatorResult;
  /** Unfiltered scan counts (all zero when the scan was unavailable) */
  counts: VulnerabilityCounts;
}

const EMPTY_COUNTS: Readonly<VulnerabilityCounts> = { critical: 0, high: 0, medium: 0, low: 0 };

/**
 * Two binary sub-scores from one scan.
 *
 * Critical: unscanned → 10 (unknown risk), 0 critical → 20, any critical → 0.
 * High:     0 high → 10, any high → 0.
 *
 * When the scan is unavailable the counts are empty, so the high sub-score
 * still awards 10. This differs from the critical sub-score's partial credit
 * and is kept as-is pending a product decision.
 */
export function evaluateVulnerabilities(scan: Probe<VulnerabilityCounts>): VulnerabilityEvaluation {
  const counts = scan.status === 'ok' ? { ...scan.value } : { ...EMPTY_COUNTS };

  let critical: EvaluatorResult;
  if (scan.status === 'unavailable') {
    critical = {
      criterion: 'cve_critical',
      points: VULNERABILITY.UNSCANNED_CRITICAL_POINTS,
      max_points: POINTS.cve_critical,
      detail:
        scan.reason === 'absent'
          ? 'Vulnerability scanner not available, partial score awarded'
          : `Vulnerability scan returned no results (${scan.message}), partial score awarded`,
    };
  } else {
    critical = {
      criterion: 'cve_critical',
      points: counts.critical === 0 ? POINTS.cve_critical : 0,
      max_points: POINTS.cve_critical,
      detail: `${counts.critical} CRITICAL CVEs found`,
    };
  }

  const high: EvaluatorResult = {
    criterion: 'cve_high',
    points: counts.high === 0 ? POINTS.cve_high : 0,
    max_points: POINTS.cve_high,
    detail:
      scan.status === 'unavailable'
        ? '0 HIGH CVEs recorded (no scan result)'
        : `${counts.high} HIGH CVEs found`,
  };

  return { critical, high, counts };
}
