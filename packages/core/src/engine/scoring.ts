// Scoring engine — point aggregation, vendor guardrail, disposition mapping

import { CRITERIA, MAX_SCORE } from '../constants.js';
import type { Decision, EvaluatorResult, GateConfig } from '../types/index.js';

// ─── Aggregation ──────────────────────────────────────────────────────────────

/**
 * Put results in criterion declaration order and sum their points.
 * Exactly one result per criterion is required.
 */
export function aggregate(results: readonly EvaluatorResult[]): {
  results: EvaluatorResult[];
  total: number;
} {
  const ordered = CRITERIA.map((criterion) => {
    const matches = results.filter((r) => r.criterion === criterion);
    const [only] = matches;
    if (matches.length !== 1 || !only) {
      throw new Error(`Expected exactly one ${criterion} result, got ${matches.length}`);
    }
    return only;
  });

  const total = ordered.reduce((sum, r) => sum + r.points, 0);
  return { results: ordered, total: Math.min(Math.max(total, 0), MAX_SCORE) };
}

// ─── Decision ─────────────────────────────────────────────────────────────────

/** Disposition from the score alone, before the vendor guardrail. */
export function classifyScore(
  total: number,
  thresholds: GateConfig['thresholds'],
): Decision {
  if (total >= thresholds.autoApprove) return 'auto-approve';
  if (total >= thresholds.humanReview) return 'needs-human-review';
  return 'auto-reject';
}

/**
 * Final disposition. An unknown vendor can score arbitrarily high on the
 * other signals but is capped at needs-human-review.
 */
export function decide(
  total: number,
  vendorKnown: boolean,
  thresholds: GateConfig['thresholds'],
): { decision: Decision; guardrailApplied: boolean } {
  const decision = classifyScore(total, thresholds);
  if (decision === 'auto-approve' && !vendorKnown) {
    return { decision: 'needs-human-review', guardrailApplied: true };
  }
  return { decision, guardrailApplied: false };
}

// ─── Labels ───────────────────────────────────────────────────────────────────

export function decisionLabel(decision: Decision): string {
  const labels: Record<Decision, string> = {
    'auto-approve':       '✅ Auto-approve',
    'needs-human-review': '👀 Needs human review',
    'auto-reject':        '🚫 Auto-reject',
  };
  return labels[decision];
}
