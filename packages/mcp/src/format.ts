// Markdown renderings of an EvaluationReport for MCP tool results

import { CRITERION_LABELS, decisionLabel } from '@imagegate/core';
import type { EvaluationReport, GateConfig } from '@imagegate/core';

const BAR_WIDTH = 20;

export function scoreBar(total: number, max: number): string {
  const filled = Math.round((total / max) * BAR_WIDTH);
  return '█'.repeat(filled) + '░'.repeat(BAR_WIDTH - filled);
}

export function formatMarkdownReport(report: EvaluationReport): string {
  const v = report.vulnerabilities;
  const lines: string[] = [
    `## Image Trust Report: \`${report.image}\``,
    '',
    `**Score:** [${scoreBar(report.total_score, report.max_score)}] ${report.total_score}/${report.max_score}`,
    `**Decision:** ${decisionLabel(report.decision)}`,
    `**Vendor:** ${report.vendor_known ? 'trusted' : 'not in the trusted set'}`,
    '',
    '### Criteria',
    '| Criterion | Points | Detail |',
    '|---|---|---|',
    ...report.results.map(
      (r) => `| ${CRITERION_LABELS[r.criterion]} | ${r.points} / ${r.max_points} | ${r.detail} |`,
    ),
    '',
    '### Vulnerabilities',
    `Critical: ${v.critical} | High: ${v.high} | Medium: ${v.medium} | Low: ${v.low}`,
    '',
  ];

  if (report.guardrail_applied) {
    lines.push('> ⚠️ Unknown vendor: auto-approval withheld pending human review.', '');
  }

  lines.push(`*Evaluated: ${report.timestamp}*`);
  return lines.join('\n');
}

export interface Admissibility {
  admissible: boolean;
  text: string;
}

/**
 * YES only for auto-approve; `allowReview` also admits needs-human-review
 * (for callers that route the review themselves).
 */
export function formatAdmissibility(
  report: EvaluationReport,
  thresholds: GateConfig['thresholds'],
  allowReview = false,
): Admissibility {
  const admissible =
    report.decision === 'auto-approve' || (allowReview && report.decision === 'needs-human-review');

  let reason: string;
  if (report.decision === 'auto-approve') {
    reason = `Score ${report.total_score} meets the auto-approve threshold of ${thresholds.autoApprove}.`;
  } else if (report.guardrail_applied) {
    reason = 'The vendor is not in the trusted set, so a human must approve this image.';
  } else if (report.decision === 'needs-human-review') {
    reason = `Score ${report.total_score} is below the auto-approve threshold of ${thresholds.autoApprove}; human review required.`;
  } else {
    reason = `Score ${report.total_score} is below the review threshold of ${thresholds.humanReview}.`;
  }

  const lines: string[] = [
    admissible ? '**ADMISSIBLE: YES** ✅' : '**ADMISSIBLE: NO** ❌',
    '',
    `**Image:** ${report.image}`,
    `**Score:** ${report.total_score}/${report.max_score}`,
    `**Decision:** ${decisionLabel(report.decision)}`,
    '',
    reason,
  ];

  const shortfalls = report.results.filter((r) => r.points < r.max_points);
  if (shortfalls.length > 0) {
    lines.push('', 'Signals below full marks:');
    for (const r of shortfalls) {
      lines.push(`- ${CRITERION_LABELS[r.criterion]}: ${r.points}/${r.max_points} (${r.detail})`);
    }
  }

  return { admissible, text: lines.join('\n') };
}
