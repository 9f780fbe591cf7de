// Report rendering and disposition → process exit code mapping.
// Field names of the JSON document and the exit codes are a stable contract:
// automation branches on both.

import type { Criterion, Decision, EvaluationReport } from '../types/index.js';

export const EXIT_CODES = {
  'auto-approve':       0,
  'needs-human-review': 1,
  'auto-reject':        2,
  error:                3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function exitCodeFor(decision: Decision): ExitCode {
  return EXIT_CODES[decision];
}

// ─── Structured document ──────────────────────────────────────────────────────

export interface ScoreEntry {
  points: number;
  max: number;
  detail: string;
}

export interface ReportDocument {
  image: string;
  reference: { registry: string; namespace: string; repository: string; tag: string; digest: string | null };
  timestamp: string;
  scores: Record<Criterion, ScoreEntry>;
  total_score: number;
  max_score: number;
  decision: Decision;
  vendor_known: boolean;
  guardrail_applied: boolean;
  trivy_summary: { critical: number; high: number; medium: number; low: number };
  image_metadata: {
    created: string | null;
    size_mb: number | null;
    layers: number | null;
    digest: string | null;
  };
}

export function toReportDocument(report: EvaluationReport): ReportDocument {
  const entry = (criterion: Criterion): ScoreEntry => {
    const result = report.results.find((r) => r.criterion === criterion);
    if (!result) throw new Error(`Report is missing the ${criterion} result`);
    return { points: result.points, max: result.max_points, detail: result.detail };
  };

  const { reference: ref, vulnerabilities: v, image_metadata: meta } = report;

  return {
    image: report.image,
    reference: {
      registry: ref.registry,
      namespace: ref.namespace,
      repository: ref.repository,
      tag: ref.tag,
      digest: ref.digest ?? null,
    },
    timestamp: report.timestamp,
    scores: {
      vendor_trust: entry('vendor_trust'),
      recency:      entry('recency'),
      adoption:     entry('adoption'),
      cve_critical: entry('cve_critical'),
      cve_high:     entry('cve_high'),
      signature:    entry('signature'),
    },
    total_score: report.total_score,
    max_score: report.max_score,
    decision: report.decision,
    vendor_known: report.vendor_known,
    guardrail_applied: report.guardrail_applied,
    trivy_summary: { critical: v.critical, high: v.high, medium: v.medium, low: v.low },
    image_metadata: {
      created: meta.created ?? null,
      size_mb: meta.size_mb ?? null,
      layers: meta.layers ?? null,
      digest: meta.digest ?? null,
    },
  };
}

export function formatReportJson(report: EvaluationReport): string {
  return JSON.stringify(toReportDocument(report), null, 2);
}

// ─── Human-readable table ─────────────────────────────────────────────────────

export const CRITERION_LABELS: Record<Criterion, string> = {
  vendor_trust: 'Vendor Trust',
  recency:      'Recency',
  adoption:     'Adoption',
  cve_critical: 'CVE (Critical)',
  cve_high:     'CVE (High)',
  signature:    'Signature',
};

/** One score row: label padded to 20, points and max right-aligned to 3. */
export function formatScoreLine(label: string, points: number, max: number, detail: string): string {
  return `${label.padEnd(20)} ${String(points).padStart(3)} / ${String(max).padStart(3)}  ${detail}`;
}

export function formatReportText(report: EvaluationReport): string {
  const v = report.vulnerabilities;
  const lines: string[] = [
    '',
    '=== Image Registry Evaluation Report ===',
    `Image:    ${report.image}`,
    `Date:     ${report.timestamp}`,
    '',
    '--- Scores ---',
    ...report.results.map((r) =>
      formatScoreLine(CRITERION_LABELS[r.criterion], r.points, r.max_points, r.detail),
    ),
    '',
    '--- Vulnerability Summary ---',
    `Critical: ${v.critical} | High: ${v.high} | Medium: ${v.medium} | Low: ${v.low}`,
    '',
    `TOTAL:    ${report.total_score} / ${report.max_score}`,
    `DECISION: ${report.decision}`,
  ];

  if (report.guardrail_applied) {
    lines.push('NOTE:     unknown vendor, auto-approval withheld pending human review');
  }

  lines.push('');
  return lines.join('\n');
}
