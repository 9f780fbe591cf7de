import { describe, it, expect } from 'vitest';
import type { EvaluationReport } from '@imagegate/core';
import { formatAdmissibility, formatMarkdownReport, scoreBar } from '../format.js';

const thresholds = { autoApprove: 80, humanReview: 50 };

const report = (overrides: Partial<EvaluationReport> = {}): EvaluationReport => ({
  image: 'bitnami/redis:7.2',
  reference: { registry: 'docker.io', namespace: 'bitnami', repository: 'redis', tag: '7.2' },
  timestamp: '2026-06-01T00:00:00.000Z',
  results: [
    { criterion: 'vendor_trust', points: 30, max_points: 30, detail: 'bitnami is a known trusted vendor' },
    { criterion: 'recency',      points: 5,  max_points: 15, detail: 'Last published 120 days ago (older than 90d but within 365d)' },
    { criterion: 'adoption',     points: 15, max_points: 15, detail: 'Docker Hub: 2000000 pulls, 10 stars (highly adopted)' },
    { criterion: 'cve_critical', points: 20, max_points: 20, detail: '0 CRITICAL CVEs found' },
    { criterion: 'cve_high',     points: 0,  max_points: 10, detail: '2 HIGH CVEs found' },
    { criterion: 'signature',    points: 0,  max_points: 10, detail: 'No cosign signature found (not signed or verification failed)' },
  ],
  total_score: 70,
  max_score: 100,
  decision: 'needs-human-review',
  vendor_known: true,
  guardrail_applied: false,
  vulnerabilities: { critical: 0, high: 2, medium: 4, low: 9 },
  image_metadata: {},
  ...overrides,
});

// ── scoreBar ──────────────────────────────────────────────────────────────────
describe('scoreBar', () => {
  it('is always 20 cells wide', () => {
    expect(scoreBar(100, 100)).toBe('█'.repeat(20));
    expect(scoreBar(0, 100)).toBe('░'.repeat(20));
    expect(scoreBar(70, 100)).toBe('█'.repeat(14) + '░'.repeat(6));
  });

  it('rounds to the nearest cell', () => {
    expect(scoreBar(49, 100)).toBe('█'.repeat(10) + '░'.repeat(10));
  });
});

// ── formatMarkdownReport ──────────────────────────────────────────────────────
describe('formatMarkdownReport', () => {
  it('renders the header, criteria table and CVE summary', () => {
    const lines = formatMarkdownReport(report()).split('\n');

    expect(lines.slice(0, 5)).toEqual([
      '## Image Trust Report: `bitnami/redis:7.2`',
      '',
      `**Score:** [${'█'.repeat(14)}${'░'.repeat(6)}] 70/100`,
      '**Decision:** 👀 Needs human review',
      '**Vendor:** trusted',
    ]);
    expect(lines).toContain('| CVE (High) | 0 / 10 | 2 HIGH CVEs found |');
    expect(lines).toContain('Critical: 0 | High: 2 | Medium: 4 | Low: 9');
    expect(lines.at(-1)).toBe('*Evaluated: 2026-06-01T00:00:00.000Z*');
  });

  it('calls out the guardrail', () => {
    const md = formatMarkdownReport(report({ vendor_known: false, guardrail_applied: true }));
    expect(md).toContain('**Vendor:** not in the trusted set');
    expect(md).toContain('> ⚠️ Unknown vendor: auto-approval withheld pending human review.');
  });
});

// ── formatAdmissibility ───────────────────────────────────────────────────────
describe('formatAdmissibility', () => {
  it('review → NO with the shortfalls listed', () => {
    const { admissible, text } = formatAdmissibility(report(), thresholds);

    expect(admissible).toBe(false);
    expect(text.split('\n')).toEqual([
      '**ADMISSIBLE: NO** ❌',
      '',
      '**Image:** bitnami/redis:7.2',
      '**Score:** 70/100',
      '**Decision:** 👀 Needs human review',
      '',
      'Score 70 is below the auto-approve threshold of 80; human review required.',
      '',
      'Signals below full marks:',
      '- Recency: 5/15 (Last published 120 days ago (older than 90d but within 365d))',
      '- CVE (High): 0/10 (2 HIGH CVEs found)',
      '- Signature: 0/10 (No cosign signature found (not signed or verification failed))',
    ]);
  });

  it('review → YES when review is allowed', () => {
    const { admissible, text } = formatAdmissibility(report(), thresholds, true);
    expect(admissible).toBe(true);
    expect(text.split('\n')[0]).toBe('**ADMISSIBLE: YES** ✅');
  });

  it('auto-approve → YES without shortfalls', () => {
    const perfect = report({
      results: report().results.map((r) => ({ ...r, points: r.max_points })),
      total_score: 100,
      decision: 'auto-approve',
    });
    const { admissible, text } = formatAdmissibility(perfect, thresholds);

    expect(admissible).toBe(true);
    expect(text.split('\n').at(-1)).toBe('Score 100 meets the auto-approve threshold of 80.');
  });

  it('guardrail explains the untrusted vendor', () => {
    const { text } = formatAdmissibility(report({ guardrail_applied: true, vendor_known: false }), thresholds);
    expect(text).toContain('The vendor is not in the trusted set, so a human must approve this image.');
  });

  it('auto-reject → NO even when review is allowed', () => {
    const { admissible, text } = formatAdmissibility(
      report({ total_score: 30, decision: 'auto-reject' }),
      thresholds,
      true,
    );
    expect(admissible).toBe(false);
    expect(text).toContain('Score 30 is below the review threshold of 50.');
  });
});
