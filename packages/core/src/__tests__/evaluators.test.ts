import { describe, it, expect } from 'vitest';
import {
  ageInDays,
  evaluateRecency,
  evaluateSignature,
  evaluateVendor,
  evaluateVulnerabilities,
} from '../evaluators/index.js';
import { parseImageReference } from '../reference/parser.js';
import type { ImageInspection, Probe, VulnerabilityCounts } from '../types/index.js';

// ── Helpers ───────────────────────────────────────────────────────────────────
const ok = <T>(value: T): Probe<T> => ({ status: 'ok', value });
const absent = <T>(): Probe<T> => ({ status: 'unavailable', reason: 'absent', message: 'tool not available' });
const failed = <T>(message = 'boom'): Probe<T> => ({ status: 'unavailable', reason: 'failed', message });
const timedOut = <T>(): Probe<T> => ({ status: 'unavailable', reason: 'timeout', message: 'tool timed out after 50ms' });

const vendorConfig = {
  trustedRegistries: ['registry.redhat.io', 'registry.example.com'],
  trustedNamespaces: ['bitnami', 'hashicorp'],
};

const recencyConfig = { recency: { recentDays: 90, staleDays: 365 } };
const NOW = new Date('2026-06-01T00:00:00Z');
const daysAgo = (days: number): string => new Date(NOW.getTime() - days * 86_400_000).toISOString();

const counts = (partial: Partial<VulnerabilityCounts> = {}): VulnerabilityCounts => ({
  critical: 0,
  high: 0,
  medium: 0,
  low: 0,
  ...partial,
});

// ── Vendor ────────────────────────────────────────────────────────────────────
describe('evaluateVendor', () => {
  it('trusted registry → 30 regardless of namespace', () => {
    const { result, vendorKnown } = evaluateVendor(
      parseImageReference('registry.redhat.io/some-unknown-team/app:1'),
      vendorConfig,
    );
    expect(vendorKnown).toBe(true);
    expect(result).toEqual({
      criterion: 'vendor_trust',
      points: 30,
      max_points: 30,
      detail: 'Registry registry.redhat.io is a trusted vendor registry',
    });
  });

  it('trusted namespace on an untrusted registry → 30', () => {
    const { result, vendorKnown } = evaluateVendor(parseImageReference('bitnami/redis:7.2'), vendorConfig);
    expect(vendorKnown).toBe(true);
    expect(result.points).toBe(30);
    expect(result.detail).toBe('bitnami is a known trusted vendor');
  });

  it('unknown vendor → 0 and vendorKnown=false', () => {
    const { result, vendorKnown } = evaluateVendor(parseImageReference('unknown-vendor/app:v1'), vendorConfig);
    expect(vendorKnown).toBe(false);
    expect(result.points).toBe(0);
    expect(result.detail).toBe(
      'unknown-vendor is NOT a known trusted vendor (unknown vendors require human review)',
    );
  });

  it('exact match only: no prefix matching', () => {
    expect(evaluateVendor(parseImageReference('bitnami-fork/redis'), vendorConfig).vendorKnown).toBe(false);
    expect(evaluateVendor(parseImageReference('registry.redhat.io.evil.com/x/y'), vendorConfig).vendorKnown).toBe(false);
  });

  it('exact match only: no case folding', () => {
    expect(evaluateVendor(parseImageReference('Bitnami/redis'), vendorConfig).vendorKnown).toBe(false);
  });

  it('empty namespace is never trusted', () => {
    const { vendorKnown, result } = evaluateVendor(
      parseImageReference('quay.io/app'),
      { trustedRegistries: [], trustedNamespaces: [''] },
    );
    expect(vendorKnown).toBe(false);
    expect(result.detail).toBe('(no namespace) is NOT a known trusted vendor (unknown vendors require human review)');
  });
});

// ── Recency ───────────────────────────────────────────────────────────────────
describe('ageInDays', () => {
  it('counts whole days', () => {
    expect(ageInDays(new Date(daysAgo(3.9)), NOW)).toBe(3);
  });

  it('future timestamps count as 0', () => {
    expect(ageInDays(new Date('2026-07-01T00:00:00Z'), NOW)).toBe(0);
  });
});

describe('evaluateRecency', () => {
  const inspected = (created?: string): Probe<ImageInspection> => ok(created ? { created } : {});

  it('age = 90 days → 15 (inclusive threshold)', () => {
    const r = evaluateRecency(inspected(daysAgo(90)), NOW, recencyConfig);
    expect(r.points).toBe(15);
    expect(r.detail).toBe('Last published 90 days ago (within 90d threshold)');
  });

  it('age = 91 days → 5', () => {
    const r = evaluateRecency(inspected(daysAgo(91)), NOW, recencyConfig);
    expect(r.points).toBe(5);
    expect(r.detail).toBe('Last published 91 days ago (older than 90d but within 365d)');
  });

  it('age = 365 days → 5', () => {
    expect(evaluateRecency(inspected(daysAgo(365)), NOW, recencyConfig).points).toBe(5);
  });

  it('age = 366 days → 0 (stale)', () => {
    const r = evaluateRecency(inspected(daysAgo(366)), NOW, recencyConfig);
    expect(r.points).toBe(0);
    expect(r.detail).toBe('Last published 366 days ago (STALE: over 365d old)');
  });

  it('fresh image → 15', () => {
    expect(evaluateRecency(inspected(daysAgo(0)), NOW, recencyConfig).points).toBe(15);
  });

  it('honours a configured recency threshold', () => {
    const r = evaluateRecency(inspected(daysAgo(40)), NOW, { recency: { recentDays: 30, staleDays: 365 } });
    expect(r.points).toBe(5);
  });

  it('missing creation date → 0', () => {
    const r = evaluateRecency(inspected(), NOW, recencyConfig);
    expect(r).toEqual({
      criterion: 'recency',
      points: 0,
      max_points: 15,
      detail: 'Could not determine image creation date',
    });
  });

  it('unparseable creation date → 0', () => {
    expect(evaluateRecency(inspected('last tuesday'), NOW, recencyConfig).detail).toBe(
      'Could not determine image creation date',
    );
  });

  it('inspector absent → 0 with degraded detail', () => {
    expect(evaluateRecency(absent(), NOW, recencyConfig).detail).toBe(
      'Image inspector not available, skipping recency check',
    );
  });

  it('inspection failed → 0 with degraded detail', () => {
    const r = evaluateRecency(failed('manifest unknown'), NOW, recencyConfig);
    expect(r.points).toBe(0);
    expect(r.detail).toBe('Image inspection failed, image may not be publicly accessible (manifest unknown)');
  });

  it('inspection timed out → 0', () => {
    const r = evaluateRecency(timedOut(), NOW, recencyConfig);
    expect(r.points).toBe(0);
    expect(r.detail).toBe('Image inspection timed out (tool timed out after 50ms)');
  });
});

// ── Vulnerabilities ───────────────────────────────────────────────────────────
describe('evaluateVulnerabilities', () => {
  it('clean scan → 20 + 10', () => {
    const { critical, high } = evaluateVulnerabilities(ok(counts()));
    expect(critical.points).toBe(20);
    expect(critical.detail).toBe('0 CRITICAL CVEs found');
    expect(high.points).toBe(10);
    expect(high.detail).toBe('0 HIGH CVEs found');
  });

  it('one critical scores the same as a thousand', () => {
    const one = evaluateVulnerabilities(ok(counts({ critical: 1 })));
    const many = evaluateVulnerabilities(ok(counts({ critical: 1000 })));
    expect(one.critical.points).toBe(0);
    expect(many.critical.points).toBe(0);
  });

  it('high findings zero the high sub-score only', () => {
    const { critical, high } = evaluateVulnerabilities(ok(counts({ high: 4 })));
    expect(critical.points).toBe(20);
    expect(high.points).toBe(0);
    expect(high.detail).toBe('4 HIGH CVEs found');
  });

  it('scan unavailable → critical 10 (partial) and high 10', () => {
    const { critical, high, counts: recorded } = evaluateVulnerabilities(failed('Trivy scan returned no results'));
    expect(critical.points).toBe(10);
    expect(critical.detail).toBe(
      'Vulnerability scan returned no results (Trivy scan returned no results), partial score awarded',
    );
    expect(high.points).toBe(10);
    expect(high.detail).toBe('0 HIGH CVEs recorded (no scan result)');
    expect(recorded).toEqual(counts());
  });

  it('scanner absent → partial credit with its own detail', () => {
    expect(evaluateVulnerabilities(absent()).critical.detail).toBe(
      'Vulnerability scanner not available, partial score awarded',
    );
  });

  it('records medium/low counts without scoring them', () => {
    const scan = counts({ critical: 2, high: 3, medium: 17, low: 40 });
    const { critical, high, counts: recorded } = evaluateVulnerabilities(ok(scan));
    expect(recorded).toEqual({ critical: 2, high: 3, medium: 17, low: 40 });
    expect(critical.points + high.points).toBe(0);
  });

  it('medium/low findings alone keep full points', () => {
    const { critical, high } = evaluateVulnerabilities(ok(counts({ medium: 50, low: 200 })));
    expect(critical.points + high.points).toBe(30);
  });
});

// ── Signature ─────────────────────────────────────────────────────────────────
describe('evaluateSignature', () => {
  it('verified → 10', () => {
    expect(evaluateSignature(ok(true))).toEqual({
      criterion: 'signature',
      points: 10,
      max_points: 10,
      detail: 'cosign signature verified (Sigstore)',
    });
  });

  it('not verified → 0', () => {
    const r = evaluateSignature(ok(false));
    expect(r.points).toBe(0);
    expect(r.detail).toBe('No cosign signature found (not signed or verification failed)');
  });

  it('verifier absent → 0, treated as unsigned', () => {
    const r = evaluateSignature(absent());
    expect(r.points).toBe(0);
    expect(r.detail).toBe('Signature verifier not available, treated as unsigned');
  });

  it('verification timed out → 0', () => {
    expect(evaluateSignature(timedOut()).points).toBe(0);
  });
});
