/**
 * Centralized constants for the imagegate scoring engine.
 * All magic numbers live here — change once, applies everywhere.
 */

import type { Criterion } from './types/index.js';

// ── Reference parsing ─────────────────────────────────────────────────────────
export const REFERENCE = {
  /** Registry assumed when a reference carries no host */
  DEFAULT_REGISTRY:  'docker.io',
  DEFAULT_TAG:       'latest',
} as const;

// ── Points per criterion (sum = 100) ──────────────────────────────────────────
export const POINTS = {
  vendor_trust: 30,
  recency:      15,
  adoption:     15,
  cve_critical: 20,
  cve_high:     10,
  signature:    10,
} as const satisfies Record<Criterion, number>;

/** Report order — also the declaration order of `Criterion` */
export const CRITERIA: readonly Criterion[] = [
  'vendor_trust',
  'recency',
  'adoption',
  'cve_critical',
  'cve_high',
  'signature',
];

export const MAX_SCORE = 100;

// ── Recency ───────────────────────────────────────────────────────────────────
export const RECENCY = {
  RECENT_DAYS:     90,
  STALE_DAYS:      365,
  /** Partial credit for images older than RECENT_DAYS but within STALE_DAYS */
  AGING_POINTS:    5,
} as const;

// ── Decision thresholds ───────────────────────────────────────────────────────
export const THRESHOLDS = {
  AUTO_APPROVE:    80,
  HUMAN_REVIEW:    50,
} as const;

// ── Vulnerabilities ───────────────────────────────────────────────────────────
export const VULNERABILITY = {
  /** Critical sub-score when no scan result is available */
  UNSCANNED_CRITICAL_POINTS: 10,
  SEVERITIES: ['CRITICAL', 'HIGH', 'MEDIUM', 'LOW'],
} as const;

// ── Adoption tiers per registry ───────────────────────────────────────────────
export const ADOPTION = {
  DOCKER_HUB: {
    HOSTS:        ['docker.io', 'index.docker.io'],
    /** API namespace of official images ("nginx" → "library/nginx") */
    OFFICIAL_NAMESPACE: 'library',
    HIGH_PULLS:   1_000_000,
    MEDIUM_PULLS: 100_000,
    LOW_PULLS:    10_000,
    UNREACHABLE_POINTS: 0,
  },
  QUAY: {
    HOSTS:        ['quay.io'],
    HIGH_STARS:   10,
    HIGH_TAGS:    20,
    MEDIUM_STARS: 3,
    MEDIUM_TAGS:  5,
    FLOOR_POINTS: 5,
    UNREACHABLE_POINTS: 5,
  },
  GHCR: {
    HOSTS:           ['ghcr.io'],
    HIGH_VERSIONS:   50,
    MEDIUM_VERSIONS: 10,
    FLOOR_POINTS:    5,
  },
  /** Points for MEDIUM tier on every tiered registry */
  MEDIUM_POINTS: 10,
  LOW_POINTS:    5,
} as const;

// ── Network / process timeouts ────────────────────────────────────────────────
export const TIMEOUT = {
  /** Per-capability budget (skopeo, trivy, cosign, registry APIs) */
  CAPABILITY_MS: 120_000,
  /** Default registry metadata fetch timeout (ms) */
  HTTP_MS:       10_000,
} as const;

// ── Signature ─────────────────────────────────────────────────────────────────
export const SIGNATURE = {
  /** Permissive Sigstore keyless match: any identity, any issuer */
  IDENTITY_REGEXP: '.*',
  ISSUER_REGEXP:   '.*',
} as const;

// ── Trusted vendors ───────────────────────────────────────────────────────────
export const TRUSTED = {
  /** Registries curated by their vendor — entire catalog trusted */
  REGISTRIES: [
    'registry.access.redhat.com',
    'registry.redhat.io',
  ],
  /** Registries whose curation process stands in for adoption metrics */
  CURATED_REGISTRIES: [
    'registry.access.redhat.com',
    'registry.redhat.io',
  ],
  NAMESPACES: [
    // Red Hat ecosystem
    'redhat', 'rhdh-community', 'fedora', 'openshift', 'ubi',
    // HashiCorp
    'hashicorp',
    // Bitnami
    'bitnami', 'bitnamilegacy',
    // CNCF projects
    'kyverno', 'argoproj', 'prometheus', 'jetstack', 'fluxcd', 'envoyproxy',
    // Observability
    'grafana', 'aquasecurity',
    // Infrastructure
    'calico', 'cilium',
  ],
} as const;
