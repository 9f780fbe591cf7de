// Core types — image reference, evaluator results, report, capability contracts

// ─── Image reference ──────────────────────────────────────────────────────────

export interface ImageReference {
  readonly registry: string;   // e.g. "docker.io", "quay.io", "registry.redhat.io"
  readonly namespace: string;  // vendor namespace, e.g. "bitnami" (may be empty)
  readonly repository: string; // e.g. "redis", "charts/nginx"
  readonly tag: string;        // defaults to "latest"
  readonly digest?: string;    // "sha256:…" when pinned by digest
  readonly official?: boolean; // bare Docker Hub name, served from "library/"
}

// ─── Evaluator results ────────────────────────────────────────────────────────

export type Criterion =
  | 'vendor_trust'
  | 'recency'
  | 'adoption'
  | 'cve_critical'
  | 'cve_high'
  | 'signature';

export interface EvaluatorResult {
  readonly criterion: Criterion;
  readonly points: number;     // [0, max_points]
  readonly max_points: number;
  readonly detail: string;
}

export type Decision = 'auto-approve' | 'needs-human-review' | 'auto-reject';

export interface VulnerabilityCounts {
  critical: number;
  high: number;
  medium: number;
  low: number;
}

export interface ImageMetadata {
  created?: string;  // ISO 8601
  size_mb?: number;
  layers?: number;
  digest?: string;
}

export interface EvaluationReport {
  readonly image: string;              // raw reference as supplied
  readonly reference: ImageReference;
  readonly timestamp: string;          // ISO 8601
  readonly results: readonly EvaluatorResult[];
  readonly total_score: number;
  readonly max_score: number;
  readonly decision: Decision;
  readonly vendor_known: boolean;
  readonly guardrail_applied: boolean;
  readonly vulnerabilities: Readonly<VulnerabilityCounts>;
  readonly image_metadata: Readonly<ImageMetadata>;
}

// ─── Probes (capability outcomes) ─────────────────────────────────────────────

export type UnavailableReason = 'absent' | 'failed' | 'timeout';

export type Probe<T> =
  | { status: 'ok'; value: T }
  | { status: 'unavailable'; reason: UnavailableReason; message: string };

/**
 * Runs one capability call under its own timeout and converts every failure
 * into an `unavailable` probe. Only caller cancellation escapes as a throw.
 */
export type ProbeRunner = <T>(
  source: string,
  task: (signal: AbortSignal) => Promise<T>,
) => Promise<Probe<T>>;

// ─── Capability contracts ─────────────────────────────────────────────────────

export interface ImageInspection {
  created?: string;
  digest?: string;
  layers?: number;
  sizeBytes?: number;
}

export interface ImageInspector {
  readonly name: string;
  inspect(ref: string, signal: AbortSignal): Promise<ImageInspection>;
}

export type Severity = 'CRITICAL' | 'HIGH' | 'MEDIUM' | 'LOW';

export interface VulnerabilityScanner {
  readonly name: string;
  scan(ref: string, severities: readonly Severity[], signal: AbortSignal): Promise<VulnerabilityCounts>;
}

export interface SignatureIdentity {
  identityRegexp: string;
  oidcIssuerRegexp: string;
}

export interface SignatureVerifier {
  readonly name: string;
  verify(ref: string, identity: SignatureIdentity, signal: AbortSignal): Promise<boolean>;
}

export interface AdoptionAssessment {
  points: number;
  detail: string;
}

/** Registry-specific adoption heuristic, selected by registry host. */
export interface AdoptionStrategy {
  readonly name: string;
  assess(ref: ImageReference, probe: ProbeRunner): Promise<AdoptionAssessment>;
}

export interface Capabilities {
  inspector: ImageInspector;
  scanner: VulnerabilityScanner;
  verifier: SignatureVerifier;
}

// ─── Configuration ────────────────────────────────────────────────────────────

export interface GateConfig {
  readonly trustedRegistries: readonly string[];
  readonly trustedNamespaces: readonly string[];
  /** Vendor-curated registries: adoption presumed verified (flat full points) */
  readonly curatedRegistries: readonly string[];
  readonly recency: { readonly recentDays: number; readonly staleDays: number };
  readonly thresholds: { readonly autoApprove: number; readonly humanReview: number };
  readonly signature: Readonly<SignatureIdentity>;
  readonly timeouts: { readonly capabilityMs: number; readonly httpMs: number };
}
