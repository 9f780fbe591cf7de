// ImageGateEngine — the embeddable single-image trust evaluator
//
// Embedding example:
//   import { ImageGateEngine } from '@imagegate/core';
//   const engine = new ImageGateEngine();
//   const report = await engine.evaluate('bitnami/redis:7.2');
//   process.exitCode = exitCodeFor(report.decision);

import { MAX_SCORE, POINTS, VULNERABILITY } from '../constants.js';
import { defaultConfig } from '../config/index.js';
import { EvaluationCancelledError, InvalidImageReferenceError, errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import { AdoptionStrategyRegistry, createDefaultAdoptionRegistry } from '../adoption/registry.js';
import {
  evaluateAdoption,
  evaluateRecency,
  evaluateSignature,
  evaluateVendor,
  evaluateVulnerabilities,
} from '../evaluators/index.js';
import { CosignVerifier, SkopeoInspector, TrivyScanner } from '../providers/index.js';
import { parseImageReference } from '../reference/parser.js';
import type {
  Capabilities,
  EvaluationReport,
  EvaluatorResult,
  GateConfig,
  ImageInspection,
  ImageMetadata,
  ImageReference,
  Probe,
  ProbeRunner,
} from '../types/index.js';
import { createProbeRunner } from './probe.js';
import { aggregate, decide } from './scoring.js';

export interface EngineOptions {
  config?: GateConfig;
  /** Override any of the default skopeo / trivy / cosign capabilities */
  capabilities?: Partial<Capabilities>;
  adoption?: AdoptionStrategyRegistry;
  logger?: Logger;
  /** Evaluation time source (default: wall clock) */
  clock?: () => Date;
}

export interface EvaluateOptions {
  /** Cancels the whole evaluation; no report is produced */
  signal?: AbortSignal;
}

const BYTES_PER_MB = 1024 * 1024;

export class ImageGateEngine {
  readonly config: GateConfig;
  private readonly capabilities: Capabilities;
  private readonly adoption: AdoptionStrategyRegistry;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(options: EngineOptions = {}) {
    this.config = options.config ?? defaultConfig;
    this.capabilities = {
      inspector: options.capabilities?.inspector ?? new SkopeoInspector(),
      scanner: options.capabilities?.scanner ?? new TrivyScanner(),
      verifier: options.capabilities?.verifier ?? new CosignVerifier(),
    };
    this.adoption = options.adoption ?? createDefaultAdoptionRegistry(this.config);
    this.logger = options.logger ?? createLogger();
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Evaluate one image reference.
   * Throws InvalidImageReferenceError for empty input and
   * EvaluationCancelledError when `signal` aborts; never for signal-source failures.
   */
  async evaluate(image: string, options: EvaluateOptions = {}): Promise<EvaluationReport> {
    const raw = image.trim();
    if (!raw) throw new InvalidImageReferenceError();

    const { signal } = options;
    if (signal?.aborted) throw new EvaluationCancelledError(raw, { cause: signal.reason });

    const ref = parseImageReference(raw);
    const now = this.clock();
    const probe = createProbeRunner({
      timeoutMs: this.config.timeouts.capabilityMs,
      signal,
      logger: this.logger,
    });

    let report: EvaluationReport;
    try {
      report = await this.run(raw, ref, now, probe, signal);
    } catch (err: unknown) {
      if (signal?.aborted) throw new EvaluationCancelledError(raw, { cause: err });
      throw err;
    }

    // A cancellation that lands after the join still discards the report
    if (signal?.aborted) throw new EvaluationCancelledError(raw, { cause: signal.reason });

    this.logger.info(
      { image: raw, total_score: report.total_score, decision: report.decision },
      `[imagegate] ${raw}: ${report.total_score}/${report.max_score} → ${report.decision}`,
    );
    return report;
  }

  /** host → adoption strategy name, for health output */
  adoptionStrategies(): Record<string, string> {
    return this.adoption.describe();
  }

  // ── Internals ──────────────────────────────────────────────────────────────

  private async run(
    raw: string,
    ref: ImageReference,
    now: Date,
    probe: ProbeRunner,
    signal: AbortSignal | undefined,
  ): Promise<EvaluationReport> {
    const { inspector, scanner, verifier } = this.capabilities;
    const config = this.config;

    const vendor = evaluateVendor(ref, config);

    // Independent collections, joined before any scoring decision is made
    const [inspection, adoption, scan, verification] = await Promise.all([
      probe(inspector.name, (s) => inspector.inspect(raw, s)),
      this.assessAdoption(ref, probe, signal),
      probe(scanner.name, (s) => scanner.scan(raw, VULNERABILITY.SEVERITIES, s)),
      probe(verifier.name, (s) => verifier.verify(raw, config.signature, s)),
    ]);

    const recency = evaluateRecency(inspection, now, config);
    const vulnerabilities = evaluateVulnerabilities(scan);
    const signature = evaluateSignature(verification);

    const { results, total } = aggregate([
      vendor.result,
      recency,
      adoption,
      vulnerabilities.critical,
      vulnerabilities.high,
      signature,
    ]);
    const { decision, guardrailApplied } = decide(total, vendor.vendorKnown, config.thresholds);

    return deepFreeze({
      image: raw,
      reference: ref,
      timestamp: now.toISOString(),
      results,
      total_score: total,
      max_score: MAX_SCORE,
      decision,
      vendor_known: vendor.vendorKnown,
      guardrail_applied: guardrailApplied,
      vulnerabilities: vulnerabilities.counts,
      image_metadata: toMetadata(inspection),
    });
  }

  /** A strategy bug degrades to 0 like any other unavailable source. */
  private async assessAdoption(
    ref: ImageReference,
    probe: ProbeRunner,
    signal: AbortSignal | undefined,
  ): Promise<EvaluatorResult> {
    try {
      return await evaluateAdoption(ref, this.adoption, probe);
    } catch (err: unknown) {
      if (signal?.aborted) throw err;
      this.logger.error({ registry: ref.registry, err }, '[imagegate] adoption strategy failed');
      return {
        criterion: 'adoption',
        points: 0,
        max_points: POINTS.adoption,
        detail: `Adoption assessment failed: ${errorMessage(err)}`,
      };
    }
  }
}

function toMetadata(inspection: Probe<ImageInspection>): ImageMetadata {
  if (inspection.status !== 'ok') return {};
  const { created, digest, layers, sizeBytes } = inspection.value;
  const metadata: ImageMetadata = {};
  if (created) metadata.created = created;
  if (typeof sizeBytes === 'number') metadata.size_mb = Math.round((sizeBytes / BYTES_PER_MB) * 10) / 10;
  if (typeof layers === 'number') metadata.layers = layers;
  if (digest) metadata.digest = digest;
  return metadata;
}

function deepFreeze(report: EvaluationReport): EvaluationReport {
  for (const result of report.results) Object.freeze(result);
  Object.freeze(report.results);
  Object.freeze(report.vulnerabilities);
  Object.freeze(report.image_metadata);
  return Object.freeze(report);
}
