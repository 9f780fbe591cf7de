// @imagegate/core — public API

// ── Engine ───────────────────────────────────────────────────────────────────
export { ImageGateEngine, createProbeRunner } from './engine/index.js';
export { aggregate, classifyScore, decide, decisionLabel } from './engine/index.js';
export type { EngineOptions, EvaluateOptions, ProbeRunnerOptions } from './engine/index.js';

// ── Reference parsing ────────────────────────────────────────────────────────
export { dockerHubPath, formatImageReference, parseImageReference } from './reference/parser.js';

// ── Evaluators ───────────────────────────────────────────────────────────────
export {
  ageInDays,
  evaluateAdoption,
  evaluateRecency,
  evaluateSignature,
  evaluateVendor,
  evaluateVulnerabilities,
} from './evaluators/index.js';
export type { VendorEvaluation, VulnerabilityEvaluation } from './evaluators/index.js';

// ── Adoption strategies ──────────────────────────────────────────────────────
export {
  AdoptionStrategyRegistry,
  CuratedAdoption,
  UnknownRegistryAdoption,
  createDefaultAdoptionRegistry,
} from './adoption/index.js';

// ── Capability clients ───────────────────────────────────────────────────────
export {
  CosignVerifier,
  DockerHubAdoption,
  DockerHubClient,
  GhcrAdoption,
  GhcrClient,
  QuayAdoption,
  QuayClient,
  SkopeoInspector,
  TrivyScanner,
  parseSkopeoInspect,
  parseTrivyReport,
  providerFetch,
  runCommand,
} from './providers/index.js';
export type { CommandResult, CommandRunner, FetchOptions } from './providers/index.js';

// ── Report ───────────────────────────────────────────────────────────────────
export {
  CRITERION_LABELS,
  EXIT_CODES,
  exitCodeFor,
  formatReportJson,
  formatReportText,
  toReportDocument,
} from './report/index.js';
export type { ExitCode, ReportDocument, ScoreEntry } from './report/index.js';

// ── Config, errors, logging ──────────────────────────────────────────────────
export { GateConfigSchema, defaultConfig, loadConfig, parseConfig } from './config/index.js';
export type { GateConfigInput, LoadConfigOptions } from './config/index.js';
export {
  CapabilityUnavailableError,
  CommandError,
  ConfigError,
  EvaluationCancelledError,
  HttpError,
  ImageGateError,
  InvalidImageReferenceError,
  errorMessage,
} from './errors.js';
export type { ErrorCode } from './errors.js';
export { createLogger, silentLogger } from './logger.js';
export type { Logger } from './logger.js';
export { CRITERIA, MAX_SCORE, POINTS } from './constants.js';

// ── Types ────────────────────────────────────────────────────────────────────
export type {
  AdoptionAssessment,
  AdoptionStrategy,
  Capabilities,
  Criterion,
  Decision,
  EvaluationReport,
  EvaluatorResult,
  GateConfig,
  ImageInspection,
  ImageInspector,
  ImageMetadata,
  ImageReference,
  Probe,
  ProbeRunner,
  Severity,
  SignatureIdentity,
  SignatureVerifier,
  UnavailableReason,
  VulnerabilityCounts,
  VulnerabilityScanner,
} from './types/index.js';
