// Built-in capability clients

// ── Image tooling (process-backed) ────────────────────────────────────────────
export { SkopeoInspector, parseSkopeoInspect } from './skopeo.js';
export { TrivyScanner, parseTrivyReport }     from './trivy.js';
export { CosignVerifier }                     from './cosign.js';
export { runCommand, runChecked }             from './exec.js';
export type { CommandResult, CommandRunner }  from './exec.js';

// ── Registry metadata (HTTP) ──────────────────────────────────────────────────
export { DockerHubAdoption, DockerHubClient, scoreDockerHub } from './dockerhub.js';
export { QuayAdoption, QuayClient, scoreQuay }                from './quay.js';
export { GhcrAdoption, GhcrClient, scoreGhcr }                from './ghcr.js';
export { providerFetch }                                      from './http.js';
export type { FetchOptions }                                  from './http.js';
