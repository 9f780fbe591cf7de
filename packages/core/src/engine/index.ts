export { ImageGateEngine } from './gate-engine.js';
export type { EngineOptions, EvaluateOptions } from './gate-engine.js';
export { createProbeRunner } from './probe.js';
export type { ProbeRunnerOptions } from './probe.js';
export {
  aggregate,
  classifyScore,
  decide,
  decisionLabel,
} from './scoring.js';
