/**
 * Gate configuration — trusted vendors, thresholds, timeouts.
 *
 * Resolution order (later wins): built-in defaults → JSON file
 * (explicit path or IMAGEGATE_CONFIG) → IMAGEGATE_* environment overrides.
 * The result is validated and frozen; evaluators never read ambient state.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { RECENCY, SIGNATURE, THRESHOLDS, TIMEOUT, TRUSTED } from '../constants.js';
import { ConfigError, errorMessage } from '../errors.js';
import type { GateConfig } from '../types/index.js';

const score = z.number().int().min(0).max(100);
const days = z.number().int().min(0);
const millis = z.number().int().positive();

export const GateConfigSchema = z
  .object({
    trustedRegistries: z.array(z.string().min(1)).default([...TRUSTED.REGISTRIES]),
    trustedNamespaces: z.array(z.string().min(1)).default([...TRUSTED.NAMESPACES]),
    curatedRegistries: z.array(z.string().min(1)).default([...TRUSTED.CURATED_REGISTRIES]),
    recency: z
      .object({
        recentDays: days.default(RECENCY.RECENT_DAYS),
        staleDays: days.default(RECENCY.STALE_DAYS),
      })
      .default({}),
    thresholds: z
      .object({
        autoApprove: score.default(THRESHOLDS.AUTO_APPROVE),
        humanReview: score.default(THRESHOLDS.HUMAN_REVIEW),
      })
      .default({}),
    signature: z
      .object({
        identityRegexp: z.string().min(1).default(SIGNATURE.IDENTITY_REGEXP),
        oidcIssuerRegexp: z.string().min(1).default(SIGNATURE.ISSUER_REGEXP),
      })
      .default({}),
    timeouts: z
      .object({
        capabilityMs: millis.default(TIMEOUT.CAPABILITY_MS),
        httpMs: millis.default(TIMEOUT.HTTP_MS),
      })
      .default({}),
  })
  .strict()
  .superRefine((cfg, ctx) => {
    if (cfg.thresholds.humanReview >= cfg.thresholds.autoApprove) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['thresholds', 'humanReview'],
        message: 'humanReview threshold must be below autoApprove',
      });
    }
    if (cfg.recency.recentDays > cfg.recency.staleDays) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['recency', 'recentDays'],
        message: 'recentDays must not exceed staleDays',
      });
    }
  });

export type GateConfigInput = z.input<typeof GateConfigSchema>;

function freeze(config: z.output<typeof GateConfigSchema>): GateConfig {
  return Object.freeze({
    trustedRegistries: Object.freeze([...config.trustedRegistries]),
    trustedNamespaces: Object.freeze([...config.trustedNamespaces]),
    curatedRegistries: Object.freeze([...config.curatedRegistries]),
    recency: Object.freeze({ ...config.recency }),
    thresholds: Object.freeze({ ...config.thresholds }),
    signature: Object.freeze({ ...config.signature }),
    timeouts: Object.freeze({ ...config.timeouts }),
  });
}

/** Validate a raw value (parsed JSON, programmatic input) into a frozen GateConfig. */
export function parseConfig(input: unknown = {}): GateConfig {
  const parsed = GateConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }
  return freeze(parsed.data);
}

export const defaultConfig: GateConfig = parseConfig();

// ─── Environment overrides ────────────────────────────────────────────────────

type Section = 'recency' | 'thresholds' | 'timeouts';

const ENV_OVERRIDES: ReadonlyArray<{ name: string; section: Section; key: string }> = [
  { name: 'IMAGEGATE_RECENCY_DAYS',           section: 'recency',    key: 'recentDays' },
  { name: 'IMAGEGATE_AUTO_APPROVE_THRESHOLD', section: 'thresholds', key: 'autoApprove' },
  { name: 'IMAGEGATE_REVIEW_THRESHOLD',       section: 'thresholds', key: 'humanReview' },
  { name: 'IMAGEGATE_CAPABILITY_TIMEOUT_MS',  section: 'timeouts',   key: 'capabilityMs' },
];

function applyEnv(base: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };
  for (const { name, section, key } of ENV_OVERRIDES) {
    const raw = env[name];
    if (raw === undefined || raw === '') continue;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
      throw new ConfigError(`${name} must be a number, got "${raw}"`);
    }
    const current = out[section];
    const sectionValue = typeof current === 'object' && current !== null ? current : {};
    out[section] = { ...sectionValue, [key]: value };
  }
  return out;
}

export interface LoadConfigOptions {
  /** JSON config file; falls back to env IMAGEGATE_CONFIG */
  path?: string;
  env?: NodeJS.ProcessEnv;
}

export function loadConfig(options: LoadConfigOptions = {}): GateConfig {
  const env = options.env ?? process.env;
  const path = options.path ?? env['IMAGEGATE_CONFIG'];

  let fileConfig: Record<string, unknown> = {};
  if (path) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(path, 'utf8'));
    } catch (err) {
      throw new ConfigError(`Cannot read config file ${path}: ${errorMessage(err)}`, [], { cause: err });
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new ConfigError(`Config file ${path} must contain a JSON object`);
    }
    fileConfig = { ...parsed };
  }

  return parseConfig(applyEnv(fileConfig, env));
}
