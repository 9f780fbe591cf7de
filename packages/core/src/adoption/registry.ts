// Adoption strategy registry — registry host → AdoptionStrategy
//
// Each public registry exposes different adoption signals, so each gets its
// own strategy. New registries are added with register(); hosts with no
// strategy fall through to the default, which cannot assess and awards 0.

import { ADOPTION, POINTS } from '../constants.js';
import { DockerHubAdoption, DockerHubClient } from '../providers/dockerhub.js';
import { GhcrAdoption, GhcrClient } from '../providers/ghcr.js';
import { QuayAdoption, QuayClient } from '../providers/quay.js';
import type {
  AdoptionAssessment,
  AdoptionStrategy,
  GateConfig,
  ImageReference,
} from '../types/index.js';

/** Vendor-curated registry: adoption is presumed verified by the curation itself. */
export class CuratedAdoption implements AdoptionStrategy {
  readonly name = 'curated';

  async assess(ref: ImageReference): Promise<AdoptionAssessment> {
    return {
      points: POINTS.adoption,
      detail: `${ref.registry} is a vendor-curated registry (adoption verified)`,
    };
  }
}

export class UnknownRegistryAdoption implements AdoptionStrategy {
  readonly name = 'unknown';

  async assess(ref: ImageReference): Promise<AdoptionAssessment> {
    return {
      points: 0,
      detail: `Unknown registry type (${ref.registry || 'none'}), cannot assess adoption`,
    };
  }
}

export class AdoptionStrategyRegistry {
  private readonly strategies = new Map<string, AdoptionStrategy>();

  constructor(private readonly fallback: AdoptionStrategy = new UnknownRegistryAdoption()) {}

  /** Register a strategy for one or more registry hosts. Later registrations win. */
  register(hosts: string | readonly string[], strategy: AdoptionStrategy): this {
    for (const host of typeof hosts === 'string' ? [hosts] : hosts) {
      this.strategies.set(host, strategy);
    }
    return this;
  }

  resolve(registry: string): AdoptionStrategy {
    return this.strategies.get(registry) ?? this.fallback;
  }

  /** host → strategy name, for health output */
  describe(): Record<string, string> {
    const out: Record<string, string> = {};
    for (const [host, strategy] of this.strategies) out[host] = strategy.name;
    return out;
  }
}

/**
 * Built-in strategies: Docker Hub, Quay, GHCR, plus a curated strategy for
 * every curated registry in the configuration.
 */
export function createDefaultAdoptionRegistry(
  config: Pick<GateConfig, 'curatedRegistries' | 'timeouts'>,
): AdoptionStrategyRegistry {
  const http = { timeoutMs: config.timeouts.httpMs };
  return new AdoptionStrategyRegistry()
    .register(ADOPTION.DOCKER_HUB.HOSTS, new DockerHubAdoption(new DockerHubClient(http)))
    .register(ADOPTION.QUAY.HOSTS, new QuayAdoption(new QuayClient(http)))
    .register(ADOPTION.GHCR.HOSTS, new GhcrAdoption(new GhcrClient(undefined, http)))
    .register(config.curatedRegistries, new CuratedAdoption());
}
