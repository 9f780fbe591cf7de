// GitHub Container Registry — published version count as adoption
//
// GET https://api.github.com/orgs/<org>/packages/container/<package>/versions
// The packages API requires a token even for public packages; without one
// (or on any failure) the version count is taken as zero → floor score.

import { z } from 'zod';
import { providerFetch } from './http.js';
import type { FetchOptions } from './http.js';
import { ADOPTION, POINTS } from '../constants.js';
import type {
  AdoptionAssessment,
  AdoptionStrategy,
  ImageReference,
  Probe,
  ProbeRunner,
} from '../types/index.js';

const GITHUB_API = 'https://api.github.com';

const PackageVersionsSchema = z.array(z.unknown());

export class GhcrClient {
  private readonly token: string | undefined;

  constructor(
    token?: string,
    private readonly options: Omit<FetchOptions, 'signal' | 'bearerToken'> = {},
  ) {
    this.token = token ?? process.env['GITHUB_TOKEN'];
  }

  /** Number of versions on the first page (max 100). */
  async versionCount(org: string, pkg: string, signal: AbortSignal): Promise<number> {
    const url =
      `${GITHUB_API}/orgs/${encodeURIComponent(org)}/packages/container/` +
      `${encodeURIComponent(pkg)}/versions?per_page=100`;
    const body = await providerFetch(url, {
      ...this.options,
      headers: { Accept: 'application/vnd.github+json', ...this.options.headers },
      bearerToken: this.token,
      signal,
    });
    return PackageVersionsSchema.parse(body).length;
  }
}

export class GhcrAdoption implements AdoptionStrategy {
  readonly name = 'ghcr';

  constructor(private readonly client = new GhcrClient()) {}

  async assess(ref: ImageReference, probe: ProbeRunner): Promise<AdoptionAssessment> {
    const result = await probe('ghcr', (signal) =>
      this.client.versionCount(ref.namespace, ref.repository, signal),
    );
    return scoreGhcr(result);
  }
}

export function scoreGhcr(result: Probe<number>): AdoptionAssessment {
  const versions = result.status === 'ok' ? result.value : 0;
  const counts = `GHCR: ${versions} versions`;

  if (versions >= ADOPTION.GHCR.HIGH_VERSIONS) {
    return { points: POINTS.adoption, detail: `${counts} (actively maintained)` };
  }
  if (versions >= ADOPTION.GHCR.MEDIUM_VERSIONS) {
    return { points: ADOPTION.MEDIUM_POINTS, detail: counts };
  }
  const suffix = result.status === 'unavailable' ? ` (API unavailable: ${result.message})` : ' (limited history)';
  return { points: ADOPTION.GHCR.FLOOR_POINTS, detail: `${counts}${suffix}` };
}
