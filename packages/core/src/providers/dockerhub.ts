// Docker Hub — pull-count based adoption
//
// GET https://hub.docker.com/v2/repositories/<namespace>/<repo>/
// No API key required for public repositories.

import { z } from 'zod';
import { providerFetch } from './http.js';
import type { FetchOptions } from './http.js';
import { ADOPTION, POINTS } from '../constants.js';
import { dockerHubPath } from '../reference/parser.js';
import type {
  AdoptionAssessment,
  AdoptionStrategy,
  ImageReference,
  Probe,
  ProbeRunner,
} from '../types/index.js';

const DOCKER_HUB_API = 'https://hub.docker.com/v2';

const DockerHubRepositorySchema = z.object({
  pull_count: z.number().default(0),
  star_count: z.number().default(0),
}).passthrough();

export type DockerHubRepository = z.infer<typeof DockerHubRepositorySchema>;

export class DockerHubClient {
  constructor(private readonly options: Omit<FetchOptions, 'signal'> = {}) {}

  /** `path` is "<namespace>/<repo>" */
  async repository(path: string, signal: AbortSignal): Promise<DockerHubRepository> {
    const url = `${DOCKER_HUB_API}/repositories/${path.split('/').map(encodeURIComponent).join('/')}/`;
    const body = await providerFetch(url, { ...this.options, signal });
    return DockerHubRepositorySchema.parse(body);
  }
}

export class DockerHubAdoption implements AdoptionStrategy {
  readonly name = 'docker-hub';

  constructor(private readonly client = new DockerHubClient()) {}

  async assess(ref: ImageReference, probe: ProbeRunner): Promise<AdoptionAssessment> {
    const path = dockerHubPath(ref);
    const result = await probe('docker-hub', (signal) => this.client.repository(path, signal));
    return scoreDockerHub(result, path);
  }
}

export function scoreDockerHub(result: Probe<DockerHubRepository>, repo: string): AdoptionAssessment {
  if (result.status === 'unavailable') {
    return {
      points: ADOPTION.DOCKER_HUB.UNREACHABLE_POINTS,
      detail: `Docker Hub API unavailable for ${repo} (${result.message})`,
    };
  }

  const { pull_count: pulls, star_count: stars } = result.value;
  const counts = `Docker Hub: ${pulls} pulls, ${stars} stars`;

  if (pulls >= ADOPTION.DOCKER_HUB.HIGH_PULLS) {
    return { points: POINTS.adoption, detail: `${counts} (highly adopted)` };
  }
  if (pulls >= ADOPTION.DOCKER_HUB.MEDIUM_PULLS) {
    return { points: ADOPTION.MEDIUM_POINTS, detail: `${counts} (well adopted)` };
  }
  if (pulls >= ADOPTION.DOCKER_HUB.LOW_PULLS) {
    return { points: ADOPTION.LOW_POINTS, detail: `${counts} (moderately adopted)` };
  }
  return { points: 0, detail: `${counts} (low adoption)` };
}
