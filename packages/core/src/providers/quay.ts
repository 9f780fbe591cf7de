// Quay — star/tag based adoption
//
// GET https://quay.io/api/v1/repository/<namespace>/<repo>
// Quay exposes no pull counts publicly, so stars and tag history stand in.
// Missing data is "limited", never disqualifying: floor and unreachable are 5.

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

const QUAY_API = 'https://quay.io/api/v1';

const QuayRepositorySchema = z.object({
  star_count: z.number().default(0),
  tags: z.record(z.unknown()).nullable().optional(),
}).passthrough();

export interface QuayStats {
  stars: number;
  tags: number;
}

export class QuayClient {
  constructor(private readonly options: Omit<FetchOptions, 'signal'> = {}) {}

  async repository(namespace: string, repository: string, signal: AbortSignal): Promise<QuayStats> {
    const url = `${QUAY_API}/repository/${encodeURIComponent(namespace)}/${encodeURIComponent(repository)}`;
    const body = QuayRepositorySchema.parse(await providerFetch(url, { ...this.options, signal }));
    return { stars: body.star_count, tags: Object.keys(body.tags ?? {}).length };
  }
}

export class QuayAdoption implements AdoptionStrategy {
  readonly name = 'quay';

  constructor(private readonly client = new QuayClient()) {}

  async assess(ref: ImageReference, probe: ProbeRunner): Promise<AdoptionAssessment> {
    const result = await probe('quay', (signal) =>
      this.client.repository(ref.namespace, ref.repository, signal),
    );
    return scoreQuay(result);
  }
}

export function scoreQuay(result: Probe<QuayStats>): AdoptionAssessment {
  if (result.status === 'unavailable') {
    return {
      points: ADOPTION.QUAY.UNREACHABLE_POINTS,
      detail: `Quay.io API unavailable (${result.message}), partial score awarded`,
    };
  }

  const { stars, tags } = result.value;
  const counts = `Quay.io: ${stars} stars, ${tags} tags`;

  if (stars >= ADOPTION.QUAY.HIGH_STARS || tags >= ADOPTION.QUAY.HIGH_TAGS) {
    return { points: POINTS.adoption, detail: `${counts} (well adopted)` };
  }
  if (stars >= ADOPTION.QUAY.MEDIUM_STARS || tags >= ADOPTION.QUAY.MEDIUM_TAGS) {
    return { points: ADOPTION.MEDIUM_POINTS, detail: `${counts} (moderately adopted)` };
  }
  return { points: ADOPTION.QUAY.FLOOR_POINTS, detail: `${counts} (limited adoption data)` };
}
