import { POINTS } from '../constants.js';
import type { AdoptionStrategyRegistry } from '../adoption/registry.js';
import type { EvaluatorResult, ImageReference, ProbeRunner } from '../types/index.js';

/** Adoption, delegated to the strategy registered for the image's registry host. */
export async function evaluateAdoption(
  ref: ImageReference,
  strategies: AdoptionStrategyRegistry,
  probe: ProbeRunner,
): Promise<EvaluatorResult> {
  const max = POINTS.adoption;
  const { points, detail } = await strategies.resolve(ref.registry).assess(ref, probe);
  return {
    criterion: 'adoption',
    points: Math.min(Math.max(Math.round(points), 0), max),
    max_points: max,
    detail,
  };
}
