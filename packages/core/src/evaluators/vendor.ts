import { POINTS } from '../constants.js';
import type { EvaluatorResult, GateConfig, ImageReference } from '../types/index.js';

export interface VendorEvaluation {
  result: EvaluatorResult;
  /** Feeds the aggregator's guardrail: unknown vendors never auto-approve */
  vendorKnown: boolean;
}

/**
 * Vendor trust. Exact string match only: no prefixes, globs or case folding.
 * A trusted registry supersedes the namespace check.
 */
export function evaluateVendor(
  ref: ImageReference,
  config: Pick<GateConfig, 'trustedRegistries' | 'trustedNamespaces'>,
): VendorEvaluation {
  const max = POINTS.vendor_trust;

  if (config.trustedRegistries.includes(ref.registry)) {
    return {
      vendorKnown: true,
      result: {
        criterion: 'vendor_trust',
        points: max,
        max_points: max,
        detail: `Registry ${ref.registry} is a trusted vendor registry`,
      },
    };
  }

  if (ref.namespace && config.trustedNamespaces.includes(ref.namespace)) {
    return {
      vendorKnown: true,
      result: {
        criterion: 'vendor_trust',
        points: max,
        max_points: max,
        detail: `${ref.namespace} is a known trusted vendor`,
      },
    };
  }

  return {
    vendorKnown: false,
    result: {
      criterion: 'vendor_trust',
      points: 0,
      max_points: max,
      detail: `${ref.namespace || '(no namespace)'} is NOT a known trusted vendor (unknown vendors require human review)`,
    },
  };
}
