import { POINTS } from '../constants.js';
import type { EvaluatorResult, Probe } from '../types/index.js';

/** Signature presence is binary: verified → 10, anything else → 0. */
export function evaluateSignature(verification: Probe<boolean>): EvaluatorResult {
  const max = POINTS.signature;

  if (verification.status === 'unavailable') {
    return {
      criterion: 'signature',
      points: 0,
      max_points: max,
      detail:
        verification.reason === 'absent'
          ? 'Signature verifier not available, treated as unsigned'
          : `Signature verification could not run (${verification.message}), treated as unsigned`,
    };
  }

  return verification.value
    ? { criterion: 'signature', points: max, max_points: max, detail: 'cosign signature verified (Sigstore)' }
    : {
        criterion: 'signature',
        points: 0,
        max_points: max,
        detail: 'No cosign signature found (not signed or verification failed)',
      };
}
