// CosignVerifier — Sigstore signature verification via `cosign verify`
//
// A non-zero exit means "no valid signature", not a capability failure.
// Only a missing binary (CapabilityUnavailableError) distinguishes "absent".

import { runCommand } from './exec.js';
import type { CommandRunner } from './exec.js';
import type { SignatureIdentity, SignatureVerifier } from '../types/index.js';

export class CosignVerifier implements SignatureVerifier {
  readonly name = 'cosign';

  constructor(
    private readonly runner: CommandRunner = runCommand,
    private readonly binary = 'cosign',
  ) {}

  async verify(ref: string, identity: SignatureIdentity, signal: AbortSignal): Promise<boolean> {
    const result = await this.runner(
      this.binary,
      [
        'verify',
        ref,
        `--certificate-identity-regexp=${identity.identityRegexp}`,
        `--certificate-oidc-issuer-regexp=${identity.oidcIssuerRegexp}`,
      ],
      signal,
    );
    return result.exitCode === 0;
  }
}
