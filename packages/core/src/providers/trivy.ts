// TrivyScanner — vulnerability counts via `trivy image --format json`

import { z } from 'zod';
import { runChecked, runCommand } from './exec.js';
import type { CommandRunner } from './exec.js';
import type {
  Severity,
  VulnerabilityCounts,
  VulnerabilityScanner,
} from '../types/index.js';

const TrivyReportSchema = z.object({
  Results: z
    .array(
      z.object({
        Vulnerabilities: z
          .array(z.object({ Severity: z.string() }).passthrough())
          .nullable()
          .optional(),
      }).passthrough(),
    )
    .nullable()
    .optional(),
}).passthrough();

export class TrivyScanner implements VulnerabilityScanner {
  readonly name = 'trivy';

  constructor(
    private readonly runner: CommandRunner = runCommand,
    private readonly binary = 'trivy',
  ) {}

  async scan(
    ref: string,
    severities: readonly Severity[],
    signal: AbortSignal,
  ): Promise<VulnerabilityCounts> {
    const stdout = await runChecked(
      this.runner,
      this.binary,
      ['image', '--severity', severities.join(','), '--format', 'json', '--quiet', ref],
      signal,
    );
    return parseTrivyReport(stdout);
  }
}

/**
 * Count vulnerabilities per severity across every result target.
 * An empty document is treated as a failed scan, not a clean one.
 */
export function parseTrivyReport(stdout: string): VulnerabilityCounts {
  const trimmed = stdout.trim();
  if (!trimmed || trimmed === '{}') {
    throw new Error('Trivy scan returned no results');
  }

  const report = TrivyReportSchema.parse(JSON.parse(trimmed));
  const counts: VulnerabilityCounts = { critical: 0, high: 0, medium: 0, low: 0 };

  for (const result of report.Results ?? []) {
    for (const vuln of result.Vulnerabilities ?? []) {
      switch (vuln.Severity) {
        case 'CRITICAL': counts.critical++; break;
        case 'HIGH':     counts.high++;     break;
        case 'MEDIUM':   counts.medium++;   break;
        case 'LOW':      counts.low++;      break;
      }
    }
  }

  return counts;
}
