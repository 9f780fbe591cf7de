#!/usr/bin/env tsx
/**
 * imagegate — end-to-end demo
 *
 * Needs skopeo, trivy and cosign on PATH; missing tools degrade to partial scores.
 * Run: npm run demo
 */

import chalk from 'chalk';
import { ImageGateEngine, createLogger, decisionLabel } from '@imagegate/core';
import type { Decision } from '@imagegate/core';

const engine = new ImageGateEngine({ logger: createLogger('error') });

const images = [
  'bitnami/redis:7.2',
  'quay.io/prometheus/node-exporter:v1.8.0',
  'registry.redhat.io/ubi9/ubi-minimal',
  'someone/unknown-app:latest',
];

const DECISION_COLOR: Record<Decision, (text: string) => string> = {
  'auto-approve':       chalk.green,
  'needs-human-review': chalk.yellow,
  'auto-reject':        chalk.red,
};

console.log(`\n🛡️  ${chalk.bold('imagegate — Image Trust Demo')}\n`);
console.log('═'.repeat(60));

for (const image of images) {
  process.stdout.write(`\n  Evaluating ${image} ...`);
  const report = await engine.evaluate(image);

  const filled = Math.round((report.total_score / report.max_score) * 20);
  const bar = '█'.repeat(filled) + '░'.repeat(20 - filled);
  const color = DECISION_COLOR[report.decision];

  console.log(`\r  ${chalk.bold(image)}`);
  console.log(`  Score  [${color(bar)}] ${report.total_score}/${report.max_score}`);
  console.log(`  Result ${color(decisionLabel(report.decision))}`);
  console.log(
    `  CVEs   critical ${report.vulnerabilities.critical}, high ${report.vulnerabilities.high}` +
      `   Vendor ${report.vendor_known ? 'trusted' : 'unknown'}`,
  );
}

console.log('\n' + '═'.repeat(60) + '\n');
