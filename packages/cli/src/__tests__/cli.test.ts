import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, describe, it, expect } from 'vitest';
import {
  AdoptionStrategyRegistry,
  ImageGateEngine,
  formatReportText,
  silentLogger,
} from '@imagegate/core';
import type { GateConfig, VulnerabilityCounts, VulnerabilityScanner } from '@imagegate/core';
import { run, renderHuman } from '../cli.js';
import type { CliIO } from '../cli.js';

const dir = mkdtempSync(join(tmpdir(), 'imagegate-cli-'));
afterAll(() => rmSync(dir, { recursive: true, force: true }));

const CLEAN: VulnerabilityCounts = { critical: 0, high: 0, medium: 0, low: 0 };

const countingScanner = (counts: VulnerabilityCounts): VulnerabilityScanner => ({
  name: 'fake-scanner',
  scan: async () => counts,
});

// Never settles; only the caller's timeout ends the evaluation
const stuckScanner: VulnerabilityScanner = {
  name: 'stuck-scanner',
  scan: () => new Promise<never>(() => undefined),
};

function harness(scanner: VulnerabilityScanner = countingScanner(CLEAN), env: NodeJS.ProcessEnv = {}) {
  const out: string[] = [];
  const err: string[] = [];
  const io: CliIO = {
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
    color: false,
    env,
    createEngine: (config: GateConfig) =>
      new ImageGateEngine({
        config,
        capabilities: {
          inspector: { name: 'fake-inspector', inspect: async () => ({ created: '2026-05-30T00:00:00Z' }) },
          scanner,
          verifier: { name: 'fake-verifier', verify: async () => true },
        },
        adoption: new AdoptionStrategyRegistry().register('docker.io', {
          name: 'fixed',
          assess: async () => ({ points: 15, detail: 'fixed' }),
        }),
        logger: silentLogger,
        clock: () => new Date('2026-06-01T00:00:00Z'),
      }),
  };
  return { io, stdout: () => out.join(''), stderr: () => err.join('') };
}

// ── Dispositions → exit codes ─────────────────────────────────────────────────
describe('imagegate evaluate', () => {
  it('auto-approve exits 0 and prints the JSON document', async () => {
    const h = harness();
    const code = await run(['evaluate', 'bitnami/redis:7.2', '--json'], h.io);

    expect(code).toBe(0);
    const doc: unknown = JSON.parse(h.stdout());
    expect(doc).toMatchObject({ image: 'bitnami/redis:7.2', total_score: 100, decision: 'auto-approve' });
    expect(h.stderr()).toBe('');
  });

  it('unknown vendor below the auto-approve threshold exits 1 without a guardrail note', async () => {
    const h = harness();
    const code = await run(['evaluate', 'someone/app:1'], h.io);

    expect(code).toBe(1);
    const lines = h.stdout().split('\n');
    expect(lines).toContain('TOTAL:    70 / 100');
    expect(lines).toContain('DECISION: needs-human-review');
    expect(lines.some((line) => line.startsWith('NOTE:'))).toBe(false);
  });

  it('unknown vendor at the auto-approve threshold exits 1 with the guardrail note', async () => {
    const h = harness(countingScanner(CLEAN), { IMAGEGATE_AUTO_APPROVE_THRESHOLD: '70' });
    const code = await run(['evaluate', 'someone/app:1'], h.io);

    expect(code).toBe(1);
    const lines = h.stdout().split('\n');
    expect(lines).toContain('DECISION: needs-human-review');
    expect(lines).toContain('NOTE:     unknown vendor, auto-approval withheld pending human review');
  });

  it('auto-reject exits 2', async () => {
    const h = harness(countingScanner({ critical: 2, high: 3, medium: 0, low: 0 }));
    const code = await run(['evaluate', 'someone/app:1'], h.io);

    expect(code).toBe(2);
    expect(h.stdout().split('\n')).toContain('TOTAL:    40 / 100');
  });

  it('--config extends the trusted namespaces', async () => {
    const path = join(dir, 'trusted.json');
    writeFileSync(path, JSON.stringify({ trustedNamespaces: ['someone'] }));
    const h = harness();

    expect(await run(['evaluate', 'someone/app:1', '--config', path], h.io)).toBe(0);
  });
});

// ── Failures → exit code 3 ────────────────────────────────────────────────────
describe('imagegate fatal errors', () => {
  it('unreadable config file', async () => {
    const h = harness();
    const code = await run(['evaluate', 'bitnami/redis:7.2', '-c', join(dir, 'missing.json')], h.io);

    expect(code).toBe(3);
    expect(h.stderr().startsWith(`imagegate: Cannot read config file ${join(dir, 'missing.json')}: `)).toBe(true);
    expect(h.stdout()).toBe('');
  });

  it('blank image reference', async () => {
    const h = harness();
    expect(await run(['evaluate', '   '], h.io)).toBe(3);
    expect(h.stderr()).toBe('imagegate: An image reference is required\n');
  });

  it('--timeout cancels a stuck evaluation', async () => {
    const h = harness(stuckScanner);
    const code = await run(['evaluate', 'someone/app:1', '--timeout', '20'], h.io);

    expect(code).toBe(3);
    expect(h.stderr()).toBe('imagegate: Evaluation of someone/app:1 exceeded 20ms\n');
    expect(h.stdout()).toBe('');
  });

  it('rejects a non-numeric --timeout', async () => {
    const h = harness();
    expect(await run(['evaluate', 'bitnami/redis:7.2', '--timeout', 'abc'], h.io)).toBe(3);
    expect(h.stderr()).toContain("argument 'abc' is invalid");
  });

  it('missing command', async () => {
    const h = harness();
    expect(await run([], h.io)).toBe(3);
  });

  it('--version exits 0', async () => {
    const h = harness();
    expect(await run(['--version'], h.io)).toBe(0);
    expect(h.stdout()).toBe('0.1.0\n');
  });
});

// ── Rendering ─────────────────────────────────────────────────────────────────
describe('renderHuman', () => {
  const engine = new ImageGateEngine({
    capabilities: {
      inspector: { name: 'fake-inspector', inspect: async () => ({ created: '2026-05-30T00:00:00Z' }) },
      scanner: countingScanner(CLEAN),
      verifier: { name: 'fake-verifier', verify: async () => true },
    },
    adoption: new AdoptionStrategyRegistry(),
    logger: silentLogger,
    clock: () => new Date('2026-06-01T00:00:00Z'),
  });

  it('is the plain text report without colour', async () => {
    const report = await engine.evaluate('bitnami/redis:7.2');
    expect(renderHuman(report, false)).toBe(formatReportText(report));
  });

  it('colours the decision line by disposition', async () => {
    const report = await engine.evaluate('bitnami/redis:7.2');
    expect(renderHuman(report, true).split('\n')).toContain(
      '\u001b[32m\u001b[1mDECISION: auto-approve\u001b[22m\u001b[39m',
    );
  });
});
