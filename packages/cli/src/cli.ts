// imagegate CLI — `imagegate evaluate <image>`
//
// Exit codes: 0 auto-approve, 1 needs-human-review, 2 auto-reject,
// 3 usage, configuration or fatal evaluation errors.

import { Chalk } from 'chalk';
import type { ChalkInstance } from 'chalk';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import {
  EXIT_CODES,
  EvaluationCancelledError,
  ImageGateEngine,
  createLogger,
  errorMessage,
  exitCodeFor,
  formatReportJson,
  formatReportText,
  loadConfig,
} from '@imagegate/core';
import type { Decision, EvaluationReport, GateConfig } from '@imagegate/core';

export const VERSION = '0.1.0';

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  /** Colour human output (default: stdout is a TTY) */
  color?: boolean;
  env?: NodeJS.ProcessEnv;
  /** Builds the engine once config is loaded; tests inject fake capabilities here */
  createEngine?: (config: GateConfig) => ImageGateEngine;
}

interface EvaluateCommandOptions {
  json?: boolean;
  config?: string;
  timeout?: number;
}

const defaultIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  color: process.stdout.isTTY === true,
};

function parseTimeout(value: string): number {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms <= 0) {
    throw new InvalidArgumentError('must be a positive integer (milliseconds)');
  }
  return ms;
}

// ── Rendering ─────────────────────────────────────────────────────────────────

function paint(chalk: ChalkInstance, decision: Decision): (text: string) => string {
  switch (decision) {
    case 'auto-approve':       return chalk.green.bold;
    case 'needs-human-review': return chalk.yellow.bold;
    case 'auto-reject':        return chalk.red.bold;
  }
}

export function renderHuman(report: EvaluationReport, color: boolean): string {
  const chalk = new Chalk({ level: color ? 1 : 0 });
  const decide = paint(chalk, report.decision);
  return formatReportText(report)
    .split('\n')
    .map((line) => {
      if (line.startsWith('DECISION:')) return decide(line);
      if (line.startsWith('NOTE:')) return chalk.yellow(line);
      if (line.startsWith('===')) return chalk.bold(line);
      return line;
    })
    .join('\n');
}

// ── Commands ──────────────────────────────────────────────────────────────────

async function evaluateCommand(
  image: string,
  options: EvaluateCommandOptions,
  io: CliIO,
): Promise<number> {
  const config = loadConfig({ path: options.config, env: io.env });
  const engine = io.createEngine?.(config) ?? new ImageGateEngine({ config, logger: createLogger() });
  const signal = options.timeout === undefined ? undefined : AbortSignal.timeout(options.timeout);

  let report: EvaluationReport;
  try {
    report = await engine.evaluate(image, { signal });
  } catch (err: unknown) {
    if (err instanceof EvaluationCancelledError && options.timeout !== undefined) {
      throw new Error(`Evaluation of ${image.trim()} exceeded ${options.timeout}ms`, { cause: err });
    }
    throw err;
  }

  io.stdout(options.json ? `${formatReportJson(report)}\n` : `${renderHuman(report, io.color ?? false)}\n`);
  return exitCodeFor(report.decision);
}

export function createProgram(io: CliIO, onExitCode: (code: number) => void): Command {
  const program = new Command();

  program
    .name('imagegate')
    .description('Trust scoring for container images entering an approved registry')
    .version(VERSION)
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr });

  program
    .command('evaluate <image>')
    .description('Score one image reference and print the report')
    .option('--json', 'Emit the JSON report document')
    .option('-c, --config <path>', 'JSON configuration file (default: $IMAGEGATE_CONFIG)')
    .option('-t, --timeout <ms>', 'Cancel the evaluation after this many milliseconds', parseTimeout)
    .action(async (image: string, options: EvaluateCommandOptions) => {
      onExitCode(await evaluateCommand(image, options, io));
    });

  return program;
}

/** Runs the CLI against `argv` (user args only) and resolves to the exit code. */
export async function run(argv: readonly string[], io: CliIO = defaultIO): Promise<number> {
  let exitCode: number = EXIT_CODES.error;
  const program = createProgram(io, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv], { from: 'user' });
    return exitCode;
  } catch (err: unknown) {
    if (err instanceof CommanderError) {
      // help and --version exit 0; commander already printed usage errors
      return err.exitCode === 0 ? 0 : EXIT_CODES.error;
    }
    io.stderr(`imagegate: ${errorMessage(err)}\n`);
    return EXIT_CODES.error;
  }
}
