// Logging — pino, the same logger Fastify runs on, so the API can hand its
// request logger to the engine.

import pino from 'pino';
import type { BaseLogger, LevelWithSilent } from 'pino';

export type Logger = Pick<BaseLogger, 'debug' | 'info' | 'warn' | 'error'>;

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function levelFrom(value: string | undefined): LevelWithSilent {
  return LEVELS.find((level) => level === value) ?? 'warn';
}

/**
 * JSON logs to stderr, so stdout stays clean for `--json` reports.
 * Level comes from IMAGEGATE_LOG_LEVEL (default: warn).
 */
export function createLogger(level?: LevelWithSilent): Logger {
  return pino(
    { name: 'imagegate', level: level ?? levelFrom(process.env['IMAGEGATE_LOG_LEVEL']) },
    pino.destination(2),
  );
}

export const silentLogger: Logger = pino({ level: 'silent' });
