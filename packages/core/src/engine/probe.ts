// ProbeRunner — one bounded capability call.
//
// Each call gets its own timeout combined with the caller's signal. Timeouts
// and failures become `unavailable` probes so the evaluator can apply its
// degraded path; caller cancellation is the only thing that rethrows.

import { CapabilityUnavailableError, errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import type { Probe, ProbeRunner } from '../types/index.js';

export interface ProbeRunnerOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  logger: Logger;
}

/** Settle with the task, or reject as soon as `signal` aborts (tasks may ignore it). */
function untilAborted<T>(task: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    void task
      .then(resolve, reject)
      .finally(() => signal.removeEventListener('abort', onAbort));
  });
}

export function createProbeRunner(options: ProbeRunnerOptions): ProbeRunner {
  const { timeoutMs, signal: outer, logger } = options;

  return async <T>(source: string, task: (signal: AbortSignal) => Promise<T>): Promise<Probe<T>> => {
    outer?.throwIfAborted();

    const timeout = AbortSignal.timeout(timeoutMs);
    const signal = outer ? AbortSignal.any([outer, timeout]) : timeout;

    try {
      const value = await untilAborted(Promise.resolve().then(() => task(signal)), signal);
      return { status: 'ok', value };
    } catch (err: unknown) {
      if (outer?.aborted) throw err;

      let probe: Probe<T>;
      if (timeout.aborted) {
        probe = { status: 'unavailable', reason: 'timeout', message: `${source} timed out after ${timeoutMs}ms` };
      } else if (err instanceof CapabilityUnavailableError) {
        probe = { status: 'unavailable', reason: 'absent', message: err.message };
      } else {
        probe = { status: 'unavailable', reason: 'failed', message: errorMessage(err) };
      }

      logger.warn({ source, reason: probe.reason }, `[imagegate] ${source} unavailable: ${probe.message}`);
      return probe;
    }
  };
}
