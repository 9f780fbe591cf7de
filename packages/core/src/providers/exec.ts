/**
 * Shared process runner for the CLI-backed capabilities (skopeo, trivy, cosign).
 */

import { execFile } from 'node:child_process';
import { CapabilityUnavailableError, CommandError } from '../errors.js';

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/** Runs a command; resolves with any exit code, rejects only when it cannot run. */
export type CommandRunner = (
  command: string,
  args: readonly string[],
  signal: AbortSignal,
) => Promise<CommandResult>;

const MAX_BUFFER = 64 * 1024 * 1024; // trivy JSON for large images runs to tens of MB

export const runCommand: CommandRunner = (command, args, signal) =>
  new Promise<CommandResult>((resolve, reject) => {
    execFile(
      command,
      [...args],
      { signal, maxBuffer: MAX_BUFFER, encoding: 'utf8' },
      (err, stdout, stderr) => {
        if (!err) {
          resolve({ stdout, stderr, exitCode: 0 });
          return;
        }
        const code: unknown = err.code;
        if (code === 'ENOENT') {
          reject(new CapabilityUnavailableError(command));
          return;
        }
        if (typeof code === 'number') {
          resolve({ stdout, stderr, exitCode: code });
          return;
        }
        reject(err);
      },
    );
  });

/** Resolve stdout of a zero-exit run, or throw CommandError. */
export async function runChecked(
  runner: CommandRunner,
  command: string,
  args: readonly string[],
  signal: AbortSignal,
): Promise<string> {
  const result = await runner(command, args, signal);
  if (result.exitCode !== 0) {
    throw new CommandError(command, result.exitCode, result.stderr.trim());
  }
  return result.stdout;
}
