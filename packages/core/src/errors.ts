// Error taxonomy.
//
// Fatal (surface to the caller, exit code 3): InvalidImageReferenceError,
// ConfigError, EvaluationCancelledError.
// Degradation (never escape the engine): CapabilityUnavailableError,
// CommandError, HttpError — converted into unavailable probes.

export type ErrorCode =
  | 'INVALID_REFERENCE'
  | 'INVALID_CONFIG'
  | 'CANCELLED'
  | 'CAPABILITY_UNAVAILABLE'
  | 'COMMAND_FAILED'
  | 'HTTP_ERROR';

export class ImageGateError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ImageGateError';
  }
}

export class InvalidImageReferenceError extends ImageGateError {
  constructor(message = 'An image reference is required') {
    super('INVALID_REFERENCE', message);
    this.name = 'InvalidImageReferenceError';
  }
}

export class ConfigError extends ImageGateError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
    options?: { cause?: unknown },
  ) {
    super('INVALID_CONFIG', message, options);
    this.name = 'ConfigError';
  }
}

export class EvaluationCancelledError extends ImageGateError {
  constructor(image: string, options?: { cause?: unknown }) {
    super('CANCELLED', `Evaluation of ${image} was cancelled`, options);
    this.name = 'EvaluationCancelledError';
  }
}

/** The external tool is not installed (or not on PATH). */
export class CapabilityUnavailableError extends ImageGateError {
  constructor(
    public readonly capability: string,
    message = `${capability} not available`,
  ) {
    super('CAPABILITY_UNAVAILABLE', message);
    this.name = 'CapabilityUnavailableError';
  }
}

export class CommandError extends ImageGateError {
  constructor(
    public readonly command: string,
    public readonly exitCode: number | null,
    public readonly stderr: string,
  ) {
    super(
      'COMMAND_FAILED',
      `${command} exited with ${exitCode ?? 'signal'}${stderr ? ': ' + stderr.slice(0, 200) : ''}`,
    );
    this.name = 'CommandError';
  }
}

/** Thrown for non-2xx registry API responses (caller can inspect .status). */
export class HttpError extends ImageGateError {
  constructor(
    public readonly status: number,
    message: string,
  ) {
    super('HTTP_ERROR', message);
    this.name = 'HttpError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
