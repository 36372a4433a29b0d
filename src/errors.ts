/**
 * Error Hierarchy
 *
 * Every error raised by the dispatch layer extends VcdiffError and carries a
 * stable `code` for programmatic handling. Errors thrown by a backend while it
 * runs `diff`/`patch` are passed through untouched; DeltaFormatError is the
 * one the bundled codec raises for malformed deltas.
 *
 * @example
 * ```typescript
 * try {
 *   await patch(source, delta)
 * } catch (err) {
 *   if (err instanceof NoBackendAvailableError) console.error(err.attempts)
 * }
 * ```
 */

export type VcdiffErrorCode = 'NO_BACKEND_AVAILABLE' | 'BACKEND_LOAD_FAILED' | 'UNSUITABLE_SOURCE_HANDLE' | 'INVALID_ENDPOINT' | 'INVALID_DELTA';

export class VcdiffError extends Error {
  readonly code: VcdiffErrorCode;

  constructor(message: string, code: VcdiffErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'VcdiffError';
    this.code = code;
  }

  toJSON(): { name: string; code: VcdiffErrorCode; message: string } {
    return { name: this.name, code: this.code, message: this.message };
  }
}

export interface ProbeFailure {
  backend: string;
  error: Error;
}

/**
 * No override was set, nothing was loaded and every candidate failed to load.
 */
export class NoBackendAvailableError extends VcdiffError {
  readonly attempts: ProbeFailure[];

  constructor(attempts: ProbeFailure[]) {
    const tried = attempts.length ? ` (tried ${attempts.map((a) => a.backend).join(', ')})` : '';
    super(`Unable to find any VCDIFF backend${tried}: install at least one backend module`, 'NO_BACKEND_AVAILABLE');
    this.name = 'NoBackendAvailableError';
    this.attempts = attempts;
  }
}

/**
 * An explicitly requested backend could not be loaded.
 */
export class BackendLoadError extends VcdiffError {
  readonly backend: string;

  constructor(backend: string, cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    super(`Unable to load VCDIFF backend ${backend}${reason}`, 'BACKEND_LOAD_FAILED', { cause });
    this.name = 'BackendLoadError';
    this.backend = backend;
  }
}

export class UnsuitableSourceHandleError extends VcdiffError {
  constructor(detail: string) {
    super(`Source handle must be a seekable regular file, got ${detail}`, 'UNSUITABLE_SOURCE_HANDLE');
    this.name = 'UnsuitableSourceHandleError';
  }
}

export class InvalidEndpointError extends VcdiffError {
  constructor(message: string) {
    super(message, 'INVALID_ENDPOINT');
    this.name = 'InvalidEndpointError';
  }
}

export class DeltaFormatError extends VcdiffError {
  constructor(message: string) {
    super(message, 'INVALID_DELTA');
    this.name = 'DeltaFormatError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
