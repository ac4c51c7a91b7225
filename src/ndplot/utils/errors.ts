/**
 * Error types raised by ndplot, plus helpers for reporting thrown values.
 */

export class NdplotError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Malformed command line. Raised before any file is touched.
 */
export class UsageError extends NdplotError {
  readonly exitCode = 2;
}

/**
 * The array file is missing, unreadable, or not a serialized array.
 */
export class FileLoadError extends NdplotError {
  constructor(
    readonly path: string,
    readonly reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Cannot load array from '${path}': ${reason}`, options);
  }
}

/**
 * The loaded array cannot be drawn in the requested mode.
 */
export class RenderError extends NdplotError {}

/**
 * Extracts a string message from any error value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
