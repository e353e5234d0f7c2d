/**
 * Error types surfaced to the operator
 * Core functions degrade to empty results; only these abort a run.
 */

export type CleanerErrorCode = 'EXPORT_FORMAT' | 'INPUT_FILE' | 'OUTPUT_WRITE';

/**
 * Base class for fatal cleaner errors
 */
export class CleanerError extends Error {
  constructor(
    message: string,
    public readonly code: CleanerErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CleanerError';
  }
}

/**
 * The export document is not valid JSON or has the wrong top-level shape
 */
export class ExportFormatError extends CleanerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'EXPORT_FORMAT', options);
    this.name = 'ExportFormatError';
  }
}

/**
 * The input file is missing or unreadable
 */
export class InputFileError extends CleanerError {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'INPUT_FILE', options);
    this.name = 'InputFileError';
  }
}

/**
 * An aggregate artifact could not be written
 */
export class OutputWriteError extends CleanerError {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'OUTPUT_WRITE', options);
    this.name = 'OutputWriteError';
  }
}

/**
 * Render an unknown thrown value as a message
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
