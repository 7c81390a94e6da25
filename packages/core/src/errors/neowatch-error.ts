/**
 * Error types shared by every neowatch package
 *
 * Per-record problems (FormatError, ValidationError) are caught by the
 * extractors; source-level problems (SourceReadError) abort the load.
 */

export type ErrorCode =
  | 'FORMAT_ERROR'
  | 'VALIDATION_ERROR'
  | 'FILE_NOT_FOUND'
  | 'PERMISSION_DENIED'
  | 'READ_FAILED'
  | 'SCHEMA_MISMATCH'
  | 'WRITE_FAILED'
  | 'UNSUPPORTED_FORMAT'
  | 'INVALID_QUERY'
  | 'UNKNOWN';

export type SourceReadErrorCode =
  | 'FILE_NOT_FOUND'
  | 'PERMISSION_DENIED'
  | 'READ_FAILED'
  | 'SCHEMA_MISMATCH';

export interface NeoWatchErrorDetails {
  /** Error code for programmatic handling */
  code: ErrorCode;
  /** Human-readable message */
  message: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Additional context */
  context?: Record<string, unknown>;
}

export class NeoWatchError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: NeoWatchErrorDetails) {
    super(details.message);
    this.name = 'NeoWatchError';
    this.code = details.code;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }

    // Maintains proper stack trace in V8 environments
    Error.captureStackTrace(this, new.target);
  }

  /**
   * Format error for terminal output
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];

    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }

    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

/**
 * A date-time string matched none of the recognized patterns
 */
export class FormatError extends NeoWatchError {
  readonly input: string;

  constructor(input: string, message?: string) {
    super({
      code: 'FORMAT_ERROR',
      message: message ?? `Unrecognized date-time: "${input}"`,
      suggestion: 'Use YYYY-MMM-DD HH:MM, e.g. "1900-Jan-01 12:00".',
      context: { input },
    });
    this.name = 'FormatError';
    this.input = input;
  }
}

/**
 * A required field is missing or a field has the wrong type
 */
export class ValidationError extends NeoWatchError {
  readonly field?: string;

  constructor(message: string, field?: string, context?: Record<string, unknown>) {
    super({
      code: 'VALIDATION_ERROR',
      message,
      context: field ? { field, ...context } : context,
    });
    this.name = 'ValidationError';
    this.field = field;
  }
}

export interface SourceReadErrorDetails {
  code: SourceReadErrorCode;
  message: string;
  filePath: string;
  suggestion?: string;
  cause?: Error;
}

/**
 * A feed cannot be read, or its top-level structure is not the expected shape
 */
export class SourceReadError extends NeoWatchError {
  readonly filePath: string;

  constructor(details: SourceReadErrorDetails) {
    super({
      code: details.code,
      message: details.message,
      suggestion: details.suggestion,
      cause: details.cause,
      context: { filePath: details.filePath },
    });
    this.name = 'SourceReadError';
    this.filePath = details.filePath;
  }
}

/**
 * Helper to wrap unknown errors as NeoWatchError
 */
export function wrapError(error: unknown, defaultCode: ErrorCode = 'UNKNOWN'): NeoWatchError {
  if (error instanceof NeoWatchError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new NeoWatchError({
    code: defaultCode,
    message,
    cause,
  });
}
