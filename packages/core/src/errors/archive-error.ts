/**
 * Error types for the archive
 */

export type ArchiveErrorCode =
  | 'CONFIG_ERROR'
  | 'ENTITY_NOT_FOUND'
  | 'INVALID_DOCUMENT'
  | 'OUT_OF_ORDER_TIMESTAMP'
  | 'STORAGE_READ_FAILURE'
  | 'STORAGE_WRITE_FAILURE'
  | 'STORAGE_DELETE_FAILURE'
  | 'FETCH_FAILED';

export interface ArchiveErrorDetails {
  /** Error code for programmatic handling */
  code: ArchiveErrorCode;
  /** Human-readable message */
  message: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Additional context */
  context?: Record<string, unknown>;
}

export class ArchiveError extends Error {
  readonly code: ArchiveErrorCode;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: ArchiveErrorDetails) {
    super(details.message);
    this.name = 'ArchiveError';
    this.code = details.code;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }
  }

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

export function isArchiveError(err: unknown, code?: ArchiveErrorCode): err is ArchiveError {
  return err instanceof ArchiveError && (code === undefined || err.code === code);
}

/**
 * Helper to wrap unknown errors as ArchiveError
 */
export function wrapError(
  error: unknown,
  code: ArchiveErrorCode,
  message: string,
  context?: Record<string, unknown>
): ArchiveError {
  if (error instanceof ArchiveError) {
    return error;
  }

  const detail = error instanceof Error ? error.message : String(error);

  return new ArchiveError({
    code,
    message: `${message}: ${detail}`,
    cause: error instanceof Error ? error : undefined,
    context,
  });
}
