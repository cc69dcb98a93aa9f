/**
 * Error codes raised by the retrieval core
 */
export enum ErrorCode {
  INVALID_CONFIGURATION = 'INVALID_CONFIGURATION',
  INVALID_INPUT = 'INVALID_INPUT',
  EMBEDDING_FAILURE = 'EMBEDDING_FAILURE',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
  COMPLETION_DEGRADED = 'COMPLETION_DEGRADED',
  INDEX_CORRUPT = 'INDEX_CORRUPT',
  ALIGNMENT_VIOLATION = 'ALIGNMENT_VIOLATION',
}

export class RagError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    cause?: unknown
  ) {
    super(message);
    this.name = 'RagError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export function isRagError(error: unknown, code?: ErrorCode): error is RagError {
  return error instanceof RagError && (code === undefined || error.code === code);
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
