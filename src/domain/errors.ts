export type ValidationCode =
  | 'invalid-document'
  | 'invalid-pixel-count'
  | 'invalid-refresh-rate'
  | 'invalid-end-time'
  | 'invalid-time'
  | 'invalid-color'
  | 'invalid-duration'
  | 'empty-sequence'
  | 'non-monotonic'
  | 'invalid-filename'
  | 'invalid-brightness';

/**
 * Input rejected before any bytes are produced or sent.
 */
export class ValidationError extends Error {
  public readonly code: ValidationCode;
  public readonly details: Record<string, unknown>;

  constructor(code: ValidationCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = 'ValidationError';
    this.code = code;
    this.details = details;
  }
}

export type TransportErrorCode =
  | 'connect-timeout'
  | 'connection-refused'
  | 'connection-reset'
  | 'send-failed'
  | 'socket-error'
  | 'not-started';

/**
 * Socket-level failure surfaced to callers inside a result value.
 */
export class TransportError extends Error {
  public readonly code: TransportErrorCode;

  constructor(code: TransportErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'TransportError';
    this.code = code;
  }

  static fromSocketError(error: unknown, fallback: TransportErrorCode = 'socket-error'): TransportError {
    if (error instanceof TransportError) {
      return error;
    }
    const errno = error instanceof Error && 'code' in error ? error.code : undefined;
    const message = error instanceof Error ? error.message : String(error);
    if (errno === 'ECONNREFUSED') {
      return new TransportError('connection-refused', message, error);
    }
    if (errno === 'ECONNRESET' || errno === 'EPIPE') {
      return new TransportError('connection-reset', message, error);
    }
    return new TransportError(fallback, message, error);
  }
}
