/**
 * Error taxonomy shared by the client, the resolver and the polling engine.
 *
 * Cancellation is deliberately absent: an interrupted run is an outcome,
 * not a failure.
 */

export type ErrorCode =
  | 'VALIDATION'
  | 'NOT_FOUND'
  | 'API_ERROR'
  | 'UNAUTHORIZED'
  | 'RATE_LIMITED'
  | 'TRANSIENT';

export class PipewatchError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PipewatchError';
  }
}

/** Bad user input. Never retried. */
export class ValidationError extends PipewatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'VALIDATION', options);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends PipewatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'NOT_FOUND', options);
    this.name = 'NotFoundError';
  }
}

/** Any failure reported by, or on the way to, the CI service. */
export class ApiError extends PipewatchError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown; code?: ErrorCode }
  ) {
    super(message, options?.code ?? 'API_ERROR', options);
    this.name = 'ApiError';
  }
}

export class UnauthorizedError extends ApiError {
  constructor(message = 'Authentication failed: check the Bitbucket credentials', statusCode = 401) {
    super(message, statusCode, { code: 'UNAUTHORIZED' });
    this.name = 'UnauthorizedError';
  }
}

export class RateLimitedError extends ApiError {
  constructor(
    public readonly retryAfterMs: number,
    message = `Rate limited, retry after ${Math.ceil(retryAfterMs / 1000)}s`
  ) {
    super(message, 429, { code: 'RATE_LIMITED' });
    this.name = 'RateLimitedError';
  }
}

/** Network failures, timeouts and 5xx responses. */
export class TransientError extends ApiError {
  constructor(message: string, statusCode?: number, options?: { cause?: unknown }) {
    super(message, statusCode, { ...options, code: 'TRANSIENT' });
    this.name = 'TransientError';
  }
}

export const isRetryable = (error: PipewatchError): boolean =>
  error.code === 'TRANSIENT' || error.code === 'RATE_LIMITED';

export const toPipewatchError = (error: unknown): PipewatchError => {
  if (error instanceof PipewatchError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ApiError(`Unexpected error: ${message}`, undefined, { cause: error });
};
