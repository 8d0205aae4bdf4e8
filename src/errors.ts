/**
 * Application error hierarchy.
 * Every AppError carries an HTTP status and a machine-readable code;
 * the error handler middleware turns them into JSON error bodies.
 */

export class AppError extends Error {
  constructor(
    readonly statusCode: number,
    readonly code: string,
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(400, 'INVALID_REQUEST', message, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(404, 'NOT_FOUND', message);
  }
}

/** Raised by repositories; `code` distinguishes the kind of conflict. */
export class ConflictError extends AppError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(409, code, message, details);
  }
}

export const WRITE_CONFLICT = 'WRITE_CONFLICT';

export class SourceUnavailableError extends AppError {
  constructor(source: string) {
    super(503, 'SOURCE_UNAVAILABLE', `${source} is currently unavailable`, { source });
  }
}

export class TransientError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(503, 'TRANSIENT_ERROR', message, details);
  }
}

export class TimeoutError extends AppError {
  constructor(message: string, timeoutMs: number) {
    super(504, 'ANALYSIS_TIMEOUT', message, { timeoutMs });
  }
}
