/**
 * Error handler middleware.
 * AppError subclasses keep their status, code and details. Anything else is
 * logged with the request id and answered with an opaque 500.
 */

import { AppError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ApiErrorResponse } from '../types/api.js';
import type { Handler, Middleware } from './pipeline.js';

/** Statuses a client may simply retry. */
const RETRYABLE_STATUSES = new Set([503]);
const RETRY_AFTER_SECONDS = '1';

export function errorResponse(
  status: number,
  error: ApiErrorResponse['error'],
  extraHeaders: Record<string, string> = {}
): Response {
  const body: ApiErrorResponse = { error };
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...extraHeaders },
  });
}

export function createErrorHandler(logProvider?: ILogProvider): Middleware {
  return (next: Handler): Handler =>
    async (req, ctx) => {
      try {
        return await next(req, ctx);
      } catch (err) {
        if (err instanceof AppError) {
          return errorResponse(
            err.statusCode,
            {
              code: err.code,
              message: err.message,
              ...(err.details && { details: err.details }),
            },
            RETRYABLE_STATUSES.has(err.statusCode) ? { 'Retry-After': RETRY_AFTER_SECONDS } : {}
          );
        }

        logProvider?.error('Unhandled error', {
          error: err instanceof Error ? err.message : String(err),
          ...(err instanceof Error && err.stack && { stack: err.stack }),
          ...(ctx.requestId && { requestId: ctx.requestId }),
        });

        // Internals stay in the log
        return errorResponse(500, {
          code: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
        });
      }
    };
}

/** Handler without a logger, for composition in isolation. */
export const errorHandler: Middleware = createErrorHandler();
