/**
 * Request logging middleware.
 * One event per request: 5xx and thrown errors at error, 4xx at warn,
 * everything else at info.
 */

import type { ILogProvider, LogLevel, RequestLogEvent } from '../providers/ILogProvider.js';
import type { Handler, HandlerContext, Middleware } from './pipeline.js';

function levelForStatus(status: number): LogLevel {
  if (status >= 500) return 'error';
  if (status >= 400) return 'warn';
  return 'info';
}

function requestEvent(
  req: Request,
  ctx: HandlerContext,
  status: number,
  startedAt: number,
  fields?: Record<string, unknown>
): RequestLogEvent {
  const path = new URL(req.url).pathname;
  const durationMs = Math.round(performance.now() - startedAt);

  return {
    level: fields ? 'error' : levelForStatus(status),
    message: `${req.method} ${path} → ${status} (${durationMs}ms)`,
    method: req.method,
    path,
    status,
    durationMs,
    ...(fields && { fields }),
    ...(ctx.requestId ? { requestId: ctx.requestId } : {}),
  };
}

export function createLoggingMiddleware(logProvider: ILogProvider): Middleware {
  return (next: Handler): Handler => async (req, ctx) => {
    const startedAt = performance.now();

    let response: Response;
    try {
      response = await next(req, ctx);
    } catch (err) {
      logProvider.log(
        requestEvent(req, ctx, 500, startedAt, {
          error: err instanceof Error ? err.message : String(err),
        })
      );
      throw err;
    }

    logProvider.log(requestEvent(req, ctx, response.status, startedAt));
    return response;
  };
}
