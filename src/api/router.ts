/**
 * API router.
 * Matches method and path against the route table; every response leaves with
 * CORS headers. Works with any Request/Response runtime.
 */

import type { Container } from '../container.js';
import type { Handler, HandlerContext } from '../middleware/pipeline.js';
import { errorResponse } from '../middleware/error-handler.js';
import { createAnalysisHandlers } from './analyses.js';
import { createFeedbackHandlers } from './feedback.js';
import { createSearchHandlers } from './search.js';

type Method = 'GET' | 'POST';

interface Route {
  method: Method;
  pattern: RegExp;
  handler: Handler;
}

const CORS_HEADERS: Readonly<Record<string, string>> = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type',
  'Access-Control-Max-Age': '86400',
};

export function createRouter(container: Container) {
  const analyses = createAnalysisHandlers(container);
  const feedback = createFeedbackHandlers(container);
  const search = createSearchHandlers(container);

  const routes: Route[] = [
    { method: 'POST', pattern: /^\/api\/v1\/analyses\/?$/, handler: analyses.create },
    { method: 'GET', pattern: /^\/api\/v1\/analyses\/?$/, handler: analyses.list },
    { method: 'GET', pattern: /^\/api\/v1\/analyses\/[^/]+\/?$/, handler: analyses.getById },
    { method: 'POST', pattern: /^\/api\/v1\/feedback\/?$/, handler: feedback.record },
    { method: 'GET', pattern: /^\/api\/v1\/knowledge\/search\/?$/, handler: search.knowledge },
    { method: 'GET', pattern: /^\/api\/v1\/cases\/search\/?$/, handler: search.cases },
  ];

  const handle = async (req: Request, ctx: HandlerContext): Promise<Response> => {
    if (req.method === 'OPTIONS') {
      return new Response(null, { status: 204, headers: CORS_HEADERS });
    }

    const { pathname } = new URL(req.url);
    const onPath = routes.filter((r) => r.pattern.test(pathname));
    const route = onPath.find((r) => r.method === req.method);

    if (route) return withCors(await route.handler(req, ctx));

    if (onPath.length > 0) {
      return errorResponse(
        405,
        { code: 'INVALID_REQUEST', message: `Method ${req.method} not allowed` },
        { Allow: onPath.map((r) => r.method).join(', '), ...CORS_HEADERS }
      );
    }

    return errorResponse(
      404,
      { code: 'NOT_FOUND', message: `No route matches ${req.method} ${pathname}` },
      CORS_HEADERS
    );
  };

  return { handle, routes };
}

function withCors(response: Response): Response {
  const headers = new Headers(response.headers);
  for (const [key, value] of Object.entries(CORS_HEADERS)) headers.set(key, value);

  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}
