/**
 * Quick-fix lookup endpoints.
 * GET /api/v1/knowledge/search?q=&limit=&category=
 * GET /api/v1/cases/search?q=&limit=
 */

import { pipeline } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import { jsonResponse } from './respond.js';
import { intParam, optionalParam, requireParam } from './params.js';

export function createSearchHandlers(container: Container) {
  const knowledge: Handler = pipeline(
    container.logging,
    container.errors
  )(async (req, _ctx) => {
    const url = new URL(req.url);

    const result = await container.knowledgeService.search(requireParam(url, 'q'), {
      limit: intParam(url, 'limit'),
      category: optionalParam(url, 'category'),
    });

    return jsonResponse(200, result);
  });

  const cases: Handler = pipeline(
    container.logging,
    container.errors
  )(async (req, _ctx) => {
    const url = new URL(req.url);

    const result = await container.caseService.search(
      requireParam(url, 'q'),
      intParam(url, 'limit')
    );

    return jsonResponse(200, result);
  });

  return { knowledge, cases };
}
