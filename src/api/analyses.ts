/**
 * Analysis endpoints.
 * POST /api/v1/analyses     : Run a root-cause analysis
 * GET  /api/v1/analyses     : Analysis history (limit, offset, confidence)
 * GET  /api/v1/analyses/:id : One stored analysis
 */

import { pipeline } from '../middleware/index.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import { jsonResponse } from './respond.js';
import type { ConfidenceBand } from '../types/api.js';
import type { BodySchema } from '../types/common.js';
import { enumParam, intParam, lastSegment } from './params.js';

const CONFIDENCE_BANDS: readonly ConfidenceBand[] = ['high', 'medium', 'low'];

const analyzeSchema: BodySchema = {
  incidentText: { type: 'string', required: true, maxLength: 10_000 },
  occurredAt: { type: 'string', required: true, maxLength: 64 },
  endedAt: { type: 'string', required: false, maxLength: 64 },
  windowHours: { type: 'number', required: false },
  maxHypotheses: { type: 'number', required: false, min: 1, max: 20 },
};

export function createAnalysisHandlers(container: Container) {
  const create: Handler = pipeline(
    container.logging,
    container.errors,
    validateBody(analyzeSchema)
  )(async (req, _ctx) => {
    const body = await req.json() as Record<string, unknown>;

    const result = await container.analysisService.analyze({
      incidentText: body.incidentText as string,
      occurredAt: body.occurredAt as string,
      endedAt: body.endedAt as string | undefined,
      windowHours: body.windowHours as number | undefined,
      maxHypotheses: body.maxHypotheses as number | undefined,
    });

    return jsonResponse(201, result);
  });

  const list: Handler = pipeline(
    container.logging,
    container.errors
  )(async (req, _ctx) => {
    const url = new URL(req.url);

    const result = await container.analysisService.listAnalyses({
      limit: intParam(url, 'limit'),
      offset: intParam(url, 'offset'),
      confidence: enumParam(url, 'confidence', CONFIDENCE_BANDS),
    });

    return jsonResponse(200, result);
  });

  const getById: Handler = pipeline(
    container.logging,
    container.errors
  )(async (req, _ctx) => {
    const result = await container.analysisService.getAnalysis(lastSegment(new URL(req.url)));

    return jsonResponse(200, result);
  });

  return { create, list, getById };
}
