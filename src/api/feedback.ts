/**
 * Feedback endpoint.
 * POST /api/v1/feedback: Mark or unmark a solution as useful for an incident
 */

import { pipeline } from '../middleware/index.js';
import { isRecord, validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import { jsonResponse } from './respond.js';
import type { BodySchema } from '../types/common.js';
import type { SourceRef } from '../types/models.js';
import { ValidationError } from '../errors.js';

const SOURCE_TYPES = ['knowledge', 'historical', 'analysis'] as const;

const feedbackSchema: BodySchema = {
  incidentText: { type: 'string', required: true, maxLength: 10_000 },
  solutionText: { type: 'string', required: true, maxLength: 10_000 },
  source: {
    type: 'object',
    required: true,
    properties: {
      type: { type: 'string', required: true, enum: SOURCE_TYPES },
      id: { type: 'string', required: true, maxLength: 128 },
    },
  },
  mark: { type: 'boolean', required: true },
};

/** Narrow a validated `source` object into the tagged union. */
export function toSourceRef(value: unknown): SourceRef {
  if (!isRecord(value) || typeof value.id !== 'string') {
    throw new ValidationError('source must be an object with type and id');
  }

  const { id } = value;
  switch (value.type) {
    case 'knowledge':
      return { type: 'knowledge', id };
    case 'historical':
      return { type: 'historical', id };
    case 'analysis':
      return { type: 'analysis', id };
    default:
      throw new ValidationError(`source.type must be one of: ${SOURCE_TYPES.join(', ')}`);
  }
}

export function createFeedbackHandlers(container: Container) {
  const record: Handler = pipeline(
    container.logging,
    container.errors,
    validateBody(feedbackSchema)
  )(async (req, _ctx) => {
    const body = await req.json() as Record<string, unknown>;

    const result = await container.feedbackService.record({
      incidentText: body.incidentText as string,
      solutionText: body.solutionText as string,
      source: toSourceRef(body.source),
      mark: body.mark as boolean,
    });

    return jsonResponse(200, result);
  });

  return { record };
}
