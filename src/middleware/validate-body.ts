/**
 * Body validation middleware.
 * Parses the JSON body and checks it against a schema, nested objects included.
 * Failures throw ValidationError, so an error handler must sit outside it.
 */

import { ValidationError } from '../errors.js';
import type { BodySchema, FieldSchema, FieldType } from '../types/common.js';
import type { Handler, Middleware } from './pipeline.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Read a request body that must be a JSON object. Returns null otherwise. */
export async function parseJsonObject(req: Request): Promise<Record<string, unknown> | null> {
  let parsed: unknown;
  try {
    parsed = await req.json();
  } catch {
    return null;
  }
  return isRecord(parsed) ? parsed : null;
}

const TYPE_CHECKS: Record<FieldType, (value: unknown) => boolean> = {
  string: (v) => typeof v === 'string',
  number: (v) => typeof v === 'number' && Number.isFinite(v),
  boolean: (v) => typeof v === 'boolean',
  array: (v) => Array.isArray(v),
  object: isRecord,
};

const ARTICLES: Record<FieldType, string> = {
  string: 'a',
  number: 'a',
  boolean: 'a',
  array: 'an',
  object: 'an',
};

export function validateBody(schema: BodySchema): Middleware {
  return (next: Handler): Handler => async (req, ctx) => {
    const body = await parseJsonObject(req);
    if (!body) throw new ValidationError('Request body must be a JSON object');

    const errors = validateFields(body, schema, '');
    if (errors.length > 0) {
      throw new ValidationError(errors.join('; '), { fields: errors });
    }

    // The original stream is consumed; hand the handler a readable copy
    return next(
      new Request(req.url, {
        method: req.method,
        headers: req.headers,
        body: JSON.stringify(body),
      }),
      ctx
    );
  };
}

export function validateFields(
  body: Record<string, unknown>,
  schema: BodySchema,
  prefix: string
): string[] {
  return Object.entries(schema).flatMap(([name, fieldSchema]) =>
    validateField(`${prefix}${name}`, body[name], fieldSchema)
  );
}

function validateField(field: string, value: unknown, schema: FieldSchema): string[] {
  if (value === undefined || value === null) {
    return schema.required ? [`${field} is required`] : [];
  }

  if (!TYPE_CHECKS[schema.type](value)) {
    return [`${field} must be ${ARTICLES[schema.type]} ${schema.type}`];
  }

  if (typeof value === 'string') return stringConstraints(field, value, schema);
  if (typeof value === 'number') return numberConstraints(field, value, schema);
  if (schema.properties && isRecord(value)) {
    return validateFields(value, schema.properties, `${field}.`);
  }
  return [];
}

function stringConstraints(field: string, value: string, schema: FieldSchema): string[] {
  const errors: string[] = [];
  if (schema.maxLength !== undefined && value.length > schema.maxLength) {
    errors.push(`${field} must be ${schema.maxLength} characters or less`);
  }
  if (schema.enum && !schema.enum.includes(value)) {
    errors.push(`${field} must be one of: ${schema.enum.join(', ')}`);
  }
  return errors;
}

function numberConstraints(field: string, value: number, schema: FieldSchema): string[] {
  const errors: string[] = [];
  if (schema.min !== undefined && value < schema.min) {
    errors.push(`${field} must be at least ${schema.min}`);
  }
  if (schema.max !== undefined && value > schema.max) {
    errors.push(`${field} must be at most ${schema.max}`);
  }
  return errors;
}
