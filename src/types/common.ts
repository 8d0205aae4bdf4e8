/**
 * Shared helper types.
 */

export interface PaginationOptions {
  limit: number;
  offset: number;
}

export type FieldType = 'string' | 'number' | 'boolean' | 'array' | 'object';

export interface FieldSchema {
  type: FieldType;
  required?: boolean;
  /** Strings only. */
  maxLength?: number;
  /** Numbers only. */
  min?: number;
  max?: number;
  /** Strings only: allowed values. */
  enum?: readonly string[];
  /** Objects only: schema for nested fields. */
  properties?: BodySchema;
}

export type BodySchema = Record<string, FieldSchema>;
