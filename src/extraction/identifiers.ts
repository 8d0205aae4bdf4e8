/**
 * Identifier extraction.
 * Pulls structured tokens out of free-text incident descriptions.
 * Pure: no state, no I/O, never throws.
 */

import type { IdentifierClass, IdentifierMap } from '../types/models.js';

interface IdentifierPattern {
  cls: IdentifierClass;
  pattern: RegExp;
  /** Capture group holding the value; 0 means the whole match. */
  group: number;
}

/**
 * Case-sensitive to each class's canonical format.
 * Patterns are global; matchAll() works on a copy of lastIndex so sharing is safe.
 */
export const IDENTIFIER_PATTERNS: readonly IdentifierPattern[] = [
  // ISO 6346 style: owner code + 7 digits, e.g. CMAU0000020
  { cls: 'containers', pattern: /\b[A-Z]{4}\d{7}\b/g, group: 0 },
  // MV Lion City 07
  {
    cls: 'vessels',
    pattern: /\b(?:MV|MS|MT)\s+[A-Z][a-z]+(?:\s+[A-Z][a-z]+)*(?:\s+\d+)?\b/g,
    group: 0,
  },
  // VESSEL_ERR_4, EDI_PARSE_ERROR_12, BERTH_WARN_3
  { cls: 'errorCodes', pattern: /\b[A-Z]+(?:_[A-Z]+)*_(?:ERR|ERROR|WARN)_\d+\b/g, group: 0 },
  // REF-COP-0001
  { cls: 'ediRefs', pattern: /\bREF-[A-Z]+-\d+\b/g, group: 0 },
  // corr-0001
  { cls: 'correlationIds', pattern: /\bcorr-\d+\b/g, group: 0 },
  // IMO 9123456 / IMO9123456 -> 9123456
  { cls: 'imoNumbers', pattern: /\bIMO\s?(\d{7})\b/g, group: 1 },
];

export function emptyIdentifiers(): IdentifierMap {
  return {
    containers: [],
    vessels: [],
    errorCodes: [],
    ediRefs: [],
    correlationIds: [],
    imoNumbers: [],
  };
}

export function extractIdentifiers(text: string): IdentifierMap {
  const result = emptyIdentifiers();
  if (!text) return result;

  for (const { cls, pattern, group } of IDENTIFIER_PATTERNS) {
    const seen = new Set<string>();
    for (const match of text.matchAll(pattern)) {
      const value = match[group];
      if (value !== undefined) seen.add(value);
    }
    result[cls] = [...seen];
  }

  return result;
}

export function hasIdentifiers(identifiers: IdentifierMap): boolean {
  return Object.values(identifiers).some((values) => values.length > 0);
}
