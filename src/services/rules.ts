/**
 * Detection rule confidences.
 * Every hypothesis confidence is looked up here by the rule that produced it.
 */

import type { DetectionRule, KnowledgePriority } from '../types/models.js';

export const RULE_CONFIDENCE = {
  rapid_duplicate_insert: 0.95,
  data_inconsistency: 0.7,
  vessel_advice_conflict: 0.98,
  edi_segment_missing: 0.9,
  edi_validation_failure: 0.85,
  edi_timeout: 0.8,
  edi_generic_error: 0.6,
  api_cascade_correlated: 0.85,
  api_cascade_temporal: 0.75,
  best_historical_match: 0.85,
  knowledge_high: 0.7,
  knowledge_medium: 0.5,
  knowledge_low: 0.3,
  fallback: 0,
} as const satisfies Record<DetectionRule, number>;

export function knowledgeRule(priority: KnowledgePriority): DetectionRule {
  switch (priority) {
    case 'high':
      return 'knowledge_high';
    case 'medium':
      return 'knowledge_medium';
    case 'low':
      return 'knowledge_low';
  }
}

// ── Detection thresholds ──

/** Consecutive container versions closer than this are a rapid duplicate insert. */
export const RAPID_INSERT_THRESHOLD_MS = 5_000;

/** Failed API events no further apart than this are grouped into one cascade. */
export const CASCADE_GAP_MS = 10_000;

export const MIN_CASCADE_EVENTS = 2;

/** Lexical case score below which a historical case is ignored. */
export const CASE_SCORE_THRESHOLD = 0.1;

/** Vector similarity at which a historical case qualifies on the semantic path. */
export const SEMANTIC_SIMILARITY_THRESHOLD = 0.75;
