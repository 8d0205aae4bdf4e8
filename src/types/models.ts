/**
 * Domain models: entities as the engine understands them.
 * Decoupled from both API shapes and database row shapes.
 */

// ── Knowledge & history ──

export type KnowledgePriority = 'low' | 'medium' | 'high';
export type KnowledgeStatus = 'active' | 'inactive';

export interface KnowledgeEntry {
  id: string;
  title: string;
  category: string;
  content: string;
  keywords: string[];
  priority: KnowledgePriority;
  status: KnowledgeStatus;
  usefulnessCount: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface HistoricalCase {
  id: string;
  incidentDescription: string;
  expectedRootCause: string;
  expectedResolution: string;
  category: string;
  isValidated: boolean;
  usefulnessCount: number;
  createdAt: Date;
}

// ── Identifiers ──

export type IdentifierClass =
  | 'containers'
  | 'vessels'
  | 'errorCodes'
  | 'ediRefs'
  | 'correlationIds'
  | 'imoNumbers';

export type IdentifierMap = Record<IdentifierClass, string[]>;

// ── Analysis ──

/**
 * Every confidence value comes from one of these rules.
 * See services/rules.ts for the constants.
 */
export type DetectionRule =
  | 'rapid_duplicate_insert'
  | 'data_inconsistency'
  | 'vessel_advice_conflict'
  | 'edi_segment_missing'
  | 'edi_validation_failure'
  | 'edi_timeout'
  | 'edi_generic_error'
  | 'api_cascade_correlated'
  | 'api_cascade_temporal'
  | 'best_historical_match'
  | 'knowledge_high'
  | 'knowledge_medium'
  | 'knowledge_low'
  | 'fallback';

export type FindingKind =
  | 'rapid_duplicate_insert'
  | 'data_inconsistency'
  | 'vessel_advice_conflict'
  | 'edi_error'
  | 'api_cascade';

/** Structured output of one operational detection that fired. */
export interface CorrelationFinding {
  kind: FindingKind;
  rule: DetectionRule;
  /** The identifier the detection ran against (container number, vessel name, ...). */
  subject: string;
  description: string;
  confidence: number;
  evidence: string[];
  contributingFactors: string[];
}

/** Exactly one populated arm, naming where a hypothesis or solution came from. */
export type SourceRef =
  | { type: 'knowledge'; id: string }
  | { type: 'historical'; id: string }
  | { type: 'analysis'; id: string };

/** One step of the resolution plan, most useful first. */
export interface ResolutionStep {
  /** 1-based position in the plan. */
  order: number;
  title: string;
  description: string;
  source: SourceRef;
  usefulnessCount: number;
  category: string;
}

export interface Hypothesis {
  description: string;
  confidence: number;
  rule: DetectionRule;
  evidence: string[];
  contributingFactors: string[];
  source: SourceRef | null;
}

/** ok: full result. degraded: fell back to a weaker path. unavailable: no data. */
export type SourceStatus = 'ok' | 'degraded' | 'unavailable';

export interface SourceReport {
  knowledge: SourceStatus;
  cases: SourceStatus;
  operational: SourceStatus;
  narrative: SourceStatus;
}

export interface TimeWindow {
  start: Date;
  end: Date;
  hours: number;
}
