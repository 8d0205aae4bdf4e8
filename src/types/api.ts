/**
 * API types: shapes for request/response payloads.
 */

import type {
  HistoricalCase,
  Hypothesis,
  IdentifierMap,
  KnowledgeEntry,
  ResolutionStep,
  SourceRef,
  SourceReport,
} from './models.js';

// ── Requests ──

export interface AnalyzeRequest {
  incidentText: string;
  /** ISO-8601 incident start. */
  occurredAt: string;
  /** ISO-8601 incident end; must not precede occurredAt. */
  endedAt?: string;
  windowHours?: number;
  maxHypotheses?: number;
}

export interface FeedbackRequest {
  incidentText: string;
  solutionText: string;
  source: SourceRef;
  mark: boolean;
}

export type ConfidenceBand = 'high' | 'medium' | 'low';

export interface ListAnalysesRequest {
  limit?: number;
  offset?: number;
  confidence?: ConfidenceBand;
}

export interface KnowledgeSearchOptions {
  limit?: number;
  category?: string;
}

// ── Responses ──

export interface AnalysisResponse {
  /** Null when the analysis could not be persisted. */
  id: string | null;
  incidentText: string;
  incidentType: string;
  occurredAt: string;
  window: {
    start: string;
    end: string;
    hours: number;
  };
  identifiers: IdentifierMap;
  hypotheses: Hypothesis[];
  resolutionSteps: ResolutionStep[];
  sources: SourceReport;
  summary: string;
  createdAt: string;
}

export interface AnalysisSummary {
  id: string;
  incidentText: string;
  incidentType: string;
  rootCause: string;
  confidence: number;
  createdAt: string;
}

export interface AnalysisListResponse {
  items: AnalysisSummary[];
  total: number;
  limit: number;
  offset: number;
}

export interface FeedbackResponse {
  usefulnessCount: number;
  /** Counter on the referenced knowledge entry or case; null for analysis sources. */
  sourceUsefulnessCount: number | null;
}

export interface KnowledgeSearchResponse {
  results: KnowledgeEntry[];
  total: number;
}

export interface ScoredCase {
  case: HistoricalCase;
  score: number;
  matchedBy: 'lexical' | 'semantic';
}

export interface CaseSearchResponse {
  results: ScoredCase[];
  total: number;
}

export interface ApiErrorResponse {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}
