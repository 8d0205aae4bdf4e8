/**
 * Database row types: mirror the Supabase table schemas in
 * supabase/migrations/001_incident_engine.sql.
 * Column names use snake_case to match PostgreSQL conventions.
 */

import type { Hypothesis, IdentifierMap, ResolutionStep, SourceReport } from './models.js';

// ── Knowledge & history ──

export interface KnowledgeEntryRow {
  id: string;
  title: string;
  category: string;
  content: string;
  keywords: string[];
  priority: string;
  status: string;
  usefulness_count: number;
  created_at: string;
  updated_at: string;
}

export interface HistoricalCaseRow {
  id: string;
  incident_description: string;
  expected_root_cause: string;
  expected_resolution: string;
  category: string;
  is_validated: boolean;
  usefulness_count: number;
  created_at: string;
}

export interface ScoredHistoricalCaseRow extends HistoricalCaseRow {
  similarity: number;
}

// ── Operational tables (read-only) ──

export interface VesselRow {
  vessel_id: number;
  imo_no: number;
  vessel_name: string;
  call_sign: string | null;
  operator_name: string | null;
  flag_state: string | null;
  capacity_teu: number | null;
}

export interface VesselAdviceRow {
  vessel_advice_no: number;
  vessel_name: string;
  system_vessel_name: string;
  effective_start_datetime: string;
  effective_end_datetime: string | null;
  created_at: string;
}

export interface ContainerRow {
  container_id: number;
  cntr_no: string;
  status: string;
  vessel_id: number | null;
  origin_port: string;
  destination_port: string;
  created_at: string;
}

export interface EdiMessageRow {
  edi_id: number;
  message_type: string;
  direction: string;
  status: string;
  message_ref: string;
  sender: string;
  receiver: string;
  sent_at: string;
  error_text: string | null;
}

export interface ApiEventRow {
  api_id: number;
  event_type: string;
  source_system: string;
  http_status: number | null;
  correlation_id: string | null;
  event_ts: string;
}

// ── Analyses & feedback ──

export interface RootCauseAnalysisRow {
  id: string;
  incident_text: string;
  incident_type: string;
  occurred_at: string;
  window_start: string;
  window_end: string;
  window_hours: number;
  identifiers: IdentifierMap;
  hypotheses: Hypothesis[];
  resolution_steps: ResolutionStep[];
  sources: SourceReport;
  summary: string;
  top_confidence: number;
  created_at: string;
}

export interface SolutionFeedbackRow {
  id: string;
  incident_description: string;
  solution_description: string;
  source_type: string;
  knowledge_entry_id: string | null;
  historical_case_id: string | null;
  analysis_id: string | null;
  usefulness_count: number;
  marked_at: string;
}
