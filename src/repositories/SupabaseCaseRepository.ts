/**
 * Supabase implementation of ICaseRepository.
 * Vector search goes through the search_historical_cases RPC (pgvector cosine similarity).
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { isUuid } from '../db.js';
import type { CaseVectorSearchOptions, ICaseRepository } from './ICaseRepository.js';
import type { HistoricalCaseRow, ScoredHistoricalCaseRow } from '../types/database.js';

const CASE_COLUMNS =
  'id, incident_description, expected_root_cause, expected_resolution, category, is_validated, usefulness_count, created_at';

export class SupabaseCaseRepository implements ICaseRepository {
  constructor(private readonly db: SupabaseClient) {}

  async findValidated(): Promise<HistoricalCaseRow[]> {
    const { data, error } = await this.db
      .from('historical_cases')
      .select(CASE_COLUMNS)
      .eq('is_validated', true);

    if (error)
      throw new Error(`Failed to load historical cases: ${error.message}`);
    return (data ?? []) as HistoricalCaseRow[];
  }

  async findById(id: string): Promise<HistoricalCaseRow | null> {
    if (!isUuid(id)) return null;

    const { data, error } = await this.db
      .from('historical_cases')
      .select(CASE_COLUMNS)
      .eq('id', id)
      .maybeSingle();

    if (error)
      throw new Error(`Failed to find historical case: ${error.message}`);
    return data as HistoricalCaseRow | null;
  }

  async vectorSearch(
    embedding: number[],
    options: CaseVectorSearchOptions
  ): Promise<ScoredHistoricalCaseRow[]> {
    const { data, error } = await this.db.rpc('search_historical_cases', {
      query_embedding: JSON.stringify(embedding),
      match_count: options.maxResults,
      min_similarity: options.minSimilarity,
    });

    if (error)
      throw new Error(`Failed to search historical cases: ${error.message}`);
    return (data ?? []) as ScoredHistoricalCaseRow[];
  }
}
