/**
 * Supabase implementation of IAnalysisRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { isUuid } from '../db.js';
import type { AnalysisListFilter, IAnalysisRepository } from './IAnalysisRepository.js';
import type { RootCauseAnalysisRow } from '../types/database.js';

export class SupabaseAnalysisRepository implements IAnalysisRepository {
  constructor(private readonly db: SupabaseClient) {}

  async insert(
    row: Omit<RootCauseAnalysisRow, 'id' | 'created_at'>
  ): Promise<RootCauseAnalysisRow> {
    const { data, error } = await this.db
      .from('root_cause_analyses')
      .insert(row)
      .select()
      .single();

    if (error) throw new Error(`Failed to insert analysis: ${error.message}`);
    return data as RootCauseAnalysisRow;
  }

  async findById(id: string): Promise<RootCauseAnalysisRow | null> {
    if (!isUuid(id)) return null;

    const { data, error } = await this.db
      .from('root_cause_analyses')
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error) throw new Error(`Failed to find analysis: ${error.message}`);
    return data as RootCauseAnalysisRow | null;
  }

  async list(
    filter: AnalysisListFilter
  ): Promise<{ rows: RootCauseAnalysisRow[]; total: number }> {
    let query = this.db
      .from('root_cause_analyses')
      .select('*', { count: 'exact' });

    if (filter.minConfidence !== undefined) {
      query = query.gte('top_confidence', filter.minConfidence);
    }
    if (filter.maxConfidence !== undefined) {
      query = query.lt('top_confidence', filter.maxConfidence);
    }

    const { data, count, error } = await query
      .order('created_at', { ascending: false })
      .range(filter.offset, filter.offset + filter.limit - 1);

    if (error) throw new Error(`Failed to list analyses: ${error.message}`);
    return { rows: (data ?? []) as RootCauseAnalysisRow[], total: count ?? 0 };
  }
}
