/**
 * Supabase implementation of IKnowledgeRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { isUuid } from '../db.js';
import type { IKnowledgeRepository, KnowledgeFilter } from './IKnowledgeRepository.js';
import type { KnowledgeEntryRow } from '../types/database.js';

export class SupabaseKnowledgeRepository implements IKnowledgeRepository {
  constructor(private readonly db: SupabaseClient) {}

  async findActive(filter?: KnowledgeFilter): Promise<KnowledgeEntryRow[]> {
    let query = this.db
      .from('knowledge_entries')
      .select('*')
      .eq('status', 'active');

    if (filter?.category) {
      // ilike without wildcards is a case-insensitive equality
      query = query.ilike('category', escapeLikePattern(filter.category));
    }

    const { data, error } = await query;

    if (error)
      throw new Error(`Failed to load knowledge entries: ${error.message}`);
    return (data ?? []) as KnowledgeEntryRow[];
  }

  async findById(id: string): Promise<KnowledgeEntryRow | null> {
    if (!isUuid(id)) return null;

    const { data, error } = await this.db
      .from('knowledge_entries')
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error)
      throw new Error(`Failed to find knowledge entry: ${error.message}`);
    return data as KnowledgeEntryRow | null;
  }
}

function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}
