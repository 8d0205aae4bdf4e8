/**
 * Knowledge base data access interface.
 */

import type { KnowledgeEntryRow } from '../types/database.js';

export interface KnowledgeFilter {
  /** Case-insensitive exact match on category. */
  category?: string;
}

export interface IKnowledgeRepository {
  /** All active entries, optionally narrowed by category. */
  findActive(filter?: KnowledgeFilter): Promise<KnowledgeEntryRow[]>;

  findById(id: string): Promise<KnowledgeEntryRow | null>;
}
