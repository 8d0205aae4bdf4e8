/**
 * Root-cause analysis persistence.
 */

import type { RootCauseAnalysisRow } from '../types/database.js';
import type { PaginationOptions } from '../types/common.js';

export interface AnalysisListFilter extends PaginationOptions {
  /** Inclusive lower bound on top_confidence. */
  minConfidence?: number;
  /** Exclusive upper bound on top_confidence. */
  maxConfidence?: number;
}

export interface IAnalysisRepository {
  insert(row: Omit<RootCauseAnalysisRow, 'id' | 'created_at'>): Promise<RootCauseAnalysisRow>;

  findById(id: string): Promise<RootCauseAnalysisRow | null>;

  /** Newest first. */
  list(filter: AnalysisListFilter): Promise<{ rows: RootCauseAnalysisRow[]; total: number }>;
}
