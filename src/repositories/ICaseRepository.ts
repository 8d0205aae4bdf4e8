/**
 * Historical case (training data) access interface.
 */

import type { HistoricalCaseRow, ScoredHistoricalCaseRow } from '../types/database.js';

export interface CaseVectorSearchOptions {
  maxResults: number;
  minSimilarity: number;
}

export interface ICaseRepository {
  /** Validated cases only. */
  findValidated(): Promise<HistoricalCaseRow[]>;

  findById(id: string): Promise<HistoricalCaseRow | null>;

  /** Cosine similarity search over stored case embeddings (validated cases only). */
  vectorSearch(
    embedding: number[],
    options: CaseVectorSearchOptions
  ): Promise<ScoredHistoricalCaseRow[]>;
}
