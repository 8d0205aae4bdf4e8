/**
 * Historical case retrieval.
 *
 * Lexical strategy (always on): Jaccard overlap of token sets, plus a bonus
 * when the whole query appears in the case description and a smaller one when
 * the case category appears in the query.
 *
 * Semantic strategy (when an embedding provider is configured): the query
 * embedding is matched against stored case embeddings; a case's score is the
 * larger of its lexical score and its vector similarity. The embedding call and
 * vector search share one timeout; on expiry or error the lexical result stands
 * and the source is reported as degraded.
 */

import type { ICaseRepository } from '../repositories/ICaseRepository.js';
import type { IEmbeddingProvider } from '../providers/IEmbeddingProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { CaseSearchResponse, ScoredCase } from '../types/api.js';
import type { HistoricalCaseRow, ScoredHistoricalCaseRow } from '../types/database.js';
import type { HistoricalCase, SourceStatus } from '../types/models.js';
import { SourceUnavailableError } from '../errors.js';
import { jaccard, tokenize } from '../extraction/tokens.js';
import { clampLimit } from '../utils/limits.js';
import { withTimeout } from '../utils/timeout.js';
import { CASE_SCORE_THRESHOLD, SEMANTIC_SIMILARITY_THRESHOLD } from './rules.js';

export const DEFAULT_CASE_LIMIT = 3;
export const MAX_CASE_LIMIT = 25;
const DEFAULT_AI_TIMEOUT_MS = 3_000;

const PHRASE_BONUS = 0.2;
const CATEGORY_BONUS = 0.1;

export interface CaseServiceOptions {
  embeddingProvider?: IEmbeddingProvider;
  /** Bound on embedding + vector search. Default: 3000. */
  aiTimeoutMs?: number;
  logger?: ILogProvider;
}

export interface CaseRetrieval {
  items: ScoredCase[];
  status: SourceStatus;
  /** Validated cases scored in this pass. */
  considered: number;
}

export class CaseService {
  private readonly embeddingProvider: IEmbeddingProvider | undefined;
  private readonly aiTimeoutMs: number;
  private readonly logger: ILogProvider | undefined;

  constructor(
    private readonly caseRepo: ICaseRepository,
    options: CaseServiceOptions = {}
  ) {
    this.embeddingProvider = options.embeddingProvider;
    this.aiTimeoutMs = options.aiTimeoutMs ?? DEFAULT_AI_TIMEOUT_MS;
    this.logger = options.logger;
  }

  /** Quick-fix lookup. Throws SourceUnavailableError when the store fails. */
  async search(query: string, limit?: number): Promise<CaseSearchResponse> {
    const { items } = await this.rank(
      query,
      clampLimit(limit, DEFAULT_CASE_LIMIT, MAX_CASE_LIMIT)
    );
    return { results: items, total: items.length };
  }

  /** Analysis path: never throws. */
  async retrieve(query: string, limit = DEFAULT_CASE_LIMIT): Promise<CaseRetrieval> {
    try {
      return await this.rank(query, clampLimit(limit, DEFAULT_CASE_LIMIT, MAX_CASE_LIMIT));
    } catch (err) {
      this.logger?.warn('Historical case source unavailable', {
        error: err instanceof Error ? err.message : String(err),
      });
      return { items: [], status: 'unavailable', considered: 0 };
    }
  }

  private async rank(query: string, limit: number): Promise<CaseRetrieval> {
    let rows: HistoricalCaseRow[];
    try {
      rows = await this.caseRepo.findValidated();
    } catch (err) {
      this.logger?.error('Historical case store query failed', {
        error: err instanceof Error ? err.message : String(err),
      });
      throw new SourceUnavailableError('historical cases');
    }

    const scored = new Map<string, ScoredCase>();
    for (const row of rows) {
      const score = lexicalScore(query, row);
      if (score >= CASE_SCORE_THRESHOLD) {
        scored.set(row.id, { case: toHistoricalCase(row), score, matchedBy: 'lexical' });
      }
    }

    let status: SourceStatus = 'ok';
    if (this.embeddingProvider && query.trim() !== '') {
      try {
        const hits = await withTimeout(
          this.semanticHits(this.embeddingProvider, query, limit),
          this.aiTimeoutMs,
          () => new Error(`Semantic case search timed out after ${this.aiTimeoutMs}ms`)
        );
        mergeSemanticHits(scored, hits);
      } catch (err) {
        status = 'degraded';
        this.logger?.warn('Semantic case matching failed, using lexical scores', {
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }

    const items = [...scored.values()]
      .sort((a, b) => b.score - a.score || b.case.usefulnessCount - a.case.usefulnessCount)
      .slice(0, limit);

    return { items, status, considered: rows.length };
  }

  private async semanticHits(
    provider: IEmbeddingProvider,
    query: string,
    limit: number
  ): Promise<ScoredHistoricalCaseRow[]> {
    const embedding = await provider.generate(query);
    return this.caseRepo.vectorSearch(embedding, {
      maxResults: limit,
      minSimilarity: SEMANTIC_SIMILARITY_THRESHOLD,
    });
  }
}

export function lexicalScore(query: string, row: HistoricalCaseRow): number {
  const phrase = query.trim().toLowerCase();
  if (phrase === '') return 0;

  const description = row.incident_description.toLowerCase();
  const category = row.category.trim().toLowerCase();

  let score = jaccard(tokenize(query), tokenize(row.incident_description));
  if (description.includes(phrase)) score += PHRASE_BONUS;
  if (category !== '' && phrase.includes(category)) score += CATEGORY_BONUS;

  return Math.min(score, 1);
}

function mergeSemanticHits(
  scored: Map<string, ScoredCase>,
  hits: ScoredHistoricalCaseRow[]
): void {
  for (const hit of hits) {
    if (!hit.is_validated || hit.similarity < SEMANTIC_SIMILARITY_THRESHOLD) continue;

    const existing = scored.get(hit.id);
    if (!existing || hit.similarity > existing.score) {
      scored.set(hit.id, {
        case: existing?.case ?? toHistoricalCase(hit),
        score: Math.min(hit.similarity, 1),
        matchedBy: 'semantic',
      });
    }
  }
}

export function toHistoricalCase(row: HistoricalCaseRow): HistoricalCase {
  return {
    id: row.id,
    incidentDescription: row.incident_description,
    expectedRootCause: row.expected_root_cause,
    expectedResolution: row.expected_resolution,
    category: row.category,
    isValidated: row.is_validated,
    usefulnessCount: row.usefulness_count,
    createdAt: new Date(row.created_at),
  };
}
