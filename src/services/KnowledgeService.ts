/**
 * Knowledge base retrieval.
 * Keyword and title matching over active entries, ordered by priority,
 * then usefulness, then recency. A category hint widens an empty result to
 * the entries of one category family.
 */

import type { IKnowledgeRepository } from '../repositories/IKnowledgeRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { KnowledgeSearchOptions, KnowledgeSearchResponse } from '../types/api.js';
import type { KnowledgeEntryRow } from '../types/database.js';
import type {
  KnowledgeEntry,
  KnowledgePriority,
  SourceStatus,
} from '../types/models.js';
import { SourceUnavailableError } from '../errors.js';
import { categoryHint, classifyIncident } from '../extraction/incident-type.js';
import { tokenize } from '../extraction/tokens.js';
import { clampLimit } from '../utils/limits.js';

export const DEFAULT_KNOWLEDGE_LIMIT = 5;
export const MAX_KNOWLEDGE_LIMIT = 20;

const PRIORITY_RANK: Record<KnowledgePriority, number> = {
  high: 3,
  medium: 2,
  low: 1,
};

export interface KnowledgeRetrieval {
  items: KnowledgeEntry[];
  status: SourceStatus;
}

export class KnowledgeService {
  constructor(
    private readonly knowledgeRepo: IKnowledgeRepository,
    private readonly logger?: ILogProvider
  ) {}

  /**
   * Quick-fix lookup. Without an explicit category, a query that matches no
   * entry by text falls back to the category family of its incident type.
   * Throws SourceUnavailableError when the store fails.
   */
  async search(
    query: string,
    options: KnowledgeSearchOptions = {}
  ): Promise<KnowledgeSearchResponse> {
    const limit = clampLimit(options.limit, DEFAULT_KNOWLEDGE_LIMIT, MAX_KNOWLEDGE_LIMIT);
    const results = options.category
      ? await this.match(query, limit, { category: options.category })
      : await this.match(query, limit, { hint: categoryHint(classifyIncident(query)) });
    return { results, total: results.length };
  }

  /** Analysis path: never throws, reports the store outcome as a status. */
  async retrieve(
    query: string,
    limit = DEFAULT_KNOWLEDGE_LIMIT,
    hint?: string
  ): Promise<KnowledgeRetrieval> {
    try {
      const items = await this.match(
        query,
        clampLimit(limit, DEFAULT_KNOWLEDGE_LIMIT, MAX_KNOWLEDGE_LIMIT),
        { hint }
      );
      return { items, status: 'ok' };
    } catch (err) {
      this.logger?.warn('Knowledge source unavailable', {
        error: err instanceof Error ? err.message : String(err),
      });
      return { items: [], status: 'unavailable' };
    }
  }

  private async match(
    query: string,
    limit: number,
    { category, hint }: { category?: string; hint?: string }
  ): Promise<KnowledgeEntry[]> {
    let rows: KnowledgeEntryRow[];
    try {
      rows = await this.knowledgeRepo.findActive(category ? { category } : undefined);
    } catch (err) {
      this.logger?.error('Knowledge store query failed', {
        error: err instanceof Error ? err.message : String(err),
      });
      throw new SourceUnavailableError('knowledge');
    }

    const text = query.toLowerCase();
    const tokens = tokenize(query);
    if (tokens.length === 0 && text.trim() === '') return [];

    const active = rows.map(toKnowledgeEntry).filter((entry) => entry.status === 'active');
    let hits = active.filter((entry) => matches(entry, text, tokens));
    if (hits.length === 0 && hint) {
      hits = active.filter((entry) => entry.category.toLowerCase().includes(hint));
    }

    return hits.sort(compareEntries).slice(0, limit);
  }
}

function matches(entry: KnowledgeEntry, text: string, tokens: string[]): boolean {
  const keywordHit = entry.keywords.some((keyword) => {
    const k = keyword.trim().toLowerCase();
    return k !== '' && text.includes(k);
  });
  if (keywordHit) return true;

  const title = entry.title.toLowerCase();
  return tokens.some((token) => title.includes(token));
}

function compareEntries(a: KnowledgeEntry, b: KnowledgeEntry): number {
  return (
    PRIORITY_RANK[b.priority] - PRIORITY_RANK[a.priority] ||
    b.usefulnessCount - a.usefulnessCount ||
    b.createdAt.getTime() - a.createdAt.getTime()
  );
}

export function toKnowledgeEntry(row: KnowledgeEntryRow): KnowledgeEntry {
  return {
    id: row.id,
    title: row.title,
    category: row.category,
    content: row.content,
    keywords: row.keywords ?? [],
    priority: toPriority(row.priority),
    status: row.status === 'active' ? 'active' : 'inactive',
    usefulnessCount: row.usefulness_count,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

function toPriority(value: string): KnowledgePriority {
  return value === 'high' || value === 'low' ? value : 'medium';
}
