/**
 * Turns retrieved knowledge entries and historical cases into an ordered list
 * of resolution steps. Each step names its source so feedback can target it.
 * Pure.
 */

import type { ScoredCase } from '../types/api.js';
import type { KnowledgeEntry, ResolutionStep } from '../types/models.js';

export const MAX_KNOWLEDGE_STEPS = 5;
export const MAX_CASE_STEPS = 3;

export function planResolution(knowledge: KnowledgeEntry[], cases: ScoredCase[]): ResolutionStep[] {
  const steps: Omit<ResolutionStep, 'order'>[] = [
    ...knowledge.slice(0, MAX_KNOWLEDGE_STEPS).map((entry) => ({
      title: entry.title,
      description: entry.content || entry.title,
      source: { type: 'knowledge' as const, id: entry.id },
      usefulnessCount: entry.usefulnessCount,
      category: entry.category,
    })),
    ...cases.slice(0, MAX_CASE_STEPS).map(({ case: c }) => ({
      title: `Resolved case: ${c.incidentDescription}`,
      description: c.expectedResolution || c.expectedRootCause || c.incidentDescription,
      source: { type: 'historical' as const, id: c.id },
      usefulnessCount: c.usefulnessCount,
      category: c.category,
    })),
  ];

  // Array.prototype.sort is stable: equal counts keep knowledge before cases.
  return steps
    .sort((a, b) => b.usefulnessCount - a.usefulnessCount)
    .map((step, i) => ({ order: i + 1, ...step }));
}
