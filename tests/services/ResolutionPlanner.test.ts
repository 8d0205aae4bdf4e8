import { describe, it, expect } from 'vitest';
import { planResolution } from '../../src/services/ResolutionPlanner.js';
import type { ScoredCase } from '../../src/types/api.js';
import type { HistoricalCase, KnowledgeEntry } from '../../src/types/models.js';

function entry(id: string, overrides: Partial<KnowledgeEntry> = {}): KnowledgeEntry {
  return {
    id,
    title: `Runbook ${id}`,
    category: 'Container Management',
    content: `Steps from ${id}`,
    keywords: [],
    priority: 'medium',
    status: 'active',
    usefulnessCount: 0,
    createdAt: new Date('2024-01-01T00:00:00.000Z'),
    updatedAt: new Date('2024-01-01T00:00:00.000Z'),
    ...overrides,
  };
}

function scored(id: string, overrides: Partial<HistoricalCase> = {}): ScoredCase {
  return {
    case: {
      id,
      incidentDescription: 'Gate submitted the container twice',
      expectedRootCause: 'Retry without idempotency key',
      expectedResolution: 'Delete the newer row and enable idempotency keys',
      category: 'Container',
      isValidated: true,
      usefulnessCount: 0,
      createdAt: new Date('2024-01-01T00:00:00.000Z'),
      ...overrides,
    },
    score: 0.5,
    matchedBy: 'lexical',
  };
}

describe('planResolution', () => {
  it('should build one numbered step per knowledge entry and case', () => {
    const steps = planResolution([entry('kb-1')], [scored('case-1')]);

    expect(steps).toEqual([
      {
        order: 1,
        title: 'Runbook kb-1',
        description: 'Steps from kb-1',
        source: { type: 'knowledge', id: 'kb-1' },
        usefulnessCount: 0,
        category: 'Container Management',
      },
      {
        order: 2,
        title: 'Resolved case: Gate submitted the container twice',
        description: 'Delete the newer row and enable idempotency keys',
        source: { type: 'historical', id: 'case-1' },
        usefulnessCount: 0,
        category: 'Container',
      },
    ]);
  });

  it('should put the most useful steps first and renumber them', () => {
    const steps = planResolution(
      [entry('kb-1', { usefulnessCount: 1 }), entry('kb-2', { usefulnessCount: 4 })],
      [scored('case-1', { usefulnessCount: 2 })]
    );

    expect(steps.map((s) => [s.order, s.source.id])).toEqual([
      [1, 'kb-2'],
      [2, 'case-1'],
      [3, 'kb-1'],
    ]);
  });

  it('should keep knowledge ahead of cases on equal usefulness', () => {
    const steps = planResolution([entry('kb-1')], [scored('case-1')]);
    expect(steps.map((s) => s.source.type)).toEqual(['knowledge', 'historical']);
  });

  it('should take at most five entries and three cases', () => {
    const entries = ['a', 'b', 'c', 'd', 'e', 'f'].map((id) => entry(id));
    const cases = ['c1', 'c2', 'c3', 'c4'].map((id) => scored(id));

    const ids = planResolution(entries, cases).map((s) => s.source.id);
    expect(ids).toEqual(['a', 'b', 'c', 'd', 'e', 'c1', 'c2', 'c3']);
  });

  it('should fall back to the root cause, then the description, for a case without a resolution', () => {
    const steps = planResolution(
      [],
      [
        scored('case-1', { expectedResolution: '' }),
        scored('case-2', { expectedResolution: '', expectedRootCause: '' }),
      ]
    );

    expect(steps.map((s) => s.description)).toEqual([
      'Retry without idempotency key',
      'Gate submitted the container twice',
    ]);
  });

  it('should use the title when an entry has no content', () => {
    expect(planResolution([entry('kb-1', { content: '' })], [])[0]?.description).toBe('Runbook kb-1');
  });

  it('should return an empty plan with nothing retrieved', () => {
    expect(planResolution([], [])).toEqual([]);
  });
});
