/**
 * In-memory mock for IFeedbackRepository.
 * Mirrors adjust_solution_feedback: find-or-create on mark, floored decrement
 * on unmark, source counter moves only when the feedback row moved.
 */

import type {
  AdjustFeedbackInput,
  AdjustFeedbackResult,
  IFeedbackRepository,
} from '../../src/repositories/IFeedbackRepository.js';
import type { SolutionFeedbackRow } from '../../src/types/database.js';
import { ConflictError, NotFoundError, WRITE_CONFLICT } from '../../src/errors.js';
import type { MockKnowledgeRepository } from './MockKnowledgeRepository.js';
import type { MockCaseRepository } from './MockCaseRepository.js';
import type { MockAnalysisRepository } from './MockAnalysisRepository.js';

export class MockFeedbackRepository implements IFeedbackRepository {
  private rows = new Map<string, SolutionFeedbackRow>();
  private nextId = 1;

  /** The next N adjust() calls fail with a write conflict. */
  conflictsRemaining = 0;
  adjustCalls = 0;

  constructor(
    private readonly knowledgeRepo: MockKnowledgeRepository,
    private readonly caseRepo: MockCaseRepository,
    private readonly analysisRepo: MockAnalysisRepository
  ) {}

  async adjust(input: AdjustFeedbackInput): Promise<AdjustFeedbackResult> {
    this.adjustCalls++;
    if (this.conflictsRemaining > 0) {
      this.conflictsRemaining--;
      throw new ConflictError(WRITE_CONFLICT, 'could not serialize access');
    }

    const { source } = input;
    let sourceCount = await this.sourceCount(input);

    const key = [input.incidentDescription, input.solutionDescription, source.id].join('\u0000');
    const existing = this.rows.get(key);
    const before = existing?.usefulness_count ?? 0;
    let after = before;

    if (existing) {
      after = Math.max(0, before + input.delta);
      if (after !== before) {
        existing.usefulness_count = after;
        existing.marked_at = new Date().toISOString();
      }
    } else if (input.delta > 0) {
      after = 1;
      this.rows.set(key, {
        id: `feedback-${this.nextId++}`,
        incident_description: input.incidentDescription,
        solution_description: input.solutionDescription,
        source_type: source.type,
        knowledge_entry_id: source.type === 'knowledge' ? source.id : null,
        historical_case_id: source.type === 'historical' ? source.id : null,
        analysis_id: source.type === 'analysis' ? source.id : null,
        usefulness_count: 1,
        marked_at: new Date().toISOString(),
      });
    }

    if (after !== before) {
      if (source.type === 'knowledge') {
        sourceCount = this.knowledgeRepo.adjustUsefulness(source.id, input.delta);
      } else if (source.type === 'historical') {
        sourceCount = this.caseRepo.adjustUsefulness(source.id, input.delta);
      }
    }

    return { feedbackCount: after, sourceCount };
  }

  // ── Test Helpers ──

  all(): SolutionFeedbackRow[] {
    return [...this.rows.values()];
  }

  private async sourceCount(input: AdjustFeedbackInput): Promise<number | null> {
    const { source } = input;
    switch (source.type) {
      case 'knowledge': {
        const row = this.knowledgeRepo.get(source.id);
        if (!row) throw new NotFoundError(`knowledge source "${source.id}" not found`);
        return row.usefulness_count;
      }
      case 'historical': {
        const row = this.caseRepo.get(source.id);
        if (!row) throw new NotFoundError(`historical source "${source.id}" not found`);
        return row.usefulness_count;
      }
      case 'analysis': {
        if (!(await this.analysisRepo.findById(source.id))) {
          throw new NotFoundError(`analysis source "${source.id}" not found`);
        }
        return null;
      }
    }
  }
}
