/**
 * Supabase implementation of IFeedbackRepository.
 * The adjustment runs inside the adjust_solution_feedback database function,
 * which locks the feedback row and the source row in one transaction.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type {
  AdjustFeedbackInput,
  AdjustFeedbackResult,
  IFeedbackRepository,
} from './IFeedbackRepository.js';
import { isUuid } from '../db.js';
import { ConflictError, NotFoundError, WRITE_CONFLICT } from '../errors.js';

/** serialization_failure, deadlock_detected */
const CONFLICT_CODES = new Set(['40001', '40P01']);
/** no_data_found, raised when the source row is missing */
const SOURCE_MISSING_CODE = 'P0002';

interface AdjustFeedbackRow {
  feedback_count: number;
  source_count: number | null;
}

export class SupabaseFeedbackRepository implements IFeedbackRepository {
  constructor(private readonly db: SupabaseClient) {}

  async adjust(input: AdjustFeedbackInput): Promise<AdjustFeedbackResult> {
    if (!isUuid(input.source.id)) {
      throw new NotFoundError(`${input.source.type} source "${input.source.id}" not found`);
    }

    const { data, error } = await this.db.rpc('adjust_solution_feedback', {
      p_incident_description: input.incidentDescription,
      p_solution_description: input.solutionDescription,
      p_source_type: input.source.type,
      p_source_id: input.source.id,
      p_delta: input.delta,
    });

    if (error) {
      if (CONFLICT_CODES.has(error.code)) {
        throw new ConflictError(WRITE_CONFLICT, 'Feedback write conflicted with a concurrent update', {
          pgCode: error.code,
        });
      }
      if (error.code === SOURCE_MISSING_CODE) {
        throw new NotFoundError(`${input.source.type} source "${input.source.id}" not found`);
      }
      throw new Error(`Failed to adjust solution feedback: ${error.message}`);
    }

    const [row] = (data ?? []) as AdjustFeedbackRow[];
    if (!row) throw new Error('adjust_solution_feedback returned no row');

    return {
      feedbackCount: Number(row.feedback_count),
      sourceCount: row.source_count === null ? null : Number(row.source_count),
    };
  }
}
