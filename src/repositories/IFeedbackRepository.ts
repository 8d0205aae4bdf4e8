/**
 * Solution feedback persistence.
 * Adjustments are atomic: the feedback row and the source's usefulness counter
 * move together or not at all.
 */

import type { SourceRef } from '../types/models.js';

export interface AdjustFeedbackInput {
  incidentDescription: string;
  solutionDescription: string;
  source: SourceRef;
  delta: 1 | -1;
}

export interface AdjustFeedbackResult {
  /** Usefulness count on the feedback row after the adjustment (0 when no row exists). */
  feedbackCount: number;
  /** Counter on the knowledge entry or historical case; null for analysis sources. */
  sourceCount: number | null;
}

export interface IFeedbackRepository {
  /**
   * Find-or-create on mark, decrement floored at zero on unmark.
   * Throws ConflictError(WRITE_CONFLICT) on serialization failure or deadlock,
   * NotFoundError when the source disappeared mid-write.
   */
  adjust(input: AdjustFeedbackInput): Promise<AdjustFeedbackResult>;
}
