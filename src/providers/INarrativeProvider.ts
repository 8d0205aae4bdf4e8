/**
 * Narrative provider interface.
 * Produces a short human-readable summary of ranked hypotheses.
 */

import type { Hypothesis } from '../types/models.js';

export interface NarrativeInput {
  incidentText: string;
  incidentType: string;
  hypotheses: Hypothesis[];
}

export interface INarrativeProvider {
  summarize(input: NarrativeInput): Promise<string>;
}
