/**
 * Records "this solution helped" marks against an incident.
 * Each mark or unmark is one atomic repository call; write conflicts are
 * retried a bounded number of times before surfacing as a transient error.
 */

import type { IFeedbackRepository } from '../repositories/IFeedbackRepository.js';
import type { IKnowledgeRepository } from '../repositories/IKnowledgeRepository.js';
import type { ICaseRepository } from '../repositories/ICaseRepository.js';
import type { IAnalysisRepository } from '../repositories/IAnalysisRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { FeedbackRequest, FeedbackResponse } from '../types/api.js';
import type { SourceRef } from '../types/models.js';
import {
  AppError,
  ConflictError,
  NotFoundError,
  SourceUnavailableError,
  TransientError,
  ValidationError,
  WRITE_CONFLICT,
} from '../errors.js';

export const MAX_WRITE_ATTEMPTS = 3;
export const UNKNOWN_INCIDENT = 'Unknown incident';

const RETRY_BACKOFF_MS = 20;

const SOURCE_LABELS: Record<SourceRef['type'], string> = {
  knowledge: 'Knowledge entry',
  historical: 'Historical case',
  analysis: 'Analysis',
};

export class FeedbackService {
  constructor(
    private readonly feedbackRepo: IFeedbackRepository,
    private readonly knowledgeRepo: IKnowledgeRepository,
    private readonly caseRepo: ICaseRepository,
    private readonly analysisRepo: IAnalysisRepository,
    private readonly logger?: ILogProvider
  ) {}

  async record(input: FeedbackRequest): Promise<FeedbackResponse> {
    const solutionDescription = input.solutionText.trim();
    if (!solutionDescription) {
      throw new ValidationError('solutionText must not be empty');
    }
    if (!input.source.id.trim()) {
      throw new ValidationError('source.id must not be empty');
    }

    let incidentDescription = input.incidentText.trim();
    if (!incidentDescription) {
      incidentDescription = UNKNOWN_INCIDENT;
      this.logger?.warn('Feedback recorded without incident text', {
        sourceType: input.source.type,
        sourceId: input.source.id,
      });
    }

    await this.assertSourceExists(input.source);

    const adjustment = {
      incidentDescription,
      solutionDescription,
      source: input.source,
      delta: input.mark ? 1 : -1,
    } as const;

    for (let attempt = 1; ; attempt++) {
      try {
        const result = await this.feedbackRepo.adjust(adjustment);
        return {
          usefulnessCount: result.feedbackCount,
          sourceUsefulnessCount: result.sourceCount,
        };
      } catch (err) {
        if (!(err instanceof ConflictError && err.code === WRITE_CONFLICT)) {
          throw this.toServiceError(err);
        }
        if (attempt >= MAX_WRITE_ATTEMPTS) {
          this.logger?.error('Feedback write conflict persisted', { attempts: attempt });
          throw new TransientError('Feedback could not be saved due to concurrent updates, please retry', {
            attempts: attempt,
          });
        }
        this.logger?.warn('Feedback write conflict, retrying', { attempt });
        await sleep(RETRY_BACKOFF_MS * attempt);
      }
    }
  }

  private async assertSourceExists(source: SourceRef): Promise<void> {
    let exists: boolean;
    try {
      exists = await this.sourceExists(source);
    } catch (err) {
      throw this.toServiceError(err);
    }

    if (!exists) {
      throw new NotFoundError(`${SOURCE_LABELS[source.type]} "${source.id}" not found`);
    }
  }

  private async sourceExists(source: SourceRef): Promise<boolean> {
    switch (source.type) {
      case 'knowledge':
        return (await this.knowledgeRepo.findById(source.id)) !== null;
      case 'historical':
        return (await this.caseRepo.findById(source.id)) !== null;
      case 'analysis':
        return (await this.analysisRepo.findById(source.id)) !== null;
    }
  }

  private toServiceError(err: unknown): AppError {
    if (err instanceof AppError) return err;
    this.logger?.error('Feedback store call failed', {
      error: err instanceof Error ? err.message : String(err),
    });
    return new SourceUnavailableError('feedback store');
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
