/**
 * Dependency wiring.
 * Constructs all services with their dependencies. Production passes Supabase
 * repositories and OpenAI providers; tests pass in-memory mocks.
 */

import type { IKnowledgeRepository } from './repositories/IKnowledgeRepository.js';
import type { ICaseRepository } from './repositories/ICaseRepository.js';
import type { IOperationalRepository } from './repositories/IOperationalRepository.js';
import type { IAnalysisRepository } from './repositories/IAnalysisRepository.js';
import type { IFeedbackRepository } from './repositories/IFeedbackRepository.js';
import type { IEmbeddingProvider } from './providers/IEmbeddingProvider.js';
import type { INarrativeProvider } from './providers/INarrativeProvider.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { Middleware } from './middleware/pipeline.js';
import { KnowledgeService } from './services/KnowledgeService.js';
import { CaseService } from './services/CaseService.js';
import { CorrelationService } from './services/CorrelationService.js';
import { AnalysisService } from './services/AnalysisService.js';
import { FeedbackService } from './services/FeedbackService.js';
import { createLoggingMiddleware } from './middleware/logging.js';
import { createErrorHandler } from './middleware/error-handler.js';

export interface Container {
  knowledgeService: KnowledgeService;
  caseService: CaseService;
  correlationService: CorrelationService;
  analysisService: AnalysisService;
  feedbackService: FeedbackService;
  logProvider: ILogProvider;
  logging: Middleware;
  /** Error mapping that reports unexpected failures to logProvider. */
  errors: Middleware;
}

export interface ContainerDeps {
  knowledgeRepo: IKnowledgeRepository;
  caseRepo: ICaseRepository;
  operationalRepo: IOperationalRepository;
  analysisRepo: IAnalysisRepository;
  feedbackRepo: IFeedbackRepository;
  logProvider: ILogProvider;
  /** Enables semantic case matching. */
  embeddingProvider?: IEmbeddingProvider;
  /** Enables AI-written analysis summaries. */
  narrativeProvider?: INarrativeProvider;
  aiTimeoutMs?: number;
  analysisTimeoutMs?: number;
}

export function createContainer(deps: ContainerDeps): Container {
  const logger = deps.logProvider;

  const knowledgeService = new KnowledgeService(deps.knowledgeRepo, logger);
  const caseService = new CaseService(deps.caseRepo, {
    embeddingProvider: deps.embeddingProvider,
    aiTimeoutMs: deps.aiTimeoutMs,
    logger,
  });
  const correlationService = new CorrelationService(deps.operationalRepo, logger);
  const analysisService = new AnalysisService(
    knowledgeService,
    caseService,
    correlationService,
    deps.analysisRepo,
    {
      narrativeProvider: deps.narrativeProvider,
      aiTimeoutMs: deps.aiTimeoutMs,
      analysisTimeoutMs: deps.analysisTimeoutMs,
      logger,
    }
  );
  const feedbackService = new FeedbackService(
    deps.feedbackRepo,
    deps.knowledgeRepo,
    deps.caseRepo,
    deps.analysisRepo,
    logger
  );

  return {
    knowledgeService,
    caseService,
    correlationService,
    analysisService,
    feedbackService,
    logProvider: logger,
    logging: createLoggingMiddleware(logger),
    errors: createErrorHandler(logger),
  };
}
