/**
 * Production container: Supabase repositories, OpenAI providers when an API
 * key is configured, Axiom logging when configured (console otherwise).
 * Built once per cold start from process.env.
 */

import { createContainer, type Container } from './container.js';
import { loadConfig, type Env } from './config.js';
import { getSupabaseClient } from './db.js';
import { SupabaseKnowledgeRepository } from './repositories/SupabaseKnowledgeRepository.js';
import { SupabaseCaseRepository } from './repositories/SupabaseCaseRepository.js';
import { SupabaseOperationalRepository } from './repositories/SupabaseOperationalRepository.js';
import { SupabaseAnalysisRepository } from './repositories/SupabaseAnalysisRepository.js';
import { SupabaseFeedbackRepository } from './repositories/SupabaseFeedbackRepository.js';
import {
  AxiomLogProvider,
  ConsoleLogProvider,
  OpenAIEmbeddingProvider,
  OpenAINarrativeProvider,
} from './providers/index.js';

const SERVICE_NAME = 'incident-rca-engine';

let cached: Container | null = null;

export function getProductionContainer(env: Env = process.env): Container {
  if (cached) return cached;

  const config = loadConfig(env);
  const db = getSupabaseClient(config.supabase.url, config.supabase.serviceRoleKey);

  const logProvider = config.axiom
    ? new AxiomLogProvider({
        apiToken: config.axiom.apiKey,
        dataset: config.axiom.dataset,
        minLevel: config.logLevel,
        baseFields: { service: SERVICE_NAME },
      })
    : new ConsoleLogProvider({
        outputToConsole: true,
        minLevel: config.logLevel,
        baseFields: { service: SERVICE_NAME },
      });

  const ai = config.openai;

  cached = createContainer({
    knowledgeRepo: new SupabaseKnowledgeRepository(db),
    caseRepo: new SupabaseCaseRepository(db),
    operationalRepo: new SupabaseOperationalRepository(db),
    analysisRepo: new SupabaseAnalysisRepository(db),
    feedbackRepo: new SupabaseFeedbackRepository(db),
    logProvider,
    embeddingProvider: ai
      ? new OpenAIEmbeddingProvider({ apiKey: ai.apiKey, model: ai.embeddingModel })
      : undefined,
    narrativeProvider: ai
      ? new OpenAINarrativeProvider({ apiKey: ai.apiKey, model: ai.chatModel })
      : undefined,
    aiTimeoutMs: config.aiTimeoutMs,
    analysisTimeoutMs: config.analysisTimeoutMs,
  });

  return cached;
}
