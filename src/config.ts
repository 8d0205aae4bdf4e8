/**
 * Runtime configuration, read once from environment variables.
 * Missing required values or malformed numbers throw immediately so a bad
 * deploy fails at cold start rather than on the first request.
 */

import { isLogLevel, type LogLevel } from './providers/ILogProvider.js';

export interface AppConfig {
  supabase: {
    url: string;
    serviceRoleKey: string;
  };
  /** Null disables semantic case matching and the narrative summary. */
  openai: {
    apiKey: string;
    embeddingModel: string;
    chatModel: string;
  } | null;
  aiTimeoutMs: number;
  analysisTimeoutMs: number;
  /** Null falls back to console logging. */
  axiom: {
    apiKey: string;
    dataset: string;
  } | null;
  logLevel: LogLevel;
}

export type Env = Record<string, string | undefined>;

const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';
const DEFAULT_CHAT_MODEL = 'gpt-4o-mini';
const DEFAULT_AI_TIMEOUT_MS = 3_000;
const DEFAULT_ANALYSIS_TIMEOUT_MS = 30_000;

export function loadConfig(env: Env): AppConfig {
  const missing = ['SUPABASE_URL', 'SUPABASE_SERVICE_ROLE_KEY'].filter(
    (name) => !env[name]
  );
  if (missing.length > 0) {
    throw new Error(`Missing required environment variables: ${missing.join(', ')}`);
  }

  const logLevel = env.LOG_LEVEL ?? 'info';
  if (!isLogLevel(logLevel)) {
    throw new Error(`LOG_LEVEL must be one of debug, info, warn, error (got "${logLevel}")`);
  }

  return {
    supabase: {
      url: env.SUPABASE_URL ?? '',
      serviceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY ?? '',
    },
    openai: env.OPENAI_API_KEY
      ? {
          apiKey: env.OPENAI_API_KEY,
          embeddingModel: env.OPENAI_EMBEDDING_MODEL || DEFAULT_EMBEDDING_MODEL,
          chatModel: env.OPENAI_CHAT_MODEL || DEFAULT_CHAT_MODEL,
        }
      : null,
    aiTimeoutMs: readPositiveInt(env, 'AI_TIMEOUT_MS', DEFAULT_AI_TIMEOUT_MS),
    analysisTimeoutMs: readPositiveInt(env, 'ANALYSIS_TIMEOUT_MS', DEFAULT_ANALYSIS_TIMEOUT_MS),
    axiom:
      env.AXIOM_API_KEY && env.AXIOM_DATASET
        ? { apiKey: env.AXIOM_API_KEY, dataset: env.AXIOM_DATASET }
        : null,
    logLevel,
  };
}

function readPositiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer (got "${raw}")`);
  }
  return value;
}
