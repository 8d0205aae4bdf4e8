/**
 * Root-cause analysis orchestration and history.
 *
 * analyze(): extract identifiers → retrieve knowledge, cases and operational
 * findings concurrently → rank → summarize → persist. Retrieval sources never
 * throw; each reports its own status. The whole call is bounded by the
 * analysis timeout.
 */

import type { IAnalysisRepository } from '../repositories/IAnalysisRepository.js';
import type { INarrativeProvider } from '../providers/INarrativeProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type {
  AnalysisListResponse,
  AnalysisResponse,
  AnalysisSummary,
  AnalyzeRequest,
  ConfidenceBand,
  ListAnalysesRequest,
} from '../types/api.js';
import type { RootCauseAnalysisRow } from '../types/database.js';
import type { Hypothesis, SourceReport, SourceStatus } from '../types/models.js';
import { DEFAULT_KNOWLEDGE_LIMIT, type KnowledgeService } from './KnowledgeService.js';
import type { CaseService } from './CaseService.js';
import type { CorrelationService } from './CorrelationService.js';
import {
  AppError,
  NotFoundError,
  SourceUnavailableError,
  TimeoutError,
  ValidationError,
} from '../errors.js';
import { extractIdentifiers } from '../extraction/identifiers.js';
import { categoryHint, classifyIncident } from '../extraction/incident-type.js';
import { clampLimit } from '../utils/limits.js';
import { withTimeout } from '../utils/timeout.js';
import { rankHypotheses } from './HypothesisRanker.js';
import { planResolution } from './ResolutionPlanner.js';

export const DEFAULT_WINDOW_HOURS = 2;
export const MAX_WINDOW_HOURS = 168;
const DEFAULT_AI_TIMEOUT_MS = 3_000;
const DEFAULT_ANALYSIS_TIMEOUT_MS = 30_000;
const DEFAULT_LIST_LIMIT = 20;
const MAX_LIST_LIMIT = 100;

const CONFIDENCE_BANDS: Record<ConfidenceBand, { min?: number; max?: number }> = {
  high: { min: 0.7 },
  medium: { min: 0.4, max: 0.7 },
  low: { max: 0.4 },
};

export interface AnalysisServiceOptions {
  narrativeProvider?: INarrativeProvider;
  /** Bound on the narrative call. Default: 3000. */
  aiTimeoutMs?: number;
  /** Bound on the whole analyze() call. Default: 30000. */
  analysisTimeoutMs?: number;
  logger?: ILogProvider;
}

interface AnalysisParams {
  incidentText: string;
  occurredAt: Date;
  endedAt?: Date;
  windowHours: number;
  maxHypotheses?: number;
}

export class AnalysisService {
  private readonly narrativeProvider: INarrativeProvider | undefined;
  private readonly aiTimeoutMs: number;
  private readonly analysisTimeoutMs: number;
  private readonly logger: ILogProvider | undefined;

  constructor(
    private readonly knowledgeService: KnowledgeService,
    private readonly caseService: CaseService,
    private readonly correlationService: CorrelationService,
    private readonly analysisRepo: IAnalysisRepository,
    options: AnalysisServiceOptions = {}
  ) {
    this.narrativeProvider = options.narrativeProvider;
    this.aiTimeoutMs = options.aiTimeoutMs ?? DEFAULT_AI_TIMEOUT_MS;
    this.analysisTimeoutMs = options.analysisTimeoutMs ?? DEFAULT_ANALYSIS_TIMEOUT_MS;
    this.logger = options.logger;
  }

  async analyze(input: AnalyzeRequest): Promise<AnalysisResponse> {
    const params = parseAnalyzeRequest(input);
    const run = { expired: false };

    try {
      return await withTimeout(
        this.run(params, run),
        this.analysisTimeoutMs,
        () =>
          new TimeoutError(
            `Analysis did not complete within ${this.analysisTimeoutMs}ms`,
            this.analysisTimeoutMs
          )
      );
    } catch (err) {
      if (err instanceof TimeoutError) {
        run.expired = true;
        this.logger?.error('Analysis timed out', { timeoutMs: this.analysisTimeoutMs });
      }
      throw err;
    }
  }

  async getAnalysis(id: string): Promise<AnalysisResponse> {
    let row: RootCauseAnalysisRow | null;
    try {
      row = await this.analysisRepo.findById(id);
    } catch (err) {
      throw this.storeUnavailable(err);
    }

    if (!row) throw new NotFoundError(`Analysis "${id}" not found`);
    return toAnalysisResponse(row);
  }

  async listAnalyses(request: ListAnalysesRequest = {}): Promise<AnalysisListResponse> {
    const limit = clampLimit(request.limit, DEFAULT_LIST_LIMIT, MAX_LIST_LIMIT);
    const offset = Math.max(0, Math.floor(request.offset ?? 0));
    const band = request.confidence ? CONFIDENCE_BANDS[request.confidence] : {};

    let page: { rows: RootCauseAnalysisRow[]; total: number };
    try {
      page = await this.analysisRepo.list({
        limit,
        offset,
        minConfidence: band.min,
        maxConfidence: band.max,
      });
    } catch (err) {
      throw this.storeUnavailable(err);
    }

    return {
      items: page.rows.map(toAnalysisSummary),
      total: page.total,
      limit,
      offset,
    };
  }

  private async run(
    params: AnalysisParams,
    run: { expired: boolean }
  ): Promise<AnalysisResponse> {
    const identifiers = extractIdentifiers(params.incidentText);
    const incidentType = classifyIncident(params.incidentText);

    const [knowledge, cases, correlation] = await Promise.all([
      this.knowledgeService.retrieve(
        params.incidentText,
        DEFAULT_KNOWLEDGE_LIMIT,
        categoryHint(incidentType)
      ),
      this.caseService.retrieve(params.incidentText),
      this.correlationService.correlate(
        identifiers,
        params.occurredAt,
        params.windowHours,
        params.endedAt
      ),
    ]);

    const sources: SourceReport = {
      knowledge: knowledge.status,
      cases: cases.status,
      operational: correlation.status,
      narrative: 'unavailable',
    };

    const hypotheses = rankHypotheses({
      findings: correlation.findings,
      cases: cases.items,
      casesConsidered: cases.considered,
      knowledge: knowledge.items,
      sources,
      maxHypotheses: params.maxHypotheses,
    });

    const narrative = await this.summarize(params.incidentText, incidentType, hypotheses);
    sources.narrative = narrative.status;

    const row: Omit<RootCauseAnalysisRow, 'id' | 'created_at'> = {
      incident_text: params.incidentText,
      incident_type: incidentType,
      occurred_at: params.occurredAt.toISOString(),
      window_start: correlation.window.start.toISOString(),
      window_end: correlation.window.end.toISOString(),
      window_hours: correlation.window.hours,
      identifiers,
      hypotheses,
      resolution_steps: planResolution(knowledge.items, cases.items),
      sources,
      summary: narrative.summary,
      top_confidence: hypotheses[0]?.confidence ?? 0,
    };

    if (run.expired) {
      throw new TimeoutError('Analysis expired before it could be saved', this.analysisTimeoutMs);
    }

    const saved = await this.persist(row);

    this.logger?.info('Analysis completed', {
      analysisId: saved?.id ?? null,
      incidentType,
      hypotheses: hypotheses.length,
      topConfidence: row.top_confidence,
      sources,
    });

    return toAnalysisResponse(
      saved ?? { ...row, id: null, created_at: new Date().toISOString() }
    );
  }

  private async summarize(
    incidentText: string,
    incidentType: string,
    hypotheses: Hypothesis[]
  ): Promise<{ summary: string; status: SourceStatus }> {
    const template = templateSummary(hypotheses);
    if (!this.narrativeProvider) return { summary: template, status: 'unavailable' };

    try {
      const summary = await withTimeout(
        this.narrativeProvider.summarize({ incidentText, incidentType, hypotheses }),
        this.aiTimeoutMs,
        () => new Error(`Narrative summary timed out after ${this.aiTimeoutMs}ms`)
      );
      return { summary, status: 'ok' };
    } catch (err) {
      this.logger?.warn('Narrative summary failed, using template summary', {
        error: err instanceof Error ? err.message : String(err),
      });
      return { summary: template, status: 'degraded' };
    }
  }

  private async persist(
    row: Omit<RootCauseAnalysisRow, 'id' | 'created_at'>
  ): Promise<RootCauseAnalysisRow | null> {
    try {
      return await this.analysisRepo.insert(row);
    } catch (err) {
      this.logger?.error('Failed to persist analysis', {
        error: err instanceof Error ? err.message : String(err),
        incidentType: row.incident_type,
      });
      return null;
    }
  }

  private storeUnavailable(err: unknown): AppError {
    if (err instanceof AppError) return err;
    this.logger?.error('Analysis store call failed', {
      error: err instanceof Error ? err.message : String(err),
    });
    return new SourceUnavailableError('analyses');
  }
}

export function parseAnalyzeRequest(input: AnalyzeRequest): AnalysisParams {
  const occurredAt = parseDate(input.occurredAt, 'occurredAt');
  const endedAt = input.endedAt === undefined ? undefined : parseDate(input.endedAt, 'endedAt');

  if (endedAt && endedAt.getTime() < occurredAt.getTime()) {
    throw new ValidationError('endedAt must not be before occurredAt', {
      occurredAt: input.occurredAt,
      endedAt: input.endedAt,
    });
  }

  const windowHours = input.windowHours ?? DEFAULT_WINDOW_HOURS;
  if (!Number.isFinite(windowHours) || windowHours <= 0 || windowHours > MAX_WINDOW_HOURS) {
    throw new ValidationError(
      `windowHours must be greater than 0 and at most ${MAX_WINDOW_HOURS}`,
      { windowHours }
    );
  }

  return {
    incidentText: input.incidentText,
    occurredAt,
    endedAt,
    windowHours,
    maxHypotheses: input.maxHypotheses,
  };
}

function parseDate(value: string, field: string): Date {
  const date = new Date(value);
  if (!value || Number.isNaN(date.getTime())) {
    throw new ValidationError(`${field} must be an ISO-8601 date`, { [field]: value });
  }
  return date;
}

export function templateSummary(hypotheses: Hypothesis[]): string {
  const [top] = hypotheses;
  if (!top) return '';
  if (top.rule === 'fallback') return top.description;

  const others = hypotheses.length - 1;
  const suffix =
    others === 0 ? '' : ` (${others} alternative ${others === 1 ? 'hypothesis' : 'hypotheses'})`;
  return `Most likely root cause (confidence ${top.confidence.toFixed(2)}): ${top.description}${suffix}`;
}

function toAnalysisResponse(
  row: Omit<RootCauseAnalysisRow, 'id'> & { id: string | null }
): AnalysisResponse {
  return {
    id: row.id,
    incidentText: row.incident_text,
    incidentType: row.incident_type,
    occurredAt: new Date(row.occurred_at).toISOString(),
    window: {
      start: new Date(row.window_start).toISOString(),
      end: new Date(row.window_end).toISOString(),
      hours: row.window_hours,
    },
    identifiers: row.identifiers,
    hypotheses: row.hypotheses,
    resolutionSteps: row.resolution_steps,
    sources: row.sources,
    summary: row.summary,
    createdAt: new Date(row.created_at).toISOString(),
  };
}

function toAnalysisSummary(row: RootCauseAnalysisRow): AnalysisSummary {
  return {
    id: row.id,
    incidentText: row.incident_text,
    incidentType: row.incident_type,
    rootCause: row.hypotheses[0]?.description ?? row.summary,
    confidence: row.top_confidence,
    createdAt: new Date(row.created_at).toISOString(),
  };
}
