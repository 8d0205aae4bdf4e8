import { describe, it, expect, beforeEach } from 'vitest';
import {
  AnalysisService,
  type AnalysisServiceOptions,
  templateSummary,
} from '../../src/services/AnalysisService.js';
import { KnowledgeService } from '../../src/services/KnowledgeService.js';
import { CaseService } from '../../src/services/CaseService.js';
import { CorrelationService } from '../../src/services/CorrelationService.js';
import { FALLBACK_DESCRIPTION } from '../../src/services/HypothesisRanker.js';
import { NotFoundError, TimeoutError, ValidationError } from '../../src/errors.js';
import { emptyIdentifiers } from '../../src/extraction/identifiers.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import type { Hypothesis } from '../../src/types/models.js';
import { MockKnowledgeRepository } from '../mocks/MockKnowledgeRepository.js';
import { MockCaseRepository } from '../mocks/MockCaseRepository.js';
import { MockOperationalRepository } from '../mocks/MockOperationalRepository.js';
import { MockAnalysisRepository } from '../mocks/MockAnalysisRepository.js';
import { MockNarrativeProvider } from '../mocks/MockNarrativeProvider.js';

const OCCURRED_AT = '2024-03-01T10:00:00.000Z';

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('AnalysisService', () => {
  let knowledgeRepo: MockKnowledgeRepository;
  let caseRepo: MockCaseRepository;
  let operationalRepo: MockOperationalRepository;
  let analysisRepo: MockAnalysisRepository;
  let logger: ConsoleLogProvider;

  function createService(options: AnalysisServiceOptions = {}): AnalysisService {
    return new AnalysisService(
      new KnowledgeService(knowledgeRepo, logger),
      new CaseService(caseRepo, { logger }),
      new CorrelationService(operationalRepo, logger),
      analysisRepo,
      { logger, ...options }
    );
  }

  beforeEach(() => {
    knowledgeRepo = new MockKnowledgeRepository();
    caseRepo = new MockCaseRepository();
    operationalRepo = new MockOperationalRepository();
    analysisRepo = new MockAnalysisRepository();
    logger = new ConsoleLogProvider();
  });

  // ── analyze ──

  describe('analyze', () => {
    it('should diagnose a rapid duplicate container insert', async () => {
      operationalRepo.addContainer({ cntr_no: 'CMAU0000020', created_at: '2024-03-01T10:00:00.000Z' });
      operationalRepo.addContainer({ cntr_no: 'CMAU0000020', created_at: '2024-03-01T10:00:01.000Z' });

      const res = await createService().analyze({
        incidentText: 'Duplicate container CMAU0000020 created twice',
        occurredAt: OCCURRED_AT,
      });

      expect(res.id).toBe('analysis-1');
      expect(res.incidentType).toBe('container_duplication');
      expect(res.identifiers.containers).toEqual(['CMAU0000020']);
      expect(res.window).toEqual({
        start: '2024-03-01T08:00:00.000Z',
        end: '2024-03-01T12:00:00.000Z',
        hours: 2,
      });
      expect(res.hypotheses).toHaveLength(1);
      expect(res.hypotheses[0]?.rule).toBe('rapid_duplicate_insert');
      expect(res.hypotheses[0]?.confidence).toBe(0.95);
      expect(res.hypotheses[0]?.description).toContain('rapid_duplicate_insert');
      expect(res.hypotheses[0]?.evidence).toEqual([
        'Database shows 2 records for CMAU0000020',
        'Records created 1.0s apart',
      ]);
      expect(res.sources).toEqual({
        knowledge: 'ok',
        cases: 'ok',
        operational: 'ok',
        narrative: 'unavailable',
      });
      expect(res.summary).toBe(
        'Most likely root cause (confidence 0.95): Container CMAU0000020 duplication detected: rapid_duplicate_insert. 2 records created 1.0s apart, likely a double submit or retried request'
      );
      expect(logger.messages('info')).toEqual(['Analysis completed']);
    });

    it('should name the duplicate-insert rule in the top hypothesis', async () => {
      operationalRepo.addContainer({ cntr_no: 'CMAU0000020', created_at: '2024-03-01T10:00:00.000Z' });
      operationalRepo.addContainer({ cntr_no: 'CMAU0000020', created_at: '2024-03-01T10:00:01.000Z' });

      const res = await createService().analyze({
        incidentText: 'Container CMAU0000020 duplicate record',
        occurredAt: OCCURRED_AT,
      });

      expect(res.hypotheses[0]?.description).toBe(
        'Container CMAU0000020 duplication detected: rapid_duplicate_insert. 2 records created 1.0s apart, likely a double submit or retried request'
      );
    });

    it('should diagnose a vessel advice conflict', async () => {
      operationalRepo.addVessel({ vessel_name: 'MV Lion City 07', imo_no: 9123456 });
      operationalRepo.addAdvice({
        vessel_name: 'MV Lion City 07',
        effective_start_datetime: '2024-02-28T00:00:00.000Z',
      });

      const res = await createService().analyze({
        incidentText: 'Cannot create vessel advice for MV Lion City 07',
        occurredAt: OCCURRED_AT,
      });

      expect(res.hypotheses[0]?.rule).toBe('vessel_advice_conflict');
      expect(res.hypotheses[0]?.confidence).toBe(0.98);
    });

    it('should rank operational findings above knowledge and cases', async () => {
      operationalRepo.addContainer({ cntr_no: 'CMAU0000020', created_at: '2024-03-01T10:00:00.000Z' });
      operationalRepo.addContainer({ cntr_no: 'CMAU0000020', created_at: '2024-03-01T10:00:01.000Z' });
      knowledgeRepo.seed({ title: 'Container duplication runbook', keywords: ['duplicate container'] });
      caseRepo.seed({
        incident_description: 'Duplicate container CMAU0000020 created twice',
        expected_root_cause: 'Gate retried the request',
      });

      const res = await createService().analyze({
        incidentText: 'Duplicate container CMAU0000020 created twice',
        occurredAt: OCCURRED_AT,
      });

      expect(res.hypotheses.map((h) => h.rule)).toEqual([
        'rapid_duplicate_insert',
        'best_historical_match',
        'knowledge_medium',
      ]);
      expect(res.summary).toMatch(/\(2 alternative hypotheses\)$/);
      expect(res.resolutionSteps.map((s) => [s.order, s.source])).toEqual([
        [1, { type: 'knowledge', id: 'kb-1' }],
        [2, { type: 'historical', id: 'case-1' }],
      ]);
      expect((await createService().getAnalysis('analysis-1')).resolutionSteps).toEqual(
        res.resolutionSteps
      );
    });

    it('should use the incident family when knowledge has no text match', async () => {
      knowledgeRepo.seed({ title: 'Gate-in double submit', category: 'Container Management' });

      const res = await createService().analyze({
        incidentText: 'CNTR error on CMAU0000020',
        occurredAt: OCCURRED_AT,
      });

      expect(res.incidentType).toBe('container_reference_error');
      expect(res.hypotheses.map((h) => h.rule)).toEqual(['knowledge_medium']);
    });

    it('should honor maxHypotheses', async () => {
      knowledgeRepo.seed({ title: 'First', keywords: ['gate'] });
      knowledgeRepo.seed({ title: 'Second', keywords: ['gate'] });

      const res = await createService().analyze({
        incidentText: 'gate rejected the truck',
        occurredAt: OCCURRED_AT,
        maxHypotheses: 1,
      });

      expect(res.hypotheses).toHaveLength(1);
    });

    it('should fall back when nothing matches', async () => {
      const res = await createService().analyze({ incidentText: '', occurredAt: OCCURRED_AT });

      expect(res.incidentType).toBe('unknown_error');
      expect(res.identifiers).toEqual(emptyIdentifiers());
      expect(res.hypotheses).toHaveLength(1);
      expect(res.hypotheses[0]?.rule).toBe('fallback');
      expect(res.hypotheses[0]?.confidence).toBe(0);
      expect(res.summary).toBe(FALLBACK_DESCRIPTION);
    });

    it('should widen the window from endedAt', async () => {
      const res = await createService().analyze({
        incidentText: 'Gate slowdown',
        occurredAt: OCCURRED_AT,
        endedAt: '2024-03-01T11:00:00.000Z',
        windowHours: 1,
      });

      expect(res.window).toEqual({
        start: '2024-03-01T09:00:00.000Z',
        end: '2024-03-01T12:00:00.000Z',
        hours: 1,
      });
    });

    it('should still answer when a source store is down', async () => {
      operationalRepo.failWith = new Error('connection reset');

      const res = await createService().analyze({
        incidentText: 'Duplicate container CMAU0000020 created twice',
        occurredAt: OCCURRED_AT,
      });

      expect(res.sources.operational).toBe('unavailable');
      expect(res.hypotheses[0]?.rule).toBe('fallback');
      expect(res.hypotheses[0]?.evidence).toContain('Operational records: unavailable');
      expect(res.id).toBe('analysis-1');
    });

    it('should return the analysis unsaved when persistence fails', async () => {
      analysisRepo.insertFailWith = new Error('disk full');

      const res = await createService().analyze({ incidentText: 'Gate slowdown', occurredAt: OCCURRED_AT });

      expect(res.id).toBeNull();
      expect(logger.messages('error')).toEqual(['Failed to persist analysis']);
    });
  });

  // ── validation ──

  describe('request validation', () => {
    it('should reject endedAt before occurredAt', async () => {
      const run = createService().analyze({
        incidentText: 'Gate slowdown',
        occurredAt: OCCURRED_AT,
        endedAt: '2024-03-01T09:00:00.000Z',
      });

      await expect(run).rejects.toThrow(
        new ValidationError('endedAt must not be before occurredAt')
      );
      await expect(run).rejects.toMatchObject({ statusCode: 400 });
      expect(analysisRepo.size).toBe(0);
    });

    it('should reject an unparseable occurredAt', async () => {
      await expect(
        createService().analyze({ incidentText: 'Gate slowdown', occurredAt: 'yesterday' })
      ).rejects.toThrow('occurredAt must be an ISO-8601 date');
    });

    it('should reject window sizes outside (0, 168]', async () => {
      const service = createService();
      for (const windowHours of [0, -1, 169]) {
        await expect(
          service.analyze({ incidentText: 'Gate slowdown', occurredAt: OCCURRED_AT, windowHours })
        ).rejects.toThrow('windowHours must be greater than 0 and at most 168');
      }
    });
  });

  // ── narrative ──

  describe('narrative summary', () => {
    let narrativeProvider: MockNarrativeProvider;

    beforeEach(() => {
      narrativeProvider = new MockNarrativeProvider();
    });

    it('should use the provider summary when it answers in time', async () => {
      const res = await createService({ narrativeProvider }).analyze({
        incidentText: 'Gate slowdown',
        occurredAt: OCCURRED_AT,
      });

      expect(res.summary).toBe('Two containers were created from one gate submission.');
      expect(res.sources.narrative).toBe('ok');
      expect(narrativeProvider.calls[0]?.incidentType).toBe('gate_slowdown');
    });

    it('should fall back to the template when the provider times out', async () => {
      narrativeProvider.delayMs = 100;

      const res = await createService({ narrativeProvider, aiTimeoutMs: 10 }).analyze({
        incidentText: '',
        occurredAt: OCCURRED_AT,
      });

      expect(res.summary).toBe(FALLBACK_DESCRIPTION);
      expect(res.sources.narrative).toBe('degraded');
      expect(logger.messages('warn')).toEqual(['Narrative summary failed, using template summary']);
    });

    it('should fall back to the template when the provider fails', async () => {
      narrativeProvider.failWith = new Error('rate limited');

      const res = await createService({ narrativeProvider }).analyze({
        incidentText: '',
        occurredAt: OCCURRED_AT,
      });

      expect(res.sources.narrative).toBe('degraded');
      expect(res.summary).toBe(FALLBACK_DESCRIPTION);
    });
  });

  // ── overall timeout ──

  it('should give up with a 504 and save nothing when the analysis runs too long', async () => {
    const narrativeProvider = new MockNarrativeProvider();
    narrativeProvider.delayMs = 100;

    const err = await createService({
      narrativeProvider,
      aiTimeoutMs: 1_000,
      analysisTimeoutMs: 20,
    })
      .analyze({ incidentText: 'Gate slowdown', occurredAt: OCCURRED_AT })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TimeoutError);
    expect(err).toMatchObject({ statusCode: 504, code: 'ANALYSIS_TIMEOUT' });

    await sleep(150);
    expect(analysisRepo.size).toBe(0);
  });

  // ── history ──

  describe('getAnalysis', () => {
    it('should return a stored analysis', async () => {
      const service = createService();
      const created = await service.analyze({ incidentText: 'Gate slowdown', occurredAt: OCCURRED_AT });

      expect(await service.getAnalysis('analysis-1')).toEqual(created);
    });

    it('should throw NotFoundError for an unknown id', async () => {
      await expect(createService().getAnalysis('nope')).rejects.toThrow(
        new NotFoundError('Analysis "nope" not found')
      );
    });
  });

  describe('listAnalyses', () => {
    function hypothesis(confidence: number, description: string): Hypothesis {
      return {
        description,
        confidence,
        rule: 'knowledge_medium',
        evidence: [],
        contributingFactors: [],
        source: null,
      };
    }

    beforeEach(async () => {
      const rows: Array<[string, number]> = [
        ['2024-03-01T00:00:00.000Z', 0.95],
        ['2024-03-02T00:00:00.000Z', 0.5],
        ['2024-03-03T00:00:00.000Z', 0.1],
      ];
      for (const [createdAt, confidence] of rows) {
        analysisRepo.clock = () => new Date(createdAt);
        await analysisRepo.insert({
          incident_text: `Incident at ${confidence}`,
          incident_type: 'incident_at',
          occurred_at: createdAt,
          window_start: createdAt,
          window_end: createdAt,
          window_hours: 2,
          identifiers: emptyIdentifiers(),
          hypotheses: [hypothesis(confidence, `Cause ${confidence}`)],
          resolution_steps: [],
          sources: { knowledge: 'ok', cases: 'ok', operational: 'ok', narrative: 'unavailable' },
          summary: '',
          top_confidence: confidence,
        });
      }
    });

    it('should list newest first with paging', async () => {
      const res = await createService().listAnalyses({ limit: 2, offset: 1 });

      expect(res.total).toBe(3);
      expect(res.limit).toBe(2);
      expect(res.offset).toBe(1);
      expect(res.items.map((i) => i.rootCause)).toEqual(['Cause 0.5', 'Cause 0.95']);
    });

    it('should filter by confidence band', async () => {
      const service = createService();

      expect((await service.listAnalyses({ confidence: 'high' })).items.map((i) => i.confidence)).toEqual([0.95]);
      expect((await service.listAnalyses({ confidence: 'medium' })).items.map((i) => i.confidence)).toEqual([0.5]);
      expect((await service.listAnalyses({ confidence: 'low' })).items.map((i) => i.confidence)).toEqual([0.1]);
    });

    it('should default and clamp the page size', async () => {
      const service = createService();

      expect((await service.listAnalyses()).limit).toBe(20);
      expect((await service.listAnalyses({ limit: 500 })).limit).toBe(100);
    });
  });
});

describe('templateSummary', () => {
  function h(description: string, confidence: number): Hypothesis {
    return {
      description,
      confidence,
      rule: 'data_inconsistency',
      evidence: [],
      contributingFactors: [],
      source: null,
    };
  }

  it('should name the top hypothesis alone', () => {
    expect(templateSummary([h('Drift', 0.7)])).toBe('Most likely root cause (confidence 0.70): Drift');
  });

  it('should count a single alternative in the singular', () => {
    expect(templateSummary([h('Drift', 0.7), h('Other', 0.5)])).toBe(
      'Most likely root cause (confidence 0.70): Drift (1 alternative hypothesis)'
    );
  });
});
