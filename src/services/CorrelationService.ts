/**
 * Operational correlation.
 * Cross-references extracted identifiers against the operational tables inside
 * the incident's time window and turns anything suspicious into findings:
 *
 *   containers      → rapid_duplicate_insert | data_inconsistency
 *   vessels / IMO   → vessel_advice_conflict
 *   EDI references  → edi_* by error-text keyword
 *   correlation ids → api_cascade_correlated
 *   (any identifier)→ api_cascade_temporal over all failed API events
 *
 * Read-only. A store failure anywhere discards every finding and reports the
 * source as unavailable.
 */

import type { IOperationalRepository, TimeRange } from '../repositories/IOperationalRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ApiEventRow, ContainerRow, EdiMessageRow } from '../types/database.js';
import type {
  CorrelationFinding,
  DetectionRule,
  IdentifierMap,
  SourceStatus,
  TimeWindow,
} from '../types/models.js';
import { hasIdentifiers } from '../extraction/identifiers.js';
import {
  CASCADE_GAP_MS,
  MIN_CASCADE_EVENTS,
  RAPID_INSERT_THRESHOLD_MS,
  RULE_CONFIDENCE,
} from './rules.js';

const HOUR_MS = 3_600_000;

const CONTAINER_FIELDS = ['status', 'vessel_id', 'origin_port', 'destination_port'] as const;

export interface CorrelationResult {
  findings: CorrelationFinding[];
  status: SourceStatus;
  window: TimeWindow;
}

interface EdiRule {
  rule: DetectionRule;
  cause: string;
  remedy: string;
}

/** Checked in order against the lowercased error text; first keyword found wins. */
const EDI_KEYWORD_RULES: ReadonlyArray<EdiRule & { keyword: string }> = [
  {
    keyword: 'segment',
    rule: 'edi_segment_missing',
    cause: 'EDI message structure incomplete: required segment missing',
    remedy: "Verify the sender's EDI message template and segment ordering",
  },
  {
    keyword: 'validation',
    rule: 'edi_validation_failure',
    cause: 'EDI message validation failed: invalid data format or values',
    remedy: 'Check data type constraints and code list values',
  },
  {
    keyword: 'timeout',
    rule: 'edi_timeout',
    cause: 'EDI processing timeout: message too large or system overload',
    remedy: 'Review message size limits and system performance',
  },
];

const GENERIC_EDI_RULE: EdiRule = {
  rule: 'edi_generic_error',
  cause: 'EDI processing error',
  remedy: 'Inspect the error text and reprocess the message once corrected',
};

export function buildWindow(occurredAt: Date, windowHours: number, endedAt?: Date): TimeWindow {
  const offset = windowHours * HOUR_MS;
  return {
    start: new Date(occurredAt.getTime() - offset),
    end: new Date((endedAt ?? occurredAt).getTime() + offset),
    hours: windowHours,
  };
}

export function formatSeconds(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

export class CorrelationService {
  constructor(
    private readonly operationalRepo: IOperationalRepository,
    private readonly logger?: ILogProvider
  ) {}

  async correlate(
    identifiers: IdentifierMap,
    occurredAt: Date,
    windowHours: number,
    endedAt?: Date
  ): Promise<CorrelationResult> {
    const window = buildWindow(occurredAt, windowHours, endedAt);

    try {
      const [containers, vessels, edi, api] = await Promise.all([
        this.detectContainerDuplicates(identifiers.containers),
        this.detectVesselAdviceConflicts(identifiers, occurredAt),
        this.analyzeEdiErrors(identifiers.ediRefs, window),
        this.detectApiCascades(identifiers, window),
      ]);

      return {
        findings: [...containers, ...vessels, ...edi, ...api],
        status: 'ok',
        window,
      };
    } catch (err) {
      this.logger?.warn('Operational source unavailable', {
        error: err instanceof Error ? err.message : String(err),
      });
      return { findings: [], status: 'unavailable', window };
    }
  }

  // ── Containers ──

  private async detectContainerDuplicates(cntrNos: string[]): Promise<CorrelationFinding[]> {
    const findings: CorrelationFinding[] = [];

    for (const cntrNo of cntrNos) {
      const versions = await this.operationalRepo.findContainerVersions(cntrNo);
      if (versions.length < 2) continue;
      findings.push(containerFinding(cntrNo, versions));
    }

    return findings;
  }

  // ── Vessels ──

  private async detectVesselAdviceConflicts(
    identifiers: IdentifierMap,
    occurredAt: Date
  ): Promise<CorrelationFinding[]> {
    // vessel name → how it was identified
    const targets = new Map<string, string | null>();
    for (const name of identifiers.vessels) targets.set(name, null);

    for (const imo of identifiers.imoNumbers) {
      const vessel = await this.operationalRepo.findVesselByImo(Number(imo));
      if (vessel && !targets.has(vessel.vessel_name)) {
        targets.set(vessel.vessel_name, imo);
      }
    }

    const findings: CorrelationFinding[] = [];

    for (const [name, imo] of targets) {
      const advices = await this.operationalRepo.findVesselAdvices(name);
      const active = advices.filter(
        (a) =>
          new Date(a.effective_start_datetime).getTime() <= occurredAt.getTime() &&
          (a.effective_end_datetime === null ||
            new Date(a.effective_end_datetime).getTime() > occurredAt.getTime())
      );
      const [current] = active;
      if (!current) continue;

      const evidence = [
        `Active vessel advice #${current.vessel_advice_no} for ${name} since ${new Date(current.effective_start_datetime).toISOString()}`,
        `Remediation: expire existing advice #${current.vessel_advice_no} (set effective_end_datetime) before creating a new one`,
      ];
      if (imo !== null) evidence.unshift(`Vessel ${name} resolved from IMO ${imo}`);

      const contributingFactors = ['Expire the existing advice before creating a new one'];
      if (active.length > 1) {
        evidence.push(`${active.length} active advices exist for ${name}`);
        contributingFactors.push('Multiple active advices for the same vessel');
      }

      findings.push({
        kind: 'vessel_advice_conflict',
        rule: 'vessel_advice_conflict',
        subject: name,
        description: `Vessel advice conflict: ${name} already has active advice #${current.vessel_advice_no}, so a new advice cannot be created`,
        confidence: RULE_CONFIDENCE.vessel_advice_conflict,
        evidence,
        contributingFactors,
      });
    }

    return findings;
  }

  // ── EDI ──

  private async analyzeEdiErrors(refs: string[], window: TimeRange): Promise<CorrelationFinding[]> {
    const findings: CorrelationFinding[] = [];

    for (const ref of refs) {
      const failed = await this.operationalRepo.findFailedEdiMessages(ref, window);
      for (const message of failed) {
        findings.push(ediFinding(ref, message));
      }
    }

    return findings;
  }

  // ── API cascades ──

  private async detectApiCascades(
    identifiers: IdentifierMap,
    window: TimeRange
  ): Promise<CorrelationFinding[]> {
    const findings: CorrelationFinding[] = [];
    const reported = new Set<number>();

    for (const correlationId of identifiers.correlationIds) {
      const events = await this.operationalRepo.findApiEventsByCorrelation(correlationId, window);
      const failed = events.filter(isFailedEvent);
      if (failed.length < MIN_CASCADE_EVENTS) continue;

      for (const e of failed) reported.add(e.api_id);
      findings.push(
        cascadeFinding('api_cascade_correlated', correlationId, failed, [
          `Correlation id ${correlationId} links ${failed.length} failed calls`,
        ])
      );
    }

    if (!hasIdentifiers(identifiers)) return findings;

    const failed = await this.operationalRepo.findFailedApiEvents(window);
    for (const group of groupByProximity(failed.filter(isFailedEvent))) {
      // Events already in a correlated cascade are not counted twice.
      const fresh = group.filter((e) => !reported.has(e.api_id));
      if (fresh.length < MIN_CASCADE_EVENTS) continue;

      for (const e of fresh) reported.add(e.api_id);
      const first = fresh[0];
      findings.push(
        cascadeFinding(
          'api_cascade_temporal',
          first ? new Date(first.event_ts).toISOString() : 'window',
          fresh,
          [`Failures no more than ${formatSeconds(CASCADE_GAP_MS)} apart`]
        )
      );
    }

    return findings;
  }
}

function containerFinding(cntrNo: string, versions: ContainerRow[]): CorrelationFinding {
  const times = versions
    .map((v) => new Date(v.created_at).getTime())
    .sort((a, b) => a - b);

  let minGap = Number.POSITIVE_INFINITY;
  for (let i = 1; i < times.length; i++) {
    const gap = (times[i] ?? 0) - (times[i - 1] ?? 0);
    if (gap < minGap) minGap = gap;
  }

  const rapid = minGap < RAPID_INSERT_THRESHOLD_MS;
  const delta = formatSeconds(minGap);
  const disagreements = CONTAINER_FIELDS.flatMap((field) => {
    const values = [...new Set(versions.map((v) => String(v[field] ?? 'null')))];
    return values.length > 1 ? [`Versions disagree on ${field}: ${values.join(', ')}`] : [];
  });

  const evidence = [
    `Database shows ${versions.length} records for ${cntrNo}`,
    `Records created ${delta} apart`,
    ...disagreements,
  ];

  if (rapid) {
    return {
      kind: 'rapid_duplicate_insert',
      rule: 'rapid_duplicate_insert',
      subject: cntrNo,
      description: `Container ${cntrNo} duplication detected: rapid_duplicate_insert. ${versions.length} records created ${delta} apart, likely a double submit or retried request`,
      confidence: RULE_CONFIDENCE.rapid_duplicate_insert,
      evidence,
      contributingFactors: [
        'Missing idempotency check on container creation',
        'Concurrent or retried submissions',
      ],
    };
  }

  return {
    kind: 'data_inconsistency',
    rule: 'data_inconsistency',
    subject: cntrNo,
    description: `Container ${cntrNo} duplication detected: data_inconsistency. ${versions.length} conflicting versions in the database`,
    confidence: RULE_CONFIDENCE.data_inconsistency,
    evidence,
    contributingFactors: [
      'Container number reused across versions',
      ...(disagreements.length > 0 ? ['Version fields out of sync'] : []),
    ],
  };
}

function ediFinding(ref: string, message: EdiMessageRow): CorrelationFinding {
  const errorText = message.error_text ?? '';
  const lower = errorText.toLowerCase();
  const rule = EDI_KEYWORD_RULES.find((r) => lower.includes(r.keyword)) ?? GENERIC_EDI_RULE;

  const evidence = [
    `${message.message_type} ${ref} from ${message.sender} to ${message.receiver} failed at ${new Date(message.sent_at).toISOString()}`,
  ];
  if (errorText) evidence.push(`Error text: ${errorText}`);

  return {
    kind: 'edi_error',
    rule: rule.rule,
    subject: ref,
    description: `${rule.cause} (${ref})`,
    confidence: RULE_CONFIDENCE[rule.rule],
    evidence,
    contributingFactors: [rule.remedy],
  };
}

function isFailedEvent(event: ApiEventRow): boolean {
  return event.http_status !== null && event.http_status >= 400;
}

/** Split time-ordered events wherever the gap to the previous event exceeds CASCADE_GAP_MS. */
export function groupByProximity(events: ApiEventRow[]): ApiEventRow[][] {
  const sorted = [...events].sort(
    (a, b) => new Date(a.event_ts).getTime() - new Date(b.event_ts).getTime()
  );

  const groups: ApiEventRow[][] = [];
  let current: ApiEventRow[] = [];
  let lastTs = 0;

  for (const event of sorted) {
    const ts = new Date(event.event_ts).getTime();
    if (current.length > 0 && ts - lastTs > CASCADE_GAP_MS) {
      groups.push(current);
      current = [];
    }
    current.push(event);
    lastTs = ts;
  }
  if (current.length > 0) groups.push(current);

  return groups;
}

function cascadeFinding(
  rule: 'api_cascade_correlated' | 'api_cascade_temporal',
  subject: string,
  events: ApiEventRow[],
  extraEvidence: string[]
): CorrelationFinding {
  const times = events.map((e) => new Date(e.event_ts).getTime());
  const span = Math.max(...times) - Math.min(...times);
  const statuses = [...new Set(events.map((e) => String(e.http_status)))];
  const systems = [...new Set(events.map((e) => e.source_system))];

  return {
    kind: 'api_cascade',
    rule,
    subject,
    description:
      rule === 'api_cascade_correlated'
        ? `Cascading API failures across ${systems.join(', ')} linked by ${subject}`
        : `Cascading API failures across ${systems.join(', ')} within ${formatSeconds(span)}`,
    confidence: RULE_CONFIDENCE[rule],
    evidence: [
      `${events.length} failed API events over ${formatSeconds(span)}`,
      `HTTP statuses: ${statuses.join(', ')}`,
      `Source systems: ${systems.join(', ')}`,
      ...extraEvidence,
    ],
    contributingFactors: ['Upstream failure propagating to dependent services'],
  };
}
