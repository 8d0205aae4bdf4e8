/**
 * Merges correlator findings, the best historical case and knowledge hits into
 * one confidence-ordered hypothesis list. Pure.
 */

import type { ScoredCase } from '../types/api.js';
import type {
  CorrelationFinding,
  Hypothesis,
  KnowledgeEntry,
  SourceReport,
  SourceStatus,
} from '../types/models.js';
import { clampLimit } from '../utils/limits.js';
import { knowledgeRule, RULE_CONFIDENCE } from './rules.js';

export const DEFAULT_MAX_HYPOTHESES = 10;
export const MAX_MAX_HYPOTHESES = 20;

export const FALLBACK_DESCRIPTION = 'Unable to determine root cause from available data';

const EXCERPT_LENGTH = 120;

export interface RankInput {
  findings: CorrelationFinding[];
  cases: ScoredCase[];
  /** Validated cases the case retriever scored. */
  casesConsidered: number;
  knowledge: KnowledgeEntry[];
  sources: SourceReport;
  maxHypotheses?: number;
}

export function rankHypotheses(input: RankInput): Hypothesis[] {
  const cap = clampLimit(input.maxHypotheses, DEFAULT_MAX_HYPOTHESES, MAX_MAX_HYPOTHESES);
  const candidates: Hypothesis[] = input.findings.map(fromFinding);

  const best = bestCase(input.cases);
  if (best) candidates.push(fromCase(best, input.casesConsidered));

  candidates.push(...input.knowledge.map(fromKnowledge));

  if (candidates.length === 0) return [fallback(input.sources)];

  // Array.prototype.sort is stable, so ties keep insertion order
  return candidates
    .sort((a, b) => b.confidence - a.confidence)
    .slice(0, cap);
}

function fromFinding(finding: CorrelationFinding): Hypothesis {
  return {
    description: finding.description,
    confidence: finding.confidence,
    rule: finding.rule,
    evidence: finding.evidence.length > 0 ? finding.evidence : [`Detected by ${finding.rule} on ${finding.subject}`],
    contributingFactors: finding.contributingFactors,
    source: null,
  };
}

function bestCase(cases: ScoredCase[]): ScoredCase | null {
  let best: ScoredCase | null = null;
  for (const c of cases) {
    if (!best || c.score > best.score) best = c;
  }
  return best;
}

function fromCase(scored: ScoredCase, considered: number): Hypothesis {
  const { case: historical } = scored;
  const rootCause = historical.expectedRootCause.trim();

  return {
    description: rootCause || `Matches historical incident: ${excerpt(historical.incidentDescription)}`,
    confidence: RULE_CONFIDENCE.best_historical_match,
    rule: 'best_historical_match',
    evidence: [
      `Matched historical case ${historical.id}: "${excerpt(historical.incidentDescription)}"`,
      `Match score ${scored.score.toFixed(2)} (${scored.matchedBy})`,
      `${considered} validated historical cases considered`,
    ],
    contributingFactors: historical.expectedResolution.trim()
      ? [`Previous resolution: ${historical.expectedResolution.trim()}`]
      : [],
    source: { type: 'historical', id: historical.id },
  };
}

function fromKnowledge(entry: KnowledgeEntry): Hypothesis {
  const rule = knowledgeRule(entry.priority);
  return {
    description: entry.title,
    confidence: RULE_CONFIDENCE[rule],
    rule,
    evidence: [
      `Knowledge base entry "${entry.title}" (${entry.priority} priority, category ${entry.category || 'none'})`,
    ],
    contributingFactors: entry.content.trim() ? [excerpt(entry.content)] : [],
    source: { type: 'knowledge', id: entry.id },
  };
}

function fallback(sources: SourceReport): Hypothesis {
  return {
    description: FALLBACK_DESCRIPTION,
    confidence: RULE_CONFIDENCE.fallback,
    rule: 'fallback',
    evidence: [
      `Knowledge base: ${outcome(sources.knowledge, 'no matching entries')}`,
      `Historical cases: ${outcome(sources.cases, 'no similar validated cases')}`,
      `Operational records: ${outcome(sources.operational, 'no correlated anomalies')}`,
    ],
    contributingFactors: [],
    source: null,
  };
}

function outcome(status: SourceStatus, nothingFound: string): string {
  switch (status) {
    case 'ok':
      return nothingFound;
    case 'degraded':
      return `${nothingFound} (degraded)`;
    case 'unavailable':
      return 'unavailable';
  }
}

function excerpt(text: string): string {
  const trimmed = text.trim();
  return trimmed.length > EXCERPT_LENGTH ? `${trimmed.slice(0, EXCERPT_LENGTH - 3)}...` : trimmed;
}
