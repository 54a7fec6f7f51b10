/**
 * Decision Resolver
 *
 * Merges rule results and (when they were needed) semantic scores into one
 * Decision. Pure computation: same inputs, same Decision, trace included.
 */

import { ValidationError, type ErrorDetail } from '../errors';
import {
  ERROR_MARKER,
  UNCLASSIFIED,
  type CategoryScoreTrace,
  type ClassificationPolicy,
  type Decision,
  type DecidingSignal,
  type DecisionStage,
  type DecisionTrace,
  type RuleResults,
  type SemanticOutcome,
} from '../types';
import { rankScores, type Ranking } from './ordering';

export interface ResolveInput {
  sourcePath: string;
  ruleResults: RuleResults;
  /** Absent when the rules were conclusive and semantic scoring never ran */
  semantic?: SemanticOutcome;
  policy: ClassificationPolicy;
  /** Every configured category, in name order */
  categoryNames: readonly string[];
}

function ruleScore(ruleResults: RuleResults, name: string): number {
  return ruleResults[name]?.score ?? 0;
}

function rankRules(ruleResults: RuleResults, categoryNames: readonly string[], epsilon: number): Ranking {
  return rankScores(
    categoryNames.map((category) => ({ category, score: ruleScore(ruleResults, category) })),
    epsilon
  );
}

function fmt(value: number): string {
  return value.toFixed(4);
}

/**
 * Whether the rule scores alone settle the document, per the configured
 * inconclusive policy. The winner must have scored something.
 */
export function isRuleOutcomeConclusive(
  ruleResults: RuleResults,
  policy: ClassificationPolicy,
  categoryNames: readonly string[] = Object.keys(ruleResults)
): boolean {
  const ranking = rankRules(ruleResults, categoryNames, policy.tieEpsilon);
  if (!ranking.winner || ranking.topScore <= 0) return false;

  const absolute = ranking.topScore > policy.highConfidenceThreshold;
  // Margins are float differences, so compare within epsilon
  const margin = ranking.margin + policy.tieEpsilon >= policy.ruleMargin;

  switch (policy.inconclusivePolicy) {
    case 'absolute':
      return absolute;
    case 'margin':
      return margin;
    case 'absolute-and-margin':
      return absolute && margin;
  }
}

interface Selection {
  stage: Exclude<DecisionStage, 'unclassified' | 'failed'>;
  ranking: Ranking;
  scores: Record<string, CategoryScoreTrace>;
  semanticStatus: DecisionTrace['semanticStatus'];
  reason: string;
  errors: ErrorDetail[];
}

function decidedBy(selection: Selection, category: string): DecidingSignal {
  const trace = selection.scores[category];
  if (selection.stage === 'rule-only') return 'rule';
  const fromRule = trace.rule > 0;
  const fromSemantic = (trace.semantic ?? 0) > 0;
  if (fromRule && fromSemantic) return 'both';
  return fromRule ? 'rule' : 'semantic';
}

function tieNote(ranking: Ranking): string {
  return ranking.tieCandidates.length > 0
    ? `; tie between ${ranking.tieCandidates.join(', ')} broken by name`
    : '';
}

/**
 * Resolve one document. Applies, in order: the rule short-circuit, the
 * blend, the name tie-break, the confidence floor, and the rule-only
 * fallback when semantic scoring failed or was skipped.
 */
export function resolveDecision(input: ResolveInput): Decision {
  const { sourcePath, ruleResults, semantic, policy, categoryNames } = input;
  const epsilon = policy.tieEpsilon;

  const ruleTrace = (name: string): CategoryScoreTrace => ({
    rule: ruleScore(ruleResults, name),
    semantic: null,
    combined: null,
    matchedRules: [...(ruleResults[name]?.matchedRules ?? [])],
  });

  const ruleRanking = rankRules(ruleResults, categoryNames, epsilon);
  const ruleScores = Object.fromEntries(categoryNames.map((name) => [name, ruleTrace(name)]));
  let selection: Selection;

  if (isRuleOutcomeConclusive(ruleResults, policy, categoryNames)) {
    selection = {
      stage: 'rule-only',
      ranking: ruleRanking,
      scores: ruleScores,
      semanticStatus: 'not-needed',
      reason: `rules conclusive under ${policy.inconclusivePolicy} policy`,
      errors: [],
    };
  } else if (semantic?.status === 'scored') {
    const alpha = policy.blendWeight;
    const scores: Record<string, CategoryScoreTrace> = {};
    for (const name of categoryNames) {
      const similarity = semantic.scores[name]?.similarity ?? null;
      const rule = ruleScore(ruleResults, name);
      scores[name] = {
        ...ruleTrace(name),
        semantic: similarity,
        combined: alpha * rule + (1 - alpha) * (similarity ?? 0),
      };
    }
    selection = {
      stage: 'blended',
      ranking: rankScores(
        categoryNames.map((category) => ({ category, score: scores[category].combined ?? 0 })),
        epsilon
      ),
      scores,
      semanticStatus: 'scored',
      reason: `rules inconclusive; blended with semantic scores (alpha ${alpha})`,
      errors: [],
    };
  } else {
    const semanticStatus = semantic?.status ?? 'skipped';
    const errors = semantic?.status === 'failed' ? [semantic.error] : [];
    const why =
      semantic?.status === 'failed'
        ? `semantic scoring failed: ${semantic.error.message}`
        : `semantic scoring skipped${semantic?.status === 'skipped' ? `: ${semantic.reason}` : ''}`;

    if (!ruleRanking.winner || ruleRanking.topScore <= 0) {
      return finalize({
        sourcePath,
        category: UNCLASSIFIED,
        outcome: 'unclassified',
        confidence: 0,
        stage: 'unclassified',
        trace: {
          stage: 'unclassified',
          decidedBy: 'none',
          scores: ruleScores,
          topCategory: null,
          runnerUp: null,
          margin: 0,
          tieCandidates: [],
          reason: `no rule matched and ${why}`,
          semanticStatus,
          errors,
        },
      }, categoryNames);
    }

    selection = {
      stage: 'rule-only',
      ranking: ruleRanking,
      scores: ruleScores,
      semanticStatus,
      reason: `rules inconclusive and ${why}; using rule scores`,
      errors,
    };
  }

  const { ranking } = selection;
  const winner = ranking.winner;
  // A tie-break winner can sit up to epsilon below the top score; the floor
  // and the confidence use the top score itself
  const best = ranking.topScore;
  const traceBase = {
    scores: selection.scores,
    topCategory: winner ? winner.category : null,
    runnerUp: ranking.runnerUp ? ranking.runnerUp.category : null,
    margin: ranking.margin,
    tieCandidates: ranking.tieCandidates,
    semanticStatus: selection.semanticStatus,
    errors: selection.errors,
  };

  if (!winner || best < policy.confidenceFloor) {
    return finalize({
      sourcePath,
      category: UNCLASSIFIED,
      outcome: 'unclassified',
      confidence: clampUnit(best),
      stage: 'unclassified',
      trace: {
        ...traceBase,
        stage: 'unclassified',
        decidedBy: 'none',
        reason: `below floor: best score ${fmt(best)} < ${fmt(policy.confidenceFloor)} (${selection.reason})`,
      },
    }, categoryNames);
  }

  return finalize({
    sourcePath,
    category: winner.category,
    outcome: 'classified',
    confidence: clampUnit(best),
    stage: selection.stage,
    trace: {
      ...traceBase,
      stage: selection.stage,
      decidedBy: decidedBy(selection, winner.category),
      reason: `${selection.reason}${tieNote(ranking)}`,
    },
  }, categoryNames);
}

function clampUnit(value: number): number {
  return Math.max(0, Math.min(1, value));
}

function finalize(decision: Decision, categoryNames: readonly string[]): Decision {
  assertDecisionValid(decision, categoryNames);
  return Object.freeze(decision);
}

/**
 * Check a Decision against the data-model invariant: exactly one category
 * that is configured, the Unclassified sentinel, or (failed only) the error
 * marker; a confidence in [0, 1]; a stage that agrees with the outcome.
 */
export function assertDecisionValid(decision: Decision, categoryNames: readonly string[]): void {
  const { category, outcome, stage, confidence, trace } = decision;
  const problems: string[] = [];

  if (!Number.isFinite(confidence) || confidence < 0 || confidence > 1) {
    problems.push(`confidence ${confidence} outside [0, 1]`);
  }
  if (trace.stage !== stage) {
    problems.push(`trace stage "${trace.stage}" differs from stage "${stage}"`);
  }

  switch (outcome) {
    case 'classified':
      if (!categoryNames.includes(category)) problems.push(`category "${category}" is not configured`);
      if (stage !== 'rule-only' && stage !== 'blended') problems.push(`classified decision has stage "${stage}"`);
      break;
    case 'unclassified':
      if (category !== UNCLASSIFIED) problems.push(`unclassified decision has category "${category}"`);
      if (stage !== 'unclassified') problems.push(`unclassified decision has stage "${stage}"`);
      break;
    case 'failed':
      if (category !== ERROR_MARKER) problems.push(`failed decision has category "${category}"`);
      if (stage !== 'failed') problems.push(`failed decision has stage "${stage}"`);
      if (trace.errors.length === 0) problems.push('failed decision records no error');
      break;
  }

  if (problems.length > 0) {
    throw new ValidationError(`Invalid decision for ${decision.sourcePath}: ${problems.join('; ')}`);
  }
}
