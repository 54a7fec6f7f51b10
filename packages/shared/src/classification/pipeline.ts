/**
 * Classification Pipeline
 *
 * rules → (only when inconclusive) semantic → resolve, for one document.
 * Never throws: anything unexpected becomes a failed Decision.
 */

import { getCorrelationId, runWithContextAsync } from '../context';
import { toErrorDetail } from '../errors';
import { logger } from '../logger';
import { documentsByCategoryCounter, documentsProcessedCounter, semanticSkippedCounter } from '../metrics';
import { ERROR_MARKER, type CategorySet, type Decision, type ExtractedDocument, type SemanticOutcome } from '../types';
import { assertDecisionValid, isRuleOutcomeConclusive, resolveDecision } from './decision-resolver';
import { evaluateRules } from './rule-engine';
import type { SemanticScorer } from './semantic-classifier';

export interface PipelineContext {
  categorySet: CategorySet;
  /** Null when the run has no embedding provider */
  semanticScorer: SemanticScorer | null;
  /** Correlation id for log lines; defaults to the ambient one */
  runId?: string;
}

/**
 * The Decision recorded for a document whose pipeline could not run
 * (unreadable file, extractor error, invariant violation).
 */
export function failedDecision(sourcePath: string, error: unknown): Decision {
  const detail = toErrorDetail(error);
  const decision: Decision = {
    sourcePath,
    category: ERROR_MARKER,
    outcome: 'failed',
    confidence: 0,
    stage: 'failed',
    trace: {
      stage: 'failed',
      decidedBy: 'none',
      scores: {},
      topCategory: null,
      runnerUp: null,
      margin: 0,
      tieCandidates: [],
      reason: `${detail.type}: ${detail.message}`,
      semanticStatus: 'skipped',
      errors: [detail],
    },
  };
  assertDecisionValid(decision, []);
  return Object.freeze(decision);
}

export function recordDecisionMetrics(decision: Decision): void {
  documentsProcessedCounter.inc({ outcome: decision.outcome, stage: decision.stage });
  documentsByCategoryCounter.inc({ category: decision.category });
}

async function runPipeline(document: ExtractedDocument, context: PipelineContext): Promise<Decision> {
  const { categorySet, semanticScorer } = context;
  const { policy, names } = categorySet;

  const ruleResults = evaluateRules(document, categorySet);

  let semantic: SemanticOutcome | undefined;
  if (isRuleOutcomeConclusive(ruleResults, policy, names)) {
    semanticSkippedCounter.inc();
  } else if (semanticScorer) {
    semantic = await semanticScorer.score(document);
  } else {
    semantic = { status: 'skipped', reason: 'no embedding provider configured' };
  }

  return resolveDecision({
    sourcePath: document.sourcePath,
    ruleResults,
    semantic,
    policy,
    categoryNames: names,
  });
}

/**
 * Classify one extracted document.
 */
export async function classifyDocument(document: ExtractedDocument, context: PipelineContext): Promise<Decision> {
  const runContext = {
    correlationId: context.runId ?? getCorrelationId(),
    documentPath: document.sourcePath,
    stage: 'classify',
  };

  return runWithContextAsync(runContext, async () => {
    let decision: Decision;
    try {
      decision = await runPipeline(document, context);
    } catch (err) {
      logger.error('Classification pipeline failed', err);
      decision = failedDecision(document.sourcePath, err);
    }

    logger.info('Document classified', {
      category: decision.category,
      outcome: decision.outcome,
      stage: decision.stage,
      confidence: decision.confidence,
      decided_by: decision.trace.decidedBy,
    });
    return decision;
  });
}
