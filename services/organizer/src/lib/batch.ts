/**
 * Batch Runner
 *
 * Runs extract → classify for every discovered file through a bounded
 * worker pool. The ReportBuilder is the only accumulator; one document
 * failing never stops the others.
 */

import {
  ReportBuilder,
  batchDurationHistogram,
  classifyDocument,
  failedDecision,
  getExtractorForFile,
  logger,
  recordDecisionMetrics,
  runWithContextAsync,
  type CategorySet,
  type Decision,
  type EntryExtras,
  type ExtractedDocument,
  type SemanticScorer,
  type TextExtractor,
} from '@docsort/shared';
import type { FolderMaterializer } from './materializer';
import { WorkerPool } from './worker-pool';

export interface BatchOptions {
  files: readonly string[];
  sourceRoot: string;
  categorySet: CategorySet;
  semanticScorer: SemanticScorer | null;
  concurrency: number;
  runId: string;
  /** Defaults to the extractor registry */
  extractorFor?: (filePath: string) => TextExtractor;
}

export interface BatchResult {
  builder: ReportBuilder;
  /** Sorted by source path */
  decisions: Decision[];
  durationMs: number;
}

async function processFile(
  filePath: string,
  options: BatchOptions
): Promise<{ decision: Decision; extras: EntryExtras }> {
  const extractorFor = options.extractorFor ?? getExtractorForFile;

  return runWithContextAsync({ correlationId: options.runId, documentPath: filePath, stage: 'extract' }, async () => {
    let document: ExtractedDocument;
    try {
      document = await extractorFor(filePath).extract(filePath, { sourceRoot: options.sourceRoot });
    } catch (error) {
      logger.error('Document extraction failed', error);
      return { decision: failedDecision(filePath, error), extras: {} };
    }

    const decision = await classifyDocument(document, {
      categorySet: options.categorySet,
      semanticScorer: options.semanticScorer,
      runId: options.runId,
    });
    return {
      decision,
      extras: { contentHash: document.contentHash, pageCount: document.metadata.pageCount },
    };
  });
}

export async function runBatch(options: BatchOptions): Promise<BatchResult> {
  const startTime = Date.now();
  const pool = new WorkerPool(options.concurrency);
  const builder = new ReportBuilder({ runId: options.runId, categorySet: options.categorySet });

  logger.info('Batch started', {
    documents: options.files.length,
    concurrency: options.concurrency,
    semantic: options.semanticScorer !== null,
  });

  try {
    await Promise.all(
      options.files.map((filePath) =>
        pool.execute(async () => {
          const { decision, extras } = await processFile(filePath, options);
          recordDecisionMetrics(decision);
          builder.add(decision, extras);
        })
      )
    );
    await pool.waitForCompletion();
  } finally {
    // Queued work is dropped once a task has broken the batch
    pool.shutdown();
  }

  const durationMs = Date.now() - startTime;
  batchDurationHistogram.observe(durationMs / 1000);
  logger.info('Batch complete', { documents: builder.size, duration_ms: durationMs });

  return { builder, decisions: builder.decisions(), durationMs };
}

/**
 * Place every decided file and record its destination in the report.
 * A file that cannot be placed keeps a null destination.
 */
export async function materializeDecisions(
  result: BatchResult,
  materializer: FolderMaterializer
): Promise<{ placed: number; failed: number }> {
  let placed = 0;
  let failed = 0;

  for (const decision of result.decisions) {
    try {
      const destination = await materializer.place(decision);
      result.builder.setDestination(decision.sourcePath, destination);
      if (destination !== null) placed++;
    } catch (error) {
      failed++;
      logger.error('Failed to place file', error, { source_path: decision.sourcePath, category: decision.category });
    }
  }

  logger.info('Files materialized', { placed, failed });
  return { placed, failed };
}
