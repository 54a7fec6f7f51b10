/**
 * Prometheus Metrics
 *
 * Metrics for a classification run. The CLI dumps the registry in text
 * exposition format to a file when asked to.
 */

import * as promClient from 'prom-client';
import { logger } from './logger';

// Create a Registry for metrics
export const register = new promClient.Registry();

let defaultMetricsEnabled = false;

/**
 * Collect default process metrics (CPU, memory, ...).
 * Wrapped to avoid crashes on restricted environments.
 */
export function enableDefaultMetrics(): void {
  if (defaultMetricsEnabled) return;
  try {
    promClient.collectDefaultMetrics({ register });
    defaultMetricsEnabled = true;
  } catch (err) {
    logger.warn('Default Prometheus metrics collection skipped', {
      error: err instanceof Error ? err.message : String(err),
    });
  }
}

// ============================================================================
// Pipeline Metrics
// ============================================================================

export const documentsProcessedCounter = new promClient.Counter({
  name: 'docsort_documents_processed_total',
  help: 'Total number of documents decided, by outcome and decision stage',
  labelNames: ['outcome', 'stage'],
  registers: [register],
});

export const documentsByCategoryCounter = new promClient.Counter({
  name: 'docsort_documents_by_category_total',
  help: 'Total number of documents assigned to each category',
  labelNames: ['category'],
  registers: [register],
});

export const extractionDurationHistogram = new promClient.Histogram({
  name: 'docsort_extraction_duration_seconds',
  help: 'Duration of document text extraction',
  labelNames: ['extractor', 'status'],
  buckets: [0.05, 0.1, 0.5, 1, 2, 5, 10, 30, 60],
  registers: [register],
});

// ============================================================================
// Embedding Metrics
// ============================================================================

export const embeddingRequestsCounter = new promClient.Counter({
  name: 'docsort_embedding_requests_total',
  help: 'Total number of embedding provider requests',
  labelNames: ['model', 'status'],
  registers: [register],
});

export const embeddingDurationHistogram = new promClient.Histogram({
  name: 'docsort_embedding_duration_seconds',
  help: 'Duration of the per-document embedding step',
  labelNames: ['status'],
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60],
  registers: [register],
});

export const semanticSkippedCounter = new promClient.Counter({
  name: 'docsort_semantic_skipped_total',
  help: 'Documents decided by rules alone, without computing an embedding',
  registers: [register],
});

// ============================================================================
// Batch Metrics
// ============================================================================

export const batchDurationHistogram = new promClient.Histogram({
  name: 'docsort_batch_duration_seconds',
  help: 'Duration of a full classification batch',
  buckets: [1, 5, 10, 30, 60, 300, 900, 3600],
  registers: [register],
});

/**
 * Get metrics in Prometheus text exposition format
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}
