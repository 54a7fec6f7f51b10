/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 * Policy values here are defaults; a category file may override them.
 */

import type { ClassificationPolicy, InconclusivePolicy } from './types';

export interface Config {
  // Batch
  workerConcurrency: number;
  supportedExtensions: string[];

  // Extraction
  extractionTimeoutMs: number;
  extractionMaxPages: number;
  extractionMaxFileBytes: number;

  // Embeddings
  openaiApiKey: string;
  embeddingModel: string;
  embeddingTimeoutMs: number;
  embeddingMaxInputChars: number;
  embeddingBatchSize: number;

  // Decision policy defaults
  policy: ClassificationPolicy;
}

function parseInconclusivePolicy(raw: string | undefined): InconclusivePolicy {
  if (raw === 'absolute' || raw === 'margin' || raw === 'absolute-and-margin') {
    return raw;
  }
  return 'absolute-and-margin';
}

export const DEFAULT_POLICY: ClassificationPolicy = {
  inconclusivePolicy: 'absolute-and-margin',
  highConfidenceThreshold: 0.8,
  ruleMargin: 0.2,
  blendWeight: 0.5,
  tieEpsilon: 1e-6,
  confidenceFloor: 0.3,
};

export const config: Config = {
  // Batch
  workerConcurrency: parseInt(process.env.WORKER_CONCURRENCY || '4', 10),
  supportedExtensions: (process.env.SUPPORTED_EXTENSIONS || 'pdf,txt,md')
    .split(',')
    .map((ext) => ext.trim().toLowerCase().replace(/^\./, ''))
    .filter((ext) => ext.length > 0),

  // Extraction
  extractionTimeoutMs: parseInt(process.env.EXTRACTION_TIMEOUT_MS || '60000', 10),
  extractionMaxPages: parseInt(process.env.EXTRACTION_MAX_PAGES || '0', 10),
  extractionMaxFileBytes: parseInt(process.env.EXTRACTION_MAX_FILE_BYTES || String(50 * 1024 * 1024), 10),

  // Embeddings
  openaiApiKey: process.env.OPENAI_API_KEY || '',
  embeddingModel: process.env.EMBEDDING_MODEL || 'text-embedding-3-small',
  embeddingTimeoutMs: parseInt(process.env.EMBEDDING_TIMEOUT_MS || '60000', 10),
  embeddingMaxInputChars: parseInt(process.env.EMBEDDING_MAX_INPUT_CHARS || '24000', 10),
  embeddingBatchSize: parseInt(process.env.EMBEDDING_BATCH_SIZE || '16', 10),

  // Decision policy defaults
  policy: {
    inconclusivePolicy: parseInconclusivePolicy(process.env.INCONCLUSIVE_POLICY),
    highConfidenceThreshold: parseFloat(
      process.env.HIGH_CONFIDENCE_THRESHOLD || String(DEFAULT_POLICY.highConfidenceThreshold)
    ),
    ruleMargin: parseFloat(process.env.RULE_MARGIN || String(DEFAULT_POLICY.ruleMargin)),
    blendWeight: parseFloat(process.env.BLEND_WEIGHT || String(DEFAULT_POLICY.blendWeight)),
    tieEpsilon: parseFloat(process.env.TIE_EPSILON || String(DEFAULT_POLICY.tieEpsilon)),
    confidenceFloor: parseFloat(process.env.CONFIDENCE_FLOOR || String(DEFAULT_POLICY.confidenceFloor)),
  },
};
