/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  newRunId,
  runWithContextAsync,
  type RunContext,
} from './context';

// Logger
export { logger, type LogContext, type LogLevel } from './logger';

// Config
export { config, DEFAULT_POLICY, type Config } from './config';

// Types
export * from './types';

// Errors
export {
  ExtractionError,
  EmbeddingError,
  ConfigurationError,
  ValidationError,
  isConfigurationError,
  toErrorDetail,
  type ErrorCode,
  type ErrorDetail,
} from './errors';

// Timeouts
export { withTimeout, type TimeoutOptions } from './timeout';

// Metrics
export {
  register,
  enableDefaultMetrics,
  documentsProcessedCounter,
  documentsByCategoryCounter,
  extractionDurationHistogram,
  embeddingRequestsCounter,
  embeddingDurationHistogram,
  semanticSkippedCounter,
  batchDurationHistogram,
  getMetrics,
} from './metrics';

// Schema validation
export { SCHEMA_FILES, validateCategoryConfig, validateReport, type ValidationResult } from './schemas';

// Classification core
export { compareNames, rankScores, type RankedScore, type Ranking } from './classification/ordering';
export {
  buildCategorySet,
  loadCategorySet,
  resolvePolicy,
  parseCentroid,
  compileKeywordMatcher,
  type BuildCategorySetOptions,
  type RawCategoryConfig,
} from './classification/category-config';
export {
  MAX_RULE_SCORE,
  evaluateRules,
  evaluateCategory,
  fieldHaystack,
  hasExtractedText,
} from './classification/rule-engine';
export {
  SemanticClassifier,
  chunkText,
  averageVectors,
  cosineSimilarity,
  type EmbeddingProvider,
  type SemanticScorer,
  type SemanticClassifierOptions,
} from './classification/semantic-classifier';
export {
  resolveDecision,
  isRuleOutcomeConclusive,
  assertDecisionValid,
  type ResolveInput,
} from './classification/decision-resolver';
export {
  classifyDocument,
  failedDecision,
  recordDecisionMetrics,
  type PipelineContext,
} from './classification/pipeline';
export {
  ReportBuilder,
  REPORT_SCHEMA_VERSION,
  DEFAULT_REPORT_FILENAME,
  toReportEntry,
  roundScore,
  summarize,
  serializeReport,
  writeReport,
  formatSummary,
  type EntryExtras,
  type ReportBuilderOptions,
  type SerializeOptions,
} from './classification/report';

// Extractor registry
export type { TextExtractor, ExtractionOptions } from './extractors/types';
export {
  registerExtractor,
  getExtractor,
  getExtractorForFile,
  hasExtractor,
  getRegisteredExtensions,
  normalizeExtension,
  extensionOf,
  clearRegistry,
  getRegistryStats,
} from './extractors/registry';
export { BaseTextExtractor, sha256, type BaseExtractorOptions } from './extractors/base-extractor';
export { TextCache, type ParsedText } from './extractors/text-cache';
