/**
 * Shared TypeScript Types
 *
 * Types for the document classification pipeline, matching JSON schemas in docs/contracts/
 */

import type { ErrorDetail } from './errors';

// ============================================================================
// Sentinels
// ============================================================================

/** Category assigned when no configured category clears the confidence floor. */
export const UNCLASSIFIED = 'Unclassified';

/** Category marker assigned to documents whose pipeline failed. */
export const ERROR_MARKER = 'Error';

export const RESERVED_CATEGORY_NAMES: readonly string[] = [UNCLASSIFIED, ERROR_MARKER];

// ============================================================================
// Documents
// ============================================================================

export interface DocumentMetadata {
  filename: string;
  /** Lowercase, without the leading dot */
  extension: string;
  /** Path relative to the source root, using forward slashes */
  relativePath: string;
  sizeBytes: number;
  pageCount: number | null;
  createdAt: string | null;
  modifiedAt: string | null;
  /** Document properties (PDF Title, Author, Subject, Keywords, ...) */
  properties: Readonly<Record<string, string>>;
}

export interface ExtractedDocument {
  sourcePath: string;
  text: string;
  /** sha256 of the file bytes */
  contentHash: string;
  metadata: DocumentMetadata;
}

// ============================================================================
// Categories & Rules
// ============================================================================

export type RuleField = 'text' | 'filename' | 'metadata';

interface RuleBase {
  /** Label shown in decision traces */
  label: string;
  /** Normalized (kind, field, pattern); duplicate identities count once */
  identity: string;
  field: RuleField;
  /** Restricts a metadata rule to one document property */
  metadataKey?: string;
  weight: number;
  matcher: RegExp;
}

export interface KeywordRule extends RuleBase {
  kind: 'keywords';
  keywords: readonly string[];
  wholeWord: boolean;
}

export interface RegexRule extends RuleBase {
  kind: 'regex';
  pattern: string;
}

export type Rule = KeywordRule | RegexRule;

export interface Category {
  name: string;
  description?: string;
  rules: readonly Rule[];
  centroid?: readonly number[];
}

export type InconclusivePolicy = 'absolute' | 'margin' | 'absolute-and-margin';

export interface ClassificationPolicy {
  inconclusivePolicy: InconclusivePolicy;
  highConfidenceThreshold: number;
  ruleMargin: number;
  /** α in combined = α·rule + (1−α)·semantic */
  blendWeight: number;
  tieEpsilon: number;
  confidenceFloor: number;
}

export interface CategorySet {
  /** Sorted by name */
  categories: readonly Category[];
  names: readonly string[];
  policy: ClassificationPolicy;
  /** Dimension shared by every centroid, or null when no category has one */
  centroidDimensions: number | null;
  sourcePath: string | null;
}

// ============================================================================
// Scores
// ============================================================================

export interface RuleMatchResult {
  category: string;
  /** Labels of triggered rules, sorted */
  matchedRules: string[];
  /** Sum of distinct triggered weights, clamped to 1.0 */
  score: number;
}

export type RuleResults = Record<string, RuleMatchResult>;

export interface SemanticScore {
  category: string;
  /** Cosine similarity in [-1, 1], null when the category has no centroid */
  similarity: number | null;
}

export type SemanticOutcome =
  | { status: 'scored'; scores: Record<string, SemanticScore>; model: string; chunkCount: number }
  | { status: 'failed'; error: ErrorDetail }
  | { status: 'skipped'; reason: string };

// ============================================================================
// Decisions
// ============================================================================

export type DecisionStage = 'rule-only' | 'blended' | 'unclassified' | 'failed';

export type DecisionOutcome = 'classified' | 'unclassified' | 'failed';

export type DecidingSignal = 'rule' | 'semantic' | 'both' | 'none';

export interface CategoryScoreTrace {
  rule: number;
  semantic: number | null;
  combined: number | null;
  matchedRules: string[];
}

export interface DecisionTrace {
  stage: DecisionStage;
  decidedBy: DecidingSignal;
  /** Keyed by category name, in name order */
  scores: Record<string, CategoryScoreTrace>;
  /** Best category by score, even when the decision fell below the floor */
  topCategory: string | null;
  runnerUp: string | null;
  margin: number;
  /** Categories within epsilon of the top score, when more than one */
  tieCandidates: string[];
  reason: string;
  semanticStatus: 'scored' | 'failed' | 'skipped' | 'not-needed';
  errors: ErrorDetail[];
}

export interface Decision {
  sourcePath: string;
  category: string;
  outcome: DecisionOutcome;
  confidence: number;
  stage: DecisionStage;
  trace: DecisionTrace;
}

// ============================================================================
// Report
// ============================================================================

export interface ReportCategoryScore {
  rule: number;
  semantic: number | null;
  combined: number | null;
  matched_rules: string[];
}

export interface ReportEntry {
  source_path: string;
  category: string;
  outcome: DecisionOutcome;
  confidence: number;
  stage: DecisionStage;
  decided_by: DecidingSignal;
  top_category: string | null;
  runner_up: string | null;
  margin: number;
  tie_candidates: string[];
  reason: string;
  semantic_status: DecisionTrace['semanticStatus'];
  scores: Record<string, ReportCategoryScore>;
  content_hash: string | null;
  page_count: number | null;
  destination: string | null;
  errors: ErrorDetail[];
}

export interface ReportSummary {
  total: number;
  classified: number;
  unclassified: number;
  failed: number;
  by_category: Record<string, number>;
}

export interface ClassificationReport {
  schema_version: '1.0.0';
  run_id: string;
  generated_at: string;
  configuration: string | null;
  categories: string[];
  policy: ClassificationPolicy;
  summary: ReportSummary;
  documents: ReportEntry[];
}
