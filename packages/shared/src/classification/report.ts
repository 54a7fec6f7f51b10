/**
 * Report Builder
 *
 * The single writer of a run's report. Workers hand their Decisions to
 * add() as they finish; build() sorts by source path, so the report does
 * not depend on completion order.
 */

import fs from 'fs';
import path from 'path';
import { ValidationError } from '../errors';
import { logger } from '../logger';
import { validateReport } from '../schemas';
import {
  ERROR_MARKER,
  UNCLASSIFIED,
  type CategorySet,
  type ClassificationReport,
  type Decision,
  type ReportCategoryScore,
  type ReportEntry,
  type ReportSummary,
} from '../types';
import { compareNames } from './ordering';

export const REPORT_SCHEMA_VERSION = '1.0.0';
export const DEFAULT_REPORT_FILENAME = 'classification_report.json';

/** Scores are written with 6 decimals so float noise never changes the JSON. */
export function roundScore(value: number): number {
  const rounded = Math.round(value * 1e6) / 1e6;
  return Object.is(rounded, -0) ? 0 : rounded;
}

function roundNullable(value: number | null): number | null {
  return value === null ? null : roundScore(value);
}

export interface EntryExtras {
  contentHash?: string | null;
  pageCount?: number | null;
  destination?: string | null;
}

export function toReportEntry(decision: Decision, extras: EntryExtras = {}): ReportEntry {
  const { trace } = decision;
  const scores: Record<string, ReportCategoryScore> = {};
  for (const name of Object.keys(trace.scores).sort(compareNames)) {
    const score = trace.scores[name];
    scores[name] = {
      rule: roundScore(score.rule),
      semantic: roundNullable(score.semantic),
      combined: roundNullable(score.combined),
      matched_rules: [...score.matchedRules],
    };
  }

  return {
    source_path: decision.sourcePath,
    category: decision.category,
    outcome: decision.outcome,
    confidence: roundScore(decision.confidence),
    stage: decision.stage,
    decided_by: trace.decidedBy,
    top_category: trace.topCategory,
    runner_up: trace.runnerUp,
    margin: roundScore(trace.margin),
    tie_candidates: [...trace.tieCandidates],
    reason: trace.reason,
    semantic_status: trace.semanticStatus,
    scores,
    content_hash: extras.contentHash ?? null,
    page_count: extras.pageCount ?? null,
    destination: extras.destination ?? null,
    errors: trace.errors.map((e) => ({ type: e.type, code: e.code, message: e.message })),
  };
}

export interface ReportBuilderOptions {
  runId: string;
  categorySet: CategorySet;
  now?: () => Date;
}

export class ReportBuilder {
  private readonly entries = new Map<string, { decision: Decision; extras: EntryExtras }>();

  constructor(private readonly options: ReportBuilderOptions) {}

  /**
   * Record one document's Decision. A document is decided exactly once per run.
   */
  add(decision: Decision, extras: EntryExtras = {}): void {
    if (this.entries.has(decision.sourcePath)) {
      throw new ValidationError(`Decision for ${decision.sourcePath} was already recorded`);
    }
    this.entries.set(decision.sourcePath, { decision, extras: { ...extras } });
  }

  setDestination(sourcePath: string, destination: string | null): void {
    const entry = this.entries.get(sourcePath);
    if (!entry) {
      throw new ValidationError(`No decision recorded for ${sourcePath}`);
    }
    entry.extras = { ...entry.extras, destination };
  }

  get size(): number {
    return this.entries.size;
  }

  decisions(): Decision[] {
    return [...this.entries.values()]
      .map((e) => e.decision)
      .sort((a, b) => compareNames(a.sourcePath, b.sourcePath));
  }

  build(): ClassificationReport {
    const { categorySet, runId } = this.options;
    const documents = [...this.entries.values()]
      .map(({ decision, extras }) => toReportEntry(decision, extras))
      .sort((a, b) => compareNames(a.source_path, b.source_path));

    const report: ClassificationReport = {
      schema_version: REPORT_SCHEMA_VERSION,
      run_id: runId,
      generated_at: (this.options.now ?? (() => new Date()))().toISOString(),
      configuration: categorySet.sourcePath,
      categories: [...categorySet.names],
      policy: { ...categorySet.policy },
      summary: summarize(documents),
      documents,
    };

    const result = validateReport(report);
    if (!result.valid) {
      throw new ValidationError(`Report does not match its schema: ${(result.errors ?? []).join('; ')}`);
    }
    return report;
  }
}

export function summarize(documents: readonly ReportEntry[]): ReportSummary {
  const counts = new Map<string, number>();
  let classified = 0;
  let unclassified = 0;
  let failed = 0;

  for (const entry of documents) {
    counts.set(entry.category, (counts.get(entry.category) ?? 0) + 1);
    if (entry.outcome === 'classified') classified++;
    else if (entry.outcome === 'unclassified') unclassified++;
    else failed++;
  }

  const byCategory: Record<string, number> = {};
  for (const name of [...counts.keys()].sort(compareNames)) {
    byCategory[name] = counts.get(name) ?? 0;
  }

  return { total: documents.length, classified, unclassified, failed, by_category: byCategory };
}

export interface SerializeOptions {
  /** Include run_id and generated_at (default true) */
  includeVolatile?: boolean;
}

/**
 * Stable JSON for a report. Without the volatile fields, two runs over the
 * same inputs and configuration serialize identically.
 */
export function serializeReport(report: ClassificationReport, options: SerializeOptions = {}): string {
  if (options.includeVolatile ?? true) {
    return `${JSON.stringify(report, null, 2)}\n`;
  }
  const { run_id: _runId, generated_at: _generatedAt, ...stable } = report;
  return `${JSON.stringify(stable, null, 2)}\n`;
}

export async function writeReport(report: ClassificationReport, filePath: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, serializeReport(report), 'utf-8');
  logger.info('Classification report written', { path: filePath, documents: report.documents.length });
}

const TOP_CATEGORIES = 10;

/**
 * Human-readable run summary.
 */
export function formatSummary(report: ClassificationReport): string {
  const { summary } = report;
  const lines = [
    'Classification summary',
    `  Documents:    ${summary.total}`,
    `  Classified:   ${summary.classified}`,
    `  Unclassified: ${summary.unclassified}`,
    `  Failed:       ${summary.failed}`,
  ];

  const top = Object.entries(summary.by_category)
    .filter(([name]) => name !== UNCLASSIFIED && name !== ERROR_MARKER)
    .sort(([a, x], [b, y]) => y - x || compareNames(a, b))
    .slice(0, TOP_CATEGORIES);
  if (top.length > 0) {
    lines.push('', 'Top categories');
    for (const [name, count] of top) {
      lines.push(`  ${name}: ${count}`);
    }
  }

  const unclassified = report.documents.filter((d) => d.outcome === 'unclassified');
  if (unclassified.length > 0) {
    lines.push('', 'Unclassified documents');
    for (const entry of unclassified) {
      lines.push(`  ${entry.source_path} (${entry.reason})`);
    }
  }

  const failed = report.documents.filter((d) => d.outcome === 'failed');
  if (failed.length > 0) {
    lines.push('', 'Failed documents');
    for (const entry of failed) {
      lines.push(`  ${entry.source_path}: ${entry.errors.map((e) => e.message).join('; ')}`);
    }
  }

  return lines.join('\n');
}
