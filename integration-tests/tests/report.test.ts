/**
 * Report Builder tests
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  DEFAULT_POLICY,
  ExtractionError,
  ReportBuilder,
  ValidationError,
  classifyDocument,
  failedDecision,
  formatSummary,
  loadCategorySet,
  roundScore,
  serializeReport,
  writeReport,
  type Decision,
} from '@docsort/shared';
import { FIXTURE_CONFIG, makeDocument, makeTempDir } from './helpers';

describe('Report Builder', () => {
  const categorySet = loadCategorySet(FIXTURE_CONFIG, DEFAULT_POLICY);
  const fixedClock = () => new Date('2026-01-02T03:04:05.000Z');
  let decisions: Decision[];

  beforeAll(async () => {
    const classify = (text: string, filename: string) =>
      classifyDocument(makeDocument(text, { filename }), { categorySet, semanticScorer: null });

    decisions = [
      await classify('Invoice No. 7', 'b.pdf'),
      await classify('the party hereinafter named', 'a.pdf'),
      await classify('weather forecast', 'c.pdf'),
      failedDecision('/inbox/d.pdf', new ExtractionError('File is not valid UTF-8 text', '/inbox/d.pdf')),
    ];
  });

  function build(order: readonly Decision[], runId = 'run-1'): ReturnType<ReportBuilder['build']> {
    const builder = new ReportBuilder({ runId, categorySet, now: fixedClock });
    for (const decision of order) builder.add(decision);
    return builder.build();
  }

  it('should sort entries by source path regardless of completion order', () => {
    const report = build(decisions);

    expect(report.documents.map((d) => d.source_path)).toEqual([
      '/inbox/a.pdf',
      '/inbox/b.pdf',
      '/inbox/c.pdf',
      '/inbox/d.pdf',
    ]);
    expect(report.documents.map((d) => d.category)).toEqual(['Contracts', 'Invoices', 'Unclassified', 'Error']);
  });

  it('should serialize identically across runs once volatile fields are dropped', () => {
    const first = build(decisions, 'run-1');
    const second = build([...decisions].reverse(), 'run-2');

    expect(serializeReport(first, { includeVolatile: false })).toBe(
      serializeReport(second, { includeVolatile: false })
    );
    expect(serializeReport(first)).not.toBe(serializeReport(second));
  });

  it('should summarize counts per outcome and category', () => {
    const report = build(decisions);

    expect(report.summary).toEqual({
      total: 4,
      classified: 2,
      unclassified: 1,
      failed: 1,
      by_category: { Contracts: 1, Error: 1, Invoices: 1, Unclassified: 1 },
    });
    expect(report.run_id).toBe('run-1');
    expect(report.generated_at).toBe('2026-01-02T03:04:05.000Z');
    expect(report.categories).toEqual(['Contracts', 'Invoices', 'Reports']);
    expect(report.configuration).toBe(categorySet.sourcePath);
  });

  it('should carry the trace and extras into each entry', () => {
    const builder = new ReportBuilder({ runId: 'run-1', categorySet, now: fixedClock });
    builder.add(decisions[0], { contentHash: 'abc', pageCount: 2 });
    builder.setDestination('/inbox/b.pdf', '/sorted/Invoices/b.pdf');

    const [entry] = builder.build().documents;

    expect(entry).toMatchObject({
      source_path: '/inbox/b.pdf',
      category: 'Invoices',
      outcome: 'classified',
      confidence: 0.9,
      stage: 'rule-only',
      decided_by: 'rule',
      semantic_status: 'not-needed',
      content_hash: 'abc',
      page_count: 2,
      destination: '/sorted/Invoices/b.pdf',
      errors: [],
    });
    expect(Object.keys(entry.scores)).toEqual(['Contracts', 'Invoices', 'Reports']);
    expect(entry.scores.Invoices).toEqual({ rule: 0.9, semantic: null, combined: null, matched_rules: ['invoice-number'] });
  });

  it('should refuse a second decision for the same document', () => {
    const builder = new ReportBuilder({ runId: 'run-1', categorySet });
    builder.add(decisions[0]);

    expect(() => builder.add(decisions[0])).toThrow(ValidationError);
    expect(builder.size).toBe(1);
  });

  it('should refuse a destination for an unknown document', () => {
    const builder = new ReportBuilder({ runId: 'run-1', categorySet });

    expect(() => builder.setDestination('/inbox/nope.pdf', '/sorted/nope.pdf')).toThrow(
      'No decision recorded for /inbox/nope.pdf'
    );
  });

  it('should produce an empty document list for an empty run', () => {
    const report = new ReportBuilder({ runId: 'run-1', categorySet, now: fixedClock }).build();

    expect(report.documents).toEqual([]);
    expect(report.summary).toEqual({ total: 0, classified: 0, unclassified: 0, failed: 0, by_category: {} });
  });

  it('should write the serialized report, creating directories', async () => {
    const dir = makeTempDir('report');
    const filePath = path.join(dir, 'nested', 'classification_report.json');
    const report = build(decisions);

    await writeReport(report, filePath);

    expect(fs.readFileSync(filePath, 'utf-8')).toBe(serializeReport(report));
  });

  describe('formatSummary', () => {
    it('should list totals, top categories and problem documents', () => {
      expect(formatSummary(build(decisions)).split('\n')).toEqual([
        'Classification summary',
        '  Documents:    4',
        '  Classified:   2',
        '  Unclassified: 1',
        '  Failed:       1',
        '',
        'Top categories',
        '  Contracts: 1',
        '  Invoices: 1',
        '',
        'Unclassified documents',
        '  /inbox/c.pdf (no rule matched and semantic scoring skipped: no embedding provider configured)',
        '',
        'Failed documents',
        '  /inbox/d.pdf: File is not valid UTF-8 text',
      ]);
    });
  });

  describe('roundScore', () => {
    it('should round to six decimals without negative zero', () => {
      expect(roundScore(0.1234567)).toBe(0.123457);
      expect(Object.is(roundScore(-0.0000001), 0)).toBe(true);
    });
  });
});
