/**
 * Rule Engine unit tests
 */

import { evaluateCategory, evaluateRules, fieldHaystack } from '@docsort/shared';
import { categorySetFrom, makeDocument } from './helpers';

describe('Rule Engine', () => {
  const invoiceSet = categorySetFrom([
    {
      name: 'Invoices',
      rules: [
        { keywords: ['invoice'], weight: 0.6 },
        { field: 'filename', keywords: ['invoice'], wholeWord: false, weight: 0.3 },
      ],
    },
    { name: 'Contracts', rules: [{ regex: 'agreement', weight: 0.5 }] },
  ]);

  it('should score every category zero when the extracted text is empty', () => {
    const document = makeDocument('   \n  ', { filename: 'invoice-2024.pdf' });

    const results = evaluateRules(document, invoiceSet);

    expect(Object.keys(results)).toEqual(['Contracts', 'Invoices']);
    expect(results.Invoices).toEqual({ category: 'Invoices', matchedRules: [], score: 0 });
    expect(results.Contracts).toEqual({ category: 'Contracts', matchedRules: [], score: 0 });
  });

  it('should report categories with no matches explicitly', () => {
    const results = evaluateRules(makeDocument('Invoice attached'), invoiceSet);

    expect(results.Contracts.score).toBe(0);
    expect(results.Contracts.matchedRules).toEqual([]);
    expect(results.Invoices.matchedRules).toEqual(['text:keywords(invoice)']);
    expect(results.Invoices.score).toBe(0.6);
  });

  it('should match keywords case-insensitively and on whole words only', () => {
    const [invoices] = invoiceSet.categories.filter((c) => c.name === 'Invoices');

    expect(evaluateCategory(makeDocument('INVOICE #42 attached'), invoices).score).toBe(0.6);
    expect(evaluateCategory(makeDocument('all invoiced amounts'), invoices).score).toBe(0);
  });

  it('should sum weights across fields', () => {
    const document = makeDocument('Invoice for March', { filename: 'march-invoice.pdf' });

    const result = evaluateRules(document, invoiceSet).Invoices;

    expect(result.matchedRules).toEqual(['filename:keywords(invoice)', 'text:keywords(invoice)']);
    expect(result.score).toBeCloseTo(0.9, 10);
  });

  it('should clamp the aggregate score to 1.0', () => {
    const set = categorySetFrom([
      {
        name: 'Contracts',
        rules: [
          { keywords: ['agreement'], weight: 0.7 },
          { keywords: ['hereinafter'], weight: 0.7 },
        ],
      },
    ]);

    const result = evaluateRules(makeDocument('This agreement, hereinafter the Agreement'), set).Contracts;

    expect(result.score).toBe(1);
    expect(result.matchedRules).toHaveLength(2);
  });

  it('should count a duplicated rule once, with its largest weight', () => {
    const set = categorySetFrom([
      {
        name: 'Invoices',
        rules: [
          { keywords: ['Invoice'], weight: 0.4 },
          { keywords: ['invoice '], weight: 0.5 },
        ],
      },
    ]);

    const result = evaluateRules(makeDocument('invoice no. 7'), set).Invoices;

    expect(result.score).toBe(0.5);
    expect(result.matchedRules).toEqual(['text:keywords(invoice)']);
  });

  it('should not depend on the order rules are listed in', () => {
    const rules = [
      { keywords: ['alpha'], weight: 0.1 },
      { keywords: ['beta'], weight: 0.2 },
      { regex: 'gam+a', weight: 0.3 },
    ];
    const forward = categorySetFrom([{ name: 'Greek', rules }]);
    const reversed = categorySetFrom([{ name: 'Greek', rules: [...rules].reverse() }]);
    const document = makeDocument('alpha beta gamma');

    const a = evaluateRules(document, forward).Greek;
    const b = evaluateRules(document, reversed).Greek;

    expect(a.score).toBe(b.score);
    expect(a.matchedRules).toEqual(b.matchedRules);
  });

  it('should let whitespace in a phrase match line breaks', () => {
    const set = categorySetFrom([{ name: 'Reports', rules: [{ keywords: ['quarterly report'], weight: 0.4 }] }]);

    const result = evaluateRules(makeDocument('Quarterly\n   Report for Q3'), set).Reports;

    expect(result.score).toBe(0.4);
  });

  it('should apply regex rules case-insensitively', () => {
    const set = categorySetFrom([
      { name: 'Invoices', rules: [{ id: 'invoice-number', regex: 'invoice\\s+no\\.?\\s*\\d+', weight: 0.9 }] },
    ]);

    const result = evaluateRules(makeDocument('INVOICE No. 123'), set).Invoices;

    expect(result).toEqual({ category: 'Invoices', matchedRules: ['invoice-number'], score: 0.9 });
  });

  it('should test metadata rules against one property, matching the key case-insensitively', () => {
    const set = categorySetFrom([
      {
        name: 'Contracts',
        rules: [{ field: 'metadata', metadataKey: 'Title', keywords: ['agreement'], weight: 0.3 }],
      },
    ]);
    const document = makeDocument('body text', {
      properties: { title: 'Master Services Agreement', Author: 'Legal' },
    });

    expect(evaluateRules(document, set).Contracts.score).toBe(0.3);
  });

  describe('fieldHaystack', () => {
    const document = makeDocument('body', {
      filename: 'scan.pdf',
      properties: { Title: 'Quarterly', Author: 'Finance' },
    });

    it('should join every metadata value in key order when no key is given', () => {
      expect(fieldHaystack(document, { field: 'metadata' })).toBe('Finance\nQuarterly');
    });

    it('should return the filename for filename rules', () => {
      expect(fieldHaystack(document, { field: 'filename' })).toBe('scan.pdf');
    });

    it('should return an empty string for a missing property', () => {
      expect(fieldHaystack(document, { field: 'metadata', metadataKey: 'Subject' })).toBe('');
    });
  });
});
