/**
 * Rule Engine
 *
 * Evaluates every category's rules against a document. Weights of distinct
 * triggered rules are summed and clamped to 1.0 so categories with large
 * rule sets stay comparable to small ones.
 */

import type { Category, CategorySet, ExtractedDocument, Rule, RuleMatchResult, RuleResults } from '../types';
import { compareNames } from './ordering';

export const MAX_RULE_SCORE = 1.0;

function findProperty(properties: Readonly<Record<string, string>>, key: string): string {
  if (key in properties) return properties[key];
  const folded = key.toLowerCase();
  const match = Object.keys(properties).find((k) => k.toLowerCase() === folded);
  return match !== undefined ? properties[match] : '';
}

/**
 * The string a rule is tested against.
 */
export function fieldHaystack(document: ExtractedDocument, rule: Pick<Rule, 'field' | 'metadataKey'>): string {
  switch (rule.field) {
    case 'text':
      return document.text;
    case 'filename':
      return document.metadata.filename;
    case 'metadata': {
      const { properties } = document.metadata;
      if (rule.metadataKey !== undefined) {
        return findProperty(properties, rule.metadataKey);
      }
      return Object.keys(properties)
        .sort(compareNames)
        .map((key) => properties[key])
        .join('\n');
    }
  }
}

export function hasExtractedText(document: ExtractedDocument): boolean {
  return document.text.trim().length > 0;
}

/**
 * Evaluate one category. Duplicate rule identities count once (with the
 * largest weight among them) and weights are added in identity order, so
 * the score does not depend on the order rules are listed or evaluated in.
 */
export function evaluateCategory(document: ExtractedDocument, category: Category): RuleMatchResult {
  if (!hasExtractedText(document)) {
    return { category: category.name, matchedRules: [], score: 0 };
  }

  const byIdentity = new Map<string, number>();
  const labels = new Set<string>();

  for (const rule of category.rules) {
    const haystack = fieldHaystack(document, rule);
    if (haystack.length === 0 || !rule.matcher.test(haystack)) continue;

    labels.add(rule.label);
    const previous = byIdentity.get(rule.identity);
    if (previous === undefined || rule.weight > previous) {
      byIdentity.set(rule.identity, rule.weight);
    }
  }

  let sum = 0;
  for (const identity of [...byIdentity.keys()].sort(compareNames)) {
    sum += byIdentity.get(identity) ?? 0;
  }

  return {
    category: category.name,
    matchedRules: [...labels].sort(compareNames),
    score: Math.min(MAX_RULE_SCORE, sum),
  };
}

/**
 * Evaluate every configured category. Every category is present in the
 * result, including those with no matches.
 */
export function evaluateRules(
  document: ExtractedDocument,
  categorySet: Pick<CategorySet, 'categories'>
): RuleResults {
  const results: RuleResults = {};
  const ordered = [...categorySet.categories].sort((a, b) => compareNames(a.name, b.name));
  for (const category of ordered) {
    results[category.name] = evaluateCategory(document, category);
  }
  return results;
}
