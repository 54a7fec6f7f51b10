/**
 * Category Configuration Loader
 *
 * Reads the category file once at startup, validates it against
 * category_config.schema.json, compiles every rule and loads centroid
 * embeddings. Any problem is a ConfigurationError; the resulting CategorySet
 * is frozen and shared read-only by every worker.
 */

import fs from 'fs';
import path from 'path';
import { config } from '../config';
import { ConfigurationError } from '../errors';
import { logger } from '../logger';
import { validateCategoryConfig } from '../schemas';
import {
  RESERVED_CATEGORY_NAMES,
  type Category,
  type CategorySet,
  type ClassificationPolicy,
  type InconclusivePolicy,
  type KeywordRule,
  type RegexRule,
  type Rule,
  type RuleField,
} from '../types';
import { compareNames } from './ordering';

// ============================================================================
// Raw (file) shapes, as described by category_config.schema.json
// ============================================================================

interface RawRuleBase {
  id?: string;
  field?: RuleField;
  metadataKey?: string;
  weight: number;
}

interface RawKeywordRule extends RawRuleBase {
  keywords: string[];
  wholeWord?: boolean;
}

interface RawRegexRule extends RawRuleBase {
  regex: string;
}

type RawRule = RawKeywordRule | RawRegexRule;

interface RawCategory {
  name: string;
  description?: string;
  centroid?: string;
  rules: RawRule[];
}

export interface RawCategoryConfig {
  version?: string;
  policy?: Partial<ClassificationPolicy>;
  categories: RawCategory[];
}

/**
 * Schema-backed type guard. Throws with every schema violation listed.
 */
function assertRawCategoryConfig(data: unknown, source: string): asserts data is RawCategoryConfig {
  const result = validateCategoryConfig(data);
  if (!result.valid) {
    throw new ConfigurationError(`Invalid category configuration (${source})`, result.errors ?? []);
  }
}

// ============================================================================
// Rule compilation
// ============================================================================

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function normalizeKeyword(keyword: string): string {
  return keyword.trim().toLowerCase().replace(/\s+/g, ' ');
}

/** Whitespace inside a phrase matches any whitespace run (PDF text breaks lines freely). */
function keywordPattern(keyword: string): string {
  return normalizeKeyword(keyword).split(' ').map(escapeRegex).join('\\s+');
}

export function compileKeywordMatcher(keywords: readonly string[], wholeWord: boolean): RegExp {
  // Longest first so the alternation reports the most specific phrase
  const alternation = [...new Set(keywords.map(normalizeKeyword))]
    .sort((a, b) => b.length - a.length || compareNames(a, b))
    .map(keywordPattern)
    .join('|');

  if (wholeWord) {
    return new RegExp(`(?<![\\p{L}\\p{N}_])(?:${alternation})(?![\\p{L}\\p{N}_])`, 'iu');
  }
  return new RegExp(`(?:${alternation})`, 'iu');
}

function isKeywordRule(rule: RawRule): rule is RawKeywordRule {
  return 'keywords' in rule;
}

function compileRule(raw: RawRule, categoryName: string, index: number, problems: string[]): Rule | null {
  const field: RuleField = raw.field ?? 'text';
  const where = `category "${categoryName}" rule #${index + 1}`;

  if (raw.metadataKey !== undefined && field !== 'metadata') {
    problems.push(`${where}: metadataKey is only valid with field "metadata"`);
    return null;
  }

  const scope = raw.metadataKey ?? '*';

  if (isKeywordRule(raw)) {
    const wholeWord = raw.wholeWord ?? true;
    const normalized = [...new Set(raw.keywords.map(normalizeKeyword))].sort(compareNames);
    const rule: KeywordRule = {
      kind: 'keywords',
      label: raw.id ?? `${field}:keywords(${normalized.join(', ')})`,
      identity: `keywords|${field}|${scope}|${wholeWord ? 'word' : 'substring'}|${JSON.stringify(normalized)}`,
      field,
      metadataKey: raw.metadataKey,
      weight: raw.weight,
      keywords: Object.freeze(normalized),
      wholeWord,
      matcher: compileKeywordMatcher(normalized, wholeWord),
    };
    return rule;
  }

  let matcher: RegExp;
  try {
    matcher = new RegExp(raw.regex, 'i');
  } catch (err) {
    problems.push(`${where}: invalid regular expression /${raw.regex}/ (${err instanceof Error ? err.message : String(err)})`);
    return null;
  }

  const rule: RegexRule = {
    kind: 'regex',
    label: raw.id ?? `${field}:regex(/${raw.regex}/)`,
    identity: `regex|${field}|${scope}|${raw.regex}`,
    field,
    metadataKey: raw.metadataKey,
    weight: raw.weight,
    pattern: raw.regex,
    matcher,
  };
  return rule;
}

// ============================================================================
// Centroids
// ============================================================================

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((n) => typeof n === 'number');
}

/**
 * Centroid files hold either a bare JSON number array or { "vector": [...] }.
 */
export function parseCentroid(data: unknown): number[] | null {
  if (isNumberArray(data)) return data;
  if (typeof data === 'object' && data !== null && 'vector' in data && isNumberArray(data.vector)) {
    return data.vector;
  }
  return null;
}

function loadCentroid(file: string, baseDir: string, categoryName: string, problems: string[]): number[] | null {
  const centroidPath = path.resolve(baseDir, file);
  const where = `category "${categoryName}" centroid ${centroidPath}`;

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(centroidPath, 'utf-8'));
  } catch (err) {
    problems.push(`${where}: cannot be read (${err instanceof Error ? err.message : String(err)})`);
    return null;
  }

  const vector = parseCentroid(data);
  if (!vector || vector.length === 0) {
    problems.push(`${where}: expected a non-empty number array or { "vector": [...] }`);
    return null;
  }
  if (!vector.every(Number.isFinite)) {
    problems.push(`${where}: contains non-finite values`);
    return null;
  }
  if (vector.every((n) => n === 0)) {
    problems.push(`${where}: is the zero vector`);
    return null;
  }
  return vector;
}

// ============================================================================
// Policy
// ============================================================================

const INCONCLUSIVE_POLICIES: readonly InconclusivePolicy[] = ['absolute', 'margin', 'absolute-and-margin'];

export function resolvePolicy(
  defaults: ClassificationPolicy,
  overrides: Partial<ClassificationPolicy> | undefined,
  problems: string[]
): ClassificationPolicy {
  const policy: ClassificationPolicy = { ...defaults, ...overrides };

  if (!INCONCLUSIVE_POLICIES.includes(policy.inconclusivePolicy)) {
    problems.push(`policy.inconclusivePolicy must be one of ${INCONCLUSIVE_POLICIES.join(', ')}`);
  }

  const unitFields = ['highConfidenceThreshold', 'ruleMargin', 'blendWeight', 'tieEpsilon', 'confidenceFloor'] as const;
  for (const key of unitFields) {
    const value = policy[key];
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      problems.push(`policy.${key} must be a number in [0, 1] (got ${String(value)})`);
    }
  }

  return policy;
}

// ============================================================================
// CategorySet
// ============================================================================

export interface BuildCategorySetOptions {
  /** Directory centroid paths are resolved against */
  baseDir: string;
  sourcePath?: string | null;
  defaults?: ClassificationPolicy;
}

/**
 * Validate and compile a parsed category configuration.
 */
export function buildCategorySet(data: unknown, options: BuildCategorySetOptions): CategorySet {
  const source = options.sourcePath ?? 'inline configuration';
  assertRawCategoryConfig(data, source);

  const problems: string[] = [];
  const policy = resolvePolicy(options.defaults ?? config.policy, data.policy, problems);

  const seenNames = new Map<string, string>();
  const categories: Category[] = [];
  let centroidDimensions: number | null = null;

  for (const rawCategory of data.categories) {
    const name = rawCategory.name.trim();
    if (name !== rawCategory.name) {
      problems.push(`category "${rawCategory.name}": name has leading or trailing whitespace`);
    }

    const folded = name.toLowerCase();
    if (RESERVED_CATEGORY_NAMES.some((reserved) => reserved.toLowerCase() === folded)) {
      problems.push(`category "${name}": name is reserved`);
    }
    const previous = seenNames.get(folded);
    if (previous !== undefined) {
      problems.push(`category "${name}": duplicates category "${previous}"`);
    }
    seenNames.set(folded, name);

    const rules: Rule[] = [];
    const ruleIds = new Set<string>();
    const identities = new Set<string>();
    rawCategory.rules.forEach((rawRule, index) => {
      if (rawRule.id !== undefined) {
        if (ruleIds.has(rawRule.id)) {
          problems.push(`category "${name}": rule id "${rawRule.id}" is used more than once`);
        }
        ruleIds.add(rawRule.id);
      }
      const rule = compileRule(rawRule, name, index, problems);
      if (!rule) return;
      if (identities.has(rule.identity)) {
        logger.warn('Duplicate rule in category; it will be counted once', {
          category: name,
          rule: rule.label,
        });
      }
      identities.add(rule.identity);
      rules.push(Object.freeze(rule));
    });

    let centroid: number[] | null = null;
    if (rawCategory.centroid !== undefined) {
      centroid = loadCentroid(rawCategory.centroid, options.baseDir, name, problems);
      if (centroid) {
        if (centroidDimensions === null) {
          centroidDimensions = centroid.length;
        } else if (centroid.length !== centroidDimensions) {
          problems.push(
            `category "${name}": centroid has ${centroid.length} dimensions, expected ${centroidDimensions}`
          );
        }
      }
    }

    if (rules.length === 0 && rawCategory.centroid === undefined) {
      problems.push(`category "${name}": needs at least one rule or a centroid`);
    }

    const category: Category = {
      name,
      rules: Object.freeze(rules),
      ...(rawCategory.description !== undefined ? { description: rawCategory.description } : {}),
      ...(centroid ? { centroid: Object.freeze(centroid) } : {}),
    };
    categories.push(Object.freeze(category));
  }

  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid category configuration (${source})`, problems);
  }

  categories.sort((a, b) => compareNames(a.name, b.name));

  const categorySet: CategorySet = {
    categories: Object.freeze(categories),
    names: Object.freeze(categories.map((c) => c.name)),
    policy: Object.freeze(policy),
    centroidDimensions,
    sourcePath: options.sourcePath ?? null,
  };

  logger.info('Category configuration loaded', {
    source,
    categories: categorySet.names.length,
    rules: categories.reduce((n, c) => n + c.rules.length, 0),
    centroids: categories.filter((c) => c.centroid).length,
    centroid_dimensions: centroidDimensions,
    policy,
  });

  return Object.freeze(categorySet);
}

/**
 * Load the category configuration file. Fatal (ConfigurationError) on any problem.
 */
export function loadCategorySet(configPath: string, defaults?: ClassificationPolicy): CategorySet {
  const absolutePath = path.resolve(configPath);

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(absolutePath, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(
      `Cannot read category configuration ${absolutePath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  return buildCategorySet(data, {
    baseDir: path.dirname(absolutePath),
    sourcePath: absolutePath,
    defaults,
  });
}
