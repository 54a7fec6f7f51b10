/**
 * Test Helpers
 *
 * Document factories, category sets built from inline configuration and an
 * in-process embedding provider.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  DEFAULT_POLICY,
  buildCategorySet,
  type CategorySet,
  type ClassificationPolicy,
  type EmbeddingProvider,
  type ExtractedDocument,
  type RawCategoryConfig,
} from '@docsort/shared';

export const FIXTURES_DIR = path.join(__dirname, '../fixtures');
export const FIXTURE_CONFIG = path.join(FIXTURES_DIR, 'categories.json');

export interface DocumentOverrides {
  sourcePath?: string;
  filename?: string;
  properties?: Record<string, string>;
  pageCount?: number | null;
}

export function makeDocument(text: string, overrides: DocumentOverrides = {}): ExtractedDocument {
  const filename = overrides.filename ?? 'document.pdf';
  return {
    sourcePath: overrides.sourcePath ?? `/inbox/${filename}`,
    text,
    contentHash: 'test-hash',
    metadata: {
      filename,
      extension: path.extname(filename).replace(/^\./, ''),
      relativePath: filename,
      sizeBytes: text.length,
      pageCount: overrides.pageCount ?? 1,
      createdAt: null,
      modifiedAt: null,
      properties: overrides.properties ?? {},
    },
  };
}

export function categorySetFrom(
  categories: RawCategoryConfig['categories'],
  policy: Partial<ClassificationPolicy> = {}
): CategorySet {
  return buildCategorySet(
    { categories },
    { baseDir: FIXTURES_DIR, defaults: { ...DEFAULT_POLICY, ...policy } }
  );
}

export function policyWith(overrides: Partial<ClassificationPolicy> = {}): ClassificationPolicy {
  return { ...DEFAULT_POLICY, ...overrides };
}

/**
 * Embedding provider that never leaves the process. Records every call.
 */
export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly model = 'fake-embedding';
  readonly calls: string[][] = [];

  constructor(
    private readonly embedOne: (input: string) => number[],
    readonly maxInputChars: number = 1000
  ) {}

  async embed(inputs: string[]): Promise<number[][]> {
    this.calls.push([...inputs]);
    return inputs.map((input) => this.embedOne(input));
  }
}

export class FailingEmbeddingProvider implements EmbeddingProvider {
  readonly model = 'failing-embedding';
  readonly maxInputChars = 1000;
  calls = 0;

  async embed(): Promise<number[][]> {
    this.calls++;
    throw new Error('provider unavailable');
  }
}

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `docsort-${prefix}-`));
}

export function writeFile(root: string, relative: string, content: string): string {
  const filePath = path.join(root, relative);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content);
  return filePath;
}
