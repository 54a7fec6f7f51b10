/**
 * Base Text Extractor
 *
 * Abstract base class providing what every extractor shares: reading the
 * file, the size limit, content hashing, the per-run text cache, the
 * timeout, metrics and logging. Subclasses only parse bytes into text.
 */

import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import { ExtractionError } from '../errors';
import { logger } from '../logger';
import { extractionDurationHistogram } from '../metrics';
import { withTimeout } from '../timeout';
import type { DocumentMetadata, ExtractedDocument } from '../types';
import type { ParsedText, TextCache } from './text-cache';
import type { ExtractionOptions, TextExtractor } from './types';

export interface BaseExtractorOptions {
  timeoutMs: number;
  /** Files larger than this are rejected; 0 disables the limit */
  maxFileBytes: number;
  cache?: TextCache;
}

const SLOW_EXTRACTION_WARNING_MS = 10_000;

export function sha256(bytes: Uint8Array): string {
  return crypto.createHash('sha256').update(bytes).digest('hex');
}

function toPosix(relative: string): string {
  return relative.split(path.sep).join('/');
}

/**
 * Abstract base class for text extractors.
 */
export abstract class BaseTextExtractor implements TextExtractor {
  abstract readonly id: string;
  abstract readonly supportedExtensions: readonly string[];
  abstract readonly description: string;

  constructor(protected readonly options: BaseExtractorOptions) {}

  /**
   * Parse file bytes into text and document properties.
   * Must be implemented by subclasses; throw ExtractionError on bad input.
   */
  protected abstract parse(bytes: Uint8Array, filePath: string): Promise<ParsedText>;

  async extract(filePath: string, options: ExtractionOptions): Promise<ExtractedDocument> {
    const startTime = Date.now();

    try {
      const stats = await fs.promises.stat(filePath).catch((err: unknown) => {
        throw new ExtractionError(`Cannot read file: ${errorMessage(err)}`, filePath, { cause: err });
      });
      const { maxFileBytes } = this.options;
      if (maxFileBytes > 0 && stats.size > maxFileBytes) {
        throw new ExtractionError(`File is ${stats.size} bytes, limit is ${maxFileBytes}`, filePath);
      }

      const bytes = await fs.promises.readFile(filePath).catch((err: unknown) => {
        throw new ExtractionError(`Cannot read file: ${errorMessage(err)}`, filePath, { cause: err });
      });
      const contentHash = sha256(bytes);

      let parsed = this.options.cache?.get(this.id, contentHash);
      if (parsed) {
        logger.debug('Extraction served from cache', { extractor: this.id, content_hash: contentHash });
      } else {
        parsed = await withTimeout(this.parse(new Uint8Array(bytes), filePath), {
          timeoutMs: this.options.timeoutMs,
          warningMs: SLOW_EXTRACTION_WARNING_MS,
          label: `${this.id} extraction of ${filePath}`,
          onTimeout: (ms) => new ExtractionError(`Extraction timed out after ${ms}ms`, filePath),
        });
        this.options.cache?.set(this.id, contentHash, parsed);
      }

      const filename = path.basename(filePath);
      const metadata: DocumentMetadata = {
        filename,
        extension: path.extname(filename).replace(/^\./, '').toLowerCase(),
        relativePath: toPosix(path.relative(options.sourceRoot, filePath)),
        sizeBytes: stats.size,
        pageCount: parsed.pageCount,
        createdAt: parsed.createdAt ?? (stats.birthtimeMs > 0 ? stats.birthtime.toISOString() : null),
        modifiedAt: stats.mtime.toISOString(),
        properties: Object.freeze({ ...parsed.properties }),
      };

      const durationMs = Date.now() - startTime;
      extractionDurationHistogram.observe({ extractor: this.id, status: 'success' }, durationMs / 1000);
      logger.debug('Extraction complete', {
        extractor: this.id,
        page_count: parsed.pageCount,
        total_chars: parsed.text.length,
        duration_ms: durationMs,
      });

      return Object.freeze({ sourcePath: filePath, text: parsed.text, contentHash, metadata: Object.freeze(metadata) });
    } catch (error) {
      extractionDurationHistogram.observe({ extractor: this.id, status: 'failed' }, (Date.now() - startTime) / 1000);
      logger.warn('Extraction failed', { extractor: this.id, error: errorMessage(error) });
      if (error instanceof ExtractionError) throw error;
      throw new ExtractionError(`Extraction failed: ${errorMessage(error)}`, filePath, { cause: error });
    }
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
