/**
 * Text Extractor Types
 *
 * An extractor turns one file into an ExtractedDocument: text plus the
 * metadata rules may target. Extractors are I/O adapters; the
 * classification core only ever sees their output.
 */

import type { ExtractedDocument } from '../types';

export interface ExtractionOptions {
  /** Directory discovery started from; metadata.relativePath is relative to it */
  sourceRoot: string;
}

export interface TextExtractor {
  /** Stable identifier, used as a metrics label */
  readonly id: string;
  /** Lowercase extensions without the leading dot */
  readonly supportedExtensions: readonly string[];
  readonly description: string;

  /**
   * Extract text and metadata. Throws ExtractionError when the file cannot
   * be read or parsed.
   */
  extract(filePath: string, options: ExtractionOptions): Promise<ExtractedDocument>;
}
