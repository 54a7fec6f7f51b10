/**
 * Extractor Registry
 *
 * Registry pattern for text extractors, keyed by file extension.
 */

import path from 'path';
import { logger } from '../logger';
import type { TextExtractor } from './types';

/**
 * Map of extensions (lowercase, no dot) to their extractors
 */
const extractorRegistry = new Map<string, TextExtractor>();

export function normalizeExtension(extension: string): string {
  return extension.trim().replace(/^\./, '').toLowerCase();
}

/**
 * Extension of a file path, normalized ("" when there is none)
 */
export function extensionOf(filePath: string): string {
  return normalizeExtension(path.extname(filePath));
}

/**
 * Register an extractor for every extension it supports.
 * Overwrites any existing extractor for those extensions.
 */
export function registerExtractor(extractor: TextExtractor): void {
  for (const extension of extractor.supportedExtensions) {
    extractorRegistry.set(normalizeExtension(extension), extractor);
  }

  logger.debug('Registered extractor', {
    extractor: extractor.id,
    extensions: extractor.supportedExtensions,
    description: extractor.description,
  });
}

/**
 * Get the extractor for an extension, or undefined if none is registered.
 */
export function getExtractor(extension: string): TextExtractor | undefined {
  return extractorRegistry.get(normalizeExtension(extension));
}

/**
 * Get the extractor for a file by its extension.
 *
 * @throws Error if no extractor is registered for the extension
 */
export function getExtractorForFile(filePath: string): TextExtractor {
  const extension = extensionOf(filePath);
  const extractor = extractorRegistry.get(extension);
  if (!extractor) {
    throw new Error(`No extractor registered for extension: ${extension || '(none)'}`);
  }
  return extractor;
}

export function hasExtractor(extension: string): boolean {
  return extractorRegistry.has(normalizeExtension(extension));
}

/**
 * Registered extensions, sorted.
 */
export function getRegisteredExtensions(): string[] {
  return Array.from(extractorRegistry.keys()).sort();
}

/**
 * Clear all registered extractors.
 * Useful for testing.
 */
export function clearRegistry(): void {
  extractorRegistry.clear();
}

export function getRegistryStats(): {
  totalExtractors: number;
  byExtractor: Record<string, string[]>;
} {
  const byExtractor: Record<string, string[]> = {};
  for (const extension of getRegisteredExtensions()) {
    const extractor = extractorRegistry.get(extension);
    if (!extractor) continue;
    (byExtractor[extractor.id] ??= []).push(extension);
  }

  return {
    totalExtractors: Object.keys(byExtractor).length,
    byExtractor,
  };
}
