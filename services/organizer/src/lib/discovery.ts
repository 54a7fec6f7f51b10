/**
 * Document Discovery
 *
 * Recursive walk of the source directory. Returns absolute file paths with a
 * supported extension, sorted, so every run sees the same ordered batch.
 */

import fs, { type Dirent } from 'fs';
import path from 'path';
import { compareNames, extensionOf, logger, normalizeExtension } from '@docsort/shared';

/** Directories never descended into */
export const IGNORED_DIRECTORIES: readonly string[] = ['node_modules', '__pycache__', '__MACOSX'];

export interface DiscoveryOptions {
  /** Extensions to keep (case-insensitive, with or without the dot) */
  extensions: readonly string[];
  /** Absolute paths whose subtrees are skipped (e.g. a destination inside the source) */
  exclude?: readonly string[];
}

function isHidden(name: string): boolean {
  return name.startsWith('.');
}

function isWithin(candidate: string, root: string): boolean {
  const relative = path.relative(root, candidate);
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Linked directories are not followed; a dangling link is reported and skipped. */
async function isLinkedFile(linkPath: string): Promise<boolean> {
  try {
    const stats = await fs.promises.stat(linkPath);
    if (!stats.isFile()) {
      logger.debug('Skipping symbolic link that is not a file', { path: linkPath });
    }
    return stats.isFile();
  } catch (error) {
    logger.warn('Skipping broken symbolic link', { path: linkPath, error: errorMessage(error) });
    return false;
  }
}

export async function discoverDocuments(sourceRoot: string, options: DiscoveryOptions): Promise<string[]> {
  const root = path.resolve(sourceRoot);
  const wanted = new Set(options.extensions.map(normalizeExtension));
  const excluded = (options.exclude ?? []).map((p) => path.resolve(p));
  const found: string[] = [];
  let skipped = 0;

  async function walk(dir: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.promises.readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (dir === root) throw error;
      logger.warn('Skipping unreadable directory', { directory: dir, error: errorMessage(error) });
      return;
    }

    for (const entry of entries) {
      if (isHidden(entry.name)) continue;
      const fullPath = path.join(dir, entry.name);

      if (entry.isDirectory()) {
        if (IGNORED_DIRECTORIES.includes(entry.name)) continue;
        if (excluded.some((ex) => isWithin(fullPath, ex))) continue;
        await walk(fullPath);
      } else if (entry.isFile() || (entry.isSymbolicLink() && (await isLinkedFile(fullPath)))) {
        if (wanted.has(extensionOf(entry.name))) {
          found.push(fullPath);
        } else {
          skipped++;
        }
      }
    }
  }

  await walk(root);
  found.sort(compareNames);

  logger.info('Documents discovered', {
    source: root,
    documents: found.length,
    skipped_unsupported: skipped,
    extensions: [...wanted].sort(compareNames),
  });

  return found;
}
