/**
 * Folder Materializer
 *
 * Places each decided file under <destination>/<category>/. Copies by
 * default; failed documents stay where they are. Runs after the batch, in
 * source-path order, so collision suffixes are the same on every run. A
 * destination that already holds the same bytes is reused, so running twice
 * over the same inputs places nothing new.
 */

import fs, { type Stats } from 'fs';
import path from 'path';
import { logger, sha256, type Decision } from '@docsort/shared';

export type TransferMode = 'copy' | 'move';

export interface MaterializerOptions {
  destinationRoot: string;
  mode: TransferMode;
  /** Compute destinations without touching the filesystem */
  dryRun: boolean;
}

const INVALID_PATH_CHARS = /[<>:"/\\|?*\u0000-\u001f]/g;

/**
 * Make a category name safe as a single folder name.
 */
export function sanitizeFolderName(name: string): string {
  const cleaned = name
    .replace(INVALID_PATH_CHARS, '-')
    .split(/\s+/)
    .filter((part) => part.length > 0)
    .join(' ')
    .replace(/[. ]+$/, '');
  return cleaned === '' || cleaned === '.' || cleaned === '..' ? '_' : cleaned;
}

/** name.ext for counter 0, otherwise name_<counter>.ext */
export function suffixedName(fileName: string, counter: number): string {
  if (counter === 0) return fileName;
  const ext = path.extname(fileName);
  return `${fileName.slice(0, fileName.length - ext.length)}_${counter}${ext}`;
}

async function hashFile(filePath: string): Promise<string> {
  return sha256(await fs.promises.readFile(filePath));
}

async function moveFile(source: string, destination: string): Promise<void> {
  try {
    await fs.promises.rename(source, destination);
  } catch (err) {
    if (!(err instanceof Error && 'code' in err && err.code === 'EXDEV')) throw err;
    // Different filesystems: copy, then remove the original
    await fs.promises.copyFile(source, destination, fs.constants.COPYFILE_EXCL);
    await fs.promises.unlink(source);
  }
}

export class FolderMaterializer {
  /** Destinations handed out this run, including dry-run ones */
  private readonly claimed = new Set<string>();

  constructor(private readonly options: MaterializerOptions) {}

  /**
   * The folder a decision lands in, or null when the file stays in place.
   */
  folderFor(decision: Decision): string | null {
    if (decision.outcome === 'failed') return null;
    return path.join(this.options.destinationRoot, sanitizeFolderName(decision.category));
  }

  /**
   * Place one file. Returns the destination path, or null for failed documents.
   */
  async place(decision: Decision): Promise<string | null> {
    const folder = this.folderFor(decision);
    if (folder === null) return null;

    const source = path.resolve(decision.sourcePath);
    const { destination, existing } = await this.chooseDestination(source, folder);
    this.claimed.add(destination);

    if (this.options.dryRun) {
      logger.debug('Dry run: file would be placed', { destination, mode: this.options.mode, existing });
      return destination;
    }

    if (existing) {
      if (this.options.mode === 'move' && destination !== source) {
        await fs.promises.unlink(source);
      }
      logger.debug('Identical file already in place', { destination, mode: this.options.mode });
      return destination;
    }

    await fs.promises.mkdir(folder, { recursive: true });
    if (this.options.mode === 'move') {
      await moveFile(source, destination);
    } else {
      await fs.promises.copyFile(source, destination, fs.constants.COPYFILE_EXCL);
      const stats = await fs.promises.stat(source);
      await fs.promises.utimes(destination, stats.atime, stats.mtime);
    }

    logger.debug('File placed', { destination, mode: this.options.mode });
    return destination;
  }

  /**
   * Walk name.ext, name_1.ext, ... skipping names claimed this run. Stops at
   * the first free name, or at an existing file with the same bytes.
   */
  private async chooseDestination(
    source: string,
    folder: string
  ): Promise<{ destination: string; existing: boolean }> {
    const fileName = path.basename(source);
    let sourceHash: string | null = null;

    for (let counter = 0; ; counter++) {
      const candidate = path.join(folder, suffixedName(fileName, counter));
      if (this.claimed.has(candidate)) continue;

      let stats: Stats;
      try {
        stats = await fs.promises.stat(candidate);
      } catch (err) {
        if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
          return { destination: candidate, existing: false };
        }
        throw err;
      }

      if (!stats.isFile()) continue;
      sourceHash ??= await hashFile(source);
      if ((await hashFile(candidate)) === sourceHash) {
        return { destination: candidate, existing: true };
      }
    }
  }
}
