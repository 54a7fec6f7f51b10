/**
 * PDF Text Extraction
 *
 * Extracts text and document properties from PDF files using pdfjs-dist.
 */

import * as pdfjsLib from 'pdfjs-dist';
import { BaseTextExtractor, ExtractionError, logger, type BaseExtractorOptions, type ParsedText } from '@docsort/shared';

// Configure worker for Node.js environment
pdfjsLib.GlobalWorkerOptions.workerSrc = require.resolve('pdfjs-dist/build/pdf.worker.js');

/** PDF info dictionary entries copied into document properties */
const INFO_PROPERTIES = ['Title', 'Author', 'Subject', 'Keywords', 'Creator', 'Producer'] as const;

export interface PdfExtractorOptions extends BaseExtractorOptions {
  /** Only the first maxPages pages are read; 0 reads every page */
  maxPages: number;
}

export interface PositionedText {
  x: number;
  y: number;
  str: string;
}

/**
 * Group a page's text items by Y position to keep line structure, then
 * read lines top to bottom and items left to right.
 */
export function layoutLines(items: readonly PositionedText[]): string {
  const itemsByY = new Map<number, PositionedText[]>();
  for (const item of items) {
    const line = itemsByY.get(item.y) ?? [];
    line.push(item);
    itemsByY.set(item.y, line);
  }

  const lines: string[] = [];
  for (const y of [...itemsByY.keys()].sort((a, b) => b - a)) {
    const lineText = (itemsByY.get(y) ?? [])
      .sort((a, b) => a.x - b.x)
      .map((item) => item.str)
      .join(' ')
      .trim();
    if (lineText) lines.push(lineText);
  }
  return lines.join('\n');
}

function readInfo(info: unknown): Record<string, string> {
  const properties: Record<string, string> = {};
  if (typeof info !== 'object' || info === null) return properties;

  const entries = new Map(Object.entries(info));
  for (const key of INFO_PROPERTIES) {
    const value = entries.get(key);
    if (typeof value === 'string' && value.trim() !== '') {
      properties[key] = value.trim();
    }
  }
  const creationDate = entries.get('CreationDate');
  if (typeof creationDate === 'string') {
    properties.CreationDate = creationDate;
  }
  return properties;
}

export class PdfExtractor extends BaseTextExtractor {
  readonly id = 'pdf';
  readonly supportedExtensions = ['pdf'] as const;
  readonly description = 'PDF text layer via pdfjs-dist (no OCR)';

  constructor(protected readonly options: PdfExtractorOptions) {
    super(options);
  }

  protected async parse(bytes: Uint8Array, filePath: string): Promise<ParsedText> {
    const loadingTask = pdfjsLib.getDocument({
      data: bytes,
      disableFontFace: true,
      isEvalSupported: false,
      verbosity: 0,
    });

    try {
      const pdf = await loadingTask.promise.catch((err: unknown) => {
        const reason = err instanceof Error ? err.message : String(err);
        const encrypted = err instanceof Error && err.name === 'PasswordException';
        throw new ExtractionError(
          encrypted ? `PDF is encrypted: ${reason}` : `Cannot parse PDF: ${reason}`,
          filePath,
          { cause: err }
        );
      });

      const { maxPages } = this.options;
      const pageLimit = maxPages > 0 ? Math.min(maxPages, pdf.numPages) : pdf.numPages;
      const pages: string[] = [];
      for (let pageNum = 1; pageNum <= pageLimit; pageNum++) {
        const page = await pdf.getPage(pageNum);
        const textContent = await page.getTextContent();
        const positioned: PositionedText[] = [];
        for (const item of textContent.items) {
          if (!('str' in item) || item.str.trim() === '') continue;
          // Items on the same visual line may differ slightly in Y
          positioned.push({
            x: Math.round(Number(item.transform[4])),
            y: Math.round(Number(item.transform[5])),
            str: item.str,
          });
        }
        pages.push(layoutLines(positioned));
        page.cleanup();
      }

      const meta = await pdf.getMetadata().catch((err: unknown) => {
        logger.warn('PDF metadata unreadable', { error: err instanceof Error ? err.message : String(err) });
        return null;
      });
      const properties = readInfo(meta?.info);
      const created = properties.CreationDate ? pdfjsLib.PDFDateString.toDateObject(properties.CreationDate) : null;

      if (pageLimit < pdf.numPages) {
        logger.debug('PDF page limit applied', { pages_read: pageLimit, total_pages: pdf.numPages });
      }

      return {
        text: pages.join('\n\n'),
        pageCount: pdf.numPages,
        properties,
        createdAt: created ? created.toISOString() : null,
      };
    } finally {
      await loadingTask.destroy();
    }
  }
}
