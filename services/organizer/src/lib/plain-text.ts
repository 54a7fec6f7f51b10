/**
 * Plain text and Markdown extraction.
 */

import { TextDecoder } from 'util';
import { BaseTextExtractor, ExtractionError, type ParsedText } from '@docsort/shared';

export class PlainTextExtractor extends BaseTextExtractor {
  readonly id = 'plain-text';
  readonly supportedExtensions = ['txt', 'md'] as const;
  readonly description = 'UTF-8 text and Markdown files';

  protected async parse(bytes: Uint8Array, filePath: string): Promise<ParsedText> {
    let text: string;
    try {
      // fatal: reject binary files mislabelled as text
      text = new TextDecoder('utf-8', { fatal: true, ignoreBOM: false }).decode(bytes);
    } catch (err) {
      throw new ExtractionError('File is not valid UTF-8 text', filePath, { cause: err });
    }

    return {
      text: text.replace(/\r\n?/g, '\n'),
      pageCount: null,
      properties: {},
      createdAt: null,
    };
  }
}
