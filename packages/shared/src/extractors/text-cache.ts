/**
 * Text cache keyed by content hash, so byte-identical files in one run are
 * only parsed once.
 */

export interface ParsedText {
  text: string;
  pageCount: number | null;
  /** Document properties (PDF Title, Author, ...) */
  properties: Record<string, string>;
  /** ISO timestamp from the document itself, when it records one */
  createdAt: string | null;
}

export class TextCache {
  private readonly entries = new Map<string, ParsedText>();
  private hitCount = 0;

  private key(extractorId: string, contentHash: string): string {
    return `${extractorId}:${contentHash}`;
  }

  get(extractorId: string, contentHash: string): ParsedText | undefined {
    const entry = this.entries.get(this.key(extractorId, contentHash));
    if (entry) this.hitCount++;
    return entry;
  }

  set(extractorId: string, contentHash: string, parsed: ParsedText): void {
    this.entries.set(this.key(extractorId, contentHash), parsed);
  }

  get size(): number {
    return this.entries.size;
  }

  get hits(): number {
    return this.hitCount;
  }

  clear(): void {
    this.entries.clear();
    this.hitCount = 0;
  }
}
