/**
 * Semantic Classifier
 *
 * Embeds the document text and compares it with each category's centroid.
 * Only invoked when rules are inconclusive; embedding is the most expensive
 * step of the pipeline.
 */

import { EmbeddingError, toErrorDetail } from '../errors';
import { logger } from '../logger';
import { embeddingDurationHistogram } from '../metrics';
import { withTimeout } from '../timeout';
import type { CategorySet, ExtractedDocument, SemanticOutcome, SemanticScore } from '../types';

/**
 * Provider of text embeddings. One vector per input, in input order.
 */
export interface EmbeddingProvider {
  readonly model: string;
  /** Longest input (in characters) the model is given */
  readonly maxInputChars: number;
  embed(inputs: string[]): Promise<number[][]>;
}

export interface SemanticScorer {
  score(document: ExtractedDocument): Promise<SemanticOutcome>;
}

export interface SemanticClassifierOptions {
  /** Bound on the whole embedding step for one document */
  timeoutMs: number;
}

/**
 * Split text into chunks of at most maxChars, preferring whitespace
 * boundaries. Whitespace runs are collapsed first so the split is
 * deterministic for a given text.
 */
export function chunkText(text: string, maxChars: number): string[] {
  if (!Number.isInteger(maxChars) || maxChars <= 0) {
    throw new EmbeddingError(`Invalid chunk size: ${maxChars}`);
  }

  let remaining = text.replace(/\s+/g, ' ').trim();
  const chunks: string[] = [];

  while (remaining.length > maxChars) {
    let cut = remaining.lastIndexOf(' ', maxChars);
    if (cut <= 0) {
      cut = maxChars;
      // Keep surrogate pairs whole; a limit of one still has to take both halves
      if (isHighSurrogate(remaining.charCodeAt(cut - 1))) cut = cut > 1 ? cut - 1 : cut + 1;
    }
    chunks.push(remaining.slice(0, cut).trim());
    remaining = remaining.slice(cut).trim();
  }
  if (remaining.length > 0) chunks.push(remaining);

  return chunks;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Weighted mean of equally sized vectors.
 */
export function averageVectors(vectors: readonly (readonly number[])[], weights: readonly number[]): number[] {
  if (vectors.length === 0) {
    throw new EmbeddingError('No vectors to average');
  }
  const dims = vectors[0].length;
  const total = weights.reduce((sum, w) => sum + w, 0);
  if (total <= 0) {
    throw new EmbeddingError('Chunk weights must sum to a positive number');
  }

  const mean = new Array<number>(dims).fill(0);
  vectors.forEach((vector, i) => {
    if (vector.length !== dims) {
      throw new EmbeddingError(`Chunk embedding ${i} has ${vector.length} dimensions, expected ${dims}`);
    }
    const w = weights[i] / total;
    for (let d = 0; d < dims; d++) {
      mean[d] += vector[d] * w;
    }
  });
  return mean;
}

/**
 * Cosine similarity in [-1, 1]. A zero vector has no direction, so it is an
 * error rather than a similarity of 0.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new EmbeddingError(`Vectors must have same length (${a.length} vs ${b.length})`);
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  if (denominator === 0 || !Number.isFinite(denominator)) {
    throw new EmbeddingError('Cannot compare a zero or non-finite vector');
  }

  return Math.max(-1, Math.min(1, dotProduct / denominator));
}

export class SemanticClassifier implements SemanticScorer {
  constructor(
    private readonly categorySet: CategorySet,
    private readonly provider: EmbeddingProvider,
    private readonly options: SemanticClassifierOptions
  ) {}

  /**
   * Embed the document and score it against every centroid. Never throws and
   * never reports a made-up score: failures come back as status "failed".
   */
  async score(document: ExtractedDocument): Promise<SemanticOutcome> {
    if (this.categorySet.centroidDimensions === null) {
      return { status: 'skipped', reason: 'no category has a centroid embedding' };
    }

    const startTime = Date.now();
    try {
      const embedding = await withTimeout(this.embedDocument(document), {
        timeoutMs: this.options.timeoutMs,
        label: `embedding ${document.sourcePath}`,
        onTimeout: (ms) => new EmbeddingError(`Embedding timed out after ${ms}ms`),
      });

      const scores: Record<string, SemanticScore> = {};
      for (const category of this.categorySet.categories) {
        scores[category.name] = {
          category: category.name,
          similarity: category.centroid ? cosineSimilarity(embedding.vector, category.centroid) : null,
        };
      }

      embeddingDurationHistogram.observe({ status: 'success' }, (Date.now() - startTime) / 1000);
      logger.debug('Semantic scores computed', {
        model: this.provider.model,
        chunk_count: embedding.chunkCount,
      });

      return { status: 'scored', scores, model: this.provider.model, chunkCount: embedding.chunkCount };
    } catch (err) {
      embeddingDurationHistogram.observe({ status: 'failed' }, (Date.now() - startTime) / 1000);
      const error =
        err instanceof EmbeddingError
          ? err
          : new EmbeddingError(`Embedding failed: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
      logger.warn('Semantic scoring failed', { error: error.message, model: this.provider.model });
      return { status: 'failed', error: toErrorDetail(error) };
    }
  }

  private async embedDocument(document: ExtractedDocument): Promise<{ vector: number[]; chunkCount: number }> {
    const chunks = chunkText(document.text, this.provider.maxInputChars);
    if (chunks.length === 0) {
      throw new EmbeddingError('Document has no text to embed');
    }

    const vectors = await this.provider.embed(chunks);
    if (vectors.length !== chunks.length) {
      throw new EmbeddingError(`Provider returned ${vectors.length} embeddings for ${chunks.length} chunks`);
    }

    const expected = this.categorySet.centroidDimensions;
    for (const vector of vectors) {
      if (vector.length !== expected) {
        throw new EmbeddingError(
          `Embedding has ${vector.length} dimensions but centroids have ${String(expected)}`
        );
      }
      if (!vector.every(Number.isFinite)) {
        throw new EmbeddingError('Embedding contains non-finite values');
      }
    }

    return {
      vector: averageVectors(vectors, chunks.map((c) => c.length)),
      chunkCount: chunks.length,
    };
  }
}
