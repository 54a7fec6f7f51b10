/**
 * OpenAI Embedding Provider
 *
 * Batches chunk inputs into embeddings.create calls. Retries are left to the
 * caller: a failed document falls back to its rule scores instead.
 */

import OpenAI from 'openai';
import {
  EmbeddingError,
  config,
  embeddingRequestsCounter,
  logger,
  type Config,
  type EmbeddingProvider,
} from '@docsort/shared';

export interface OpenAIEmbeddingProviderOptions {
  apiKey: string;
  model: string;
  maxInputChars: number;
  /** Inputs per request */
  batchSize: number;
  timeoutMs: number;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  readonly maxInputChars: number;
  private readonly batchSize: number;
  private readonly openai: OpenAI;

  constructor(options: OpenAIEmbeddingProviderOptions) {
    this.model = options.model;
    this.maxInputChars = options.maxInputChars;
    this.batchSize = Math.max(1, options.batchSize);
    this.openai = new OpenAI({
      apiKey: options.apiKey,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
  }

  async embed(inputs: string[]): Promise<number[][]> {
    const vectors: number[][] = [];

    for (let start = 0; start < inputs.length; start += this.batchSize) {
      const batch = inputs.slice(start, start + this.batchSize);
      try {
        const response = await this.openai.embeddings.create({
          model: this.model,
          input: batch,
        });
        embeddingRequestsCounter.inc({ model: this.model, status: 'success' });

        const ordered = [...response.data].sort((a, b) => a.index - b.index);
        if (ordered.length !== batch.length) {
          throw new EmbeddingError(`Expected ${batch.length} embeddings, received ${ordered.length}`);
        }
        vectors.push(...ordered.map((d) => d.embedding));
      } catch (error) {
        if (error instanceof EmbeddingError) throw error;
        embeddingRequestsCounter.inc({ model: this.model, status: 'error' });
        const message = error instanceof Error ? error.message : String(error);
        throw new EmbeddingError(`Embedding request failed: ${message}`, { cause: error });
      }
    }

    logger.debug('Embeddings computed', { model: this.model, inputs: inputs.length });
    return vectors;
  }
}

/**
 * The run's embedding provider, or null when no API key is configured
 * (semantic scoring is then skipped).
 */
export function createEmbeddingProvider(cfg: Config = config): EmbeddingProvider | null {
  if (!cfg.openaiApiKey) {
    return null;
  }
  return new OpenAIEmbeddingProvider({
    apiKey: cfg.openaiApiKey,
    model: cfg.embeddingModel,
    maxInputChars: cfg.embeddingMaxInputChars,
    batchSize: cfg.embeddingBatchSize,
    timeoutMs: cfg.embeddingTimeoutMs,
  });
}
