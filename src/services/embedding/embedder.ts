/**
 * Embedding service
 *
 * Client for an Ollama-compatible /api/embed endpoint. Batches are sent one
 * after another so output order always equals input order.
 *
 * @module services/embedding/embedder
 */

import { z } from 'zod';
import { postOllama } from '../http/ollama.js';

type EmbeddingErrorCode = 'REQUEST_FAILED' | 'COUNT_MISMATCH' | 'DIMENSION_MISMATCH';

export class EmbeddingError extends Error {
  constructor(
    message: string,
    public readonly code: EmbeddingErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'EmbeddingError';
    Error.captureStackTrace?.(this, EmbeddingError);
  }
}

export interface EmbeddingProvider {
  embed(texts: string[]): Promise<number[][]>;
}

export interface EmbeddingClientOptions {
  baseUrl: string;
  model: string;
  batchSize: number;
  timeoutMs: number;
}

const EmbedResponse = z.object({
  embeddings: z.array(z.array(z.number())),
});

export class OllamaEmbeddingClient implements EmbeddingProvider {
  constructor(private readonly options: EmbeddingClientOptions) {}

  async embed(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    const batchSize = Math.max(1, this.options.batchSize);

    for (let i = 0; i < texts.length; i += batchSize) {
      const batch = texts.slice(i, i + batchSize);
      const { embeddings } = await postOllama(
        `${this.options.baseUrl.replace(/\/+$/, '')}/api/embed`,
        { model: this.options.model, input: batch },
        EmbedResponse,
        this.options.timeoutMs,
        (message, details) => new EmbeddingError(message, 'REQUEST_FAILED', details)
      );
      if (embeddings.length !== batch.length) {
        throw new EmbeddingError(
          `Embedding service returned ${embeddings.length} vectors for ${batch.length} inputs`,
          'COUNT_MISMATCH',
          { model: this.options.model, offset: i }
        );
      }
      vectors.push(...embeddings);
    }

    const dimension = vectors[0]?.length;
    if (dimension !== undefined && vectors.some((v) => v.length !== dimension)) {
      throw new EmbeddingError('Embedding service returned vectors of mixed dimensions', 'DIMENSION_MISMATCH', {
        model: this.options.model,
      });
    }
    return vectors;
  }
}
