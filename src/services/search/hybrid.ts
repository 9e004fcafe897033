/**
 * Hybrid search
 *
 * Embeds the query, takes candidates from the vector and lexical paths and
 * fuses them with reciprocal rank fusion.
 *
 * @module services/search/hybrid
 */

import { RRFFusion } from './fusion.js';
import { EmbeddingError, type EmbeddingProvider } from '../embedding/embedder.js';
import type { IndexStore } from '../storage/index-store.js';
import type { FusedResult } from '../../models/search.js';

export interface HybridSearchDeps {
  index: IndexStore;
  embedder: EmbeddingProvider;
}

export interface HybridSearchOptions {
  /** Fused results returned */
  limit: number;
  minScore: number;
  /** Hits taken from each path before fusion */
  candidates: number;
  perDocumentCap: number;
}

export async function hybridSearch(
  query: string,
  deps: HybridSearchDeps,
  options: HybridSearchOptions
): Promise<FusedResult[]> {
  const [queryVector] = await deps.embedder.embed([query]);
  if (queryVector === undefined) {
    throw new EmbeddingError('Embedding service returned no vector for the query', 'COUNT_MISMATCH');
  }

  const candidates = Math.max(options.candidates, options.limit);
  const vectorHits = deps.index.searchVector(queryVector, candidates);
  const lexicalHits = deps.index.searchLexical(query, candidates);

  const fusion = new RRFFusion({ perDocumentCap: options.perDocumentCap });
  const results = fusion.fuse(vectorHits, lexicalHits, options.limit, options.minScore);

  console.error(
    `[search] "${query.slice(0, 60)}": ${vectorHits.length} vector + ${lexicalHits.length} lexical -> ${results.length}`
  );
  return results;
}
