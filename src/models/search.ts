/**
 * Search result shapes for docsift
 */

import type { Chunk } from './chunk.js';

/**
 * Chunk as stored in the index, keyed by its stable identifier
 */
export interface IndexedChunk extends Chunk {
  /** `<doc_id>:<source>:<locator>:<fingerprint>` */
  id: string;
}

/**
 * One candidate from the vector or the lexical path, in rank order
 */
export interface SearchHit extends IndexedChunk {
  /** Path-specific score: cosine similarity or negated BM25 */
  score: number;
  /** Highlighted lexical match; always null on vector hits */
  snippet: string | null;
}

export interface FusedResult extends SearchHit {
  fused_score: number;
  /** 1-based rank in the vector list, null when absent */
  vector_rank: number | null;
  /** 1-based rank in the lexical list, null when absent */
  lexical_rank: number | null;
}
