/**
 * Reciprocal Rank Fusion for Hybrid Search
 *
 * Combines vector and lexical results by rank: each list contributes
 * 1 / (k + rank) per hit. Ties keep first-seen order (vector list first).
 * After the score floor, a per-document cap keeps any one document from
 * filling the result set; capped hits do not use up result slots.
 */

import { documentIdOf } from '../ingestion/identity.js';
import type { FusedResult, SearchHit } from '../../models/search.js';

interface RRFConfig {
  /** Rank offset constant */
  k: number;
  /** Maximum results from one document */
  perDocumentCap: number;
}

const DEFAULT_CONFIG: RRFConfig = {
  k: 60,
  perDocumentCap: 2,
};

function buildFusedResult(hit: SearchHit): FusedResult {
  return { ...hit, fused_score: 0, vector_rank: null, lexical_rank: null };
}

export class RRFFusion {
  private readonly config: RRFConfig;

  constructor(config: Partial<RRFConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };

    if (this.config.k < 1) {
      throw new Error(`RRF k must be >= 1, got ${this.config.k}`);
    }
    if (this.config.perDocumentCap < 1) {
      throw new Error(`Per-document cap must be >= 1, got ${this.config.perDocumentCap}`);
    }
  }

  /**
   * @param limit - Maximum results returned
   * @param minScore - Hits with fused score <= minScore are dropped
   */
  fuse(vectorHits: SearchHit[], lexicalHits: SearchHit[], limit: number, minScore: number): FusedResult[] {
    const { k, perDocumentCap } = this.config;
    // Map iteration order is insertion order: the first-seen tie-break
    const fusedMap = new Map<string, FusedResult>();

    vectorHits.forEach((hit, index) => {
      const rank = index + 1;
      const existing = fusedMap.get(hit.id) ?? buildFusedResult(hit);
      existing.fused_score += 1 / (k + rank);
      existing.vector_rank ??= rank;
      fusedMap.set(hit.id, existing);
    });

    lexicalHits.forEach((hit, index) => {
      const rank = index + 1;
      const existing = fusedMap.get(hit.id) ?? buildFusedResult(hit);
      existing.fused_score += 1 / (k + rank);
      existing.lexical_rank ??= rank;
      if (existing.snippet === null) existing.snippet = hit.snippet;
      fusedMap.set(hit.id, existing);
    });

    // Array.prototype.sort is stable
    const ranked = Array.from(fusedMap.values())
      .sort((a, b) => b.fused_score - a.fused_score)
      .filter((r) => r.fused_score > minScore);

    const perDocument = new Map<string, number>();
    const results: FusedResult[] = [];
    for (const result of ranked) {
      if (results.length >= limit) break;
      const docId = documentIdOf(result.id);
      const count = perDocument.get(docId) ?? 0;
      if (count >= perDocumentCap) continue;
      perDocument.set(docId, count + 1);
      results.push(result);
    }
    return results;
  }
}
