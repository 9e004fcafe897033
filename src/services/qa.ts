/**
 * Question answering over the index
 *
 * Retrieves fused context for a question and asks the answer generator to
 * respond from that context alone. Sources are returned alongside the answer
 * in retrieval order.
 *
 * @module services/qa
 */

import { hybridSearch, type HybridSearchDeps, type HybridSearchOptions } from './search/hybrid.js';
import { REFUSAL_SENTENCE, type AnswerGenerator } from './generation/answer.js';
import type { SourceType } from '../models/chunk.js';
import type { FusedResult } from '../models/search.js';

/** Characters of chunk text shown when a source has no highlight */
const PREVIEW_CHARS = 220;

export interface AnswerSource {
  title: string;
  page: number | null;
  slide: number | null;
  source: SourceType;
  snippet: string;
}

export interface AskResult {
  answer: string;
  sources: AnswerSource[];
}

export interface AskDeps extends HybridSearchDeps {
  generator: AnswerGenerator;
}

export function toAnswerSource(hit: FusedResult): AnswerSource {
  return {
    title: hit.title,
    page: hit.page,
    slide: hit.slide,
    source: hit.source,
    snippet: hit.snippet ?? `${hit.text.slice(0, PREVIEW_CHARS)}…`,
  };
}

/**
 * With no retrieved context the refusal sentence is returned without
 * calling the generator.
 */
export async function ask(question: string, deps: AskDeps, options: HybridSearchOptions): Promise<AskResult> {
  const hits = await hybridSearch(question, deps, options);
  if (hits.length === 0) {
    return { answer: REFUSAL_SENTENCE, sources: [] };
  }

  const answer = await deps.generator.generate(question, hits);
  return { answer, sources: hits.map(toAnswerSource) };
}
