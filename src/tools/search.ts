/**
 * Search MCP Tools
 *
 * Tools: docsift_search (hybrid vector + lexical), docsift_ask (answer from
 * retrieved context)
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/search
 */

import { z } from 'zod';
import { hybridSearch } from '../services/search/hybrid.js';
import { ask } from '../services/qa.js';
import { getConfig, searchOptions, withServices } from '../server/state.js';
import { validateInput, SearchInput, AskInput } from '../utils/validation.js';
import { toolReply, type SearchHitView, type ToolResponse, type ToolModule } from './shared.js';
import type { FusedResult } from '../models/search.js';

const searchReply = toolReply('docsift_search');
const askReply = toolReply('docsift_ask');

function toSearchResult(hit: FusedResult, rank: number): SearchHitView {
  return {
    rank,
    id: hit.id,
    doc_id: hit.doc_id,
    title: hit.title,
    source: hit.source,
    page: hit.page,
    slide: hit.slide,
    timecode: hit.timecode,
    section: hit.section,
    caption: hit.caption,
    confidence: hit.confidence,
    text: hit.text,
    snippet: hit.snippet,
    fused_score: hit.fused_score,
    vector_rank: hit.vector_rank,
    lexical_rank: hit.lexical_rank,
  };
}

export async function handleSearch(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(SearchInput, params);
    const options = searchOptions(getConfig(), { limit: input.limit, minScore: input.min_score });

    const hits = await withServices((services) => hybridSearch(input.query, services, options));

    return searchReply.ok({
      query: input.query,
      total: hits.length,
      results: hits.map((hit, i) => toSearchResult(hit, i + 1)),
    });
  } catch (error) {
    return searchReply.fail(error);
  }
}

export async function handleAsk(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(AskInput, params);
    const options = searchOptions(getConfig(), { limit: input.limit });

    const result = await withServices((services) => ask(input.question, services, options));

    return askReply.ok({ question: input.question, ...result });
  } catch (error) {
    return askReply.fail(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

export const searchTools: ToolModule<'docsift_search' | 'docsift_ask'> = {
  docsift_search: {
    description:
      '[SEARCH] Hybrid search over indexed chunks: vector and keyword rankings fused with reciprocal rank fusion, at most two results per document.',
    inputSchema: {
      query: z.string().min(1).max(2000).describe('Search query'),
      limit: z.number().int().min(1).max(100).optional().describe('Results to return (default: topK)'),
      min_score: z.number().min(0).optional().describe('Drop results with fused score at or below this'),
    },
    handler: handleSearch,
  },
  docsift_ask: {
    description:
      '[SEARCH] Answer a question from the indexed documents only. Returns the answer and the sources it was given.',
    inputSchema: {
      question: z.string().min(1).max(2000).describe('Question to answer'),
      limit: z.number().int().min(1).max(50).optional().describe('Context passages to retrieve (default: topK)'),
    },
    handler: handleAsk,
  },
};
