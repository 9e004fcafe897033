/**
 * Tool Envelope
 *
 * Every docsift tool answers with `{ success: true, data }` or the error
 * envelope from server/errors. The payload of each tool is typed here so
 * handlers cannot drift from what clients parse.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/shared
 */

import { z } from 'zod';
import { MCPError, formatErrorResponse } from '../server/errors.js';
import type { FileIngestResult } from '../services/indexing/indexer.js';
import type { AskResult } from '../services/qa.js';
import type { IndexStats } from '../services/storage/types.js';
import type { CaptionTag, SourceType } from '../models/chunk.js';
import type { ServerConfig } from '../server/types.js';
import type { ConfigKey } from '../utils/validation.js';

export type ToolName =
  | 'docsift_ingest'
  | 'docsift_search'
  | 'docsift_ask'
  | 'docsift_index_stats'
  | 'docsift_index_clear'
  | 'docsift_config_get'
  | 'docsift_config_set';

export interface NextStep {
  tool: ToolName;
  description: string;
}

export interface IngestPayload {
  files_indexed: number;
  files_empty: number;
  files_failed: number;
  chunks_indexed: number;
  max_tokens: number;
  overlap_tokens: number;
  results: FileIngestResult[];
  next_steps: NextStep[];
}

/** One fused hit as clients see it */
export interface SearchHitView {
  rank: number;
  id: string;
  doc_id: string;
  title: string;
  source: SourceType;
  page: number | null;
  slide: number | null;
  timecode: string | null;
  section: string | null;
  caption: CaptionTag | null;
  confidence: number | null;
  text: string;
  snippet: string | null;
  fused_score: number;
  vector_rank: number | null;
  lexical_rank: number | null;
}

export interface SearchPayload {
  query: string;
  total: number;
  results: SearchHitView[];
}

export interface AskPayload extends AskResult {
  question: string;
}

export interface IndexClearPayload {
  deleted_chunks: number;
  next_steps: NextStep[];
}

export type ConfigView = Omit<ServerConfig, 'pythonPath'> & { pythonPath: string | null };

export type ConfigGetPayload =
  | { key: ConfigKey; value: string | number | null; env: string }
  | (ConfigView & { next_steps: NextStep[] });

export interface ConfigSetPayload {
  key: ConfigKey;
  previous: string | number | null;
  value: string | number | null;
  updated: true;
  warning?: string;
  next_steps: NextStep[];
}

/** Payload carried under `data` by each tool */
export interface ToolPayloads {
  docsift_ingest: IngestPayload;
  docsift_search: SearchPayload;
  docsift_ask: AskPayload;
  docsift_index_stats: IndexStats;
  docsift_index_clear: IndexClearPayload;
  docsift_config_get: ConfigGetPayload;
  docsift_config_set: ConfigSetPayload;
}

/** MCP tool response format */
export type ToolResponse = { content: Array<{ type: 'text'; text: string }>; isError?: boolean };

export interface ToolDefinition {
  description: string;
  inputSchema: Record<string, z.ZodTypeAny>;
  handler: (params: Record<string, unknown>) => Promise<ToolResponse>;
}

/** A tool module maps each of its tool names to a definition */
export type ToolModule<K extends ToolName> = { [P in K]: ToolDefinition };

function asText(body: unknown): ToolResponse['content'] {
  return [{ type: 'text', text: JSON.stringify(body, null, 2) }];
}

export interface ToolReply<K extends ToolName> {
  ok(data: ToolPayloads[K]): ToolResponse;
  /** Error envelope; the category and message are logged under the tool's name */
  fail(error: unknown): ToolResponse;
}

export function toolReply<K extends ToolName>(tool: K): ToolReply<K> {
  return {
    ok: (data) => ({ content: asText({ success: true, data }) }),
    fail: (error) => {
      const mcpError = MCPError.fromUnknown(error);
      console.error(`[${tool}] ${mcpError.category}: ${mcpError.message}`);
      return { content: asText(formatErrorResponse(mcpError)), isError: true };
    },
  };
}
