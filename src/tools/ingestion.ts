/**
 * Ingestion MCP Tools
 *
 * Tools: docsift_ingest
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/ingestion
 */

import { homedir } from 'os';
import path from 'path';
import { z } from 'zod';
import { ingestFiles } from '../services/indexing/indexer.js';
import { SUPPORTED_EXTENSIONS } from '../services/ingestion/router.js';
import { getConfig, withServices } from '../server/state.js';
import { validationError } from '../server/errors.js';
import { validateInput, IngestFilesInput } from '../utils/validation.js';
import { toolReply, type ToolResponse, type ToolModule } from './shared.js';
import type { ChunkingConfig } from '../models/chunk.js';

/**
 * Resolve a user-supplied path: leading ~ expands to the home directory,
 * relative paths resolve against the working directory.
 */
export function resolveInputPath(input: string): string {
  const expanded = input.replace(/^~(?=$|[\\/])/, homedir());
  return path.resolve(expanded);
}

const ingestReply = toolReply('docsift_ingest');

export async function handleIngest(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(IngestFilesInput, params);
    const config = getConfig();

    const budget: ChunkingConfig = {
      maxTokens: input.max_tokens ?? config.maxTokens,
      overlapTokens: input.overlap_tokens ?? config.overlapTokens,
    };
    const chunkBudget = budget.maxTokens - config.tokenHeadroom;
    if (chunkBudget < 1 || budget.overlapTokens >= chunkBudget) {
      throw validationError(
        `overlap_tokens (${budget.overlapTokens}) must be below max_tokens minus headroom (${chunkBudget})`,
        { ...budget, tokenHeadroom: config.tokenHeadroom }
      );
    }

    const filePaths = input.file_paths.map(resolveInputPath);
    const results = await withServices((services) =>
      ingestFiles(filePaths, budget, services, {
        snapshotDir: config.snapshotDir,
        batchSize: config.indexBatchSize,
      })
    );

    const summary = {
      files_indexed: results.filter((r) => r.status === 'indexed').length,
      files_empty: results.filter((r) => r.status === 'empty').length,
      files_failed: results.filter((r) => r.status === 'failed').length,
      chunks_indexed: results.reduce((sum, r) => sum + r.indexed, 0),
    };

    return ingestReply.ok({
      ...summary,
      max_tokens: budget.maxTokens,
      overlap_tokens: budget.overlapTokens,
      results,
      next_steps: [
        { tool: 'docsift_search', description: 'Search the indexed chunks' },
        { tool: 'docsift_index_stats', description: 'Check index totals' },
      ],
    });
  } catch (error) {
    return ingestReply.fail(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

export const ingestionTools: ToolModule<'docsift_ingest'> = {
  docsift_ingest: {
    description: `[INGEST] Extract, chunk, embed and index files one at a time. Supported: ${SUPPORTED_EXTENSIONS.join(', ')}. Returns per-file chunk counts and timings.`,
    inputSchema: {
      file_paths: z.array(z.string().min(1)).min(1).describe('Files to ingest'),
      max_tokens: z.number().int().min(16).max(8192).optional().describe('Chunk budget before headroom'),
      overlap_tokens: z.number().int().min(0).optional().describe('Tokens repeated between consecutive chunks'),
    },
    handler: handleIngest,
  },
};
