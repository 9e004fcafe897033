/**
 * Index Maintenance MCP Tools
 *
 * Tools: docsift_index_stats, docsift_index_clear
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/maintenance
 */

import { z } from 'zod';
import { requireServices, withServices } from '../server/state.js';
import { validateInput, IndexClearInput } from '../utils/validation.js';
import { toolReply, type ToolResponse, type ToolModule } from './shared.js';
import type { IndexStore } from '../services/storage/index-store.js';

const statsReply = toolReply('docsift_index_stats');
const clearReply = toolReply('docsift_index_clear');

/**
 * Delete every stored chunk; the index and its vector dimension remain.
 */
export function clearIndex(index: IndexStore): number {
  const deleted = index.clear();
  console.error(`[maintenance] Cleared ${deleted} chunks from ${index.path}`);
  return deleted;
}

export async function handleIndexStats(_params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const { index } = requireServices();
    return statsReply.ok(index.stats());
  } catch (error) {
    return statsReply.fail(error);
  }
}

export async function handleIndexClear(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    validateInput(IndexClearInput, params);
    const deleted = await withServices(async ({ index }) => clearIndex(index));
    return clearReply.ok({
      deleted_chunks: deleted,
      next_steps: [{ tool: 'docsift_ingest', description: 'Re-ingest documents' }],
    });
  } catch (error) {
    return clearReply.fail(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

export const maintenanceTools: ToolModule<'docsift_index_stats' | 'docsift_index_clear'> = {
  docsift_index_stats: {
    description: '[STATUS] Show index location, vector dimension and chunk counts per source type.',
    inputSchema: {},
    handler: handleIndexStats,
  },
  docsift_index_clear: {
    description: '[DESTRUCTIVE] Delete every indexed chunk. The index itself is kept. Requires confirm=true.',
    inputSchema: {
      confirm: z.literal(true).describe('Must be true to proceed'),
    },
    handler: handleIndexClear,
  },
};
