/**
 * Plain transcript pipeline (.txt, .md): one normalize and chunk pass
 *
 * @module services/ingestion/transcript
 */

import { normalizeText } from '../chunking/text-normalizer.js';
import { createChunk } from './identity.js';
import { chunkUnit, type IngestionContext } from './context.js';
import type { Chunk, ChunkingConfig } from '../../models/chunk.js';
import type { SourceDocument } from '../../models/document.js';

export async function* transcriptChunks(
  document: SourceDocument,
  budget: ChunkingConfig,
  ctx: IngestionContext
): AsyncGenerator<Chunk> {
  const text = normalizeText(await ctx.extractor.readPlainText(document.path));
  for (const piece of chunkUnit(text, budget, ctx.settings)) {
    yield createChunk(document, 'transcript', piece);
  }
}
