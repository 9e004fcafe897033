/**
 * Embed-and-index pipeline
 *
 * Ingests files one at a time: the router produces the file's chunks, a
 * JSON snapshot is written for inspection, and the chunks are embedded and
 * upserted in rounds of `batchSize` under their stable identifiers.
 *
 * A file the router rejects (unsupported extension, missing file, missing
 * video tooling) is reported as failed and the run continues. Extraction,
 * embedding and index failures propagate.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/indexing/indexer
 */

import { processFile } from '../ingestion/router.js';
import { IngestionError } from '../ingestion/errors.js';
import { stableChunkId } from '../ingestion/identity.js';
import { saveChunks } from '../storage/snapshot.js';
import type { IngestionContext } from '../ingestion/context.js';
import type { EmbeddingProvider } from '../embedding/embedder.js';
import type { IndexStore } from '../storage/index-store.js';
import type { Chunk, ChunkingConfig } from '../../models/chunk.js';
import type { IndexedChunk } from '../../models/search.js';

export interface IndexerDeps {
  ingestion: IngestionContext;
  embedder: EmbeddingProvider;
  index: IndexStore;
}

export interface IndexerOptions {
  snapshotDir: string;
  /** Chunks embedded and upserted per round */
  batchSize: number;
}

export interface FileIngestResult {
  file_path: string;
  status: 'indexed' | 'empty' | 'failed';
  doc_id: string | null;
  title: string | null;
  chunks: number;
  indexed: number;
  snapshot_path: string | null;
  elapsed_ms: number;
  error?: { code: string; message: string };
}

/**
 * Assign stable identifiers. Chunks sharing an identifier collapse to the
 * last one, matching what an upsert would leave behind.
 */
export function toIndexRecords(chunks: Chunk[]): IndexedChunk[] {
  const byId = new Map<string, IndexedChunk>();
  for (const chunk of chunks) {
    const id = stableChunkId(chunk);
    byId.delete(id);
    byId.set(id, { ...chunk, id });
  }
  return [...byId.values()];
}

async function embedAndIndex(records: IndexedChunk[], deps: IndexerDeps, batchSize: number): Promise<number> {
  let written = 0;
  for (let i = 0; i < records.length; i += batchSize) {
    const batch = records.slice(i, i + batchSize);
    const vectors = await deps.embedder.embed(batch.map((r) => r.text));
    written += deps.index.upsert(batch, vectors);
  }
  return written;
}

export async function ingestFile(
  filePath: string,
  budget: ChunkingConfig,
  deps: IndexerDeps,
  options: IndexerOptions
): Promise<FileIngestResult> {
  const started = Date.now();
  console.error(`[indexer] Ingesting ${filePath}`);

  const chunks: Chunk[] = [];
  try {
    for await (const chunk of processFile(filePath, budget, deps.ingestion)) {
      chunks.push(chunk);
    }
  } catch (error) {
    if (!(error instanceof IngestionError)) throw error;
    console.error(`[indexer] ${filePath} rejected: ${error.message}`);
    return {
      file_path: filePath,
      status: 'failed',
      doc_id: null,
      title: null,
      chunks: 0,
      indexed: 0,
      snapshot_path: null,
      elapsed_ms: Date.now() - started,
      error: { code: error.code, message: error.message },
    };
  }

  const first = chunks[0];
  if (first === undefined) {
    console.error(`[indexer] ${filePath}: no chunks extracted`);
    return {
      file_path: filePath,
      status: 'empty',
      doc_id: null,
      title: null,
      chunks: 0,
      indexed: 0,
      snapshot_path: null,
      elapsed_ms: Date.now() - started,
    };
  }

  console.error(`[indexer] ${filePath}: ${chunks.length} unique chunks extracted`);
  const snapshot = await saveChunks(options.snapshotDir, filePath, chunks);
  const indexed = await embedAndIndex(toIndexRecords(chunks), deps, Math.max(1, options.batchSize));

  const elapsed = Date.now() - started;
  console.error(`[indexer] Done ${filePath} in ${(elapsed / 1000).toFixed(2)}s`);

  return {
    file_path: filePath,
    status: 'indexed',
    doc_id: first.doc_id,
    title: first.title,
    chunks: chunks.length,
    indexed,
    snapshot_path: snapshot,
    elapsed_ms: elapsed,
  };
}

/**
 * Ingest files sequentially, in the order given
 */
export async function ingestFiles(
  filePaths: string[],
  budget: ChunkingConfig,
  deps: IndexerDeps,
  options: IndexerOptions
): Promise<FileIngestResult[]> {
  const results: FileIngestResult[] = [];
  for (const filePath of filePaths) {
    results.push(await ingestFile(filePath, budget, deps, options));
  }
  return results;
}
