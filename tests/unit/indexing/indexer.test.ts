/**
 * Unit tests for the embed-and-index pipeline
 *
 * Uses a REAL in-memory index and temp files; extraction and embedding are
 * in-process stand-ins.
 *
 * @module tests/unit/indexing/indexer
 */

import { describe, it, expect, beforeEach, afterEach, afterAll } from 'vitest';
import { createHash } from 'crypto';
import { existsSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { basename, join } from 'path';
import { ingestFile, ingestFiles, toIndexRecords } from '../../../src/services/indexing/indexer.js';
import { IndexStore } from '../../../src/services/storage/index-store.js';
import { stableChunkId } from '../../../src/services/ingestion/identity.js';
import { EmbeddingError, type EmbeddingProvider } from '../../../src/services/embedding/embedder.js';
import { createTestDir, FakeExtractor, KeywordEmbedder, makeChunk, makeContext } from '../helpers.js';
import type { IndexerDeps } from '../../../src/services/indexing/indexer.js';

const GUIDE =
  'Employees accrue vacation days monthly. Expense reports are due within thirty days. Badge access is reviewed quarterly.';

/** Headroom 64 leaves 16 heuristic tokens: one sentence per chunk */
const SMALL_BUDGET = { maxTokens: 80, overlapTokens: 0 };

class FileTextExtractor extends FakeExtractor {
  constructor(private readonly byName: Record<string, string>) {
    super();
  }

  override async readPlainText(filePath: string): Promise<string> {
    return this.byName[basename(filePath)] ?? '';
  }
}

describe('toIndexRecords', () => {
  it('assigns stable ids and keeps the last chunk per id', () => {
    const first = makeChunk({ chunk_id: 'c1', page: 1, text: 'x' });
    const other = makeChunk({ chunk_id: 'c2', page: 2, text: 'y' });
    const again = makeChunk({ chunk_id: 'c3', page: 1, text: 'x' });

    const records = toIndexRecords([first, other, again]);

    expect(records.map((r) => [r.id, r.chunk_id])).toEqual([
      [stableChunkId(other), 'c2'],
      [stableChunkId(first), 'c3'],
    ]);
  });
});

describe('ingestFile', () => {
  const dir = createTestDir('indexer');
  const snapshotDir = join(dir, 'snapshots');
  const guide = join(dir, 'guide.txt');
  const blank = join(dir, 'blank.md');
  let index: IndexStore;
  let embedder: KeywordEmbedder;
  let deps: IndexerDeps;

  writeFileSync(guide, 'guide bytes');
  writeFileSync(blank, 'blank bytes');

  beforeEach(() => {
    index = IndexStore.open(':memory:');
    embedder = new KeywordEmbedder();
    deps = {
      index,
      embedder,
      ingestion: makeContext({
        extractor: new FileTextExtractor({ 'guide.txt': GUIDE, 'blank.md': '  \n ' }),
      }),
    };
  });

  afterEach(() => {
    index.close();
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('snapshots, embeds in batches and indexes the chunks of a file', async () => {
    const result = await ingestFile(guide, SMALL_BUDGET, deps, { snapshotDir, batchSize: 2 });

    expect(result).toMatchObject({
      file_path: guide,
      status: 'indexed',
      doc_id: createHash('sha256').update('guide bytes').digest('hex').slice(0, 32),
      title: 'Guide',
      chunks: 3,
      indexed: 3,
      snapshot_path: join(snapshotDir, 'guide.json'),
    });
    expect(embedder.calls).toEqual([
      ['Employees accrue vacation days monthly.', 'Expense reports are due within thirty days.'],
      ['Badge access is reviewed quarterly.'],
    ]);
    expect(index.stats()).toMatchObject({ dimensions: 4, total_chunks: 3, total_documents: 1 });

    const snapshot: unknown = JSON.parse(readFileSync(join(snapshotDir, 'guide.json'), 'utf-8'));
    expect(Array.isArray(snapshot) ? snapshot.length : -1).toBe(3);
  });

  it('overwrites index entries when the same file is ingested again', async () => {
    await ingestFile(guide, SMALL_BUDGET, deps, { snapshotDir, batchSize: 32 });
    await ingestFile(guide, SMALL_BUDGET, deps, { snapshotDir, batchSize: 32 });

    expect(index.stats().total_chunks).toBe(3);
  });

  it('reports a file without chunks as empty and writes no snapshot', async () => {
    const result = await ingestFile(blank, SMALL_BUDGET, deps, { snapshotDir: join(dir, 'none'), batchSize: 2 });

    expect(result).toMatchObject({ status: 'empty', chunks: 0, indexed: 0, snapshot_path: null, doc_id: null });
    expect(existsSync(join(dir, 'none'))).toBe(false);
    expect(embedder.calls).toEqual([]);
  });

  it('reports rejected files as failed with the ingestion error code', async () => {
    const unsupported = await ingestFile(join(dir, 'sheet.xlsx'), SMALL_BUDGET, deps, { snapshotDir, batchSize: 2 });
    const missing = await ingestFile(join(dir, 'gone.pdf'), SMALL_BUDGET, deps, { snapshotDir, batchSize: 2 });

    expect(unsupported.status).toBe('failed');
    expect(unsupported.error?.code).toBe('UNSUPPORTED_EXTENSION');
    expect(missing.status).toBe('failed');
    expect(missing.error?.code).toBe('FILE_NOT_FOUND');
  });

  it('propagates embedding failures', async () => {
    const failing: EmbeddingProvider = {
      embed: async () => {
        throw new EmbeddingError('connection refused', 'REQUEST_FAILED');
      },
    };

    await expect(
      ingestFile(guide, SMALL_BUDGET, { ...deps, embedder: failing }, { snapshotDir, batchSize: 2 })
    ).rejects.toBeInstanceOf(EmbeddingError);
  });

  it('ingests several files in order and continues past failures', async () => {
    const results = await ingestFiles([join(dir, 'sheet.xlsx'), blank, guide], SMALL_BUDGET, deps, {
      snapshotDir,
      batchSize: 8,
    });

    expect(results.map((r) => r.status)).toEqual(['failed', 'empty', 'indexed']);
  });
});
