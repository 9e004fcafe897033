/**
 * Unit tests for the MCP tool handlers
 *
 * Handlers run against a REAL in-memory index with in-process extraction,
 * embedding and generation stand-ins installed through setServices.
 *
 * @module tests/unit/tools/tools
 */

import { describe, it, expect, beforeEach, afterEach, afterAll, vi } from 'vitest';
import { rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { handleIngest, resolveInputPath } from '../../../src/tools/ingestion.js';
import { handleAsk, handleSearch } from '../../../src/tools/search.js';
import { handleIndexClear, handleIndexStats } from '../../../src/tools/maintenance.js';
import { handleConfigGet, handleConfigSet } from '../../../src/tools/config.js';
import { listToolNames } from '../../../src/server/register-tools.js';
import { resetState, setServices, updateConfig } from '../../../src/server/state.js';
import { IndexStore } from '../../../src/services/storage/index-store.js';
import { REFUSAL_SENTENCE } from '../../../src/services/generation/answer.js';
import { toolReply, type ToolResponse } from '../../../src/tools/shared.js';
import { validationError } from '../../../src/server/errors.js';
import { createTestDir, FakeExtractor, FakeGenerator, KeywordEmbedder, makeContext } from '../helpers.js';

const GUIDE =
  'Employees accrue vacation days monthly. Expense reports are due within thirty days. Badge access is reviewed quarterly.';

function payload(response: ToolResponse): unknown {
  const text = response.content[0]?.text;
  if (text === undefined) throw new Error('tool returned no content');
  return JSON.parse(text);
}

describe('tool registration', () => {
  it('lists every tool once, in registration order', () => {
    expect(listToolNames()).toEqual([
      'docsift_ingest',
      'docsift_search',
      'docsift_ask',
      'docsift_index_stats',
      'docsift_index_clear',
      'docsift_config_get',
      'docsift_config_set',
    ]);
  });
});

describe('toolReply', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('wraps a payload in the success envelope', () => {
    const response = toolReply('docsift_index_clear').ok({ deleted_chunks: 3, next_steps: [] });

    expect(response.isError).toBeUndefined();
    expect(payload(response)).toEqual({ success: true, data: { deleted_chunks: 3, next_steps: [] } });
  });

  it('logs a failure under the tool name and marks the response as an error', () => {
    const logged = vi.spyOn(console, 'error').mockImplementation(() => {});

    const response = toolReply('docsift_search').fail(validationError('query is empty'));

    expect(response.isError).toBe(true);
    expect(logged).toHaveBeenCalledWith('[docsift_search] VALIDATION_ERROR: query is empty');
    expect(payload(response)).toMatchObject({
      success: false,
      error: { category: 'VALIDATION_ERROR', message: 'query is empty' },
    });
  });
});

describe('resolveInputPath', () => {
  it('expands ~ and resolves relative paths', () => {
    expect(resolveInputPath('/data/a.pdf')).toBe('/data/a.pdf');
    expect(resolveInputPath('/data/../data/b.pdf')).toBe('/data/b.pdf');
    expect(resolveInputPath('~notes.txt')).toBe(join(process.cwd(), '~notes.txt'));
  });
});

describe('index tools', () => {
  const dir = createTestDir('tools');
  const guide = join(dir, 'guide.txt');
  let generator: FakeGenerator;

  writeFileSync(guide, 'guide bytes');

  beforeEach(() => {
    updateConfig({ snapshotDir: join(dir, 'snapshots') });
    generator = new FakeGenerator();
    setServices({
      index: IndexStore.open(':memory:'),
      embedder: new KeywordEmbedder(),
      generator,
      ingestion: makeContext({ extractor: new FakeExtractor({ text: GUIDE }) }),
    });
  });

  afterEach(() => {
    resetState();
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('ingests files and reports per-file results', async () => {
    const response = await handleIngest({ file_paths: [guide, join(dir, 'missing.txt'), join(dir, 'sheet.xls')] });

    expect(response.isError).toBeUndefined();
    expect(payload(response)).toMatchObject({
      success: true,
      data: {
        files_indexed: 1,
        files_empty: 0,
        files_failed: 2,
        chunks_indexed: 1,
        max_tokens: 512,
        overlap_tokens: 120,
        results: [
          { file_path: guide, status: 'indexed', title: 'Guide', chunks: 1, indexed: 1 },
          { status: 'failed', error: { code: 'FILE_NOT_FOUND' } },
          { status: 'failed', error: { code: 'UNSUPPORTED_EXTENSION' } },
        ],
      },
    });
  });

  it('rejects an overlap that fills the requested budget', async () => {
    const response = await handleIngest({ file_paths: [guide], max_tokens: 100, overlap_tokens: 40 });

    expect(response.isError).toBe(true);
    expect(payload(response)).toMatchObject({
      success: false,
      error: {
        category: 'VALIDATION_ERROR',
        message: 'overlap_tokens (40) must be below max_tokens minus headroom (36)',
      },
    });
  });

  it('searches with both retrievers agreeing', async () => {
    await handleIngest({ file_paths: [guide] });

    const response = await handleSearch({ query: 'vacation' });

    expect(payload(response)).toMatchObject({
      success: true,
      data: {
        query: 'vacation',
        total: 1,
        results: [
          {
            rank: 1,
            title: 'Guide',
            source: 'transcript',
            text: GUIDE,
            vector_rank: 1,
            lexical_rank: 1,
            snippet: expect.stringContaining('<mark>vacation</mark>'),
          },
        ],
      },
    });
  });

  it('answers from retrieved context', async () => {
    await handleIngest({ file_paths: [guide] });

    const response = await handleAsk({ question: 'vacation' });

    expect(payload(response)).toMatchObject({
      success: true,
      data: {
        question: 'vacation',
        answer: 'Vacation accrues monthly [Handbook, p.1].',
        sources: [{ title: 'Guide', page: null, slide: null, source: 'transcript' }],
      },
    });
    expect(generator.calls).toHaveLength(1);
  });

  it('refuses when only a weak vector match exists', async () => {
    await handleIngest({ file_paths: [guide] });

    const response = await handleAsk({ question: 'quantum' });

    expect(payload(response)).toEqual({
      success: true,
      data: { question: 'quantum', answer: REFUSAL_SENTENCE, sources: [] },
    });
    expect(generator.calls).toEqual([]);
  });

  it('reports stats and clears only with confirmation', async () => {
    await handleIngest({ file_paths: [guide] });

    expect(payload(await handleIndexStats({}))).toEqual({
      success: true,
      data: {
        path: ':memory:',
        dimensions: 4,
        total_chunks: 1,
        total_documents: 1,
        chunks_by_source: { transcript: 1 },
      },
    });

    const refused = await handleIndexClear({});
    expect(refused.isError).toBe(true);
    expect(payload(refused)).toMatchObject({ error: { category: 'VALIDATION_ERROR' } });

    expect(payload(await handleIndexClear({ confirm: true }))).toMatchObject({
      success: true,
      data: { deleted_chunks: 1 },
    });
    expect(payload(await handleIndexStats({}))).toMatchObject({ data: { total_chunks: 0, dimensions: 4 } });
  });
});

describe('config tools', () => {
  afterEach(() => {
    resetState();
  });

  it('reads one setting with its environment variable', async () => {
    expect(payload(await handleConfigGet({ key: 'topK' }))).toEqual({
      success: true,
      data: { key: 'topK', value: 6, env: 'DOCSIFT_TOP_K' },
    });
  });

  it('sets a value and coerces numeric strings', async () => {
    expect(payload(await handleConfigSet({ key: 'topK', value: '3' }))).toEqual({
      success: true,
      data: {
        key: 'topK',
        previous: 6,
        value: 3,
        updated: true,
        next_steps: [{ tool: 'docsift_config_get', description: 'Verify the updated configuration' }],
      },
    });
  });

  it('warns when a change invalidates indexed vectors', async () => {
    expect(payload(await handleConfigSet({ key: 'embeddingModel', value: 'mxbai-embed-large' }))).toMatchObject({
      success: true,
      data: {
        previous: 'nomic-embed-text',
        value: 'mxbai-embed-large',
        warning: 'Chunks indexed under the previous value are not re-embedded; clear and re-ingest if needed',
      },
    });
  });

  it('rejects values that break the merged configuration', async () => {
    const response = await handleConfigSet({ key: 'overlapTokens', value: 500 });

    expect(response.isError).toBe(true);
    expect(payload(response)).toMatchObject({
      error: { category: 'VALIDATION_ERROR', recovery: { tool: 'docsift_config_get' } },
    });
  });
});
