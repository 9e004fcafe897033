/**
 * Unit tests for the embedding client against a stubbed fetch
 *
 * @module tests/unit/embedding/embedder
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { EmbeddingError, OllamaEmbeddingClient } from '../../../src/services/embedding/embedder.js';
import { stubFetch } from '../http-stub.js';

const client = (batchSize = 2): OllamaEmbeddingClient =>
  new OllamaEmbeddingClient({
    baseUrl: 'http://ollama.test:11434/',
    model: 'embed-test',
    batchSize,
    timeoutMs: 1000,
  });

async function embedError(promise: Promise<unknown>): Promise<EmbeddingError> {
  const error = await promise.then(
    () => null,
    (e: unknown) => e
  );
  if (!(error instanceof EmbeddingError)) throw new Error(`expected EmbeddingError, got ${String(error)}`);
  return error;
}

describe('OllamaEmbeddingClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('sends batches in order and concatenates the vectors', async () => {
    const requests = stubFetch((_url, body) => {
      const input = body.input;
      const count = Array.isArray(input) ? input.length : 0;
      return { embeddings: Array.from({ length: count }, (_, i) => [i, 1]) };
    });

    const vectors = await client(2).embed(['a', 'b', 'c']);

    expect(vectors).toEqual([
      [0, 1],
      [1, 1],
      [0, 1],
    ]);
    expect(requests).toEqual([
      { url: 'http://ollama.test:11434/api/embed', body: { model: 'embed-test', input: ['a', 'b'] } },
      { url: 'http://ollama.test:11434/api/embed', body: { model: 'embed-test', input: ['c'] } },
    ]);
  });

  it('makes no request for no texts', async () => {
    const requests = stubFetch(() => ({ embeddings: [] }));

    expect(await client().embed([])).toEqual([]);
    expect(requests).toEqual([]);
  });

  it('rejects a response with the wrong number of vectors', async () => {
    stubFetch(() => ({ embeddings: [[1, 2]] }));

    const error = await embedError(client().embed(['a', 'b']));

    expect(error.code).toBe('COUNT_MISMATCH');
  });

  it('rejects vectors of mixed dimensions', async () => {
    stubFetch(() => ({ embeddings: [[1, 2], [1, 2, 3]] }));

    expect((await embedError(client().embed(['a', 'b']))).code).toBe('DIMENSION_MISMATCH');
  });

  it('reports HTTP errors with the status', async () => {
    stubFetch(() => ({ error: 'model not found' }), 404);

    const error = await embedError(client().embed(['a']));

    expect(error.code).toBe('REQUEST_FAILED');
    expect(error.message).toContain('Ollama API error 404');
    expect(error.details).toMatchObject({ status: 404 });
  });

  it('reports an unexpected response shape', async () => {
    stubFetch(() => ({ embedding: [1, 2] }));

    const error = await embedError(client().embed(['a']));

    expect(error.code).toBe('REQUEST_FAILED');
    expect(error.message).toBe('Unexpected response shape from http://ollama.test:11434/api/embed');
  });

  it('reports connection failures', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new Error('connect ECONNREFUSED');
      })
    );

    const error = await embedError(client().embed(['a']));

    expect(error.code).toBe('REQUEST_FAILED');
    expect(error.message).toBe('Request to http://ollama.test:11434/api/embed failed: connect ECONNREFUSED');
  });
});
