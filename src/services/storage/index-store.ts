/**
 * IndexStore - SQLite search index for chunk records
 *
 * One database file holds the chunk records, an FTS5 index for lexical
 * search and a sqlite-vec table for cosine nearest-neighbour search.
 * Records are upserted by stable chunk identifier. The vector dimension is
 * fixed the first time embeddings are stored.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/storage/index-store
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import path from 'path';
import * as sqliteVec from 'sqlite-vec';
import {
  CREATE_CHUNKS_FTS_TABLE,
  CREATE_CHUNKS_INDEXES,
  CREATE_CHUNKS_TABLE,
  CREATE_FTS_TRIGGERS,
  CREATE_METADATA_TABLE,
  DATABASE_PRAGMAS,
  createVecTable,
} from './schema.js';
import {
  IndexError,
  IndexErrorCode,
  type ChunkRow,
  type IndexStats,
} from './types.js';
import type { CaptionTag, SourceType } from '../../models/chunk.js';
import type { IndexedChunk, SearchHit } from '../../models/search.js';

/** Tokens of context around each highlighted match */
const SNIPPET_TOKENS = 32;

/** BM25 column weights for text, title, caption */
const BM25_WEIGHTS = [3.0, 2.0, 1.0] as const;

const SOURCE_TYPES: ReadonlySet<string> = new Set<SourceType>(['pdf', 'pptx', 'docx', 'transcript']);
const CAPTION_TAGS: ReadonlySet<string> = new Set<CaptionTag>(['ocr', 'table']);

function isSourceType(value: string): value is SourceType {
  return SOURCE_TYPES.has(value);
}

function isCaptionTag(value: string): value is CaptionTag {
  return CAPTION_TAGS.has(value);
}

function rowToChunk(row: ChunkRow): IndexedChunk {
  const { source, caption } = row;
  if (!isSourceType(source)) {
    throw new IndexError(`Stored chunk ${row.id} has unknown source "${source}"`, IndexErrorCode.CORRUPT_ROW);
  }
  if (caption !== null && !isCaptionTag(caption)) {
    throw new IndexError(`Stored chunk ${row.id} has unknown caption "${caption}"`, IndexErrorCode.CORRUPT_ROW);
  }
  return { ...row, source, caption };
}

function toVectorBlob(vector: number[]): Buffer {
  const floats = new Float32Array(vector);
  return Buffer.from(floats.buffer, floats.byteOffset, floats.byteLength);
}

/**
 * FTS5 query requiring every word of the user query.
 * Terms are quoted so FTS syntax characters in the query are inert.
 */
export function buildMatchQuery(query: string): string | null {
  const terms = query.match(/[\p{L}\p{N}]+/gu);
  if (!terms || terms.length === 0) return null;
  return terms.map((term) => `"${term}"`).join(' AND ');
}

interface ScoredRow extends ChunkRow {
  score: number;
  snippet: string | null;
}

const CHUNK_COLUMNS =
  'c.id, c.doc_id, c.chunk_id, c.source, c.title, c.page, c.slide, c.timecode, c.section, c.text, c.caption, c.confidence, c.created_at';

export class IndexStore {
  private dimensions: number | null;

  private constructor(
    private readonly db: Database.Database,
    readonly path: string
  ) {
    this.dimensions = this.readDimensions();
  }

  /**
   * Open (creating if needed) the index at dbPath. ':memory:' opens a
   * private in-memory index.
   *
   * @throws IndexError if the file cannot be opened or sqlite-vec fails to load
   */
  static open(dbPath: string): IndexStore {
    if (dbPath !== ':memory:') {
      mkdirSync(path.dirname(dbPath), { recursive: true, mode: 0o700 });
    }

    let db: Database.Database;
    try {
      db = new Database(dbPath);
    } catch (error) {
      throw new IndexError(`Failed to open index at ${dbPath}: ${String(error)}`, IndexErrorCode.OPEN_FAILED, error);
    }

    try {
      sqliteVec.load(db);
    } catch (error) {
      db.close();
      throw new IndexError(
        `Failed to load sqlite-vec extension: ${String(error)}. Ensure sqlite-vec is installed for your platform.`,
        IndexErrorCode.EXTENSION_LOAD_FAILED,
        error
      );
    }

    for (const pragma of DATABASE_PRAGMAS) db.exec(pragma);
    db.transaction(() => {
      db.exec(CREATE_METADATA_TABLE);
      db.exec(CREATE_CHUNKS_TABLE);
      for (const statement of CREATE_CHUNKS_INDEXES) db.exec(statement);
      db.exec(CREATE_CHUNKS_FTS_TABLE);
      for (const trigger of CREATE_FTS_TRIGGERS) db.exec(trigger);
    })();

    return new IndexStore(db, dbPath);
  }

  private readDimensions(): number | null {
    const row = this.db
      .prepare<[], { dimensions: number }>('SELECT dimensions FROM index_metadata WHERE id = 1')
      .get();
    return row?.dimensions ?? null;
  }

  /**
   * Create the vector table for the given dimension, once.
   *
   * @throws IndexError if the index already holds vectors of another dimension
   */
  ensureIndex(dimensions: number): void {
    if (!Number.isInteger(dimensions) || dimensions < 1) {
      throw new IndexError(`Invalid embedding dimension: ${dimensions}`, IndexErrorCode.DIMENSION_MISMATCH);
    }
    if (this.dimensions !== null) {
      if (this.dimensions !== dimensions) {
        throw new IndexError(
          `Index stores ${this.dimensions}-dimensional vectors, got ${dimensions}. Clear the index file to change embedding models.`,
          IndexErrorCode.DIMENSION_MISMATCH
        );
      }
      return;
    }

    this.db.transaction(() => {
      this.db.exec(createVecTable(dimensions));
      this.db
        .prepare<[number, string]>('INSERT INTO index_metadata (id, dimensions, created_at) VALUES (1, ?, ?)')
        .run(dimensions, new Date().toISOString());
    })();
    this.dimensions = dimensions;
    console.error(`[IndexStore] Created ${dimensions}-dimensional vector index at ${this.path}`);
  }

  /**
   * Insert or replace records and their vectors, atomically.
   */
  upsert(records: IndexedChunk[], vectors: number[][]): number {
    if (records.length !== vectors.length) {
      throw new IndexError(
        `Got ${vectors.length} vectors for ${records.length} records`,
        IndexErrorCode.WRITE_FAILED
      );
    }
    if (records.length === 0) return 0;
    this.ensureIndex(vectors[0].length);

    const upsertChunk = this.db.prepare<IndexedChunk>(`
      INSERT INTO chunks (id, doc_id, chunk_id, source, title, page, slide, timecode, section, text, caption, confidence, created_at)
      VALUES (@id, @doc_id, @chunk_id, @source, @title, @page, @slide, @timecode, @section, @text, @caption, @confidence, @created_at)
      ON CONFLICT(id) DO UPDATE SET
        doc_id = excluded.doc_id,
        chunk_id = excluded.chunk_id,
        source = excluded.source,
        title = excluded.title,
        page = excluded.page,
        slide = excluded.slide,
        timecode = excluded.timecode,
        section = excluded.section,
        text = excluded.text,
        caption = excluded.caption,
        confidence = excluded.confidence,
        created_at = excluded.created_at
    `);
    const selectSeq = this.db.prepare<[string], { seq: number }>('SELECT seq FROM chunks WHERE id = ?');
    const deleteVector = this.db.prepare<[bigint]>('DELETE FROM vec_chunks WHERE chunk_seq = ?');
    const insertVector = this.db.prepare<[bigint, Buffer]>(
      'INSERT INTO vec_chunks (chunk_seq, embedding) VALUES (?, ?)'
    );

    try {
      this.db.transaction(() => {
        records.forEach((record, i) => {
          if (vectors[i].length !== this.dimensions) {
            throw new IndexError(
              `Vector for ${record.id} has ${vectors[i].length} dimensions, index expects ${this.dimensions}`,
              IndexErrorCode.DIMENSION_MISMATCH
            );
          }
          upsertChunk.run(record);
          const row = selectSeq.get(record.id);
          if (!row) {
            throw new IndexError(`Upserted chunk ${record.id} not found`, IndexErrorCode.WRITE_FAILED);
          }
          // sqlite-vec requires an integer-typed key
          const seq = BigInt(row.seq);
          deleteVector.run(seq);
          insertVector.run(seq, toVectorBlob(vectors[i]));
        });
      })();
    } catch (error) {
      if (error instanceof IndexError) throw error;
      throw new IndexError(`Failed to write ${records.length} chunks: ${String(error)}`, IndexErrorCode.WRITE_FAILED, error);
    }
    return records.length;
  }

  /**
   * Nearest neighbours by cosine distance; score is cosine similarity.
   */
  searchVector(queryVector: number[], limit: number): SearchHit[] {
    if (this.dimensions === null) return [];
    if (queryVector.length !== this.dimensions) {
      throw new IndexError(
        `Query vector has ${queryVector.length} dimensions, index expects ${this.dimensions}`,
        IndexErrorCode.DIMENSION_MISMATCH
      );
    }

    const rows = this.db
      .prepare<[Buffer, bigint], ScoredRow>(
        `
      WITH knn AS (
        SELECT chunk_seq, distance FROM vec_chunks
        WHERE embedding MATCH ? AND k = ?
      )
      SELECT ${CHUNK_COLUMNS}, 1.0 - knn.distance AS score, NULL AS snippet
      FROM knn JOIN chunks c ON c.seq = knn.chunk_seq
      ORDER BY knn.distance
    `
      )
      .all(toVectorBlob(queryVector), BigInt(limit));

    return rows.map((row) => ({ ...rowToChunk(row), score: row.score, snippet: null }));
  }

  /**
   * BM25 search over text, title and caption; every query word must match.
   * Score is the negated BM25 rank (higher is better).
   */
  searchLexical(query: string, limit: number): SearchHit[] {
    const match = buildMatchQuery(query);
    if (!match) return [];

    const [textWeight, titleWeight, captionWeight] = BM25_WEIGHTS;
    const rows = this.db
      .prepare<[string, number], ScoredRow>(
        `
      SELECT ${CHUNK_COLUMNS},
        -bm25(chunks_fts, ${textWeight}, ${titleWeight}, ${captionWeight}) AS score,
        snippet(chunks_fts, 0, '<mark>', '</mark>', '...', ${SNIPPET_TOKENS}) AS snippet
      FROM chunks_fts
      JOIN chunks c ON c.seq = chunks_fts.rowid
      WHERE chunks_fts MATCH ?
      ORDER BY bm25(chunks_fts, ${textWeight}, ${titleWeight}, ${captionWeight})
      LIMIT ?
    `
      )
      .all(match, limit);

    return rows.map((row) => ({ ...rowToChunk(row), score: row.score, snippet: row.snippet }));
  }

  getChunk(id: string): IndexedChunk | null {
    const row = this.db
      .prepare<[string], ChunkRow>(`SELECT ${CHUNK_COLUMNS} FROM chunks c WHERE c.id = ?`)
      .get(id);
    return row ? rowToChunk(row) : null;
  }

  /**
   * Delete every stored chunk and vector; the schema and dimension stay.
   */
  clear(): number {
    return this.db.transaction(() => {
      const { changes } = this.db.prepare('DELETE FROM chunks').run();
      if (this.dimensions !== null) this.db.exec('DELETE FROM vec_chunks');
      return changes;
    })();
  }

  stats(): IndexStats {
    const totals = this.db
      .prepare<[], { total_chunks: number; total_documents: number }>(
        'SELECT COUNT(*) AS total_chunks, COUNT(DISTINCT doc_id) AS total_documents FROM chunks'
      )
      .get();
    const bySource = this.db
      .prepare<[], { source: string; count: number }>(
        'SELECT source, COUNT(*) AS count FROM chunks GROUP BY source ORDER BY source'
      )
      .all();

    return {
      path: this.path,
      dimensions: this.dimensions,
      total_chunks: totals?.total_chunks ?? 0,
      total_documents: totals?.total_documents ?? 0,
      chunks_by_source: Object.fromEntries(bySource.map((r) => [r.source, r.count])),
    };
  }

  close(): void {
    this.db.close();
  }
}
