/**
 * SQL schema for the search index
 *
 * chunks holds the records, chunks_fts is an external-content FTS5 index
 * over text, title and caption kept in sync by triggers, and vec_chunks is
 * a sqlite-vec table keyed by chunks.seq. vec_chunks is created once
 * the embedding dimension is known.
 */

export const DATABASE_PRAGMAS = [
  'PRAGMA journal_mode = WAL',
  'PRAGMA synchronous = NORMAL',
  'PRAGMA foreign_keys = ON',
];

export const CREATE_METADATA_TABLE = `
CREATE TABLE IF NOT EXISTS index_metadata (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  dimensions INTEGER NOT NULL,
  created_at TEXT NOT NULL
)
`;

export const CREATE_CHUNKS_TABLE = `
CREATE TABLE IF NOT EXISTS chunks (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  id TEXT NOT NULL UNIQUE,
  doc_id TEXT NOT NULL,
  chunk_id TEXT NOT NULL,
  source TEXT NOT NULL CHECK (source IN ('pdf', 'pptx', 'docx', 'transcript')),
  title TEXT NOT NULL,
  page INTEGER,
  slide INTEGER,
  timecode TEXT,
  section TEXT,
  text TEXT NOT NULL,
  caption TEXT CHECK (caption IS NULL OR caption IN ('ocr', 'table')),
  confidence REAL,
  created_at TEXT NOT NULL
)
`;

export const CREATE_CHUNKS_INDEXES = [
  'CREATE INDEX IF NOT EXISTS idx_chunks_doc_id ON chunks(doc_id)',
];

export const CREATE_CHUNKS_FTS_TABLE = `
CREATE VIRTUAL TABLE IF NOT EXISTS chunks_fts USING fts5(
  text,
  title,
  caption,
  content='chunks',
  content_rowid='seq',
  tokenize='porter unicode61'
)
`;

export const CREATE_FTS_TRIGGERS = [
  `CREATE TRIGGER IF NOT EXISTS chunks_fts_ai AFTER INSERT ON chunks BEGIN
    INSERT INTO chunks_fts(rowid, text, title, caption) VALUES (new.seq, new.text, new.title, new.caption);
  END`,
  `CREATE TRIGGER IF NOT EXISTS chunks_fts_ad AFTER DELETE ON chunks BEGIN
    INSERT INTO chunks_fts(chunks_fts, rowid, text, title, caption) VALUES('delete', old.seq, old.text, old.title, old.caption);
  END`,
  `CREATE TRIGGER IF NOT EXISTS chunks_fts_au AFTER UPDATE ON chunks BEGIN
    INSERT INTO chunks_fts(chunks_fts, rowid, text, title, caption) VALUES('delete', old.seq, old.text, old.title, old.caption);
    INSERT INTO chunks_fts(rowid, text, title, caption) VALUES (new.seq, new.text, new.title, new.caption);
  END`,
];

export function createVecTable(dimensions: number): string {
  return `
CREATE VIRTUAL TABLE IF NOT EXISTS vec_chunks USING vec0(
  chunk_seq INTEGER PRIMARY KEY,
  embedding FLOAT[${dimensions}] distance_metric=cosine
)
`;
}
