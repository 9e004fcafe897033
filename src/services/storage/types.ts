/**
 * Type definitions for the search index
 */

/**
 * Error codes for index operations
 */
export enum IndexErrorCode {
  OPEN_FAILED = 'OPEN_FAILED',
  EXTENSION_LOAD_FAILED = 'EXTENSION_LOAD_FAILED',
  DIMENSION_MISMATCH = 'DIMENSION_MISMATCH',
  WRITE_FAILED = 'WRITE_FAILED',
  CORRUPT_ROW = 'CORRUPT_ROW',
  SNAPSHOT_WRITE_FAILED = 'SNAPSHOT_WRITE_FAILED',
}

export class IndexError extends Error {
  constructor(
    message: string,
    public readonly code: IndexErrorCode,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'IndexError';
  }
}

/**
 * chunks table row
 */
export interface ChunkRow {
  id: string;
  doc_id: string;
  chunk_id: string;
  source: string;
  title: string;
  page: number | null;
  slide: number | null;
  timecode: string | null;
  section: string | null;
  text: string;
  caption: string | null;
  confidence: number | null;
  created_at: string;
}

export interface IndexStats {
  path: string;
  dimensions: number | null;
  total_chunks: number;
  total_documents: number;
  chunks_by_source: Record<string, number>;
}
