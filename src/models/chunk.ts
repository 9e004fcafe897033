/**
 * Chunk interfaces for docsift
 *
 * A chunk is the atomic indexable unit emitted by ingestion and read back
 * by retrieval. The persisted record uses snake_case field names, the same
 * names the search index stores.
 */

/**
 * Source-type tag carried by every chunk.
 * Plain text and video transcripts share the `transcript` tag.
 */
export type SourceType = 'pdf' | 'pptx' | 'docx' | 'transcript';

/**
 * Caption tag for non-ordinary text: recognition-derived or tabular.
 * Ordinary prose has no caption (null).
 */
export type CaptionTag = 'ocr' | 'table';

/**
 * Persisted chunk record
 */
export interface Chunk {
  /** Stable document identifier derived from the file content hash */
  doc_id: string;
  /** Per-chunk identifier (UUID v4) */
  chunk_id: string;
  source: SourceType;
  /** Human-readable document title derived from the file name */
  title: string;
  /** 1-based page number (paginated documents) */
  page: number | null;
  /** 1-based slide number (slide decks) */
  slide: number | null;
  /** HH:MM:SS-HH:MM:SS range (video transcripts) */
  timecode: string | null;
  /** Section label (word-processor documents) */
  section: string | null;
  /** Normalized text body, never empty */
  text: string;
  caption: CaptionTag | null;
  /** Recognition confidence 0-100, only for recognition-derived text */
  confidence: number | null;
  /** ISO 8601 creation timestamp */
  created_at: string;
}

/**
 * Location and tagging fields a pipeline supplies for one emitted chunk
 */
export interface ChunkLocation {
  page?: number | null;
  slide?: number | null;
  timecode?: string | null;
  section?: string | null;
  caption?: CaptionTag | null;
  confidence?: number | null;
}

/**
 * Locator used in stable identifiers: page, slide, timecode or section,
 * in that order of preference, or "0" when none is set.
 */
export function chunkLocator(chunk: Pick<Chunk, 'page' | 'slide' | 'timecode' | 'section'>): string {
  const locator = chunk.page || chunk.slide || chunk.timecode || chunk.section || 0;
  return String(locator);
}

/**
 * Token budget options for the chunker
 */
export interface ChunkingConfig {
  /** Maximum tokens per chunk before headroom is reserved (default: 512) */
  maxTokens: number;

  /** Maximum tokens shared between consecutive chunks (default: 120) */
  overlapTokens: number;
}

/**
 * Default chunking configuration
 */
export const DEFAULT_CHUNKING_CONFIG: ChunkingConfig = {
  maxTokens: 512,
  overlapTokens: 120,
};
