/**
 * Ingestion context
 *
 * Collaborators and thresholds handed to every format pipeline.
 *
 * @module services/ingestion/context
 */

import { chunkByTokens } from '../chunking/chunker.js';
import type { ChunkingConfig } from '../../models/chunk.js';
import type { DocumentExtractor } from '../extraction/extractor.js';
import type { ImageRecognizer, SpeechRecognizer } from '../recognition/recognizer.js';
import type { VideoTools } from './video-tools.js';

/** Minimum words for a page's prose to be chunked */
export const PAGE_PROSE_MIN_WORDS = 8;

/** Minimum words for a table to be chunked */
export const TABLE_MIN_WORDS = 4;

/** Minimum words for slide shape text to be chunked */
export const SLIDE_TEXT_MIN_WORDS = 4;

/** Minimum words for a transcript time block to be chunked */
export const TIME_BLOCK_MIN_WORDS = 8;

export interface IngestionSettings {
  tokenHeadroom: number;
  pdfBoilerplateFraction: number;
  slideBoilerplateFraction: number;
  boilerplateMaxLineLength: number;
  /** Pages with fewer native words fall back to recognition */
  ocrFallbackWordThreshold: number;
  /** Recognition results at or below this confidence are ignored */
  ocrConfidenceFloor: number;
  /** Minimum words for recognition-derived text to be chunked */
  ocrMinWords: number;
  /** Images with width x height above this are recognized */
  largeImageArea: number;
  blockMaxSecs: number;
  blockMaxChars: number;
  blockGapSecs: number;
}

export interface IngestionContext {
  extractor: DocumentExtractor;
  recognizer: ImageRecognizer;
  speech: SpeechRecognizer;
  video: VideoTools;
  settings: IngestionSettings;
}

/**
 * Chunk one normalized unit with the run's budget and configured headroom
 */
export function chunkUnit(text: string, budget: ChunkingConfig, settings: IngestionSettings): string[] {
  return chunkByTokens(text, budget.maxTokens, budget.overlapTokens, {
    headroom: settings.tokenHeadroom,
  });
}
