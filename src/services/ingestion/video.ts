/**
 * Video pipeline
 *
 * Probe, split under the size limit, transcribe each segment, merge
 * segments into time blocks and chunk each block. Timecodes are shifted by
 * the cumulative duration of the preceding segments. Temporary segments are
 * released whether or not the run succeeds.
 *
 * @module services/ingestion/video
 */

import { countWords, normalizeText } from '../chunking/text-normalizer.js';
import { mergeSegments } from '../chunking/segment-merger.js';
import { createChunk } from './identity.js';
import { chunkUnit, TIME_BLOCK_MIN_WORDS, type IngestionContext } from './context.js';
import type { Chunk, ChunkingConfig } from '../../models/chunk.js';
import type { SourceDocument } from '../../models/document.js';

/**
 * Seconds to HH:MM:SS, truncating fractions
 */
export function formatTimestamp(seconds: number): string {
  const total = Math.max(0, Math.trunc(seconds));
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  return [h, m, s].map((n) => String(n).padStart(2, '0')).join(':');
}

export function formatTimecode(start: number, end: number): string {
  return `${formatTimestamp(start)}-${formatTimestamp(end)}`;
}

export async function* videoChunks(
  document: SourceDocument,
  budget: ChunkingConfig,
  ctx: IngestionContext
): AsyncGenerator<Chunk> {
  const { settings } = ctx;
  const duration = await ctx.video.probeDuration(document.path);
  const segments = await ctx.video.splitBySize(document.path, duration);

  console.error(
    `[pipeline/video] ${document.title}: ${duration.toFixed(1)}s in ${segments.paths.length} segment(s)`
  );

  try {
    let offset = 0;
    for (const segmentPath of segments.paths) {
      const segmentDuration =
        segmentPath === document.path ? duration : await ctx.video.probeDuration(segmentPath);
      const { segments: spoken, language } = await ctx.speech.transcribe(segmentPath);
      const blocks = mergeSegments(spoken, {
        maxSecs: settings.blockMaxSecs,
        maxChars: settings.blockMaxChars,
        gapSecs: settings.blockGapSecs,
      });
      console.error(
        `[pipeline/video] ${document.title}: ${spoken.length} segments -> ${blocks.length} blocks (language ${language ?? 'unknown'})`
      );

      for (const block of blocks) {
        const text = normalizeText(block.text);
        if (countWords(text) < TIME_BLOCK_MIN_WORDS) continue;
        const timecode = formatTimecode(block.start + offset, block.end + offset);
        for (const piece of chunkUnit(text, budget, settings)) {
          yield createChunk(document, 'transcript', piece, { timecode });
        }
      }

      offset += segmentDuration;
    }
  } finally {
    await segments.release();
  }
}
