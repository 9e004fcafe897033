/**
 * Transcript Segment Merger
 *
 * Merges speech-recognition segments into time blocks before chunking.
 * A block closes on a silence gap, on reaching the maximum duration, or when
 * the next segment would push it past the character limit.
 *
 * @module services/chunking/segment-merger
 */

import type { TimedText } from '../../models/document.js';

export interface SegmentMergeOptions {
  /** Seconds from block start to current segment end (default: 60) */
  maxSecs: number;
  /** Accumulated characters, counting one separator per segment (default: 1200) */
  maxChars: number;
  /** Silence in seconds that forces a new block (default: 1.5) */
  gapSecs: number;
}

export const DEFAULT_SEGMENT_MERGE_OPTIONS: SegmentMergeOptions = {
  maxSecs: 60,
  maxChars: 1200,
  gapSecs: 1.5,
};

export function mergeSegments(
  segments: TimedText[],
  options: SegmentMergeOptions = DEFAULT_SEGMENT_MERGE_OPTIONS
): TimedText[] {
  const blocks: TimedText[] = [];
  let texts: string[] = [];
  let blockStart: number | null = null;
  let lastEnd: number | null = null;
  let chars = 0;

  const flush = (): void => {
    if (texts.length > 0 && blockStart !== null && lastEnd !== null) {
      blocks.push({ text: texts.join(' '), start: blockStart, end: lastEnd });
    }
    texts = [];
    chars = 0;
  };

  for (const segment of segments) {
    const text = segment.text.trim();
    if (!text) continue;

    if (blockStart === null || lastEnd === null) {
      blockStart = segment.start;
    } else {
      const gap = segment.start - lastEnd;
      const tooLong = segment.end - blockStart >= options.maxSecs;
      const tooBig = chars + text.length > options.maxChars;
      if (gap >= options.gapSecs || tooLong || tooBig) {
        flush();
        blockStart = segment.start;
      }
    }

    texts.push(text);
    chars += text.length + 1;
    lastEnd = segment.end;
  }
  flush();

  return blocks;
}
