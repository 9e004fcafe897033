/**
 * Unit tests for transcript segment merging
 *
 * @module tests/unit/chunking/segment-merger
 */

import { describe, it, expect } from 'vitest';
import { mergeSegments } from '../../../src/services/chunking/segment-merger.js';

describe('mergeSegments', () => {
  it('returns no blocks for no segments', () => {
    expect(mergeSegments([])).toEqual([]);
  });

  it('merges segments separated by less than the gap threshold', () => {
    const blocks = mergeSegments([
      { text: 'welcome back', start: 0, end: 1 },
      { text: 'to the course', start: 1.2, end: 2 },
      { text: 'chapter two', start: 4, end: 5 },
    ]);

    expect(blocks).toEqual([
      { text: 'welcome back to the course', start: 0, end: 2 },
      { text: 'chapter two', start: 4, end: 5 },
    ]);
  });

  it('starts a new block when the gap equals the threshold', () => {
    const blocks = mergeSegments([
      { text: 'first', start: 0, end: 1 },
      { text: 'second', start: 2.5, end: 3 },
    ]);

    expect(blocks.map((b) => b.text)).toEqual(['first', 'second']);
  });

  it('starts a new block once the block would span maxSecs', () => {
    const blocks = mergeSegments(
      [
        { text: 'x', start: 0, end: 4 },
        { text: 'y', start: 4, end: 9 },
        { text: 'z', start: 9, end: 10 },
      ],
      { maxSecs: 10, maxChars: 1200, gapSecs: 1.5 }
    );

    expect(blocks).toEqual([
      { text: 'x y', start: 0, end: 9 },
      { text: 'z', start: 9, end: 10 },
    ]);
  });

  it('starts a new block when the text would exceed maxChars', () => {
    const blocks = mergeSegments(
      [
        { text: 'abcd', start: 0, end: 1 },
        { text: 'efgh', start: 1, end: 2 },
        { text: 'ij', start: 2, end: 3 },
      ],
      { maxSecs: 60, maxChars: 10, gapSecs: 1.5 }
    );

    expect(blocks.map((b) => b.text)).toEqual(['abcd efgh', 'ij']);
  });

  it('skips segments with blank text and trims the rest', () => {
    const blocks = mergeSegments([
      { text: '  hello ', start: 0, end: 1 },
      { text: '   ', start: 1, end: 30 },
      { text: 'world', start: 1.4, end: 2 },
    ]);

    expect(blocks).toEqual([{ text: 'hello world', start: 0, end: 2 }]);
  });
});
