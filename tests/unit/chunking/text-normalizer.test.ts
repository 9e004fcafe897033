/**
 * Unit tests for text normalization and word counting
 *
 * @module tests/unit/chunking/text-normalizer
 */

import { describe, it, expect } from 'vitest';
import { countWords, normalizeText } from '../../../src/services/chunking/text-normalizer.js';

describe('normalizeText', () => {
  it('converts CRLF and lone CR to LF', () => {
    expect(normalizeText('line one\r\nline two\rline three')).toBe('line one\nline two\nline three');
  });

  it('joins words hyphenated across a line break', () => {
    expect(normalizeText('infor-\nmation retrieval')).toBe('information retrieval');
  });

  it('strips leading bullet glyphs, including repeated ones', () => {
    expect(normalizeText('• first\n▪ second\n- • third')).toBe('first\nsecond\nthird');
  });

  it('keeps a hyphen that is not at the start of a line', () => {
    expect(normalizeText('well-known fact')).toBe('well-known fact');
  });

  it('collapses horizontal whitespace to one space', () => {
    expect(normalizeText('a  \t b\tc')).toBe('a b c');
  });

  it('collapses runs of blank lines to a single blank line', () => {
    expect(normalizeText('a\n\n\n\nb')).toBe('a\n\nb');
  });

  it('treats whitespace-only lines as blank', () => {
    expect(normalizeText('a\n \n \t\n  \nb')).toBe('a\n\nb');
    expect(normalizeText('kept \nnext')).toBe('kept\nnext');
    expect(normalizeText('infor- \nmation')).toBe('information');
  });

  it('folds a bullet-only line into the surrounding blank-line handling', () => {
    expect(normalizeText('intro\n•\n\noutro')).toBe('intro\n\noutro');
  });

  it('trims the result', () => {
    expect(normalizeText('  \n padded \n ')).toBe('padded');
  });

  it('returns an empty string for whitespace-only input', () => {
    expect(normalizeText(' \t\r\n ')).toBe('');
  });

  it('is idempotent', () => {
    const samples = [
      '• Agenda\r\n\r\n\r\n- Budget  review\n▪ Hiring plan',
      'multi-\nline   text\n\n\n\nend',
      '  - • -  nested bullets\tand tabs  ',
      'plain sentence.',
      'trailing  \n \n\t\n  indented',
    ];
    for (const sample of samples) {
      const once = normalizeText(sample);
      expect(normalizeText(once)).toBe(once);
    }
  });
});

describe('countWords', () => {
  it('counts whitespace-separated words across lines', () => {
    expect(countWords('  one two\nthree\tfour ')).toBe(4);
  });

  it('returns 0 for empty and blank text', () => {
    expect(countWords('')).toBe(0);
    expect(countWords(' \n ')).toBe(0);
  });
});
