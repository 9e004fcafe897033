/**
 * Unit tests for repeated-line boilerplate detection
 *
 * @module tests/unit/dedup/boilerplate
 */

import { describe, it, expect } from 'vitest';
import { dropBoilerplate, findBoilerplate } from '../../../src/services/dedup/boilerplate.js';

const pages = [
  'ACME Confidential\nRevenue grew in the first quarter.\nDraft',
  'ACME Confidential\nCosts were flat.',
  'ACME Confidential\nHeadcount rose.\nDraft',
  'ACME Confidential\nOutlook is stable.',
  'Appendix tables follow.',
];

describe('findBoilerplate', () => {
  it('flags lines present on at least the given fraction of pages', () => {
    const found = findBoilerplate(pages, 0.6);

    expect([...found]).toEqual(['ACME Confidential']);
  });

  it('counts a line once per page however often it repeats there', () => {
    const found = findBoilerplate(['Footer\nFooter\nFooter', 'Body text', 'More body'], 0.5);

    expect(found.size).toBe(0);
  });

  it('ignores lines longer than the length limit', () => {
    const longLine = 'x'.repeat(121);
    const found = findBoilerplate([longLine, longLine], 0.5);

    expect(found.size).toBe(0);
    expect(findBoilerplate([longLine, longLine], 0.5, 200).has(longLine)).toBe(true);
  });

  it('compares trimmed lines', () => {
    const found = findBoilerplate(['  Header  \nA', 'Header\nB'], 1);

    expect([...found]).toEqual(['Header']);
  });

  it('returns an empty set for no pages', () => {
    expect(findBoilerplate([], 0.6).size).toBe(0);
  });
});

describe('dropBoilerplate', () => {
  it('returns text unchanged when nothing is boilerplate', () => {
    expect(dropBoilerplate('a\n\n b ', new Set())).toBe('a\n\n b ');
  });

  it('removes boilerplate and blank lines', () => {
    const text = 'ACME Confidential\n\nRevenue grew.\n  ACME Confidential  \nDraft';

    expect(dropBoilerplate(text, new Set(['ACME Confidential', 'Draft']))).toBe('Revenue grew.');
  });
});
