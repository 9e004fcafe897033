/**
 * Text Normalizer
 *
 * Canonicalizes extracted text before boilerplate removal and chunking:
 * line endings, hyphenation breaks, bullet glyphs, horizontal whitespace,
 * trailing spaces and runs of blank lines. Lossy on purpose.
 *
 * normalizeText is idempotent: normalizeText(normalizeText(x)) === normalizeText(x).
 *
 * @module services/chunking/text-normalizer
 */

/** CRLF and lone CR */
const LINE_ENDING_REGEX = /\r\n?/g;

/** Whitespace at a line end; whitespace-only lines become blank */
const TRAILING_WS_REGEX = /[ \t]+$/gm;

/** Hyphen directly before a line break: "infor-\nmation" -> "information" */
const HYPHEN_BREAK_REGEX = /-\n/g;

/**
 * Leading bullet glyphs, repeated and space-separated ("- • item").
 * Horizontal whitespace only, so a bullet-only line never swallows the next line.
 */
const BULLET_REGEX = /^[ \t]*(?:[•▪-][ \t]*)+/gm;

const HORIZONTAL_WS_REGEX = /[ \t]+/g;

/** Two or more blank lines */
const BLANK_RUN_REGEX = /\n{3,}/g;

/**
 * Normalize raw extracted text.
 *
 * Bullets are stripped before whitespace and blank lines are collapsed, so
 * lines emptied by bullet removal are folded into the blank-line collapse.
 */
export function normalizeText(text: string): string {
  return text
    .replace(LINE_ENDING_REGEX, '\n')
    .replace(TRAILING_WS_REGEX, '')
    .replace(HYPHEN_BREAK_REGEX, '')
    .replace(BULLET_REGEX, '')
    .replace(HORIZONTAL_WS_REGEX, ' ')
    .replace(BLANK_RUN_REGEX, '\n\n')
    .trim();
}

/**
 * Count whitespace-separated words
 */
export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}
