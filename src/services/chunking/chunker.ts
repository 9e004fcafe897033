/**
 * Sentence-Aware Token-Bounded Chunker
 *
 * Splits normalized text into overlapping chunks under a token budget:
 * sentences are accumulated greedily, consecutive chunks share a tail of
 * whole sentences no larger than the overlap budget, oversized sentences are
 * word-wrapped, and a final pass bisects any chunk still over budget.
 *
 * @module services/chunking/chunker
 */

import { DEFAULT_CHUNKING_CONFIG } from '../../models/chunk.js';

/** Tokens reserved below maxTokens for downstream prompt scaffolding */
export const TOKEN_HEADROOM = 64;

/** Characters allowed per token when wrapping or hard-splitting text */
const CHARS_PER_TOKEN_BUDGET = 4;

/**
 * Token counting strategy. Plug in a subword tokenizer where one is available.
 */
export interface TokenCounter {
  count(text: string): number;
}

/**
 * Conservative estimate: one token per three characters, at least one.
 */
export const heuristicTokenCounter: TokenCounter = {
  count: (text) => Math.max(1, Math.ceil(text.length / 3)),
};

export type SentenceSplitter = (text: string) => string[];

export interface ChunkerOptions {
  tokenCounter?: TokenCounter;
  /** Tokens subtracted from maxTokens (default: TOKEN_HEADROOM) */
  headroom?: number;
  sentenceSplitter?: SentenceSplitter;
}

const sentenceSegmenter = new Intl.Segmenter('en', { granularity: 'sentence' });

/**
 * Split text into trimmed, non-empty sentences.
 * Falls back to the whole text as one sentence when segmentation yields nothing.
 */
export function splitSentences(text: string): string[] {
  const sentences: string[] = [];
  for (const { segment } of sentenceSegmenter.segment(text)) {
    const sentence = segment.trim();
    if (sentence) sentences.push(sentence);
  }
  const whole = text.trim();
  return sentences.length > 0 ? sentences : whole ? [whole] : [];
}

/**
 * Wrap an oversized sentence into word-aligned pieces of at most maxChars.
 * A single word longer than maxChars becomes its own piece.
 */
export function wrapWords(sentence: string, maxChars: number): string[] {
  const pieces: string[] = [];
  let current: string[] = [];
  let length = 0;

  for (const word of sentence.split(/\s+/)) {
    if (!word) continue;
    const added = word.length + (current.length > 0 ? 1 : 0);
    if (current.length > 0 && length + added > maxChars) {
      pieces.push(current.join(' '));
      current = [word];
      length = word.length;
    } else {
      current.push(word);
      length += added;
    }
  }
  if (current.length > 0) pieces.push(current.join(' '));
  return pieces;
}

/**
 * Longest prefix of an unbroken piece whose count fits the budget, at least
 * one character.
 */
function fittingPrefixLength(piece: string, budget: number, counter: TokenCounter): number {
  let lo = 1;
  let hi = piece.length - 1;
  let best = 1;
  while (lo <= hi) {
    const mid = Math.floor((lo + hi) / 2);
    if (counter.count(piece.slice(0, mid)) <= budget) {
      best = mid;
      lo = mid + 1;
    } else {
      hi = mid - 1;
    }
  }
  return best;
}

/**
 * Bisect every piece whose count exceeds budget at the word boundary
 * nearest its midpoint, until all pieces fit. A piece without spaces is cut
 * at the longest prefix the counter accepts. Uses an explicit work stack;
 * output order follows input order.
 */
export function enforceTokenCap(
  pieces: string[],
  budget: number,
  counter: TokenCounter = heuristicTokenCounter
): string[] {
  const out: string[] = [];
  const stack = [...pieces].reverse();

  while (stack.length > 0) {
    const next = stack.pop();
    if (next === undefined) break;
    const piece = next.trim();
    if (!piece) continue;
    if (counter.count(piece) <= budget || piece.length < 2) {
      out.push(piece);
      continue;
    }

    const mid = Math.floor(piece.length / 2);
    let split = piece.lastIndexOf(' ', mid - 1);
    if (split <= 0) split = piece.indexOf(' ', mid);
    if (split <= 0) split = fittingPrefixLength(piece, budget, counter);

    // Right half first so the left half is popped next
    stack.push(piece.slice(split), piece.slice(0, split));
  }

  return out;
}

/**
 * Chunk text under a token budget with sentence overlap.
 *
 * @param maxTokens - Budget before headroom is reserved
 * @param overlapTokens - Upper bound on tokens repeated from the previous chunk
 * @returns Trimmed, non-empty chunks in document order; empty for blank input
 */
export function chunkByTokens(
  text: string,
  maxTokens: number = DEFAULT_CHUNKING_CONFIG.maxTokens,
  overlapTokens: number = DEFAULT_CHUNKING_CONFIG.overlapTokens,
  options: ChunkerOptions = {}
): string[] {
  if (!text.trim()) return [];

  const counter = options.tokenCounter ?? heuristicTokenCounter;
  const budget = Math.max(1, maxTokens - (options.headroom ?? TOKEN_HEADROOM));
  const maxChars = budget * CHARS_PER_TOKEN_BUDGET;
  const split = options.sentenceSplitter ?? splitSentences;
  const sentences = split(text);

  const chunks: string[] = [];
  let current: string[] = [];
  let currentTokens = 0;

  const close = (): void => {
    if (current.length > 0) chunks.push(current.join(' '));
  };

  for (const sentence of sentences) {
    const tokens = counter.count(sentence);

    if (currentTokens + tokens <= budget) {
      current.push(sentence);
      currentTokens += tokens;
      continue;
    }

    if (tokens > budget) {
      close();
      chunks.push(...wrapWords(sentence, maxChars));
      current = [];
      currentTokens = 0;
      continue;
    }

    close();

    // Overlap tail: whole trailing sentences, walking backward, within overlapTokens
    const tail: string[] = [];
    let tailTokens = 0;
    for (let i = current.length - 1; i >= 0; i--) {
      const t = counter.count(current[i]);
      if (tailTokens + t > overlapTokens) break;
      tail.unshift(current[i]);
      tailTokens += t;
    }
    // Keep the seeded buffer itself within budget
    while (tail.length > 0 && tailTokens + tokens > budget) {
      const dropped = tail.shift();
      if (dropped !== undefined) tailTokens -= counter.count(dropped);
    }

    current = [...tail, sentence];
    currentTokens = tailTokens + tokens;
  }
  close();

  return enforceTokenCap(chunks, budget, counter);
}
