/**
 * Answer generation
 *
 * Builds the grounded prompt from fused search results and asks an
 * Ollama-compatible /api/chat endpoint for the answer.
 *
 * @module services/generation/answer
 */

import { z } from 'zod';
import { postOllama } from '../http/ollama.js';
import type { FusedResult } from '../../models/search.js';

export class GenerationError extends Error {
  constructor(
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GenerationError';
    Error.captureStackTrace?.(this, GenerationError);
  }
}

export const REFUSAL_SENTENCE = "I can't answer that based on the provided documents.";

export const SYSTEM_PROMPT = [
  'You are a helpful assistant that answers questions using only the provided context.',
  `If the context does not contain the answer, reply exactly: "${REFUSAL_SENTENCE}"`,
  'Format the answer in Markdown.',
  'Preserve numbers, names, codes and quoted strings exactly as they appear in the context.',
  'Be concise.',
  'Answer in the same language as the question.',
].join('\n');

export interface AnswerGenerator {
  generate(query: string, contexts: FusedResult[]): Promise<string>;
}

/**
 * "[Title, p.3] text", "[Title, slide 2] text" or "[Title] text".
 * The highlight snippet is preferred over the full text.
 */
export function formatContext(contexts: FusedResult[]): string {
  return contexts
    .map((hit) => {
      const tag =
        hit.page !== null
          ? `${hit.title}, p.${hit.page}`
          : hit.slide !== null
            ? `${hit.title}, slide ${hit.slide}`
            : hit.title;
      return `[${tag}] ${hit.snippet ?? hit.text}`;
    })
    .join('\n\n');
}

export function buildUserMessage(query: string, contexts: FusedResult[]): string {
  return `Context:\n${formatContext(contexts)}\n\nUser: ${query}\nAnswer:`;
}

export interface AnswerClientOptions {
  baseUrl: string;
  model: string;
  timeoutMs: number;
  temperature: number;
  maxOutputTokens: number;
}

const ChatResponse = z.object({
  message: z.object({ content: z.string() }),
});

export class OllamaAnswerGenerator implements AnswerGenerator {
  constructor(private readonly options: AnswerClientOptions) {}

  async generate(query: string, contexts: FusedResult[]): Promise<string> {
    const { message } = await postOllama(
      `${this.options.baseUrl.replace(/\/+$/, '')}/api/chat`,
      {
        model: this.options.model,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: buildUserMessage(query, contexts) },
        ],
        stream: false,
        options: {
          temperature: this.options.temperature,
          num_predict: this.options.maxOutputTokens,
        },
      },
      ChatResponse,
      this.options.timeoutMs,
      (msg, details) => new GenerationError(msg, details)
    );
    return message.content.trim();
  }
}
