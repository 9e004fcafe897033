/**
 * Unit tests for prompt construction and the answer client
 *
 * @module tests/unit/generation/answer
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  buildUserMessage,
  formatContext,
  GenerationError,
  OllamaAnswerGenerator,
  SYSTEM_PROMPT,
} from '../../../src/services/generation/answer.js';
import { stubFetch } from '../http-stub.js';
import { makeFused } from '../helpers.js';

const generator = new OllamaAnswerGenerator({
  baseUrl: 'http://chat.test:11434',
  model: 'chat-test',
  timeoutMs: 1000,
  temperature: 0,
  maxOutputTokens: 350,
});

describe('formatContext', () => {
  it('tags each context with title and page, slide or nothing', () => {
    const contexts = [
      makeFused('a', { title: 'Handbook', page: 3, text: 'Page text.' }),
      makeFused('b', { title: 'Roadmap', page: null, slide: 2, text: 'Slide text.' }),
      makeFused('c', { title: 'All Hands', page: null, timecode: '00:00:01-00:00:09', text: 'Spoken text.' }),
    ];

    expect(formatContext(contexts)).toBe(
      '[Handbook, p.3] Page text.\n\n[Roadmap, slide 2] Slide text.\n\n[All Hands] Spoken text.'
    );
  });

  it('prefers the highlight snippet over the text', () => {
    expect(formatContext([makeFused('a', { snippet: 'short <mark>hit</mark>' })])).toBe(
      '[Handbook, p.1] short <mark>hit</mark>'
    );
  });
});

describe('buildUserMessage', () => {
  it('places the context before the question', () => {
    expect(buildUserMessage('How long?', [makeFused('a', { text: 'Thirty days.' })])).toBe(
      'Context:\n[Handbook, p.1] Thirty days.\n\nUser: How long?\nAnswer:'
    );
  });
});

describe('OllamaAnswerGenerator', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('sends the grounded chat request and returns the trimmed answer', async () => {
    const requests = stubFetch(() => ({ message: { role: 'assistant', content: '  Thirty days.\n' } }));
    const contexts = [makeFused('a', { text: 'Thirty days.' })];

    const answer = await generator.generate('How long?', contexts);

    expect(answer).toBe('Thirty days.');
    expect(requests).toEqual([
      {
        url: 'http://chat.test:11434/api/chat',
        body: {
          model: 'chat-test',
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: buildUserMessage('How long?', contexts) },
          ],
          stream: false,
          options: { temperature: 0, num_predict: 350 },
        },
      },
    ]);
  });

  it('raises GenerationError on HTTP errors', async () => {
    stubFetch(() => ({ error: 'overloaded' }), 503);

    await expect(generator.generate('q', [])).rejects.toBeInstanceOf(GenerationError);
  });
});
