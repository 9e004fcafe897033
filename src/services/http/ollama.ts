/**
 * Minimal JSON POST against an Ollama-compatible server
 *
 * Aborts after timeoutMs. Non-2xx responses and payloads that fail the zod
 * schema are raised through the caller's error factory. No retries.
 *
 * @module services/http/ollama
 */

import type { z } from 'zod';

export type ServiceErrorFactory = (message: string, details?: Record<string, unknown>) => Error;

export async function postOllama<T>(
  url: string,
  body: Record<string, unknown>,
  schema: z.ZodSchema<T>,
  timeoutMs: number,
  makeError: ServiceErrorFactory
): Promise<T> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  let rawResponse: Response;
  try {
    rawResponse = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal: controller.signal,
    });
  } catch (error) {
    const aborted = controller.signal.aborted;
    throw makeError(
      aborted
        ? `Request to ${url} timed out after ${timeoutMs}ms`
        : `Request to ${url} failed: ${error instanceof Error ? error.message : String(error)}`,
      { url, timeout: aborted }
    );
  } finally {
    clearTimeout(timeoutId);
  }

  if (!rawResponse.ok) {
    const text = await rawResponse.text().catch(() => '');
    throw makeError(
      `Ollama API error ${rawResponse.status}: ${rawResponse.statusText}. ${text.slice(0, 200)}`,
      { url, status: rawResponse.status }
    );
  }

  const parsed = schema.safeParse(await rawResponse.json());
  if (!parsed.success) {
    throw makeError(`Unexpected response shape from ${url}`, {
      url,
      issues: parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
    });
  }
  return parsed.data;
}
