// src/services/openai.ts
// What: OpenAI-backed embedding and summarization providers.
// How: Shares one OpenAI client with the SDK's own retries disabled (backoff is owned by withRetry), maps SDK
//      errors onto the app taxonomy (429/408/409/5xx/connection -> TransientProviderError, 401/403 ->
//      ProviderAuthError, everything else propagates unchanged) and re-associates embeddings by their
//      response index rather than by array position.

import OpenAI from 'openai';
import { DataIntegrityError, ProviderAuthError, TransientProviderError } from '../errors.js';
import type { EmbeddingProvider, Summarizer } from '../models/types.js';
import { withRetry, type RetryPolicy } from './retry.js';

const TRANSIENT_STATUSES = new Set([408, 409, 429]);

export function classifyOpenAIError(err: unknown): unknown {
  if (err instanceof OpenAI.APIUserAbortError) return err;
  if (err instanceof OpenAI.APIConnectionError) {
    return new TransientProviderError(`OpenAI connection failed: ${err.message}`, { cause: err });
  }
  if (err instanceof OpenAI.APIError) {
    const status = err.status;
    if (status === 401 || status === 403) {
      return new ProviderAuthError(`OpenAI rejected credentials (${status}): ${err.message}`, { cause: err });
    }
    if (status !== undefined && (TRANSIENT_STATUSES.has(status) || status >= 500)) {
      return new TransientProviderError(`OpenAI returned ${status}: ${err.message}`, { cause: err });
    }
  }
  return err;
}

export function createOpenAIClient(apiKey: string, timeoutMs = 60_000): OpenAI {
  return new OpenAI({ apiKey, maxRetries: 0, timeout: timeoutMs });
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string,
    private readonly dimensions?: number,
  ) {}

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    const res = await this.client.embeddings
      .create({
        model: this.model,
        input: texts,
        ...(this.dimensions ? { dimensions: this.dimensions } : {}),
      })
      .catch((err: unknown) => {
        throw classifyOpenAIError(err);
      });

    const out: Array<number[] | undefined> = new Array(texts.length).fill(undefined);
    for (const item of res.data) {
      if (item.index < 0 || item.index >= texts.length) {
        throw new DataIntegrityError(`Embedding response index ${item.index} outside request of ${texts.length}`);
      }
      out[item.index] = item.embedding;
    }
    return out.map((vec, i) => {
      if (!vec) throw new DataIntegrityError(`Embedding response missing input #${i}`);
      return vec;
    });
  }
}

const MAX_INPUT_CHARS = 8000;

export function buildSummaryPrompt(text: string, words: number): string {
  const body = text.length > MAX_INPUT_CHARS ? `${text.slice(0, MAX_INPUT_CHARS)}...` : text;
  return [
    `Please provide a concise summary of the following academic paper in approximately ${words} words.`,
    'Focus on the key contributions, methods, and findings:',
    '',
    body,
    '',
    'Summary:',
  ].join('\n');
}

export class OpenAISummarizer implements Summarizer {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string,
    private readonly retry: RetryPolicy,
    private readonly maxTokens = 200,
  ) {}

  async summarize(text: string): Promise<string> {
    const completion = await withRetry('summarize', this.retry, async () => {
      try {
        return await this.client.chat.completions.create({
          model: this.model,
          temperature: 0.3,
          max_tokens: this.maxTokens,
          messages: [
            { role: 'system', content: 'You are an expert at summarizing academic papers.' },
            { role: 'user', content: buildSummaryPrompt(text, this.maxTokens) },
          ],
        });
      } catch (err) {
        throw classifyOpenAIError(err);
      }
    });
    const summary = completion.choices[0]?.message?.content?.trim() ?? '';
    if (!summary) {
      throw new DataIntegrityError('Summarization returned empty content');
    }
    return summary;
  }
}
