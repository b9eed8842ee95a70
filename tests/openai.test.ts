import { describe, it, expect } from 'vitest';
import OpenAI from 'openai';
import { buildSummaryPrompt, classifyOpenAIError } from '../src/services/openai.js';
import { ProviderAuthError, TransientProviderError } from '../src/errors.js';

const apiError = (status: number) => new OpenAI.APIError(status, undefined, 'upstream said no', undefined);

describe('classifyOpenAIError', () => {
  it('treats rate limits, timeouts, conflicts and 5xx as transient', () => {
    for (const status of [408, 409, 429, 500, 503]) {
      expect(classifyOpenAIError(apiError(status))).toBeInstanceOf(TransientProviderError);
    }
  });

  it('treats connection failures as transient', () => {
    expect(classifyOpenAIError(new OpenAI.APIConnectionError({ message: 'socket hang up' }))).toBeInstanceOf(
      TransientProviderError,
    );
  });

  it('maps 401 and 403 to ProviderAuthError', () => {
    expect(classifyOpenAIError(apiError(401))).toBeInstanceOf(ProviderAuthError);
    expect(classifyOpenAIError(apiError(403))).toBeInstanceOf(ProviderAuthError);
  });

  it('passes other errors through unchanged', () => {
    const badRequest = apiError(400);
    const plain = new Error('bug');
    expect(classifyOpenAIError(badRequest)).toBe(badRequest);
    expect(classifyOpenAIError(plain)).toBe(plain);
  });
});

describe('buildSummaryPrompt', () => {
  it('asks for the requested length and embeds the text', () => {
    const prompt = buildSummaryPrompt('Body text.', 150);
    expect(prompt.split('\n')).toEqual([
      'Please provide a concise summary of the following academic paper in approximately 150 words.',
      'Focus on the key contributions, methods, and findings:',
      '',
      'Body text.',
      '',
      'Summary:',
    ]);
  });

  it('truncates long input', () => {
    const prompt = buildSummaryPrompt('y'.repeat(9000), 200);
    expect(prompt).toContain(`${'y'.repeat(8000)}...\n`);
    expect(prompt).not.toContain('y'.repeat(8001));
  });
});
