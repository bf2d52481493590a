import { describe, it, expect } from 'vitest';
import { classifyProviderError, parseJSONResponse, retryAfterFrom } from '../../src/llm/client.js';
import {
  LLMAuthError,
  LLMConnectionError,
  LLMQuotaError,
  LLMRateLimitError,
} from '../../src/errors/index.js';

function sdkError(message: string, fields: Record<string, unknown>): Error {
  return Object.assign(new Error(message), fields);
}

describe('parseJSONResponse', () => {
  it('should parse bare JSON', () => {
    expect(parseJSONResponse(' {"a": 1} ')).toEqual({ a: 1 });
  });

  it('should unwrap fenced code blocks', () => {
    expect(parseJSONResponse('Here you go:\n```json\n{"limit": 5}\n```')).toEqual({ limit: 5 });
    expect(parseJSONResponse('```\n[1, 2]\n```')).toEqual([1, 2]);
  });

  it('should return undefined for prose', () => {
    expect(parseJSONResponse('I cannot help with that.')).toBeUndefined();
  });
});

describe('retryAfterFrom', () => {
  it('should prefer retry-after-ms', () => {
    expect(retryAfterFrom({ headers: { 'retry-after-ms': '1500', 'retry-after': '9' } })).toBe(1500);
  });

  it('should convert retry-after seconds', () => {
    expect(retryAfterFrom({ headers: new Headers({ 'retry-after': '3' }) })).toBe(3000);
  });

  it('should return undefined without a hint', () => {
    expect(retryAfterFrom({ headers: {} })).toBeUndefined();
    expect(retryAfterFrom('nope')).toBeUndefined();
  });
});

describe('classifyProviderError', () => {
  it('should map authentication failures', () => {
    const mapped = classifyProviderError(sdkError('Unauthorized', { status: 401 }), 'openai', 'gpt-4o-mini');

    expect(mapped).toBeInstanceOf(LLMAuthError);
  });

  it('should map rate limits with their retry hint', () => {
    const mapped = classifyProviderError(
      sdkError('Too many requests', { status: 429, headers: { 'retry-after': '2' } }),
      'anthropic',
      'claude-haiku-4-5'
    );

    expect(mapped).toBeInstanceOf(LLMRateLimitError);
    expect(mapped instanceof LLMRateLimitError && mapped.retryAfterMs).toBe(2000);
  });

  it('should read nested error types', () => {
    const mapped = classifyProviderError(
      sdkError('Request failed', { status: 400, error: { type: 'insufficient_quota', message: 'no credit left' } }),
      'openai',
      'gpt-4o-mini'
    );

    expect(mapped).toBeInstanceOf(LLMQuotaError);
  });

  it('should map unreachable endpoints', () => {
    expect(classifyProviderError(new TypeError('fetch failed'), 'openai', 'm')).toBeInstanceOf(LLMConnectionError);
  });

  it('should pass everything else through', () => {
    const plain = new Error('something odd');
    const typed = new LLMAuthError('openai');

    expect(classifyProviderError(plain, 'openai', 'm')).toBe(plain);
    expect(classifyProviderError(typed, 'openai', 'm')).toBe(typed);
    expect(classifyProviderError('text', 'openai', 'm')).toBe('text');
  });
});
