/**
 * LLM client interface shared by the providers.
 */

import { DEFAULT_MODELS as DEFAULT_MODELS_CONST } from '../constants.js';
import {
  LLMAuthError,
  LLMConnectionError,
  LLMError,
  LLMQuotaError,
  LLMRateLimitError,
} from '../errors/types.js';
import { isRecord, tryParseJson } from '../utils/json.js';

export interface Message {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionOptions {
  /** Model override for this call */
  model?: string;
  maxTokens?: number;
  temperature?: number;
  systemPrompt?: string;
  /** Ask the provider for a JSON object where it supports that */
  responseFormat?: 'text' | 'json';
  signal?: AbortSignal;
}

export interface ProviderInfo {
  id: LLMProviderId;
  name: string;
  supportsJSON: boolean;
  defaultModel: string;
}

/**
 * A text-completion model.
 */
export interface LLMClient {
  getProviderInfo(): ProviderInfo;
  chat(messages: Message[], options?: CompletionOptions): Promise<string>;
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

export type LLMProviderId = 'anthropic' | 'openai';

export const DEFAULT_MODELS: Record<LLMProviderId, string> = DEFAULT_MODELS_CONST;

export interface LLMConfig {
  provider: LLMProviderId;
  model?: string;
  /** API key; takes precedence over apiKeyEnvVar */
  apiKey?: string;
  /** Environment variable to read the key from */
  apiKeyEnvVar?: string;
  baseUrl?: string;
  onUsage?: (inputTokens: number, outputTokens: number) => void;
}

/**
 * Parse a model reply as JSON, tolerating a fenced code block around it.
 * Returns undefined when the reply is not JSON.
 */
export function parseJSONResponse(response: string): unknown {
  const fenced = response.match(/```(?:json)?\s*([\s\S]*?)\s*```/);
  return tryParseJson((fenced ? fenced[1] : response).trim());
}

function readNumber(record: Record<string, unknown>, key: string): number | undefined {
  const value = record[key];
  return typeof value === 'number' ? value : undefined;
}

function readString(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  return typeof value === 'string' ? value : '';
}

/**
 * Retry-After hint from an SDK error's headers, in milliseconds.
 * `retry-after-ms` wins over `retry-after` (seconds).
 */
export function retryAfterFrom(error: unknown): number | undefined {
  if (!isRecord(error)) return undefined;
  const headers = error.headers;
  const lookup = (name: string): string | null => {
    if (headers instanceof Headers) return headers.get(name);
    if (isRecord(headers)) {
      const value = headers[name];
      return typeof value === 'string' ? value : null;
    }
    return null;
  };

  const ms = Number.parseInt(lookup('retry-after-ms') ?? '', 10);
  if (!Number.isNaN(ms)) return ms;
  const seconds = Number.parseInt(lookup('retry-after') ?? '', 10);
  return Number.isNaN(seconds) ? undefined : seconds * 1000;
}

/**
 * Map an SDK error onto the typed LLM errors the retry logic understands.
 * Errors that match nothing come back unchanged.
 */
export function classifyProviderError(error: unknown, provider: LLMProviderId, model: string): unknown {
  if (error instanceof LLMError || !(error instanceof Error)) {
    return error;
  }

  const record: Record<string, unknown> = isRecord(error) ? error : {};
  const nested = isRecord(record.error) ? record.error : {};
  const status = readNumber(record, 'status') ?? readNumber(record, 'statusCode');
  const code = (readString(record, 'code') || readString(nested, 'code')).toLowerCase();
  const type = (readString(record, 'type') || readString(nested, 'type')).toLowerCase();
  const message = (readString(nested, 'message') || error.message).toLowerCase();

  if (status === 401 || status === 403 || message.includes('authentication')) {
    return new LLMAuthError(provider, model, error);
  }
  if (status === 429 || code.includes('rate_limit') || type.includes('rate_limit') || message.includes('rate limit')) {
    return new LLMRateLimitError(provider, retryAfterFrom(error), model);
  }
  if (status === 402 || code.includes('insufficient') || type.includes('insufficient') || message.includes('credit')) {
    return new LLMQuotaError(provider, model);
  }
  if (message.includes('econnrefused') || message.includes('fetch failed')) {
    return new LLMConnectionError(provider, model, error);
  }
  return error;
}
