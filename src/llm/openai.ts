import OpenAI from 'openai';
import type { LLMClient, Message, CompletionOptions, ProviderInfo } from './client.js';
import { DEFAULT_MODELS, classifyProviderError } from './client.js';
import { withRetry, LLM_RETRY_OPTIONS } from '../errors/retry.js';
import { LLMAuthError, LLMRefusalError, getErrorMessage } from '../errors/types.js';
import { getLogger } from '../logging/logger.js';
import { LLM_DEFAULTS } from '../constants.js';

export interface OpenAIClientOptions {
  /** API key (defaults to OPENAI_API_KEY env var) */
  apiKey?: string;
  model?: string;
  /** Base URL for API (for proxies/alternatives) */
  baseURL?: string;
  onUsage?: (inputTokens: number, outputTokens: number) => void;
}

/**
 * Reasoning models take max_completion_tokens and only the default
 * temperature.
 */
const MODELS_WITH_RESTRICTED_PARAMS = ['o1', 'o3', 'o4', 'gpt-5'];

/**
 * Reasoning tokens come out of the completion budget.
 */
const REASONING_MODEL_MIN_TOKENS = 8192;

export function hasRestrictedParams(model: string): boolean {
  const lower = model.toLowerCase();
  return MODELS_WITH_RESTRICTED_PARAMS.some((prefix) => lower.startsWith(prefix));
}

export class OpenAIClient implements LLMClient {
  private client: OpenAI;
  private defaultModel: string;
  private logger = getLogger('openai');
  private onUsage?: (inputTokens: number, outputTokens: number) => void;

  constructor(options?: OpenAIClientOptions) {
    const apiKey = options?.apiKey ?? process.env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new LLMAuthError('openai');
    }

    this.client = new OpenAI({
      apiKey,
      baseURL: options?.baseURL,
    });

    this.defaultModel = options?.model ?? DEFAULT_MODELS.openai;
    this.onUsage = options?.onUsage;
  }

  getProviderInfo(): ProviderInfo {
    return {
      id: 'openai',
      name: 'OpenAI',
      supportsJSON: true,
      defaultModel: this.defaultModel,
    };
  }

  async chat(messages: Message[], options?: CompletionOptions): Promise<string> {
    const model = options?.model ?? this.defaultModel;
    const allMessages: Message[] = options?.systemPrompt
      ? [{ role: 'system', content: options.systemPrompt }, ...messages]
      : messages;
    const restricted = hasRestrictedParams(model);
    const requestedMaxTokens = options?.maxTokens ?? LLM_DEFAULTS.MAX_TOKENS;

    return withRetry(
      async () => {
        try {
          const response = await this.client.chat.completions.create(
            {
              model,
              messages: allMessages.map((m) => ({ role: m.role, content: m.content })),
              ...(restricted
                ? { max_completion_tokens: Math.max(requestedMaxTokens, REASONING_MODEL_MIN_TOKENS) }
                : {
                    max_tokens: requestedMaxTokens,
                    temperature: options?.temperature ?? LLM_DEFAULTS.TEMPERATURE,
                  }),
              response_format: options?.responseFormat === 'json' ? { type: 'json_object' } : undefined,
            },
            { signal: options?.signal }
          );

          if (response.usage) {
            this.onUsage?.(response.usage.prompt_tokens, response.usage.completion_tokens);
          }

          const message = response.choices[0]?.message;
          if (!message?.content) {
            if (message?.refusal) {
              throw new LLMRefusalError('openai', message.refusal, model);
            }
            throw new Error('No content in OpenAI response');
          }
          return message.content;
        } catch (error) {
          throw classifyProviderError(error, 'openai', model);
        }
      },
      {
        ...LLM_RETRY_OPTIONS,
        operation: 'OpenAI chat completion',
        context: { component: 'openai', metadata: { model } },
        onRetry: (error, attempt, delayMs) => {
          this.logger.debug({
            attempt,
            delayMs: Math.round(delayMs),
            error: getErrorMessage(error),
            msg: 'Retrying OpenAI API call',
          });
        },
      }
    );
  }

  async complete(prompt: string, options?: CompletionOptions): Promise<string> {
    return this.chat([{ role: 'user', content: prompt }], options);
  }
}
