/**
 * Anthropic Claude LLM client implementation.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { LLMClient, Message, CompletionOptions, ProviderInfo } from './client.js';
import { DEFAULT_MODELS, classifyProviderError } from './client.js';
import { LLM_DEFAULTS } from '../constants.js';
import { withRetry, LLM_RETRY_OPTIONS } from '../errors/retry.js';
import { LLMAuthError, getErrorMessage } from '../errors/types.js';
import { getLogger } from '../logging/logger.js';

/**
 * Claude requires alternating user/assistant messages starting with user.
 */
const PLACEHOLDER_CONTINUE = 'Continue.';

type ChatTurn = { role: 'user' | 'assistant'; content: string };

export interface AnthropicClientOptions {
  /** API key (defaults to ANTHROPIC_API_KEY env var) */
  apiKey?: string;
  model?: string;
  /** Base URL for API (for proxies/alternatives) */
  baseURL?: string;
  onUsage?: (inputTokens: number, outputTokens: number) => void;
}

/**
 * Merge consecutive turns from the same role and make sure the
 * conversation opens with a user turn.
 */
export function normalizeMessageOrder(messages: ChatTurn[]): ChatTurn[] {
  const result: ChatTurn[] = [];

  for (const msg of messages) {
    const last = result[result.length - 1];
    if (!last) {
      if (msg.role === 'assistant') {
        result.push({ role: 'user', content: PLACEHOLDER_CONTINUE });
      }
      result.push({ ...msg });
    } else if (last.role === msg.role) {
      last.content += `\n\n${msg.content}`;
    } else {
      result.push({ ...msg });
    }
  }

  return result;
}

export class AnthropicClient implements LLMClient {
  private client: Anthropic;
  private defaultModel: string;
  private logger = getLogger('anthropic');
  private onUsage?: (inputTokens: number, outputTokens: number) => void;

  constructor(options?: AnthropicClientOptions) {
    const apiKey = options?.apiKey ?? process.env.ANTHROPIC_API_KEY;
    if (!apiKey) {
      throw new LLMAuthError('anthropic');
    }

    this.client = new Anthropic({
      apiKey,
      baseURL: options?.baseURL,
    });

    this.defaultModel = options?.model ?? DEFAULT_MODELS.anthropic;
    this.onUsage = options?.onUsage;
  }

  getProviderInfo(): ProviderInfo {
    return {
      id: 'anthropic',
      name: 'Anthropic Claude',
      supportsJSON: false,
      defaultModel: this.defaultModel,
    };
  }

  async chat(messages: Message[], options?: CompletionOptions): Promise<string> {
    const model = options?.model ?? this.defaultModel;

    let system = options?.systemPrompt;
    const turns: ChatTurn[] = [];
    for (const message of messages) {
      if (message.role === 'system') {
        system = system ? `${system}\n\n${message.content}` : message.content;
      } else {
        turns.push({ role: message.role, content: message.content });
      }
    }
    if (turns.length === 0) {
      throw new Error('At least one user message is required');
    }
    const normalized = normalizeMessageOrder(turns);

    return withRetry(
      async () => {
        try {
          const response = await this.client.messages.create(
            {
              model,
              max_tokens: options?.maxTokens ?? LLM_DEFAULTS.MAX_TOKENS,
              temperature: options?.temperature ?? LLM_DEFAULTS.TEMPERATURE,
              system,
              messages: normalized,
            },
            { signal: options?.signal }
          );

          this.onUsage?.(response.usage.input_tokens, response.usage.output_tokens);

          const text = response.content
            .flatMap((block) => (block.type === 'text' ? [block.text] : []))
            .join('');
          if (!text) {
            throw new Error('No text content in Claude response');
          }
          return text;
        } catch (error) {
          throw classifyProviderError(error, 'anthropic', model);
        }
      },
      {
        ...LLM_RETRY_OPTIONS,
        operation: 'Anthropic chat completion',
        context: { component: 'anthropic', metadata: { model } },
        onRetry: (error, attempt, delayMs) => {
          this.logger.debug({
            attempt,
            delayMs: Math.round(delayMs),
            error: getErrorMessage(error),
            msg: 'Retrying Anthropic API call',
          });
        },
      }
    );
  }

  async complete(prompt: string, options?: CompletionOptions): Promise<string> {
    return this.chat([{ role: 'user', content: prompt }], options);
  }
}
