/**
 * LLM provider factory - creates and auto-detects providers.
 */

import type { LLMClient, LLMConfig, LLMProviderId } from './client.js';
import { OpenAIClient } from './openai.js';
import { AnthropicClient } from './anthropic.js';
import { ConfigError } from '../errors/types.js';

const DEFAULT_KEY_VARS: Record<LLMProviderId, string> = {
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
};

export function createLLMClient(config: LLMConfig, env: NodeJS.ProcessEnv = process.env): LLMClient {
  const apiKey = resolveApiKey(config, env);
  const options = { apiKey, model: config.model, baseURL: config.baseUrl, onUsage: config.onUsage };

  switch (config.provider) {
    case 'openai':
      return new OpenAIClient(options);
    case 'anthropic':
      return new AnthropicClient(options);
  }
}

function resolveApiKey(config: LLMConfig, env: NodeJS.ProcessEnv): string | undefined {
  if (config.apiKey) {
    return config.apiKey;
  }
  if (config.apiKeyEnvVar) {
    const key = env[config.apiKeyEnvVar];
    if (!key) {
      throw new ConfigError(`Environment variable ${config.apiKeyEnvVar} is not set`);
    }
    return key;
  }
  return env[DEFAULT_KEY_VARS[config.provider]];
}

/**
 * Provider with a key in the environment; Anthropic wins when both are set.
 */
export function detectProvider(env: NodeJS.ProcessEnv = process.env): LLMProviderId | null {
  if (env.ANTHROPIC_API_KEY) {
    return 'anthropic';
  }
  if (env.OPENAI_API_KEY) {
    return 'openai';
  }
  return null;
}

export function getSupportedProviders(): LLMProviderId[] {
  return ['anthropic', 'openai'];
}
