export type { LLMClient, Message, CompletionOptions, ProviderInfo, LLMConfig, LLMProviderId } from './client.js';
export { DEFAULT_MODELS, parseJSONResponse, classifyProviderError } from './client.js';

export { OpenAIClient } from './openai.js';
export type { OpenAIClientOptions } from './openai.js';

export { AnthropicClient } from './anthropic.js';
export type { AnthropicClientOptions } from './anthropic.js';

export { createLLMClient, detectProvider, getSupportedProviders } from './factory.js';
