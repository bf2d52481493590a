export * from './types.js';
export { withRetry, calculateDelay, LLM_RETRY_OPTIONS, CONNECT_RETRY_OPTIONS, type RetryOptions } from './retry.js';
