/**
 * Retry logic with exponential backoff.
 */

import { getLogger } from '../logging/logger.js';
import {
  LLMRateLimitError,
  ConnectionError,
  RequestTimeoutError,
  HttpStatusError,
  isRetryable,
  wrapError,
  createTimingContext,
  getErrorMessage,
  type ErrorContext,
} from './types.js';

/**
 * Retry options.
 */
export interface RetryOptions {
  /** Maximum number of attempts, including the first (default: 3) */
  maxAttempts?: number;
  /** Initial delay in milliseconds (default: 1000) */
  initialDelayMs?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs?: number;
  /** Backoff multiplier (default: 2) */
  backoffMultiplier?: number;
  /** Add jitter to delays (default: true) */
  jitter?: boolean;
  /** Custom retry condition (default: isRetryable) */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  /** Callback on retry (for logging) */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Operation name for logging */
  operation?: string;
  /** Additional context for errors */
  context?: ErrorContext;
}

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, 'shouldRetry' | 'onRetry' | 'operation' | 'context'>> = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitter: true,
};

/**
 * Calculate delay with exponential backoff and optional jitter.
 */
export function calculateDelay(
  attempt: number,
  initialDelayMs: number,
  maxDelayMs: number,
  backoffMultiplier: number,
  jitter: boolean
): number {
  // delay = initial * multiplier^(attempt - 1)
  const exponentialDelay = initialDelayMs * Math.pow(backoffMultiplier, attempt - 1);
  const clampedDelay = Math.min(exponentialDelay, maxDelayMs);

  if (jitter) {
    // +/-25% of the delay
    const jitterRange = clampedDelay * 0.25;
    const jitterAmount = Math.random() * jitterRange * 2 - jitterRange;
    return Math.max(0, clampedDelay + jitterAmount);
  }

  return clampedDelay;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute a function with retry logic.
 *
 * The final error keeps its class when it is already a ToolscopeError;
 * anything else is wrapped.
 *
 * @example
 * ```typescript
 * const reply = await withRetry(
 *   () => llm.complete(prompt),
 *   { ...LLM_RETRY_OPTIONS, operation: 'argument correction' }
 * );
 * ```
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    maxAttempts = DEFAULT_OPTIONS.maxAttempts,
    initialDelayMs = DEFAULT_OPTIONS.initialDelayMs,
    maxDelayMs = DEFAULT_OPTIONS.maxDelayMs,
    backoffMultiplier = DEFAULT_OPTIONS.backoffMultiplier,
    jitter = DEFAULT_OPTIONS.jitter,
    shouldRetry = isRetryable,
    onRetry,
    operation = 'operation',
    context,
  } = options;

  const logger = getLogger('retry');
  const startedAt = new Date();

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= maxAttempts || !shouldRetry(error, attempt)) {
        const wrappedError = wrapError(error, {
          ...context,
          operation,
          timing: createTimingContext(startedAt),
          retry: { attempt, maxAttempts },
        });

        logger.debug(
          { operation, attempt, maxAttempts, error: wrappedError.toJSON() },
          `${operation} failed after ${attempt} attempt(s)`
        );

        throw wrappedError;
      }

      // Server-provided retry-after wins, capped at maxDelayMs
      const delayMs =
        error instanceof LLMRateLimitError && error.retryAfterMs
          ? Math.min(error.retryAfterMs, maxDelayMs)
          : calculateDelay(attempt, initialDelayMs, maxDelayMs, backoffMultiplier, jitter);

      logger.debug(
        {
          operation,
          attempt,
          maxAttempts,
          delayMs: Math.round(delayMs),
          error: getErrorMessage(error),
        },
        `Retrying ${operation} in ${Math.round(delayMs)}ms`
      );

      onRetry?.(error, attempt, delayMs);

      await sleep(delayMs);
    }
  }
}

/**
 * Retry options specifically tuned for LLM calls.
 */
export const LLM_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  initialDelayMs: 2000, // LLM rate limits often need longer waits
  maxDelayMs: 60000,
  backoffMultiplier: 2,
  jitter: true,
  shouldRetry: (error) => {
    const message = getErrorMessage(error).toLowerCase();

    if (message.includes('rate limit') || message.includes('429')) {
      return true;
    }

    if (
      message.includes('econnreset') ||
      message.includes('econnrefused') ||
      message.includes('socket hang up') ||
      message.includes('fetch failed')
    ) {
      return true;
    }

    if (message.includes('timeout')) {
      return true;
    }

    if (message.includes('500') || message.includes('502') || message.includes('503')) {
      return true;
    }

    if (message.includes('401') || message.includes('unauthorized') || message.includes('api key')) {
      return false;
    }

    if (message.includes('quota') || message.includes('insufficient') || message.includes('credit')) {
      return false;
    }

    return isRetryable(error);
  },
};

/**
 * Retry options for establishing a transport connection.
 * Only reachability failures are retried; protocol errors are permanent.
 */
export const CONNECT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  initialDelayMs: 500,
  maxDelayMs: 5000,
  backoffMultiplier: 2,
  jitter: true,
  shouldRetry: (error) =>
    error instanceof ConnectionError ||
    error instanceof RequestTimeoutError ||
    (error instanceof HttpStatusError && error.retryable === 'retryable'),
};
