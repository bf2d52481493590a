/**
 * Error types for toolscope.
 *
 * Error hierarchy:
 * - ToolscopeError (base)
 *   - LaunchError, StartupTimeoutError (process launching)
 *   - TransportError (MCP communication)
 *     - ConnectionError, ProtocolError, TransportFault, RequestTimeoutError, HttpStatusError
 *   - ToolInvocationError (tool-level failures, carried as values)
 *     - ValidationError, ToolExecutionError
 *   - LLMError (argument corrector providers)
 *   - ConfigError (configuration issues)
 */

/**
 * Error severity levels.
 */
export type ErrorSeverity = 'low' | 'medium' | 'high' | 'critical';

/**
 * Whether an error is retryable.
 */
export type RetryableStatus = 'retryable' | 'terminal' | 'unknown';

/**
 * Error context for debugging and recovery.
 */
export interface ErrorContext {
  /** Operation that failed */
  operation?: string;
  /** Component where error occurred */
  component?: string;
  /** Tool name if applicable */
  tool?: string;
  /** Scenario name if applicable */
  scenario?: string;
  /** Request ID for tracing */
  requestId?: string | number;
  /** Timing information */
  timing?: {
    startedAt: Date;
    failedAt: Date;
    durationMs: number;
  };
  /** Retry information */
  retry?: {
    attempt: number;
    maxAttempts: number;
    nextDelayMs?: number;
  };
  /** Additional metadata */
  metadata?: Record<string, unknown>;
}

interface ToolscopeErrorOptions {
  code: string;
  severity?: ErrorSeverity;
  retryable?: RetryableStatus;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base error class for all toolscope errors.
 */
export class ToolscopeError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;
  /** Error severity */
  readonly severity: ErrorSeverity;
  /** Whether this error is retryable */
  readonly retryable: RetryableStatus;
  /** Error context for debugging */
  context: ErrorContext;

  constructor(message: string, options: ToolscopeErrorOptions) {
    super(message, options.cause ? { cause: options.cause } : undefined);
    this.name = 'ToolscopeError';
    this.code = options.code;
    this.severity = options.severity ?? 'medium';
    this.retryable = options.retryable ?? 'unknown';
    this.context = options.context ?? {};

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Merge additional context into this error, keeping its class.
   */
  withContext(additionalContext: Partial<ErrorContext>): this {
    this.context = { ...this.context, ...additionalContext };
    return this;
  }

  /**
   * Convert to JSON for logging.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      severity: this.severity,
      retryable: this.retryable,
      context: this.context,
      cause: this.cause instanceof Error
        ? {
            name: this.cause.name,
            message: this.cause.message,
          }
        : undefined,
      stack: this.stack,
    };
  }
}

// =============================================================================
// Launch Errors
// =============================================================================

/**
 * The server process could not be started.
 */
export class LaunchError extends ToolscopeError {
  /** Exit code if the process exited before becoming ready */
  readonly exitCode?: number | null;
  /** Troubleshooting hints for the user */
  readonly suggestions: string[];

  constructor(
    message: string,
    options: { exitCode?: number | null; suggestions?: string[]; context?: ErrorContext; cause?: Error } = {}
  ) {
    super(message, {
      code: 'LAUNCH_FAILED',
      severity: 'critical',
      retryable: 'terminal',
      context: options.context,
      cause: options.cause,
    });
    this.name = 'LaunchError';
    this.exitCode = options.exitCode;
    this.suggestions = options.suggestions ?? [];
  }
}

/**
 * The process started but never became reachable.
 */
export class StartupTimeoutError extends ToolscopeError {
  readonly timeoutMs: number;
  readonly suggestions: string[];

  constructor(timeoutMs: number, suggestions: string[] = [], context?: ErrorContext) {
    super(`Server did not become ready within ${timeoutMs}ms`, {
      code: 'LAUNCH_STARTUP_TIMEOUT',
      severity: 'critical',
      retryable: 'terminal',
      context: { ...context, metadata: { ...context?.metadata, timeoutMs } },
    });
    this.name = 'StartupTimeoutError';
    this.timeoutMs = timeoutMs;
    this.suggestions = suggestions;
  }
}

// =============================================================================
// Transport Errors
// =============================================================================

/**
 * Base class for transport-related errors.
 */
export class TransportError extends ToolscopeError {
  constructor(message: string, options: ToolscopeErrorOptions) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/**
 * No transport could reach the target.
 */
export class ConnectionError extends TransportError {
  constructor(message: string, context?: ErrorContext, cause?: Error) {
    super(message, {
      code: 'TRANSPORT_CONNECTION_FAILED',
      severity: 'high',
      retryable: 'retryable',
      context,
      cause,
    });
    this.name = 'ConnectionError';
  }
}

/**
 * Target is reachable but does not speak the expected contract
 * (invalid envelope, missing catalog listing, failed handshake).
 */
export class ProtocolError extends TransportError {
  constructor(message: string, context?: ErrorContext, cause?: Error) {
    super(message, {
      code: 'TRANSPORT_PROTOCOL_ERROR',
      severity: 'high',
      retryable: 'terminal',
      context,
      cause,
    });
    this.name = 'ProtocolError';
  }
}

/**
 * Mid-session I/O failure. The session cannot continue and must be torn down.
 */
export class TransportFault extends TransportError {
  constructor(message: string, context?: ErrorContext, cause?: Error) {
    super(message, {
      code: 'TRANSPORT_FAULT',
      severity: 'critical',
      retryable: 'terminal',
      context,
      cause,
    });
    this.name = 'TransportFault';
  }
}

/**
 * A single request exceeded its timeout. Scoped to that request.
 */
export class RequestTimeoutError extends TransportError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number, context?: ErrorContext) {
    super(message, {
      code: 'TRANSPORT_TIMEOUT',
      severity: 'medium',
      retryable: 'retryable',
      context: { ...context, metadata: { ...context?.metadata, timeoutMs } },
    });
    this.name = 'RequestTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The server answered an HTTP request with a non-2xx status.
 */
export class HttpStatusError extends TransportError {
  readonly status: number;

  constructor(status: number, body: string, context?: ErrorContext) {
    super(`HTTP ${status}: ${body}`.trim(), {
      code: 'TRANSPORT_HTTP_STATUS',
      severity: 'medium',
      retryable: status >= 500 || status === 429 ? 'retryable' : 'terminal',
      context: { ...context, metadata: { ...context?.metadata, status } },
    });
    this.name = 'HttpStatusError';
    this.status = status;
  }
}

// =============================================================================
// Tool Invocation Errors
// =============================================================================

/**
 * Base class for tool-level failures. These are returned inside failed
 * invocation results, never thrown past the harness.
 */
export class ToolInvocationError extends ToolscopeError {
  /** JSON-RPC error code, when the server sent one */
  readonly rpcCode?: number;
  /** Raw error payload (JSON-RPC error data or tool content) */
  readonly details?: unknown;

  constructor(
    message: string,
    options: { code: string; rpcCode?: number; details?: unknown; context?: ErrorContext }
  ) {
    super(message, {
      code: options.code,
      severity: 'low',
      retryable: 'terminal',
      context: options.context,
    });
    this.name = 'ToolInvocationError';
    this.rpcCode = options.rpcCode;
    this.details = options.details;
  }
}

/**
 * The tool rejected its arguments. Eligible for one correction retry.
 */
export class ValidationError extends ToolInvocationError {
  constructor(message: string, options: { rpcCode?: number; details?: unknown; context?: ErrorContext } = {}) {
    super(message, { code: 'TOOL_VALIDATION_FAILED', ...options });
    this.name = 'ValidationError';
  }
}

/**
 * The tool failed for a reason unrelated to argument validation.
 */
export class ToolExecutionError extends ToolInvocationError {
  constructor(message: string, options: { rpcCode?: number; details?: unknown; context?: ErrorContext } = {}) {
    super(message, { code: 'TOOL_EXECUTION_FAILED', ...options });
    this.name = 'ToolExecutionError';
  }
}

// =============================================================================
// LLM Errors
// =============================================================================

/**
 * Base class for LLM-related errors.
 */
export class LLMError extends ToolscopeError {
  /** LLM provider name */
  readonly provider: string;
  /** Model name if available */
  readonly model?: string;

  constructor(
    message: string,
    provider: string,
    options: {
      code: string;
      model?: string;
      severity?: ErrorSeverity;
      retryable?: RetryableStatus;
      context?: ErrorContext;
      cause?: Error;
    }
  ) {
    super(message, {
      code: options.code,
      severity: options.severity,
      retryable: options.retryable,
      context: {
        ...options.context,
        metadata: { ...options.context?.metadata, provider, model: options.model },
      },
      cause: options.cause,
    });
    this.name = 'LLMError';
    this.provider = provider;
    this.model = options.model;
  }
}

/**
 * Authentication/API key error.
 */
export class LLMAuthError extends LLMError {
  constructor(provider: string, model?: string, cause?: Error) {
    super('LLM authentication failed - check API key', provider, {
      code: 'LLM_AUTH_FAILED',
      model,
      severity: 'critical',
      retryable: 'terminal',
      cause,
    });
    this.name = 'LLMAuthError';
  }
}

/**
 * Rate limit exceeded.
 */
export class LLMRateLimitError extends LLMError {
  /** Retry after in milliseconds if known */
  readonly retryAfterMs?: number;

  constructor(provider: string, retryAfterMs?: number, model?: string) {
    super(
      `LLM rate limit exceeded${retryAfterMs ? ` - retry after ${Math.ceil(retryAfterMs / 1000)}s` : ''}`,
      provider,
      {
        code: 'LLM_RATE_LIMITED',
        model,
        severity: 'medium',
        retryable: 'retryable',
        context: { metadata: { retryAfterMs } },
      }
    );
    this.name = 'LLMRateLimitError';
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * Quota or credits exhausted.
 */
export class LLMQuotaError extends LLMError {
  constructor(provider: string, model?: string) {
    super('LLM quota exceeded - check billing', provider, {
      code: 'LLM_QUOTA_EXCEEDED',
      model,
      severity: 'critical',
      retryable: 'terminal',
    });
    this.name = 'LLMQuotaError';
  }
}

/**
 * The model declined or its output was filtered.
 */
export class LLMRefusalError extends LLMError {
  constructor(provider: string, reason: string, model?: string) {
    super(`LLM refused request: ${reason}`, provider, {
      code: 'LLM_REFUSED',
      model,
      severity: 'medium',
      retryable: 'terminal',
    });
    this.name = 'LLMRefusalError';
  }
}

/**
 * The model output could not be parsed.
 */
export class LLMParseError extends LLMError {
  /** Raw content that failed to parse */
  readonly rawContent: string;

  constructor(provider: string, rawContent: string, model?: string, cause?: Error) {
    super('Failed to parse LLM response', provider, {
      code: 'LLM_PARSE_FAILED',
      model,
      severity: 'low',
      retryable: 'retryable',
      context: { metadata: { preview: rawContent.slice(0, 200) } },
      cause,
    });
    this.name = 'LLMParseError';
    this.rawContent = rawContent;
  }
}

/**
 * Provider endpoint unreachable.
 */
export class LLMConnectionError extends LLMError {
  constructor(provider: string, model?: string, cause?: Error) {
    super(`Failed to connect to ${provider}`, provider, {
      code: 'LLM_CONNECTION_FAILED',
      model,
      severity: 'high',
      retryable: 'retryable',
      cause,
    });
    this.name = 'LLMConnectionError';
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Configuration-related error.
 */
export class ConfigError extends ToolscopeError {
  constructor(message: string, context?: ErrorContext, cause?: Error) {
    super(message, {
      code: 'CONFIG_ERROR',
      severity: 'high',
      retryable: 'terminal',
      context,
      cause,
    });
    this.name = 'ConfigError';
  }
}

/**
 * Configuration file not found.
 */
export class ConfigNotFoundError extends ConfigError {
  /** Path that was searched */
  readonly path: string;

  constructor(path: string, context?: ErrorContext) {
    super(`Configuration file not found: ${path}`, {
      ...context,
      metadata: { ...context?.metadata, path },
    });
    this.name = 'ConfigNotFoundError';
    this.path = path;
  }
}

/**
 * Configuration validation failed.
 */
export class ConfigValidationError extends ConfigError {
  /** Validation errors */
  readonly validationErrors: string[];

  constructor(errors: string[], filePath?: string, context?: ErrorContext) {
    const location = filePath ? ` in ${filePath}` : '';
    super(`Invalid configuration${location}:\n${errors.map((e) => `  - ${e}`).join('\n')}`, {
      ...context,
      metadata: { ...context?.metadata, validationErrors: errors },
    });
    this.name = 'ConfigValidationError';
    this.validationErrors = errors;
  }
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Check if an error is a ToolscopeError.
 */
export function isToolscopeError(error: unknown): error is ToolscopeError {
  return error instanceof ToolscopeError;
}

/**
 * Check if an error is retryable.
 */
export function isRetryable(error: unknown): boolean {
  if (isToolscopeError(error)) {
    return error.retryable === 'retryable';
  }
  // For unknown errors, default to retryable for transient issues
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes('timeout') ||
      message.includes('econnreset') ||
      message.includes('econnrefused') ||
      message.includes('fetch failed') ||
      message.includes('rate limit') ||
      message.includes('429')
    );
  }
  return false;
}

/**
 * Wrap an unknown error in a ToolscopeError. ToolscopeErrors keep their class.
 */
export function wrapError(error: unknown, context?: ErrorContext): ToolscopeError {
  if (isToolscopeError(error)) {
    return context ? error.withContext(context) : error;
  }

  const originalError = toError(error);

  return new ToolscopeError(originalError.message, {
    code: 'UNKNOWN_ERROR',
    severity: 'medium',
    retryable: 'unknown',
    context,
    cause: originalError,
  });
}

/**
 * Normalize a thrown value to an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Extract error message from any error type.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Create timing context for error tracking.
 */
export function createTimingContext(startedAt: Date): ErrorContext['timing'] {
  const failedAt = new Date();
  return {
    startedAt,
    failedAt,
    durationMs: failedAt.getTime() - startedAt.getTime(),
  };
}
