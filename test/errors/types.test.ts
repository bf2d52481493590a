import { describe, it, expect } from 'vitest';
import {
  ToolscopeError,
  ConnectionError,
  ProtocolError,
  TransportFault,
  RequestTimeoutError,
  HttpStatusError,
  ValidationError,
  ToolExecutionError,
  ToolInvocationError,
  LLMRateLimitError,
  ConfigValidationError,
  StartupTimeoutError,
  isToolscopeError,
  isRetryable,
  wrapError,
  getErrorMessage,
  toError,
} from '../../src/errors/index.js';

describe('errors/types', () => {
  it('should keep the class hierarchy', () => {
    const fault = new TransportFault('stream closed');

    expect(fault).toBeInstanceOf(TransportFault);
    expect(fault).toBeInstanceOf(ToolscopeError);
    expect(fault.code).toBe('TRANSPORT_FAULT');
    expect(fault.retryable).toBe('terminal');
    expect(fault.name).toBe('TransportFault');
  });

  it('should mark validation and execution failures as tool invocation errors', () => {
    const validation = new ValidationError('bad args', { rpcCode: -32602 });
    const execution = new ToolExecutionError('boom');

    expect(validation).toBeInstanceOf(ToolInvocationError);
    expect(validation.code).toBe('TOOL_VALIDATION_FAILED');
    expect(validation.rpcCode).toBe(-32602);
    expect(execution.code).toBe('TOOL_EXECUTION_FAILED');
    expect(execution.rpcCode).toBeUndefined();
  });

  it('should classify HTTP status retryability', () => {
    expect(new HttpStatusError(503, 'unavailable').retryable).toBe('retryable');
    expect(new HttpStatusError(429, '').retryable).toBe('retryable');
    expect(new HttpStatusError(404, 'missing').retryable).toBe('terminal');
    expect(new HttpStatusError(404, 'missing').message).toBe('HTTP 404: missing');
    expect(new HttpStatusError(500, '').message).toBe('HTTP 500:');
  });

  it('should record timeouts in metadata', () => {
    const timeout = new RequestTimeoutError('Request timed out', 2500, { tool: 'search' });

    expect(timeout.timeoutMs).toBe(2500);
    expect(timeout.context.tool).toBe('search');
    expect(timeout.context.metadata).toEqual({ timeoutMs: 2500 });
    expect(new StartupTimeoutError(1000).message).toBe('Server did not become ready within 1000ms');
  });

  it('should format rate limit messages with the retry delay', () => {
    expect(new LLMRateLimitError('openai', 1500).message).toBe('LLM rate limit exceeded - retry after 2s');
    expect(new LLMRateLimitError('openai').message).toBe('LLM rate limit exceeded');
  });

  it('should list validation issues in the message', () => {
    const error = new ConfigValidationError(['timeouts.request: too small'], 'toolscope.yaml');

    expect(error.message).toBe('Invalid configuration in toolscope.yaml:\n  - timeouts.request: too small');
    expect(error.validationErrors).toEqual(['timeouts.request: too small']);
  });

  it('should serialize with toJSON', () => {
    const cause = new Error('socket closed');
    const error = new ProtocolError('bad envelope', { component: 'adapter' }, cause);
    const json = error.toJSON();

    expect(json.code).toBe('TRANSPORT_PROTOCOL_ERROR');
    expect(json.context).toEqual({ component: 'adapter' });
    expect(json.cause).toEqual({ name: 'Error', message: 'socket closed' });
  });

  describe('isRetryable', () => {
    it('should follow the retryable status of toolscope errors', () => {
      expect(isRetryable(new ConnectionError('refused'))).toBe(true);
      expect(isRetryable(new ProtocolError('bad'))).toBe(false);
    });

    it('should recognize transient plain errors by message', () => {
      expect(isRetryable(new Error('read ECONNRESET'))).toBe(true);
      expect(isRetryable(new Error('invalid input'))).toBe(false);
      expect(isRetryable('timeout')).toBe(false);
    });
  });

  describe('wrapError', () => {
    it('should keep toolscope errors and merge context', () => {
      const original = new ConnectionError('refused');
      const wrapped = wrapError(original, { operation: 'connect' });

      expect(wrapped).toBe(original);
      expect(wrapped.context.operation).toBe('connect');
    });

    it('should wrap foreign values', () => {
      const wrapped = wrapError('plain failure');

      expect(isToolscopeError(wrapped)).toBe(true);
      expect(wrapped.code).toBe('UNKNOWN_ERROR');
      expect(wrapped.message).toBe('plain failure');
    });
  });

  it('should normalize unknown values', () => {
    expect(getErrorMessage(new Error('x'))).toBe('x');
    expect(getErrorMessage(42)).toBe('42');
    expect(toError('y').message).toBe('y');
  });
});
