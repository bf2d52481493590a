import {
  isRequest,
  isResponse,
  mcpInitializeResultSchema,
  mcpToolCallResultSchema,
  mcpToolsListResultSchema,
  type InvocationResult,
  type JSONRPCError,
  type JSONRPCMessage,
  type JSONRPCRequest,
  type JSONRPCResponse,
  type MCPContentBlock,
  type MCPTool,
  type Operation,
  type OperationInputSchema,
  type ServerIdentity,
} from './types.js';
import type { BaseTransport } from './base-transport.js';
import { JSONRPC_ERROR_CODES, MCP, TIMEOUTS, VALIDATION_ERROR_PATTERNS } from '../constants.js';
import {
  ConnectionError,
  ProtocolError,
  RequestTimeoutError,
  ToolExecutionError,
  TransportFault,
  ValidationError,
  getErrorMessage,
  toError,
  type ToolInvocationError,
} from '../errors/types.js';
import { CONNECT_RETRY_OPTIONS, withRetry, type RetryOptions } from '../errors/retry.js';
import { getLogger } from '../logging/logger.js';
import { isRecord } from '../utils/json.js';
import { measurePayload } from '../utils/tokens.js';
import { CLIENT_INFO } from '../version.js';

/**
 * The four operations every transport variant supports.
 */
export interface TransportAdapter {
  /** Open the session and complete the handshake. */
  connect(): Promise<ServerIdentity>;
  /** Fetch the full operation catalog. */
  discover(): Promise<Operation[]>;
  /**
   * Call one operation. Tool-level failures come back as failed results;
   * only transport-level problems reject.
   */
  invoke(operation: Operation, args: Record<string, unknown>): Promise<InvocationResult>;
  /** Release the session. Safe to call more than once. */
  close(): Promise<void>;
}

export interface JsonRpcAdapterOptions {
  /** Per-request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Called once when the session fails mid-run */
  onFault?: (fault: TransportFault) => void;
  /** Retry policy for the connect handshake */
  connectRetry?: RetryOptions;
}

interface PendingRequest {
  method: string;
  resolve: (response: JSONRPCResponse) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

/**
 * Whether an error text reads like an argument validation failure.
 */
export function isValidationMessage(text: string): boolean {
  return VALIDATION_ERROR_PATTERNS.some((pattern) => pattern.test(text));
}

/**
 * Classify a JSON-RPC error reply to tools/call.
 */
export function classifyRpcError(error: JSONRPCError, operation: string): ToolInvocationError {
  const options = { rpcCode: error.code, details: error.data, context: { tool: operation } };
  if (error.code === JSONRPC_ERROR_CODES.INVALID_PARAMS || isValidationMessage(error.message)) {
    return new ValidationError(error.message, options);
  }
  return new ToolExecutionError(error.message, options);
}

/**
 * Classify a tool result flagged with `isError`.
 */
export function classifyToolError(content: MCPContentBlock[], operation: string): ToolInvocationError {
  const text = content
    .map((block) => (block.type === 'text' && typeof block.text === 'string' ? block.text : ''))
    .filter((part) => part !== '')
    .join('\n');
  const message = text || 'Tool reported an error without a message';
  const options = { details: content, context: { tool: operation } };
  return isValidationMessage(message)
    ? new ValidationError(message, options)
    : new ToolExecutionError(message, options);
}

/**
 * Bring a listed input schema into the shape the synthesizer expects:
 * an object schema with `properties` and `required` always present.
 */
export function normalizeInputSchema(schema: Record<string, unknown> | undefined): OperationInputSchema {
  const source = schema ?? {};
  const properties = isRecord(source.properties) ? source.properties : {};
  const required = Array.isArray(source.required)
    ? source.required.filter((name): name is string => typeof name === 'string')
    : [];

  return {
    ...source,
    type: typeof source.type === 'string' ? source.type : 'object',
    properties,
    required,
  };
}

function toOperation(tool: MCPTool): Operation {
  return Object.freeze({
    name: tool.name,
    description: tool.description ?? '',
    inputSchema: normalizeInputSchema(tool.inputSchema),
  });
}

/**
 * JSON-RPC session over any wire transport.
 *
 * Requests get increasing numeric ids and are matched to replies by id,
 * so replies may arrive in any order. A peer close or stream failure
 * becomes a TransportFault: every pending request is rejected with it,
 * later requests fail fast, and `onFault` fires once.
 */
export class JsonRpcAdapter implements TransportAdapter {
  private readonly logger = getLogger('adapter');
  private readonly pending = new Map<number, PendingRequest>();
  private readonly timeout: number;
  private readonly onFault?: (fault: TransportFault) => void;
  private readonly connectRetry: RetryOptions;
  private nextId = 0;
  private identity: ServerIdentity | null = null;
  private fault: TransportFault | null = null;
  private closed = false;

  private readonly onMessage = (message: JSONRPCMessage): void => {
    if (isRequest(message)) {
      this.answerServerRequest(message);
      return;
    }
    if (!isResponse(message)) {
      this.logger.debug({ method: message.method }, 'Ignoring server notification');
      return;
    }

    const id = message.id;
    const entry = typeof id === 'number' ? this.pending.get(id) : undefined;
    if (!entry || typeof id !== 'number') {
      this.logger.warn({ id }, 'Dropping response with no matching request');
      return;
    }
    clearTimeout(entry.timer);
    this.pending.delete(id);
    entry.resolve(message);
  };

  private readonly onClose = (): void => {
    this.handleFault(new TransportFault('Server closed the connection', { component: 'adapter' }));
  };

  private readonly onError = (error: Error): void => {
    this.handleFault(
      error instanceof TransportFault
        ? error
        : new TransportFault(`Transport failed: ${error.message}`, { component: 'adapter' }, error)
    );
  };

  constructor(
    private readonly transport: BaseTransport,
    options: JsonRpcAdapterOptions = {}
  ) {
    this.timeout = options.timeout ?? TIMEOUTS.DEFAULT;
    this.onFault = options.onFault;
    this.connectRetry = options.connectRetry ?? CONNECT_RETRY_OPTIONS;

    transport.on('message', this.onMessage);
    transport.on('close', this.onClose);
    transport.on('error', this.onError);
  }

  async connect(): Promise<ServerIdentity> {
    if (this.identity) {
      return this.identity;
    }

    let response: JSONRPCResponse;
    try {
      response = await withRetry(
        async () => {
          await this.transport.connect();
          return this.request('initialize', {
            protocolVersion: MCP.PROTOCOL_VERSION,
            capabilities: {},
            clientInfo: CLIENT_INFO,
          });
        },
        { ...this.connectRetry, operation: 'initialize' }
      );
    } catch (error) {
      throw this.asConnectError(error);
    }

    if (response.error) {
      throw new ProtocolError(
        `Server rejected initialize: ${response.error.message} (code: ${response.error.code})`,
        { component: 'adapter', operation: 'initialize' }
      );
    }
    const parsed = mcpInitializeResultSchema.safeParse(response.result);
    if (!parsed.success) {
      throw new ProtocolError('Server returned a malformed initialize result', {
        component: 'adapter',
        operation: 'initialize',
        metadata: { issues: parsed.error.issues.map((issue) => issue.message) },
      });
    }

    const result = parsed.data;
    try {
      await this.transport.send({ jsonrpc: MCP.JSONRPC_VERSION, method: 'notifications/initialized' });
    } catch (error) {
      throw this.asConnectError(error);
    }
    this.transport.setNegotiatedVersion(result.protocolVersion);

    this.identity = {
      name: result.serverInfo?.name ?? 'unknown',
      version: result.serverInfo?.version ?? 'unknown',
      protocolVersion: result.protocolVersion,
    };
    this.logger.info({ server: this.identity }, 'Session initialized');
    return this.identity;
  }

  async discover(): Promise<Operation[]> {
    this.assertReady();

    const operations: Operation[] = [];
    const seen = new Set<string>();
    let cursor: string | undefined;

    for (let page = 0; page < MCP.MAX_CATALOG_PAGES; page++) {
      const response = await this.request('tools/list', cursor ? { cursor } : {});
      if (response.error) {
        if (response.error.code === JSONRPC_ERROR_CODES.METHOD_NOT_FOUND) {
          throw new ProtocolError('Server does not implement tools/list', {
            component: 'adapter',
            operation: 'tools/list',
          });
        }
        throw new ProtocolError(
          `tools/list failed: ${response.error.message} (code: ${response.error.code})`,
          { component: 'adapter', operation: 'tools/list' }
        );
      }

      const parsed = mcpToolsListResultSchema.safeParse(response.result);
      if (!parsed.success) {
        throw new ProtocolError('Server returned a malformed tools/list result', {
          component: 'adapter',
          operation: 'tools/list',
          metadata: { issues: parsed.error.issues.map((issue) => issue.message) },
        });
      }

      for (const tool of parsed.data.tools) {
        if (seen.has(tool.name)) {
          this.logger.warn({ tool: tool.name }, 'Skipping duplicate tool name');
          continue;
        }
        seen.add(tool.name);
        operations.push(toOperation(tool));
      }

      cursor = parsed.data.nextCursor;
      if (!cursor) {
        return operations;
      }
    }

    this.logger.warn({ pages: MCP.MAX_CATALOG_PAGES }, 'Stopped following tools/list pages');
    return operations;
  }

  async invoke(operation: Operation, args: Record<string, unknown>): Promise<InvocationResult> {
    this.assertReady();

    const startedAt = Date.now();
    const response = await this.request('tools/call', { name: operation.name, arguments: args });
    const elapsedMs = Date.now() - startedAt;

    if (response.error) {
      return { ok: false, operation: operation.name, error: classifyRpcError(response.error, operation.name), elapsedMs };
    }

    const parsed = mcpToolCallResultSchema.safeParse(response.result);
    if (!parsed.success) {
      throw new ProtocolError(`Malformed tools/call result from ${operation.name}`, {
        component: 'adapter',
        tool: operation.name,
      });
    }
    if (parsed.data.isError) {
      return {
        ok: false,
        operation: operation.name,
        error: classifyToolError(parsed.data.content, operation.name),
        elapsedMs,
      };
    }

    const { sizeBytes, tokenEstimate } = measurePayload(response.result);
    return { ok: true, operation: operation.name, response: response.result, elapsedMs, sizeBytes, tokenEstimate };
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.rejectPending(new ConnectionError('Session closed', { component: 'adapter' }));
    this.transport.off('message', this.onMessage);
    this.transport.off('close', this.onClose);
    this.transport.off('error', this.onError);
    this.transport.close();
  }

  /**
   * The fault that ended the session, if any.
   */
  getFault(): TransportFault | null {
    return this.fault;
  }

  private assertReady(): void {
    if (this.fault) {
      throw this.fault;
    }
    if (this.closed || !this.identity) {
      throw new ConnectionError('Session is not connected', { component: 'adapter' });
    }
  }

  private request(method: string, params?: unknown): Promise<JSONRPCResponse> {
    if (this.fault) {
      return Promise.reject(this.fault);
    }
    if (this.closed) {
      return Promise.reject(new ConnectionError('Session closed', { component: 'adapter' }));
    }

    const id = ++this.nextId;
    const message: JSONRPCRequest = { jsonrpc: MCP.JSONRPC_VERSION, id, method, params };

    return new Promise<JSONRPCResponse>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        reject(
          new RequestTimeoutError(`Request ${method} timed out after ${this.timeout}ms`, this.timeout, {
            component: 'adapter',
            operation: method,
          })
        );
      }, this.timeout);
      this.pending.set(id, { method, resolve, reject, timer });

      this.transport.send(message).catch((error: unknown) => {
        if (error instanceof TransportFault) {
          this.handleFault(error);
          return;
        }
        const entry = this.pending.get(id);
        if (!entry) return;
        clearTimeout(entry.timer);
        this.pending.delete(id);
        entry.reject(toError(error));
      });
    });
  }

  private answerServerRequest(request: JSONRPCRequest): void {
    const reply: JSONRPCResponse =
      request.method === 'ping'
        ? { jsonrpc: MCP.JSONRPC_VERSION, id: request.id, result: {} }
        : {
            jsonrpc: MCP.JSONRPC_VERSION,
            id: request.id,
            error: { code: JSONRPC_ERROR_CODES.METHOD_NOT_FOUND, message: `Method not supported: ${request.method}` },
          };

    this.transport.send(reply).catch((error: unknown) => {
      this.logger.warn({ method: request.method, error: getErrorMessage(error) }, 'Failed to answer server request');
    });
  }

  private handleFault(fault: TransportFault): void {
    if (this.fault || this.closed) {
      return;
    }
    this.fault = fault;
    this.logger.error({ error: fault.message, pending: this.pending.size }, 'Session failed');
    this.rejectPending(fault);
    this.onFault?.(fault);
  }

  private rejectPending(error: Error): void {
    for (const entry of this.pending.values()) {
      clearTimeout(entry.timer);
      entry.reject(error);
    }
    this.pending.clear();
  }

  private asConnectError(error: unknown): Error {
    if (error instanceof ProtocolError || error instanceof ConnectionError) {
      return error;
    }
    return new ConnectionError(
      `Could not reach server: ${getErrorMessage(error)}`,
      { component: 'adapter', operation: 'initialize' },
      toError(error)
    );
  }
}
