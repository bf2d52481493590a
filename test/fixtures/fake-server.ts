/**
 * An MCP server living entirely inside the test process, reached through a
 * BaseTransport. Replies are delivered on a timer so they arrive
 * asynchronously, like real ones.
 */

import { BaseTransport } from '../../src/transport/base-transport.js';
import {
  isRequest,
  type JSONRPCError,
  type JSONRPCMessage,
  type JSONRPCRequest,
  type JSONRPCResponse,
  type MCPTool,
} from '../../src/transport/types.js';
import { ConnectionError } from '../../src/errors/index.js';
import { isRecord } from '../../src/utils/json.js';

/**
 * What a tool does when called: reply with a result or a JSON-RPC error,
 * never answer, or drop the connection.
 */
export type ToolReply =
  | { result: unknown; delayMs?: number }
  | { error: JSONRPCError; delayMs?: number }
  | { hang: true }
  | { close: true };

export interface FakeTool extends MCPTool {
  reply?: (args: Record<string, unknown>) => ToolReply;
}

export interface FakeServerOptions {
  tools?: FakeTool[];
  /** Null leaves serverInfo out of the initialize result */
  serverInfo?: { name: string; version: string } | null;
  protocolVersion?: string;
  /** Tools per tools/list page (default: all on one page) */
  pageSize?: number;
  /** Error reply to initialize */
  initializeError?: JSONRPCError;
  /** Error reply to tools/list */
  listError?: JSONRPCError;
  /** Number of connect() calls that fail before one succeeds */
  failConnects?: number;
}

export function textResult(text: string): { result: unknown } {
  return { result: { content: [{ type: 'text', text }] } };
}

export class FakeServerTransport extends BaseTransport {
  /** Everything the client sent, in order */
  readonly sent: JSONRPCMessage[] = [];
  /** tools/call arguments per tool, in arrival order */
  readonly calls: Array<{ name: string; args: Record<string, unknown> }> = [];
  connectAttempts = 0;
  closeCount = 0;
  negotiatedVersion: string | null = null;
  inFlight = 0;
  maxInFlight = 0;

  private connected = false;
  private failConnects: number;
  private readonly options: FakeServerOptions;

  constructor(options: FakeServerOptions = {}) {
    super({ timeout: 1000 });
    this.options = options;
    this.failConnects = options.failConnects ?? 0;
  }

  async connect(): Promise<void> {
    this.connectAttempts++;
    if (this.failConnects > 0) {
      this.failConnects--;
      throw new ConnectionError('connection refused');
    }
    this.connected = true;
  }

  async send(message: JSONRPCMessage): Promise<void> {
    if (!this.connected) {
      throw new ConnectionError('not connected');
    }
    this.sent.push(message);
    if (isRequest(message)) {
      this.handle(message);
    }
  }

  close(): void {
    this.closeCount++;
    this.connected = false;
  }

  isConnected(): boolean {
    return this.connected;
  }

  override setNegotiatedVersion(version: string): void {
    this.negotiatedVersion = version;
  }

  /** Simulate the server dropping the connection. */
  peerClose(): void {
    this.connected = false;
    this.emit('close');
  }

  /** Deliver a message from the server. */
  deliver(message: JSONRPCMessage): void {
    this.emit('message', message);
  }

  private handle(request: JSONRPCRequest): void {
    switch (request.method) {
      case 'initialize':
        this.reply(
          request,
          this.options.initializeError
            ? { error: this.options.initializeError }
            : {
                result: {
                  protocolVersion: this.options.protocolVersion ?? '2025-11-25',
                  capabilities: { tools: {} },
                  ...(this.options.serverInfo === null
                    ? {}
                    : { serverInfo: this.options.serverInfo ?? { name: 'fake-server', version: '1.0.0' } }),
                },
              }
        );
        return;
      case 'tools/list':
        this.reply(request, this.options.listError ? { error: this.options.listError } : { result: this.listPage(request) });
        return;
      case 'tools/call':
        this.callTool(request);
        return;
      default:
        this.reply(request, { error: { code: -32601, message: `Method not found: ${request.method}` } });
    }
  }

  private listPage(request: JSONRPCRequest): unknown {
    const tools = (this.options.tools ?? []).map(({ reply: _reply, ...tool }) => tool);
    const pageSize = this.options.pageSize ?? (tools.length || 1);
    const cursor = isRecord(request.params) && typeof request.params.cursor === 'string' ? request.params.cursor : '0';
    const start = Number(cursor);
    const end = start + pageSize;
    return end < tools.length
      ? { tools: tools.slice(start, end), nextCursor: String(end) }
      : { tools: tools.slice(start, end) };
  }

  private callTool(request: JSONRPCRequest): void {
    const params = isRecord(request.params) ? request.params : {};
    const name = typeof params.name === 'string' ? params.name : '';
    const args = isRecord(params.arguments) ? params.arguments : {};
    this.calls.push({ name, args });

    const tool = this.options.tools?.find((candidate) => candidate.name === name);
    if (!tool) {
      this.reply(request, { error: { code: -32602, message: `Unknown tool: ${name}` } });
      return;
    }

    const outcome = tool.reply?.(args) ?? textResult('ok');
    if ('close' in outcome) {
      setTimeout(() => this.peerClose(), 0);
      return;
    }
    if ('hang' in outcome) {
      return;
    }

    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    this.reply(request, outcome, () => {
      this.inFlight--;
    });
  }

  private reply(
    request: JSONRPCRequest,
    outcome: { result: unknown; delayMs?: number } | { error: JSONRPCError; delayMs?: number },
    onSent?: () => void
  ): void {
    const response: JSONRPCResponse =
      'error' in outcome
        ? { jsonrpc: '2.0', id: request.id, error: outcome.error }
        : { jsonrpc: '2.0', id: request.id, result: outcome.result };

    setTimeout(() => {
      onSent?.();
      if (this.connected) {
        this.emit('message', response);
      }
    }, outcome.delayMs ?? 0);
  }
}
