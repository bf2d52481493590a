import { parseJsonRpcMessage, type JSONRPCMessage } from './types.js';
import { BaseTransport, type BaseTransportConfig } from './base-transport.js';
import { SseParser } from './sse-parser.js';
import { MCP, LIMITS } from '../constants.js';
import {
  ConnectionError,
  HttpStatusError,
  ProtocolError,
  RequestTimeoutError,
  getErrorMessage,
  toError,
} from '../errors/types.js';
import { tryParseJson } from '../utils/json.js';
import { USER_AGENT } from '../version.js';

/**
 * Configuration for HTTP Transport.
 */
export interface HTTPTransportConfig extends BaseTransportConfig {
  /** JSON-RPC endpoint of the server (e.g., https://api.example.com/mcp) */
  url: string;
  /** Optional session ID to resume */
  sessionId?: string;
  /** Custom headers to include in requests */
  headers?: Record<string, string>;
}

/**
 * HTTPTransport sends each JSON-RPC message as its own POST request.
 *
 * The reply comes back in the response body, either as JSON or as a short
 * event stream, and is emitted as 'message' events before send() resolves.
 * A non-2xx status or an unparseable body rejects that send() only.
 */
export class HTTPTransport extends BaseTransport {
  private connected = false;
  private readonly inFlight = new Set<AbortController>();
  private readonly url: string;
  private sessionId?: string;
  private readonly customHeaders: Record<string, string>;
  private negotiatedVersion?: string;

  constructor(config: HTTPTransportConfig) {
    super(config);
    this.url = config.url;
    this.sessionId = config.sessionId;
    this.customHeaders = config.headers ?? {};
  }

  /**
   * Build request headers, including session ID and protocol version.
   */
  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'application/json, text/event-stream',
      'User-Agent': USER_AGENT,
      'MCP-Protocol-Version': this.negotiatedVersion ?? MCP.PROTOCOL_VERSION,
      ...this.customHeaders,
    };

    if (this.sessionId) {
      headers['Mcp-Session-Id'] = this.sessionId;
    }

    return headers;
  }

  /**
   * There is no persistent connection over plain HTTP; this only arms the transport.
   */
  async connect(): Promise<void> {
    this.log('Initializing HTTP transport', { url: this.url });
    this.connected = true;
  }

  /**
   * Use the protocol version agreed during initialize on later requests.
   */
  override setNegotiatedVersion(version: string): void {
    this.negotiatedVersion = version;
  }

  getSessionId(): string | undefined {
    return this.sessionId;
  }

  async send(message: JSONRPCMessage): Promise<void> {
    if (!this.connected) {
      throw new ConnectionError('HTTP transport is not connected', { component: 'http-transport' });
    }

    this.log('Sending message', { message });

    const controller = new AbortController();
    this.inFlight.add(controller);
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeout);

    try {
      const response = await fetch(this.url, {
        method: 'POST',
        headers: this.buildHeaders(),
        body: JSON.stringify(message),
        signal: controller.signal,
      });

      if (!response.ok) {
        // An expired session is reported as 404; start a new one next time
        if (response.status === 404 && this.sessionId) {
          this.log('Session expired (404), clearing session ID');
          this.sessionId = undefined;
        }
        const errorText = await response.text().catch(() => '');
        throw new HttpStatusError(response.status, errorText.slice(0, LIMITS.STDERR_TAIL), {
          component: 'http-transport',
          metadata: { url: this.url },
        });
      }

      const responseSessionId = response.headers.get('Mcp-Session-Id');
      if (responseSessionId && !this.sessionId) {
        this.log('Captured session ID from server', { sessionId: responseSessionId });
        this.sessionId = responseSessionId;
      }

      // Accepted notifications carry no body
      if (response.status === 202 || response.status === 204) {
        return;
      }

      const contentType = response.headers.get('content-type') ?? '';
      if (contentType.includes('text/event-stream')) {
        await this.readEventStream(response);
        return;
      }

      const text = await response.text();
      if (text.trim() === '') {
        return;
      }
      this.emitBody(text);
    } catch (error) {
      if (error instanceof HttpStatusError || error instanceof ProtocolError) {
        throw error;
      }
      if (timedOut) {
        throw new RequestTimeoutError(`HTTP request timed out after ${this.timeout}ms`, this.timeout, {
          component: 'http-transport',
        });
      }
      if (!this.connected) {
        throw new ConnectionError('HTTP transport closed', { component: 'http-transport' }, toError(error));
      }
      throw new ConnectionError(
        `HTTP request to ${this.url} failed: ${getErrorMessage(error)}`,
        { component: 'http-transport' },
        toError(error)
      );
    } finally {
      clearTimeout(timer);
      this.inFlight.delete(controller);
    }
  }

  /**
   * Parse a JSON body (single message or batch) and emit its messages.
   */
  private emitBody(text: string): void {
    const parsed = tryParseJson(text);
    if (parsed === undefined) {
      throw new ProtocolError('Server returned a body that is not valid JSON', {
        component: 'http-transport',
        metadata: { preview: text.slice(0, LIMITS.PREVIEW_LENGTH) },
      });
    }

    const items = Array.isArray(parsed) ? parsed : [parsed];
    for (const item of items) {
      const message = parseJsonRpcMessage(item);
      if (!message) {
        throw new ProtocolError('Server returned a malformed JSON-RPC envelope', {
          component: 'http-transport',
          metadata: { preview: text.slice(0, LIMITS.PREVIEW_LENGTH) },
        });
      }
      this.emit('message', message);
    }
  }

  /**
   * Read a streamed reply (text/event-stream) to its end.
   * The request timeout still applies while the body is read.
   */
  private async readEventStream(response: Response): Promise<void> {
    const reader = response.body?.getReader();
    if (!reader) {
      return;
    }

    const decoder = new TextDecoder();
    const parser = new SseParser();

    try {
      for (;;) {
        const { value, done } = await reader.read();
        if (done) break;
        for (const event of parser.push(decoder.decode(value, { stream: true }))) {
          this.emitStreamEvent(event.event, event.data);
        }
      }
      for (const event of parser.end()) {
        this.emitStreamEvent(event.event, event.data);
      }
    } finally {
      reader.releaseLock();
    }
  }

  private emitStreamEvent(type: string, data: string): void {
    if (type !== 'message') {
      return;
    }
    const message = parseJsonRpcMessage(tryParseJson(data));
    if (!message) {
      this.logger.warn({ preview: data.slice(0, LIMITS.PREVIEW_LENGTH) }, 'Skipping invalid event-stream message');
      return;
    }
    this.emit('message', message);
  }

  /**
   * Close the HTTP transport, aborting requests still in flight.
   */
  close(): void {
    if (!this.connected) {
      return;
    }
    this.log('Closing HTTP transport');
    this.connected = false;

    for (const controller of this.inFlight) {
      controller.abort();
    }
    this.inFlight.clear();
  }

  isConnected(): boolean {
    return this.connected;
  }
}
