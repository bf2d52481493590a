import { parseJsonRpcMessage, type JSONRPCMessage } from './types.js';
import { BaseTransport, type BaseTransportConfig } from './base-transport.js';
import { SseParser, type SseEvent } from './sse-parser.js';
import { LIMITS } from '../constants.js';
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
 * Configuration for SSE Transport.
 */
export interface SSETransportConfig extends BaseTransportConfig {
  /** URL of the event stream (e.g., https://api.example.com/sse) */
  url: string;
  /** Custom headers to include in requests */
  headers?: Record<string, string>;
}

interface StreamReader {
  read(): Promise<{ done: boolean; value?: Uint8Array }>;
}

interface EndpointWaiter {
  resolve: () => void;
  reject: (error: Error) => void;
}

/**
 * SSETransport holds one long-lived event stream open and posts requests
 * to the endpoint the server announces on it.
 *
 * Responses arrive as `message` events in any order; the adapter matches
 * them by id. Comments and other event types are ignored. The stream
 * ending is reported as 'close'.
 *
 * The stream is read through fetch rather than EventSource, which Node.js
 * does not provide and which cannot send custom headers.
 */
export class SSETransport extends BaseTransport {
  private connected = false;
  private closing = false;
  private readonly url: string;
  private readonly customHeaders: Record<string, string>;
  private streamController: AbortController | null = null;
  private readonly inFlight = new Set<AbortController>();
  private messageEndpoint: string | null = null;
  private endpointWaiter: EndpointWaiter | null = null;
  private pumping: Promise<void> | null = null;

  constructor(config: SSETransportConfig) {
    super(config);
    this.url = config.url;
    this.customHeaders = config.headers ?? {};
  }

  /**
   * Open the event stream and wait for the server's `endpoint` event.
   */
  async connect(): Promise<void> {
    if (this.connected) {
      return;
    }
    this.closing = false;
    this.log('Connecting to SSE endpoint', { url: this.url });

    const controller = new AbortController();
    this.streamController = controller;
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeout);

    try {
      const response = await fetch(this.url, {
        method: 'GET',
        headers: {
          Accept: 'text/event-stream',
          'Cache-Control': 'no-cache',
          'User-Agent': USER_AGENT,
          ...this.customHeaders,
        },
        signal: controller.signal,
      });

      if (!response.ok) {
        const body = await response.text().catch(() => '');
        throw new HttpStatusError(response.status, body.slice(0, LIMITS.STDERR_TAIL), {
          component: 'sse-transport',
          metadata: { url: this.url },
        });
      }

      const reader = response.body?.getReader();
      if (!reader) {
        throw new ProtocolError('Event stream response has no body', { component: 'sse-transport' });
      }

      const endpointReady = new Promise<void>((resolve, reject) => {
        this.endpointWaiter = { resolve, reject };
      });
      this.pumping = this.pump(reader);
      await endpointReady;

      this.connected = true;
      this.log('SSE connection established', { endpoint: this.messageEndpoint });
    } catch (error) {
      controller.abort();
      this.streamController = null;
      if (error instanceof HttpStatusError || error instanceof ProtocolError) {
        throw error;
      }
      if (timedOut) {
        throw new ConnectionError(
          `No endpoint event from ${this.url} within ${this.timeout}ms`,
          { component: 'sse-transport' },
          toError(error)
        );
      }
      if (error instanceof ConnectionError) {
        throw error;
      }
      throw new ConnectionError(
        `Failed to open event stream at ${this.url}: ${getErrorMessage(error)}`,
        { component: 'sse-transport' },
        toError(error)
      );
    } finally {
      clearTimeout(timer);
      this.endpointWaiter = null;
    }
  }

  /**
   * Read the stream until it ends. Never rejects.
   */
  private async pump(reader: StreamReader): Promise<void> {
    const decoder = new TextDecoder();
    const parser = new SseParser();

    try {
      for (;;) {
        const { value, done } = await reader.read();
        if (done) break;
        for (const event of parser.push(decoder.decode(value, { stream: true }))) {
          this.handleEvent(event);
        }
      }
      for (const event of parser.end()) {
        this.handleEvent(event);
      }
      this.onStreamEnded(null);
    } catch (error) {
      this.onStreamEnded(toError(error));
    }
  }

  private handleEvent(event: SseEvent): void {
    switch (event.event) {
      case 'endpoint': {
        this.messageEndpoint = new URL(event.data.trim(), this.url).toString();
        this.endpointWaiter?.resolve();
        break;
      }
      case 'message': {
        const message = parseJsonRpcMessage(tryParseJson(event.data));
        if (!message) {
          this.logger.warn(
            { preview: event.data.slice(0, LIMITS.PREVIEW_LENGTH) },
            'Skipping invalid event-stream message'
          );
          return;
        }
        this.emit('message', message);
        break;
      }
      default:
        this.log('Ignoring event', { event: event.event });
    }
  }

  private onStreamEnded(error: Error | null): void {
    const wasConnected = this.connected;
    this.connected = false;

    if (this.endpointWaiter) {
      this.endpointWaiter.reject(
        new ConnectionError('Event stream ended before the endpoint event', { component: 'sse-transport' }, error ?? undefined)
      );
      return;
    }

    if (this.closing || !wasConnected) {
      return;
    }

    if (error) {
      this.emit('error', error);
    } else {
      this.emit('close');
    }
  }

  /**
   * POST a message to the announced endpoint.
   */
  async send(message: JSONRPCMessage): Promise<void> {
    if (!this.connected || !this.messageEndpoint) {
      throw new ConnectionError('SSE transport is not connected', { component: 'sse-transport' });
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
      const response = await fetch(this.messageEndpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'User-Agent': USER_AGENT,
          ...this.customHeaders,
        },
        body: JSON.stringify(message),
        signal: controller.signal,
      });

      if (!response.ok) {
        const body = await response.text().catch(() => '');
        throw new HttpStatusError(response.status, body.slice(0, LIMITS.STDERR_TAIL), {
          component: 'sse-transport',
        });
      }

      // 202/204: the reply arrives on the stream
      if (response.status === 202 || response.status === 204) {
        return;
      }

      const contentType = response.headers.get('content-type') ?? '';
      const text = await response.text();
      if (!contentType.includes('application/json') || text.trim() === '') {
        return;
      }

      const reply = parseJsonRpcMessage(tryParseJson(text));
      if (!reply) {
        throw new ProtocolError('Server returned a malformed JSON-RPC envelope', {
          component: 'sse-transport',
          metadata: { preview: text.slice(0, LIMITS.PREVIEW_LENGTH) },
        });
      }
      this.emit('message', reply);
    } catch (error) {
      if (error instanceof HttpStatusError || error instanceof ProtocolError) {
        throw error;
      }
      if (timedOut) {
        throw new RequestTimeoutError(`SSE post timed out after ${this.timeout}ms`, this.timeout, {
          component: 'sse-transport',
        });
      }
      throw new ConnectionError(
        `Failed to post to ${this.messageEndpoint}: ${getErrorMessage(error)}`,
        { component: 'sse-transport' },
        toError(error)
      );
    } finally {
      clearTimeout(timer);
      this.inFlight.delete(controller);
    }
  }

  /**
   * Resolves when the stream reader has stopped. For tests and orderly shutdown.
   */
  async drained(): Promise<void> {
    await this.pumping;
  }

  getMessageEndpoint(): string | null {
    return this.messageEndpoint;
  }

  close(): void {
    if (this.closing) {
      return;
    }
    this.log('Closing SSE transport');
    this.closing = true;
    this.connected = false;

    this.streamController?.abort();
    this.streamController = null;
    for (const controller of this.inFlight) {
      controller.abort();
    }
    this.inFlight.clear();
  }

  isConnected(): boolean {
    return this.connected;
  }
}
