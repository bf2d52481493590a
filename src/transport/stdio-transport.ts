import type { Readable, Writable } from 'stream';
import { StringDecoder } from 'string_decoder';
import { parseJsonRpcMessage, type JSONRPCMessage } from './types.js';
import { BaseTransport, type BaseTransportConfig } from './base-transport.js';
import { LIMITS } from '../constants.js';
import { ConnectionError, TransportFault, getErrorMessage, toError } from '../errors/types.js';
import { tryParseJson } from '../utils/json.js';

/**
 * Configuration for StdioTransport.
 */
export interface StdioTransportConfig extends BaseTransportConfig {
  /** Maximum message size in bytes (default: 10MB) */
  maxMessageSize?: number;
  /** Maximum buffer size in bytes (default: 20MB) */
  maxBufferSize?: number;
}

/**
 * StdioTransport exchanges newline-delimited JSON-RPC messages with a
 * child process: one message per line on its stdin, one per line on its
 * stdout.
 *
 * The end of the output stream is reported as 'close'. The adapter
 * treats that as fatal for the session.
 */
export class StdioTransport extends BaseTransport {
  private buffer = '';
  /** Holds back partial multi-byte characters between chunks */
  private readonly decoder = new StringDecoder('utf8');
  private readonly maxMessageSize: number;
  private readonly maxBufferSize: number;
  private connected = false;
  private closed = false;

  private readonly onData = (chunk: Buffer | string): void => {
    const text = typeof chunk === 'string' ? chunk : this.decoder.write(chunk);
    const newSize = Buffer.byteLength(this.buffer) + Buffer.byteLength(text);
    if (newSize > this.maxBufferSize) {
      this.buffer = '';
      this.fail(new TransportFault(`Buffer size limit exceeded: ${newSize} > ${this.maxBufferSize} bytes`, {
        component: 'stdio-transport',
      }));
      return;
    }

    this.buffer += text;
    this.processBuffer();
  };

  private readonly onEnd = (): void => {
    if (this.closed || !this.connected) return;
    this.connected = false;
    this.emit('close');
  };

  private readonly onInputError = (error: Error): void => {
    this.fail(new TransportFault(`Server output stream failed: ${error.message}`, { component: 'stdio-transport' }, error));
  };

  private readonly onOutputError = (error: Error): void => {
    this.fail(new TransportFault(`Server input stream failed: ${error.message}`, { component: 'stdio-transport' }, error));
  };

  constructor(
    private readonly input: Readable,
    private readonly output: Writable,
    config?: StdioTransportConfig
  ) {
    super(config);
    this.maxMessageSize = config?.maxMessageSize ?? LIMITS.MAX_MESSAGE_SIZE;
    this.maxBufferSize = config?.maxBufferSize ?? LIMITS.MAX_BUFFER_SIZE;
  }

  /**
   * Start reading the child's output. The process is already running.
   */
  async connect(): Promise<void> {
    if (this.connected) return;
    if (this.closed) {
      throw new ConnectionError('Stdio transport was closed', { component: 'stdio-transport' });
    }
    if (this.input.readableEnded || this.input.destroyed) {
      throw new ConnectionError('Server output stream is already closed', { component: 'stdio-transport' });
    }

    this.input.on('data', this.onData);
    this.input.on('end', this.onEnd);
    this.input.on('close', this.onEnd);
    this.input.on('error', this.onInputError);
    this.output.on('error', this.onOutputError);
    this.connected = true;
  }

  isConnected(): boolean {
    return this.connected;
  }

  private processBuffer(): void {
    let newlineIndex = this.buffer.indexOf('\n');
    while (newlineIndex !== -1) {
      const line = this.buffer.slice(0, newlineIndex).trim();
      this.buffer = this.buffer.slice(newlineIndex + 1);
      newlineIndex = this.buffer.indexOf('\n');

      if (!line) continue;

      const size = Buffer.byteLength(line);
      if (size > this.maxMessageSize) {
        this.logger.warn({ size, max: this.maxMessageSize }, 'Skipping oversized message');
        continue;
      }

      const message = parseJsonRpcMessage(tryParseJson(line));
      if (!message) {
        // Servers often log to stdout; such lines are skipped, not fatal
        const preview = line.length > LIMITS.PREVIEW_LENGTH ? `${line.slice(0, LIMITS.PREVIEW_LENGTH)}...` : line;
        this.logger.warn({ preview }, 'Skipping invalid JSON-RPC line');
        continue;
      }

      if (this.debug) {
        this.logger.debug({ message }, 'Received message');
      }
      this.emit('message', message);
    }
  }

  private fail(error: TransportFault): void {
    if (this.closed || !this.connected) return;
    this.connected = false;
    this.emit('error', error);
  }

  async send(message: JSONRPCMessage): Promise<void> {
    if (!this.connected) {
      throw new TransportFault('Stdio transport is not connected', { component: 'stdio-transport' });
    }

    const content = JSON.stringify(message);
    this.log('Sending message', { content });

    await new Promise<void>((resolve, reject) => {
      this.output.write(content + '\n', (error) => {
        if (error) {
          reject(
            new TransportFault(
              `Failed to write to server input: ${getErrorMessage(error)}`,
              { component: 'stdio-transport' },
              toError(error)
            )
          );
        } else {
          resolve();
        }
      });
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.connected = false;
    this.input.off('data', this.onData);
    this.input.off('end', this.onEnd);
    this.input.off('close', this.onEnd);
    this.input.off('error', this.onInputError);
    this.output.off('error', this.onOutputError);
    this.buffer = '';
  }
}
