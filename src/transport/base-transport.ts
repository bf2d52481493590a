import { EventEmitter } from 'events';
import type { JSONRPCMessage } from './types.js';
import { getLogger, type Logger } from '../logging/logger.js';
import { TIMEOUTS } from '../constants.js';

/**
 * Base configuration for all transports.
 */
export interface BaseTransportConfig {
  /** Enable debug logging of raw traffic */
  debug?: boolean;
  /** Request timeout in milliseconds */
  timeout?: number;
}

/**
 * Events emitted by transports.
 */
export interface TransportEvents {
  message: (msg: JSONRPCMessage) => void;
  error: (error: Error) => void;
  close: () => void;
}

/**
 * Abstract base class for wire transports.
 *
 * Transports only frame and move messages. Correlating responses to
 * requests is the adapter's job.
 *
 * All transports emit:
 * - 'message': When a JSON-RPC message is received
 * - 'error': When the connection fails mid-session
 * - 'close': When the peer closes the connection
 */
export abstract class BaseTransport extends EventEmitter {
  protected readonly debug: boolean;
  protected readonly timeout: number;
  protected readonly logger: Logger;

  constructor(config?: BaseTransportConfig) {
    super();
    this.debug = config?.debug ?? false;
    this.timeout = config?.timeout ?? TIMEOUTS.DEFAULT;
    this.logger = getLogger('transport');
  }

  /**
   * Open the underlying connection.
   */
  abstract connect(): Promise<void>;

  /**
   * Send a JSON-RPC message. Resolves once the message is handed off;
   * replies arrive as 'message' events. Rejects only for failures scoped
   * to this message.
   */
  abstract send(message: JSONRPCMessage): Promise<void>;

  /**
   * Close the transport connection. Safe to call more than once.
   */
  abstract close(): void;

  /**
   * Check if the transport is connected.
   */
  abstract isConnected(): boolean;

  /**
   * Called once the handshake settles on a protocol version. Transports
   * that repeat the version on every request override this.
   */
  setNegotiatedVersion(_version: string): void {
    // no per-request version by default
  }

  /**
   * Log a debug message if debug mode is enabled.
   */
  protected log(message: string, data?: Record<string, unknown>): void {
    if (this.debug) {
      this.logger.debug(data ?? {}, message);
    }
  }

  // Type-safe event methods
  override on<K extends keyof TransportEvents>(event: K, listener: TransportEvents[K]): this {
    return super.on(event, listener);
  }

  override once<K extends keyof TransportEvents>(event: K, listener: TransportEvents[K]): this {
    return super.once(event, listener);
  }

  override emit<K extends keyof TransportEvents>(
    event: K,
    ...args: Parameters<TransportEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}

/**
 * Transport type identifier.
 */
export type TransportType = 'stdio' | 'sse' | 'http';
