import type { Readable, Writable } from 'stream';
import type { BaseTransport, TransportType } from './base-transport.js';
import { HTTPTransport } from './http-transport.js';
import { SSETransport } from './sse-transport.js';
import { StdioTransport } from './stdio-transport.js';
import { ConnectionError } from '../errors/types.js';

/**
 * Everything needed to build one of the three wire transports.
 */
export type TransportSpec =
  | { type: 'stdio'; input: Readable | null; output: Writable | null }
  | { type: 'http'; url: string }
  | { type: 'sse'; url: string };

export interface TransportFactoryOptions {
  timeout?: number;
  headers?: Record<string, string>;
  debug?: boolean;
}

/**
 * Build the transport for a session. This is the only place that looks
 * at the transport type.
 */
export function createTransport(spec: TransportSpec, options: TransportFactoryOptions = {}): BaseTransport {
  const { timeout, headers, debug } = options;

  switch (spec.type) {
    case 'stdio':
      if (!spec.input || !spec.output) {
        throw new ConnectionError('Server process has no stdio streams', { component: 'transport-factory' });
      }
      return new StdioTransport(spec.input, spec.output, { timeout, debug });
    case 'http':
      return new HTTPTransport({ url: spec.url, headers, timeout, debug });
    case 'sse':
      return new SSETransport({ url: spec.url, headers, timeout, debug });
  }
}

export function describeTransport(type: TransportType): string {
  switch (type) {
    case 'stdio':
      return 'stdio (child process)';
    case 'http':
      return 'HTTP';
    case 'sse':
      return 'Server-Sent Events';
  }
}
