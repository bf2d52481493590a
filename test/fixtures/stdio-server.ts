/**
 * Answers MCP requests written to a FakeChild's stdin on its stdout, one
 * JSON message per line.
 */

import { createInterface } from 'readline';
import type { FakeChild } from './fake-child.js';
import { isRecord } from '../../src/utils/json.js';

export interface StdioServerTools {
  [name: string]: (args: Record<string, unknown>) => unknown;
}

export interface StdioServer {
  /** Methods received, in order */
  readonly methods: string[];
}

export function serveOverStdio(child: FakeChild, tools: StdioServerTools): StdioServer {
  const methods: string[] = [];
  const lines = createInterface({ input: child.stdin });

  const write = (message: unknown): void => {
    if (!child.stdout.writableEnded) {
      child.stdout.write(`${JSON.stringify(message)}\n`);
    }
  };

  lines.on('line', (line) => {
    const message: unknown = JSON.parse(line);
    if (!isRecord(message) || typeof message.method !== 'string') return;
    methods.push(message.method);
    if (message.id === undefined) return;

    const id = message.id;
    const params = isRecord(message.params) ? message.params : {};
    switch (message.method) {
      case 'initialize':
        write({
          jsonrpc: '2.0',
          id,
          result: { protocolVersion: '2025-11-25', capabilities: {}, serverInfo: { name: 'stdio-fake', version: '0.1.0' } },
        });
        return;
      case 'tools/list':
        write({
          jsonrpc: '2.0',
          id,
          result: {
            tools: Object.keys(tools).map((name) => ({
              name,
              inputSchema: { type: 'object', properties: { text: { type: 'string' } } },
            })),
          },
        });
        return;
      case 'tools/call': {
        const handler = typeof params.name === 'string' ? tools[params.name] : undefined;
        const args = isRecord(params.arguments) ? params.arguments : {};
        write(
          handler
            ? { jsonrpc: '2.0', id, result: handler(args) }
            : { jsonrpc: '2.0', id, error: { code: -32602, message: 'Unknown tool' } }
        );
        return;
      }
      default:
        write({ jsonrpc: '2.0', id, error: { code: -32601, message: 'Method not found' } });
    }
  });

  return { methods };
}
