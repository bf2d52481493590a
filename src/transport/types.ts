/**
 * JSON-RPC 2.0 and MCP types for tool-server communication.
 *
 * Incoming messages are validated with zod before they reach the adapter;
 * outgoing messages are built from the interfaces below.
 */

import { z } from 'zod';
import type { ToolInvocationError } from '../errors/types.js';

export type JSONRPCId = string | number;

export interface JSONRPCRequest {
  jsonrpc: '2.0';
  id: JSONRPCId;
  method: string;
  params?: unknown;
}

export interface JSONRPCError {
  code: number;
  message: string;
  data?: unknown;
}

export interface JSONRPCResponse {
  jsonrpc: '2.0';
  /** Null only for errors the server could not attribute to a request */
  id: JSONRPCId | null;
  result?: unknown;
  error?: JSONRPCError;
}

export interface JSONRPCNotification {
  jsonrpc: '2.0';
  method: string;
  params?: unknown;
}

export type JSONRPCMessage = JSONRPCRequest | JSONRPCResponse | JSONRPCNotification;

// ==================== Envelope validation ====================

const idSchema = z.union([z.string(), z.number()]);

const jsonRpcErrorSchema = z.object({
  code: z.number(),
  message: z.string(),
  data: z.unknown().optional(),
});

const requestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: idSchema,
  method: z.string(),
  params: z.unknown().optional(),
});

const notificationSchema = z.object({
  jsonrpc: z.literal('2.0'),
  method: z.string(),
  params: z.unknown().optional(),
});

const responseSchema = z
  .object({
    jsonrpc: z.literal('2.0'),
    id: z.union([idSchema, z.null()]),
    result: z.unknown().optional(),
    error: jsonRpcErrorSchema.optional(),
  })
  .refine((msg) => 'result' in msg || msg.error !== undefined, {
    message: 'response must carry result or error',
  });

export const jsonRpcMessageSchema = z.union([requestSchema, notificationSchema, responseSchema]);

/**
 * Validate an already-parsed value as a JSON-RPC envelope.
 * Returns null when it is not one.
 */
export function parseJsonRpcMessage(value: unknown): JSONRPCMessage | null {
  const result = jsonRpcMessageSchema.safeParse(value);
  return result.success ? result.data : null;
}

export function isRequest(msg: JSONRPCMessage): msg is JSONRPCRequest {
  return 'method' in msg && 'id' in msg && msg.id !== undefined;
}

export function isResponse(msg: JSONRPCMessage): msg is JSONRPCResponse {
  return !('method' in msg) && 'id' in msg;
}

export function isNotification(msg: JSONRPCMessage): msg is JSONRPCNotification {
  return 'method' in msg && !('id' in msg);
}

// ==================== MCP payloads ====================

/**
 * A callable tool as listed by `tools/list`.
 */
export interface MCPTool {
  name: string;
  description?: string;
  inputSchema?: Record<string, unknown>;
  title?: string;
}

export interface MCPServerInfo {
  name: string;
  version: string;
  title?: string;
}

export interface MCPInitializeResult {
  protocolVersion: string;
  capabilities: Record<string, unknown>;
  serverInfo?: MCPServerInfo;
  instructions?: string;
}

export interface MCPToolsListResult {
  tools: MCPTool[];
  nextCursor?: string;
}

/**
 * MCP content block. Only `text` blocks are inspected; others pass through.
 */
export interface MCPContentBlock {
  type: string;
  text?: string;
  [key: string]: unknown;
}

export interface MCPToolCallResult {
  content: MCPContentBlock[];
  isError?: boolean;
  structuredContent?: Record<string, unknown>;
}

export const mcpToolSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  inputSchema: z.record(z.unknown()).optional(),
  title: z.string().optional(),
});

export const mcpToolsListResultSchema = z.object({
  tools: z.array(mcpToolSchema),
  nextCursor: z.string().optional(),
});

export const mcpInitializeResultSchema = z.object({
  protocolVersion: z.string(),
  capabilities: z.record(z.unknown()).default({}),
  serverInfo: z
    .object({
      name: z.string(),
      version: z.string(),
      title: z.string().optional(),
    })
    .optional(),
  instructions: z.string().optional(),
});

export const mcpToolCallResultSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() }).passthrough()).default([]),
  isError: z.boolean().optional(),
  structuredContent: z.record(z.unknown()).optional(),
});

// ==================== Domain ====================

/**
 * Input contract of an operation: a JSON Schema object.
 */
export interface OperationInputSchema {
  type?: string;
  properties?: Record<string, unknown>;
  required?: string[];
  [key: string]: unknown;
}

/**
 * A callable unit exposed by the target server.
 */
export interface Operation {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: OperationInputSchema;
}

/**
 * Identity of a connected server, as reported during the handshake.
 */
export interface ServerIdentity {
  name: string;
  version: string;
  protocolVersion: string;
}

export interface InvocationSuccess {
  readonly ok: true;
  readonly operation: string;
  /** Raw tool result as returned by the server */
  readonly response: unknown;
  readonly elapsedMs: number;
  /** UTF-8 byte length of the serialized response */
  readonly sizeBytes: number;
  readonly tokenEstimate: number;
}

export interface InvocationFailure {
  readonly ok: false;
  readonly operation: string;
  readonly error: ToolInvocationError;
  readonly elapsedMs: number;
}

/**
 * Outcome of executing one scenario.
 */
export type InvocationResult = InvocationSuccess | InvocationFailure;
