/**
 * Core constants: timeouts, protocol identifiers, paths and exit codes.
 */

import { homedir } from 'os';
import { join } from 'path';

// ==================== Timeouts ====================

/**
 * Default timeout values in milliseconds.
 */
export const TIMEOUTS = {
  /** Default per-request timeout (30 seconds) */
  DEFAULT: 30000,
  /** Process startup / readiness timeout (30 seconds) */
  STARTUP: 30000,
  /** Grace period between SIGTERM and SIGKILL (5 seconds) */
  SHUTDOWN_KILL: 5000,
  /** Wait for exit after SIGKILL before giving up (1 second) */
  KILL_CONFIRM: 1000,
  /** Interval between readiness probes (100ms) */
  SERVER_READY_POLL: 100,
  /** Single readiness probe request (2 seconds) */
  READY_PROBE: 2000,
  /** HEAD probe used to tell SSE from plain HTTP (5 seconds) */
  TRANSPORT_PROBE: 5000,
  /** GET probe; a stream that never finishes within this is treated as SSE (3 seconds) */
  TRANSPORT_PROBE_GET: 3000,
  /** Delay between connection attempts (500ms) */
  CONNECT_RETRY_DELAY: 500,
} as const;

// ==================== MCP protocol ====================

export const MCP = {
  /** Protocol version offered during initialize */
  PROTOCOL_VERSION: '2025-11-25',
  /** JSON-RPC version */
  JSONRPC_VERSION: '2.0',
  /** Maximum tools/list pages followed through nextCursor */
  MAX_CATALOG_PAGES: 100,
  /** Connection attempts before connect() gives up */
  CONNECT_ATTEMPTS: 3,
} as const;

/**
 * Standard JSON-RPC error codes.
 */
export const JSONRPC_ERROR_CODES = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
} as const;

// ==================== Limits ====================

export const LIMITS = {
  /** Maximum single stdio message (10MB) */
  MAX_MESSAGE_SIZE: 10 * 1024 * 1024,
  /** Maximum buffered stdio input (20MB) */
  MAX_BUFFER_SIZE: 20 * 1024 * 1024,
  /** Characters of child stderr kept for launch diagnostics */
  STDERR_TAIL: 2000,
  /** Characters of an invalid message kept in log previews */
  PREVIEW_LENGTH: 100,
  /** Safe environment names listed in a log summary before collapsing */
  ENV_SUMMARY_NAMES: 5,
} as const;

// ==================== Paths ====================

export const PATHS = {
  /** Config file names searched in the working directory */
  CONFIG_FILENAMES: ['toolscope.yaml', 'toolscope.yml', '.toolscope.yaml', '.toolscope.yml'],
  /** Default tool-call cache directory */
  DEFAULT_CACHE_DIR: join(homedir(), '.toolscope', 'tool-call-cache'),
} as const;

// ==================== Exit codes ====================

export const EXIT_CODES = {
  SUCCESS: 0,
  ERROR: 1,
} as const;
