/**
 * Cache module exports.
 */

export {
  ToolCallCache,
  hashServer,
  recordKey,
  sanitizeOperationName,
  operationDirName,
  expandHome,
  type ResultSink,
  type ToolCallRecord,
  type ToolCallRecordInput,
  type ToolCallMetrics,
  type ToolCallCacheStats,
  type ToolCallCacheOptions,
  type OperationIndex,
} from './tool-call-cache.js';
