/**
 * toolscope - structural diagnostics for MCP tool servers
 *
 * @packageDocumentation
 */

// Session and transports
export { ProtocolClient, type ProtocolClientOptions } from './transport/protocol-client.js';
export { JsonRpcAdapter, type TransportAdapter, type JsonRpcAdapterOptions } from './transport/adapter.js';
export { BaseTransport, type BaseTransportConfig, type TransportType } from './transport/base-transport.js';
export { StdioTransport, type StdioTransportConfig } from './transport/stdio-transport.js';
export { SSETransport, type SSETransportConfig } from './transport/sse-transport.js';
export { HTTPTransport, type HTTPTransportConfig } from './transport/http-transport.js';
export { createTransport, describeTransport, type TransportSpec } from './transport/factory.js';
export { detectUrlTransport, type UrlTransport } from './transport/endpoint-probe.js';
export type {
  Operation,
  OperationInputSchema,
  ServerIdentity,
  InvocationResult,
  InvocationSuccess,
  InvocationFailure,
  JSONRPCRequest,
  JSONRPCResponse,
  JSONRPCError,
  JSONRPCMessage,
} from './transport/types.js';

// Process launching
export {
  ProcessLauncher,
  type ProcessLauncherOptions,
  type LaunchedServer,
  type LaunchState,
  type SpawnFunction,
} from './launch/process-launcher.js';
export { parseLaunchCommand, isUrlTarget, type ParsedCommand } from './launch/command-parser.js';

// Scenarios
export {
  ArgumentSynthesizer,
  SCENARIO_NAMES,
  type Scenario,
  type ScenarioName,
  type SynthesizerOptions,
} from './scenarios/argument-synthesizer.js';
export { generateSampleValue, VALUE_RULES, type ValueRule } from './scenarios/value-rules.js';

// Analysis
export * from './analysis/index.js';

// Correction
export {
  createCorrector,
  NoopCorrector,
  LLMArgumentCorrector,
  type ArgumentCorrector,
  type CorrectionRequest,
} from './correction/index.js';
export { SchemaValidator, type ArgumentCheck } from './validation/schema-validator.js';

// LLM providers
export {
  createLLMClient,
  detectProvider,
  AnthropicClient,
  OpenAIClient,
  type LLMClient,
  type LLMConfig,
  type LLMProviderId,
} from './llm/index.js';

// Cache
export * from './cache/index.js';

// Configuration
export { loadConfig, loadConfigFile, getDefaultConfig, generateDefaultConfig } from './config/loader.js';
export { validateConfig, type ToolscopeConfig, type TransportChoice } from './config/validator.js';

// Errors
export * from './errors/index.js';

// Logging
export { getLogger, createLogger, configureLogger, type LogLevel, type LoggerConfig } from './logging/logger.js';

export { VERSION } from './version.js';
