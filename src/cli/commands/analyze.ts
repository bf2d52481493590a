import { Command, InvalidArgumentError, Option } from 'commander';
import { z } from 'zod';
import { AnalysisHarness, type HarnessOptions } from '../../analysis/harness.js';
import { ToolCallCache } from '../../cache/tool-call-cache.js';
import { loadConfig } from '../../config/loader.js';
import { transportSchema, type ToolscopeConfig, type TransportChoice } from '../../config/validator.js';
import { createCorrector } from '../../correction/index.js';
import { NoopCorrector } from '../../correction/corrector.js';
import { EXIT_CODES } from '../../constants.js';
import { getErrorMessage } from '../../errors/types.js';
import { configureLogger, isLogLevel, type LoggerConfig } from '../../logging/logger.js';
import { ProtocolClient, type ProtocolClientOptions } from '../../transport/protocol-client.js';
import { tryParseJson } from '../../utils/json.js';
import { formatReport, isOutputFormat, OUTPUT_FORMATS, type OutputFormat } from '../output/report-formatter.js';
import { AnalysisProgressBar } from '../utils/progress.js';
import * as output from '../output.js';

export interface AnalyzeOptions {
  config?: string;
  transport?: TransportChoice;
  timeout?: number;
  startupTimeout?: number;
  concurrency?: number;
  envVars?: Record<string, string>;
  workingDir?: string;
  /** False under --no-env-logging */
  envLogging: boolean;
  /** False under --no-correction */
  correction: boolean;
  /** False under --no-cache */
  cache: boolean;
  outputFormat: OutputFormat;
}

export interface AnalyzeSettings {
  client: ProtocolClientOptions;
  harness: Pick<
    HarnessOptions,
    | 'concurrency'
    | 'oversizedTokenThreshold'
    | 'collectionKeys'
    | 'verboseIdentifierPatterns'
    | 'paginationParams'
    | 'filterParams'
  >;
  correction: ToolscopeConfig['correction'];
  cache: { enabled: boolean; dir: string };
}

const envVarsSchema = z.record(z.string());

export function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * `--env-vars '{"KEY":"value"}'`: a JSON object of string values.
 */
export function parseEnvVars(value: string): Record<string, string> {
  const result = envVarsSchema.safeParse(tryParseJson(value));
  if (!result.success) {
    throw new InvalidArgumentError('Must be a JSON object of string values.');
  }
  return result.data;
}

export function parseTransport(value: string): TransportChoice {
  const result = transportSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(`Must be one of: ${transportSchema.options.join(', ')}.`);
  }
  return result.data;
}

export function parseOutputFormat(value: string): OutputFormat {
  if (!isOutputFormat(value)) {
    throw new InvalidArgumentError(`Must be one of: ${OUTPUT_FORMATS.join(', ')}.`);
  }
  return value;
}

/**
 * Merge command-line flags over the loaded configuration. Flags win;
 * `--env-vars` entries are layered over `server.env`.
 */
export function resolveAnalyzeSettings(
  target: string,
  options: AnalyzeOptions,
  config: ToolscopeConfig
): AnalyzeSettings {
  const { server, timeouts, analysis, logging } = config;

  return {
    client: {
      target,
      transport: options.transport ?? server.transport,
      env: { ...server.env, ...options.envVars },
      cwd: options.workingDir ?? server.cwd,
      headers: server.headers,
      requestTimeout: options.timeout ?? timeouts.request,
      startupTimeout: options.startupTimeout ?? timeouts.startup,
      shutdownGrace: timeouts.shutdownGrace,
      logEnvironment: options.envLogging && logging.logEnvironment,
      sensitiveNames: logging.sensitiveNames,
    },
    harness: {
      concurrency: options.concurrency ?? analysis.concurrency,
      oversizedTokenThreshold: analysis.oversizedTokenThreshold,
      collectionKeys: analysis.collectionKeys,
      verboseIdentifierPatterns: analysis.verboseIdentifierPatterns,
      paginationParams: analysis.paginationParams,
      filterParams: analysis.filterParams,
    },
    correction: { ...config.correction, enabled: options.correction && config.correction.enabled },
    cache: { enabled: options.cache && config.cache.enabled, dir: config.cache.dir },
  };
}

export interface GlobalLogOptions {
  logLevel?: string;
  logFile?: string;
  logPretty?: boolean;
}

/**
 * Logger settings for a run. Global flags beat `logging.*` in the config.
 */
export function resolveLoggerConfig(globals: GlobalLogOptions, config: ToolscopeConfig): LoggerConfig {
  return {
    level: isLogLevel(globals.logLevel) ? globals.logLevel : config.logging.level,
    file: globals.logFile,
    pretty: globals.logPretty ?? config.logging.pretty,
  };
}

/**
 * Action handler for the analyze command.
 */
async function analyzeAction(target: string, options: AnalyzeOptions, command: Command): Promise<void> {
  let config: ToolscopeConfig;
  try {
    config = loadConfig(options.config);
  } catch (error) {
    output.error(getErrorMessage(error));
    process.exit(EXIT_CODES.ERROR);
  }

  // --log-level beats the configured level
  configureLogger(resolveLoggerConfig(command.optsWithGlobals<GlobalLogOptions>(), config));

  const settings = resolveAnalyzeSettings(target, options, config);
  const client = new ProtocolClient(settings.client);
  const corrector = settings.correction.enabled ? createCorrector(settings.correction) : new NoopCorrector();
  const sink = settings.cache.enabled ? new ToolCallCache({ server: target, dir: settings.cache.dir }) : null;
  const progress = new AnalysisProgressBar();

  const harness = new AnalysisHarness(client, {
    ...settings.harness,
    corrector,
    sink,
    onScenariosPlanned: (total) => progress.start(total),
    onScenarioComplete: (_metric, operation, done) => progress.update(done, operation),
  });

  if (options.outputFormat === 'table' && !progress.isEnabled()) {
    output.info(`Analyzing ${target}...`);
  }

  try {
    const report = await harness.run();
    progress.stop();
    output.data(formatReport(report, options.outputFormat));
  } catch (error) {
    progress.stop();
    output.error(`Analysis failed: ${getErrorMessage(error)}`);
    process.exit(EXIT_CODES.ERROR);
  }
}

export const analyzeCommand = new Command('analyze')
  .description('Connect to an MCP server, exercise every tool and report response efficiency')
  .argument('<target>', 'Server URL, or the command that launches the server')
  .addOption(
    new Option('--transport <type>', 'Transport: auto, http, sse, stdio').argParser(parseTransport)
  )
  .option('--timeout <ms>', 'Request timeout in milliseconds', parsePositiveInteger)
  .option('--startup-timeout <ms>', 'Server startup timeout in milliseconds', parsePositiveInteger)
  .option('--concurrency <n>', 'Scenarios run in parallel', parsePositiveInteger)
  .option('--env-vars <json>', 'Environment for a launched server, as a JSON object', parseEnvVars)
  .option('--working-dir <dir>', 'Working directory for a launched server')
  .option('--no-env-logging', 'Do not log the launched server environment')
  .option('--no-correction', 'Do not ask an LLM to correct rejected arguments')
  .option('--no-cache', 'Do not write results to the tool-call cache')
  .addOption(
    new Option('--output-format <format>', 'Report format: table, json, yaml')
      .argParser(parseOutputFormat)
      .default('table')
  )
  .option('-c, --config <path>', 'Path to config file')
  .action(analyzeAction);
