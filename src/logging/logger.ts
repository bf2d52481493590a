import pino, { type Logger as PinoLogger, type LoggerOptions, type TransportSingleOptions } from 'pino';

const IS_TEST_ENV =
  process.env.NODE_ENV === 'test' ||
  process.env.VITEST === 'true' ||
  process.env.VITEST_WORKER_ID !== undefined;

/**
 * Log levels supported by toolscope.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

/**
 * Logger configuration options.
 */
export interface LoggerConfig {
  /** Log level (default: 'warn') */
  level?: LogLevel;
  /** Output file path (default: stderr, so reports on stdout stay parseable) */
  file?: string;
  /** Human-readable output through pino-pretty */
  pretty?: boolean;
  /** Include timestamps in output */
  timestamp?: boolean;
  /** Component name for context */
  name?: string;
}

/**
 * Default level is 'warn' to keep CLI output clean.
 * Users can enable verbose output with --log-level info or --log-level debug.
 */
const DEFAULT_CONFIG: Required<Omit<LoggerConfig, 'file' | 'name'>> = {
  level: IS_TEST_ENV ? 'silent' : 'warn',
  pretty: false,
  timestamp: true,
};

const STDERR_FD = 2;

let globalLogger: PinoLogger | null = null;
let globalLevel: LogLevel = DEFAULT_CONFIG.level;

/**
 * Create a new logger instance.
 */
export function createLogger(config: LoggerConfig = {}): PinoLogger {
  const level = config.level ?? DEFAULT_CONFIG.level;
  const pretty = config.pretty ?? DEFAULT_CONFIG.pretty;
  const timestamp = config.timestamp ?? DEFAULT_CONFIG.timestamp;

  const options: LoggerOptions = {
    level,
    name: config.name,
    timestamp: timestamp ? pino.stdTimeFunctions.isoTime : false,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (pretty) {
    options.transport = prettyTransport(config.file);
    return pino(options);
  }

  return pino(options, pino.destination(config.file ?? STDERR_FD));
}

/**
 * pino-pretty transport writing to the log file, or to stderr. Colors
 * only on the terminal.
 */
export function prettyTransport(file?: string): TransportSingleOptions {
  return {
    target: 'pino-pretty',
    options: {
      colorize: file === undefined,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
      destination: file ?? STDERR_FD,
    },
  };
}

/**
 * Get or create the global logger instance.
 */
export function getLogger(name?: string): PinoLogger {
  if (!globalLogger) {
    globalLogger = createLogger({ level: globalLevel });
  }

  if (name) {
    return globalLogger.child({ component: name });
  }

  return globalLogger;
}

/**
 * Configure the global logger.
 */
export function configureLogger(config: LoggerConfig): void {
  globalLevel = config.level ?? DEFAULT_CONFIG.level;
  globalLogger = createLogger(config);
}

/**
 * Reset the global logger (for testing).
 */
export function resetLogger(): void {
  globalLogger = null;
  globalLevel = DEFAULT_CONFIG.level;
  savedLogLevel = null;
}

let savedLogLevel: LogLevel | null = null;

/**
 * Temporarily suppress all logging, e.g. while a progress bar is drawn.
 * Call restoreLogLevel() to restore the previous level.
 */
export function suppressLogs(): void {
  if (globalLogger && savedLogLevel === null) {
    savedLogLevel = globalLevel;
    globalLogger.level = 'silent';
  }
}

/**
 * Restore the log level after suppression.
 */
export function restoreLogLevel(): void {
  if (globalLogger && savedLogLevel !== null) {
    globalLogger.level = savedLogLevel;
    savedLogLevel = null;
  }
}

/**
 * Type guard for log level strings coming from flags or config.
 */
export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

/**
 * Timing helper for performance measurement.
 */
export interface TimingResult {
  durationMs: number;
  log: () => void;
}

/**
 * Start a timing measurement.
 */
export function startTiming(logger: PinoLogger, operation: string): () => TimingResult {
  const startTime = Date.now();

  return () => {
    const durationMs = Date.now() - startTime;
    return {
      durationMs,
      log: () => {
        logger.debug({ operation, durationMs }, `${operation} completed`);
      },
    };
  };
}

export type { PinoLogger as Logger };
