/**
 * CLI Output Module
 *
 * User-facing output for CLI commands. Diagnostic logging goes through
 * the logging module (src/logging/logger.ts) instead.
 */

export interface OutputConfig {
  /** Suppress non-essential output */
  quiet?: boolean;
  /** Disable colored output */
  noColor?: boolean;
}

/**
 * Respects NO_COLOR (https://no-color.org/) and FORCE_COLOR=0.
 */
function shouldDisableColor(): boolean {
  if (process.env.NO_COLOR !== undefined && process.env.NO_COLOR !== '') {
    return true;
  }
  return process.env.FORCE_COLOR === '0';
}

let globalConfig: OutputConfig = {
  quiet: false,
  noColor: shouldDisableColor(),
};

export function configureOutput(config: OutputConfig): void {
  globalConfig = { ...globalConfig, ...config };
}

export function getOutputConfig(): OutputConfig {
  return { ...globalConfig };
}

export function resetOutput(): void {
  globalConfig = { quiet: false, noColor: false };
}

export function isQuiet(): boolean {
  return globalConfig.quiet ?? false;
}

/**
 * Progress messages and general information.
 */
export function info(message: string): void {
  if (!globalConfig.quiet) {
    console.log(message);
  }
}

export function success(message: string): void {
  if (!globalConfig.quiet) {
    console.log(message);
  }
}

/**
 * Always shown, quiet mode or not.
 */
export function warn(message: string): void {
  console.warn(message);
}

/**
 * Always shown, quiet mode or not.
 */
export function error(message: string): void {
  console.error(message);
}

export function newline(): void {
  if (!globalConfig.quiet) {
    console.log('');
  }
}

/**
 * Requested data output; printed even in quiet mode.
 */
export function data(text: string): void {
  console.log(text);
}

/**
 * Print formatted JSON output.
 */
export function json(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function keyValue(key: string, value: string | number | boolean | undefined): void {
  if (!globalConfig.quiet && value !== undefined) {
    console.log(`${key}: ${value}`);
  }
}
