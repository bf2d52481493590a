/**
 * Configuration validation using Zod schemas.
 *
 * Every option has a default, so an empty toolscope.yaml is valid.
 */

import { z } from 'zod';
import { existsSync } from 'fs';
import { join } from 'path';
import { CONFIG_DEFAULTS } from './defaults.js';
import { PATHS } from '../constants.js';
import { ConfigValidationError } from '../errors/types.js';

const d = CONFIG_DEFAULTS;

/**
 * A pattern string that compiles as a regular expression.
 */
const regexPatternSchema = z.string().refine(
  (pattern) => {
    try {
      new RegExp(pattern);
      return true;
    } catch {
      return false;
    }
  },
  { message: 'must be a valid regular expression' }
);

export const transportSchema = z.enum(['auto', 'http', 'sse', 'stdio']);

/**
 * Server configuration schema.
 */
export const serverConfigSchema = z.object({
  /** Transport to use for the target (auto probes URLs, commands default to stdio) */
  transport: transportSchema.default(d.server.transport),
  /** Environment overrides for launched servers */
  env: z.record(z.string()).default(d.server.env),
  /** Working directory for launched servers */
  cwd: z.string().optional(),
  /** Extra HTTP headers for remote servers */
  headers: z.record(z.string()).default(d.server.headers),
}).default({});

/**
 * Timeout configuration schema (milliseconds).
 */
export const timeoutsConfigSchema = z.object({
  request: z.number().int().min(100).max(600000).default(d.timeouts.request),
  startup: z.number().int().min(100).max(600000).default(d.timeouts.startup),
  shutdownGrace: z.number().int().min(0).max(60000).default(d.timeouts.shutdownGrace),
}).default({});

/**
 * Analysis configuration schema.
 */
export const analysisConfigSchema = z.object({
  /** Worker pool size for scenario execution */
  concurrency: z.number().int().min(1).max(32).default(d.analysis.concurrency),
  /** Token estimate above which a response is oversized */
  oversizedTokenThreshold: z.number().int().positive().default(d.analysis.oversizedTokenThreshold),
  /** Field names whose array value marks a collection-shaped response */
  collectionKeys: z.array(z.string()).default(d.analysis.collectionKeys),
  /** Regex sources for identifier-shaped strings */
  verboseIdentifierPatterns: z.array(regexPatternSchema).default(d.analysis.verboseIdentifierPatterns),
  /** Parameter names recognized as pagination controls */
  paginationParams: z.array(z.string()).default(d.analysis.paginationParams),
  /** Parameter names recognized as filters */
  filterParams: z.array(z.string()).default(d.analysis.filterParams),
}).default({});

/**
 * Argument correction configuration schema.
 */
export const correctionConfigSchema = z.object({
  enabled: z.boolean().default(d.correction.enabled),
  provider: z.enum(['auto', 'anthropic', 'openai']).default(d.correction.provider),
  /** Model to use (empty = provider default) */
  model: z.string().optional(),
  /** Environment variable holding the API key */
  apiKeyEnvVar: z.string().optional(),
}).default({});

/**
 * Tool-call cache configuration schema.
 */
export const cacheConfigSchema = z.object({
  enabled: z.boolean().default(d.cache.enabled),
  dir: z.string().default(d.cache.dir),
}).default({});

/**
 * Logging configuration schema.
 */
export const loggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default(d.logging.level),
  /** Human-readable log lines (pino-pretty) */
  pretty: z.boolean().default(d.logging.pretty),
  /** Log the launched server's environment (sensitive values redacted) */
  logEnvironment: z.boolean().default(d.logging.logEnvironment),
  /** Substrings marking an environment variable as sensitive */
  sensitiveNames: z.array(z.string()).default(d.logging.sensitiveNames),
}).default({});

/**
 * Complete toolscope.yaml configuration schema.
 */
export const toolscopeConfigSchema = z.object({
  server: serverConfigSchema,
  timeouts: timeoutsConfigSchema,
  analysis: analysisConfigSchema,
  correction: correctionConfigSchema,
  cache: cacheConfigSchema,
  logging: loggingConfigSchema,
});

export type ToolscopeConfig = z.infer<typeof toolscopeConfigSchema>;
export type TransportChoice = z.infer<typeof transportSchema>;

/**
 * Validate a configuration object.
 * Returns the validated config with defaults applied, or throws ConfigValidationError.
 */
export function validateConfig(config: unknown, filePath?: string): ToolscopeConfig {
  const result = toolscopeConfigSchema.safeParse(config ?? {});

  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return `${path || 'root'}: ${issue.message}`;
    });
    throw new ConfigValidationError(issues, filePath);
  }

  return result.data;
}

/**
 * Find a config file at the given path or in the working directory.
 */
export function findConfigFile(explicitPath?: string, cwd: string = process.cwd()): string | null {
  if (explicitPath) {
    return existsSync(explicitPath) ? explicitPath : null;
  }

  for (const name of PATHS.CONFIG_FILENAMES) {
    const path = join(cwd, name);
    if (existsSync(path)) {
      return path;
    }
  }

  return null;
}
