import { LIMITS, REDACTION_MARKER, SENSITIVE_NAME_PATTERNS } from '../constants.js';

/**
 * Environment variables to filter out when spawning server processes.
 * These may contain credentials the server has no business seeing.
 */
const FILTERED_ENV_VARS = new Set([
  // LLM API keys
  'OPENAI_API_KEY',
  'ANTHROPIC_API_KEY',
  'GOOGLE_API_KEY',
  'AZURE_OPENAI_API_KEY',
  'COHERE_API_KEY',
  'HUGGINGFACE_API_KEY',
  'REPLICATE_API_TOKEN',
  // Provider credentials
  'AWS_SECRET_ACCESS_KEY',
  'AWS_SESSION_TOKEN',
  'AZURE_CLIENT_SECRET',
  'GOOGLE_APPLICATION_CREDENTIALS',
  // SCM/CI tokens
  'GITHUB_TOKEN',
  'GH_TOKEN',
  'GITLAB_TOKEN',
  'BITBUCKET_TOKEN',
  'NPM_TOKEN',
  'PYPI_TOKEN',
  // Database credentials
  'DATABASE_URL',
  'DATABASE_PASSWORD',
  'POSTGRES_PASSWORD',
  'MYSQL_PASSWORD',
  'REDIS_PASSWORD',
  'MONGODB_URI',
  // Application secrets
  'COOKIE_SECRET',
  'SESSION_SECRET',
  'JWT_SECRET',
  'ENCRYPTION_KEY',
  'PRIVATE_KEY',
]);

/**
 * Patterns for environment variable names that should be filtered.
 */
const FILTERED_ENV_PATTERNS = [
  /_API_KEY$/i,
  /_SECRET$/i,
  /_TOKEN$/i,
  /_PASSWORD$/i,
  /_PRIVATE_KEY$/i,
  /_CREDENTIALS$/i,
  /^SECRET_/i,
  /^PRIVATE_/i,
];

function isFilteredEnvVar(name: string): boolean {
  if (FILTERED_ENV_VARS.has(name)) {
    return true;
  }

  return FILTERED_ENV_PATTERNS.some((pattern) => pattern.test(name));
}

/**
 * Filter credentials from the inherited environment before spawning a
 * subprocess. Explicitly provided variables are always passed through.
 */
export function filterSpawnEnv(
  baseEnv: NodeJS.ProcessEnv,
  additionalEnv?: Record<string, string>
): Record<string, string> {
  const filtered: Record<string, string> = {};

  for (const [key, value] of Object.entries(baseEnv)) {
    if (value !== undefined && !isFilteredEnvVar(key)) {
      filtered[key] = value;
    }
  }

  if (additionalEnv) {
    Object.assign(filtered, additionalEnv);
  }

  return filtered;
}

/**
 * Whether a variable name contains one of the sensitive substrings.
 * Comparison is case-insensitive.
 */
export function isSensitiveName(
  name: string,
  sensitiveNames: readonly string[] = SENSITIVE_NAME_PATTERNS
): boolean {
  const lower = name.toLowerCase();
  return sensitiveNames.some((pattern) => pattern !== '' && lower.includes(pattern.toLowerCase()));
}

/**
 * Copy of an environment with sensitive values replaced by the redaction marker.
 */
export function redactEnv(
  env: Record<string, string>,
  sensitiveNames: readonly string[] = SENSITIVE_NAME_PATTERNS
): Record<string, string> {
  const redacted: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    redacted[key] = isSensitiveName(key, sensitiveNames) ? REDACTION_MARKER : value;
  }
  return redacted;
}

/**
 * Log-safe summary of an environment.
 */
export interface EnvSummary {
  /** Safe variable names shown in the log */
  safe: string[];
  /** Safe variables left out of `safe` */
  more: number;
  /** Sensitive variables, counted but never named */
  sensitive: number;
}

/**
 * Summarize an environment for logging. Up to five safe names are listed
 * in full; a longer list is cut to its first three.
 */
export function summarizeEnv(
  env: Record<string, string>,
  sensitiveNames: readonly string[] = SENSITIVE_NAME_PATTERNS
): EnvSummary {
  const safe: string[] = [];
  let sensitive = 0;

  for (const key of Object.keys(env)) {
    if (isSensitiveName(key, sensitiveNames)) {
      sensitive++;
    } else {
      safe.push(key);
    }
  }

  if (safe.length <= LIMITS.ENV_SUMMARY_NAMES) {
    return { safe, more: 0, sensitive };
  }

  return { safe: safe.slice(0, 3), more: safe.length - 3, sensitive };
}
