import { readFileSync, existsSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import { validateConfig, findConfigFile, type ToolscopeConfig } from './validator.js';
import { ConfigError, ConfigNotFoundError, getErrorMessage, toError } from '../errors/types.js';
import { isRecord } from '../utils/json.js';

/**
 * Configuration with every default applied.
 */
export function getDefaultConfig(): ToolscopeConfig {
  return validateConfig({});
}

/**
 * Load configuration.
 *
 * An explicit path must exist. Without one, the working directory is
 * searched for toolscope.yaml and friends; when none is found the
 * defaults are returned.
 */
export function loadConfig(explicitPath?: string, cwd: string = process.cwd()): ToolscopeConfig {
  if (explicitPath && !existsSync(explicitPath)) {
    throw new ConfigNotFoundError(explicitPath);
  }

  const path = findConfigFile(explicitPath, cwd);
  if (!path) {
    return getDefaultConfig();
  }

  return loadConfigFile(path);
}

/**
 * Load and validate a specific config file.
 */
export function loadConfigFile(path: string): ToolscopeConfig {
  const content = readFileSync(path, 'utf-8');
  let parsed: unknown;

  try {
    parsed = parseYaml(content);
  } catch (error) {
    throw new ConfigError(
      `Invalid YAML in config file ${path}: ${getErrorMessage(error)}`,
      { operation: 'loadConfig', metadata: { path } },
      toError(error)
    );
  }

  // Empty file means all defaults
  if (parsed === null || parsed === undefined) {
    return getDefaultConfig();
  }

  // API keys belong in the environment, never in a file that gets committed
  const correction = isRecord(parsed) ? parsed.correction : undefined;
  if (isRecord(correction) && correction.apiKey !== undefined) {
    throw new ConfigError(
      `API key found in config file "${path}".\n` +
        `Remove 'correction.apiKey' and reference an environment variable instead:\n\n` +
        `  correction:\n` +
        `    provider: anthropic\n` +
        `    apiKeyEnvVar: ANTHROPIC_API_KEY`,
      { operation: 'loadConfig', metadata: { path } }
    );
  }

  return validateConfig(parsed, path);
}

/**
 * Generate the content of a starter config file.
 */
export function generateDefaultConfig(): string {
  return `# toolscope configuration
server:
  # auto | http | sse | stdio (auto probes URLs; commands use stdio)
  transport: auto
  # env:
  #   DEBUG: "1"
  # cwd: ./server
  # headers:
  #   Authorization: Bearer \${MY_TOKEN}

timeouts:
  request: 30000
  startup: 30000
  shutdownGrace: 5000

analysis:
  concurrency: 3
  oversizedTokenThreshold: 25000

correction:
  enabled: true
  # auto | anthropic | openai
  provider: auto
  # model: claude-haiku-4-5
  # apiKeyEnvVar: ANTHROPIC_API_KEY

cache:
  enabled: true
  # dir: ~/.toolscope/tool-call-cache

logging:
  level: warn
  pretty: false
  logEnvironment: true
`;
}
