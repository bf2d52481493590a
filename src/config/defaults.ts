import {
  TIMEOUTS,
  PATHS,
  TOKEN_EFFICIENCY,
  COLLECTION_KEYS,
  VERBOSE_IDENTIFIER_PATTERNS,
  PAGINATION_PARAMS,
  FILTER_PARAMS,
  SENSITIVE_NAME_PATTERNS,
} from '../constants.js';

const EMPTY_ENV: Record<string, string> = {};
const EMPTY_HEADERS: Record<string, string> = {};

export const CONFIG_DEFAULTS = {
  server: {
    transport: 'auto' as const,
    env: EMPTY_ENV,
    headers: EMPTY_HEADERS,
  },
  timeouts: {
    request: TIMEOUTS.DEFAULT,
    startup: TIMEOUTS.STARTUP,
    shutdownGrace: TIMEOUTS.SHUTDOWN_KILL,
  },
  analysis: {
    concurrency: TOKEN_EFFICIENCY.DEFAULT_CONCURRENCY,
    oversizedTokenThreshold: TOKEN_EFFICIENCY.OVERSIZED_THRESHOLD,
    collectionKeys: [...COLLECTION_KEYS],
    verboseIdentifierPatterns: [...VERBOSE_IDENTIFIER_PATTERNS],
    paginationParams: [...PAGINATION_PARAMS],
    filterParams: [...FILTER_PARAMS],
  },
  correction: {
    enabled: true,
    provider: 'auto' as const,
  },
  cache: {
    enabled: true,
    dir: PATHS.DEFAULT_CACHE_DIR,
  },
  logging: {
    level: 'warn' as const,
    pretty: false,
    logEnvironment: true,
    sensitiveNames: [...SENSITIVE_NAME_PATTERNS],
  },
};
