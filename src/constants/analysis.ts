/**
 * Heuristic tables used by argument synthesis, issue classification and
 * process launching. Every list here is a default; the config file can
 * replace the tunable ones.
 */

// ==================== Token efficiency ====================

export const TOKEN_EFFICIENCY = {
  /** Characters per estimated token */
  CHARS_PER_TOKEN: 4,
  /** Responses above this estimate are flagged as oversized */
  OVERSIZED_THRESHOLD: 25000,
  /** Share of low-value fields above which a response is flagged */
  LOW_VALUE_RATIO: 0.2,
  /** Default worker pool size */
  DEFAULT_CONCURRENCY: 3,
} as const;

/**
 * Severity bands for measured token counts.
 */
export const TOKEN_THRESHOLDS = {
  GOOD: 5000,
  WARNING: 15000,
  LIMIT: 25000,
  CRITICAL: 50000,
} as const;

// ==================== Parameter categories ====================

/**
 * Parameter names recognized as pagination controls (compared lowercase).
 */
export const PAGINATION_PARAMS = [
  'limit',
  'offset',
  'page',
  'page_size',
  'per_page',
  'cursor',
  'next_token',
  'continuation_token',
  'start',
  'count',
] as const;

/**
 * Pagination parameters that size a page and receive the scenario's page size.
 */
export const PAGE_SIZE_PARAMS = ['limit', 'count', 'per_page', 'page_size'] as const;

/**
 * Pagination parameters that select a page number.
 */
export const PAGE_NUMBER_PARAMS = ['page'] as const;

/**
 * Pagination parameters that select a starting position.
 */
export const PAGE_OFFSET_PARAMS = ['offset', 'start'] as const;

/**
 * Parameter names recognized as filters (compared lowercase).
 */
export const FILTER_PARAMS = [
  'filter',
  'where',
  'query',
  'search',
  'include',
  'exclude',
  'fields',
  'select',
  'only',
  'except',
  'type',
  'status',
] as const;

/**
 * Parameter names recognized as response-format controls.
 */
export const FORMAT_CONTROL_PARAMS = [
  'format',
  'response_format',
  'detail_level',
  'verbosity',
  'compact',
  'full',
  'summary',
  'detailed',
] as const;

/**
 * Words in a tool name or description suggesting detailed output.
 */
export const DETAIL_INDICATORS = [
  'get',
  'fetch',
  'retrieve',
  'details',
  'info',
  'describe',
  'analyze',
  'report',
  'summary',
  'profile',
] as const;

// ==================== Scenario values ====================

export const SCENARIO_PAGE_SIZES = {
  typical: 10,
  large: 1000,
} as const;

export const SAMPLE_VALUES = {
  URL: 'https://example.com',
  EMAIL: 'test@example.com',
  QUERY: 'sample query',
  IDENTIFIER: 'sample_id',
  STRING: 'sample_value',
  INTEGER: 1,
  NUMBER: 1.0,
  BOOLEAN: true,
} as const;

// ==================== Response shape ====================

/**
 * Field names whose array value suggests a list of records.
 */
export const COLLECTION_KEYS = [
  'items',
  'results',
  'records',
  'data',
  'entries',
  'rows',
  'list',
  'nodes',
  'hits',
  'values',
  'objects',
  'documents',
  'matches',
] as const;

/**
 * Identifier-shaped patterns: UUID, MD5-like and SHA1-like hex, long opaque tokens.
 */
export const VERBOSE_IDENTIFIER_PATTERNS = [
  '[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}',
  '[0-9a-f]{32}',
  '[0-9a-f]{40}',
  '[A-Za-z0-9]{20,}',
] as const;

export const TRUNCATION_INDICATORS = [
  'truncated',
  'more_available',
  'has_more',
  'continuation_token',
  'next_page',
  'partial',
  'limited',
  'excerpt',
] as const;

export const LOW_VALUE_PATTERNS = [
  /"created_at":\s*"[^"]*"/,
  /"updated_at":\s*"[^"]*"/,
  /"metadata":\s*\{[^}]*\}/,
  /"_internal"/,
  /"debug"/,
] as const;

/**
 * Error texts recognized as argument validation failures, for servers that
 * report them as tool errors rather than JSON-RPC invalid-params.
 */
export const VALIDATION_ERROR_PATTERNS = [
  /invalid (?:arguments?|params?|parameters?|input)/i,
  /validation (?:error|failed)/i,
  /(?:missing|required) (?:required )?(?:arguments?|parameters?|property|field)/i,
  /is a required property/i,
  /must be (?:a|an|of type|one of)\b/i,
  /expected (?:string|number|integer|boolean|array|object)/i,
  /does not match (?:the )?(?:schema|pattern)/i,
] as const;

// ==================== Launching ====================

/**
 * Substrings marking an environment variable name as sensitive (compared lowercase).
 */
export const SENSITIVE_NAME_PATTERNS = [
  'api_key',
  'apikey',
  'key',
  'secret',
  'password',
  'passwd',
  'pwd',
  'token',
  'auth',
  'credential',
  'cred',
  'private',
  'access',
  'session',
  'cookie',
  'oauth',
  'jwt',
  'bearer',
  'signature',
  'database_url',
  'db_url',
  'connection_string',
  'dsn',
] as const;

export const REDACTION_MARKER = '[REDACTED]';

/**
 * Local ports probed when a launched server never prints its address.
 */
export const FALLBACK_PORTS = [3000, 3001, 8000, 8080, 4000, 5000, 9000] as const;

/**
 * Log-line patterns announcing a server address. Group 1 is a URL or a port.
 */
export const SERVER_URL_PATTERNS = [
  /(?:server|mcp)\s+(?:running|started|listening)\s+(?:on|at)?\s*(https?:\/\/\S+)/i,
  /(?:available|serving)\s+(?:on|at)?\s*(https?:\/\/\S+)/i,
  /url:\s*(https?:\/\/\S+)/i,
  /listening\s+(?:on|at)?\s*(https?:\/\/\S+)/i,
  /(https?:\/\/(?:localhost|127\.0\.0\.1):\d+(?:\/\S*)?)/i,
  /(http:\/\/[^\s:]+:\d+(?:\/\S*)?)/i,
  /port\s+(\d+)/i,
  /(?:localhost|127\.0\.0\.1):(\d+)/i,
] as const;

// ==================== LLM ====================

export const LLM_DEFAULTS = {
  MAX_TOKENS: 1024,
  TEMPERATURE: 0,
} as const;

export const DEFAULT_MODELS = {
  anthropic: 'claude-haiku-4-5',
  openai: 'gpt-4o-mini',
} as const;
