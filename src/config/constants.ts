/**
 * Application-wide constants for timeouts, windows, sizes, and limits
 *
 * These values are for internal use and maintenance - they are not exposed
 * to users through the configuration system. User-tunable settings live in
 * defaults.ts.
 */

// ===========================================
// NETWORK & RETRY
// ===========================================

export const RETRY_CONFIG = {
  /** Upper bound (exclusive) of the uniform jitter added to every backoff */
  MAX_JITTER_MS: 1000,
} as const;

export const RATE_LIMIT = {
  /** Length of the sliding window */
  WINDOW_MS: 60_000,

  /** Penalty applied after a 429 without a usable Retry-After header */
  DEFAULT_429_PENALTY_MS: 5000,
} as const;

/**
 * HTTP status codes treated as transient
 */
export const TRANSIENT_HTTP_STATUSES: readonly number[] = [
  429, // Too Many Requests
  502, // Bad Gateway
  503, // Service Unavailable
  504, // Gateway Timeout
  520, // Web Server Unknown Error (Cloudflare)
  521, // Web Server Is Down (Cloudflare)
  522, // Connection Timed Out (Cloudflare)
  523, // Origin Is Unreachable (Cloudflare)
  524, // A Timeout Occurred (Cloudflare)
];

/**
 * Socket-level error codes treated as transient
 */
export const TRANSIENT_ERRNO_CODES: readonly string[] = [
  'ETIMEDOUT',
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'EPIPE',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'ENOTFOUND',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
];

/**
 * Lower-cased message fragments that indicate a dropped or flaky link
 */
export const TRANSIENT_MESSAGE_PATTERNS: readonly string[] = [
  'connection reset',
  'connection dropped',
  'network unreachable',
  'no route to host',
  'broken pipe',
  'connection refused',
  'timed out',
  'timeout',
  'dns resolution failed',
  'temporary failure in name resolution',
  'network is down',
  'host is unreachable',
  'service unavailable',
  'service temporarily unavailable',
  'the model did not respond',
  'currently unavailable',
  'fetch failed',
];

// ===========================================
// TOOL LIMITS
// ===========================================

export const TOOL_LIMITS = {
  /** web_fetch request timeout */
  FETCH_TIMEOUT_MS: 30_000,

  /** web_fetch content cap (characters) */
  FETCH_MAX_CHARS: 10_000,

  /** web_search result cap */
  SEARCH_MAX_RESULTS: 10,

  /** glob_search result cap */
  GLOB_MAX_RESULTS: 500,

  /** search_file_content match cap */
  SEARCH_MAX_MATCHES: 500,

  /** Shell output kept per stream (characters) */
  SHELL_MAX_OUTPUT_CHARS: 50_000,

  /** Grace period between SIGTERM and SIGKILL */
  GRACEFUL_SHUTDOWN_DELAY_MS: 500,
} as const;

/**
 * Directories never descended into by glob and content search
 */
export const SEARCH_EXCLUSIONS: readonly string[] = [
  '**/node_modules/**',
  '**/.git/**',
  '**/dist/**',
  '**/build/**',
];

// ===========================================
// SKILLS
// ===========================================

export const SKILL_LIMITS = {
  /** Reference files above this size are flagged */
  MAX_REFERENCE_FILE_BYTES: 10 * 1024 * 1024,

  /** Script extensions treated as executable */
  SCRIPT_EXTENSIONS: ['.sh', '.bash', '.py'],
} as const;

// ===========================================
// TEXT & BUFFERS
// ===========================================

export const TEXT_LIMITS = {
  /** Maximum characters of a parameter value shown in error context */
  TOOL_PARAM_VALUE_MAX: 80,

  /** Length of the "..." suffix */
  ELLIPSIS_LENGTH: 3,

  /** Maximum characters of matched text quoted in a threat reason */
  THREAT_MATCH_MAX: 60,
} as const;

export const BUFFER_SIZES = {
  /** Maximum log entries kept in memory */
  MAX_LOG_BUFFER_SIZE: 1000,

  /** Maximum characters per log entry */
  MAX_LOG_MESSAGE_LENGTH: 2000,
} as const;

// ===========================================
// EXIT CODES
// ===========================================

export const EXIT_CODES = {
  COMPLETED: 0,
  FAILED: 1,
  EXHAUSTED: 2,
  USAGE: 64,
  CANCELLED: 130,
} as const;
