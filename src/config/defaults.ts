/**
 * Default configuration values for Bastion
 *
 * This file defines all default settings with their types and default values.
 * Configuration can be overridden via config file or CLI flags.
 */

import type { Config, RateLimitScope } from '../types/index.js';

/**
 * Patterns denied even inside an allowed external root
 */
export const DEFAULT_EXCLUDED_PATTERNS: readonly string[] = [
  '**/.ssh/**',
  '**/.gnupg/**',
  '**/.aws/**',
  '**/.env',
  '**/.env.*',
  '**/*.pem',
  '**/*.key',
  '**/id_rsa*',
  '**/id_ed25519*',
  '**/*secret*',
  '**/.netrc',
  '**/.git-credentials',
];

export const DEFAULT_CONFIG: Config = {
  // ==========================================
  // LLM MODEL SETTINGS
  // ==========================================
  endpoint: 'http://localhost:11434/v1', // OpenAI-compatible chat completions base URL
  model: 'qwen2.5-coder:14b',
  api_key_env: 'BASTION_API_KEY', // Environment variable holding the bearer token, if any
  temperature: 0.3,
  max_tokens: 4096,

  // ==========================================
  // AGENT LOOP
  // ==========================================
  max_iterations: 25, // Model round trips per turn
  tool_timeout_ms: 120_000,
  turn_timeout_ms: 0, // 0 disables the overall turn budget

  // ==========================================
  // NETWORK RESILIENCE
  // ==========================================
  max_retries: 3,
  base_retry_delay_ms: 1000,
  max_retry_delay_ms: 60_000,
  request_timeout_ms: 120_000,
  max_requests_per_minute: 60,
  max_tokens_per_minute: 100_000,
  rate_limit_scope: 'process',

  // ==========================================
  // SECURITY
  // ==========================================
  trusted_roots: [], // Empty means the working directory
  external_allowed_roots: [],
  excluded_glob_patterns: [...DEFAULT_EXCLUDED_PATTERNS],
  require_approval: true,
  allow_suspicious_commands: false,
};

export type ConfigValidationResult<T> =
  | { valid: true; coercedValue: T }
  | { valid: false; error: string };

type ConfigValidators = {
  [K in keyof Config]: (value: unknown) => ConfigValidationResult<Config[K]>;
};

function stringValue(value: unknown): ConfigValidationResult<string> {
  if (typeof value === 'string') {
    return { valid: true, coercedValue: value };
  }
  return { valid: false, error: `Expected string, got ${typeof value}` };
}

function nonEmptyString(value: unknown): ConfigValidationResult<string> {
  const result = stringValue(value);
  if (result.valid && result.coercedValue.trim() === '') {
    return { valid: false, error: 'Expected a non-empty string' };
  }
  return result;
}

/**
 * Numbers may arrive as strings from CLI flags
 */
function numberValue(options: { min?: number; max?: number; integer?: boolean } = {}) {
  return (value: unknown): ConfigValidationResult<number> => {
    let parsed: number;
    if (typeof value === 'number') {
      parsed = value;
    } else if (typeof value === 'string' && value.trim() !== '') {
      parsed = Number(value);
    } else {
      return { valid: false, error: `Expected number, got ${typeof value}` };
    }

    if (!Number.isFinite(parsed)) {
      return { valid: false, error: `Expected number, got ${JSON.stringify(value)}` };
    }
    if (options.integer && !Number.isInteger(parsed)) {
      return { valid: false, error: `Expected an integer, got ${parsed}` };
    }
    if (options.min !== undefined && parsed < options.min) {
      return { valid: false, error: `Must be at least ${options.min}` };
    }
    if (options.max !== undefined && parsed > options.max) {
      return { valid: false, error: `Must be at most ${options.max}` };
    }
    return { valid: true, coercedValue: parsed };
  };
}

function booleanValue(value: unknown): ConfigValidationResult<boolean> {
  if (typeof value === 'boolean') {
    return { valid: true, coercedValue: value };
  }
  if (typeof value === 'string') {
    const lower = value.toLowerCase();
    if (['true', 'yes', 'y', '1'].includes(lower)) {
      return { valid: true, coercedValue: true };
    }
    if (['false', 'no', 'n', '0'].includes(lower)) {
      return { valid: true, coercedValue: false };
    }
  }
  return { valid: false, error: `Expected boolean, got ${typeof value}` };
}

/**
 * Accepts an array of strings or a comma-separated string
 */
function stringListValue(value: unknown): ConfigValidationResult<string[]> {
  if (typeof value === 'string') {
    const items = value
      .split(',')
      .map(item => item.trim())
      .filter(item => item.length > 0);
    return { valid: true, coercedValue: items };
  }
  if (Array.isArray(value)) {
    const items: string[] = [];
    for (const item of value) {
      if (typeof item !== 'string') {
        return { valid: false, error: `Expected a list of strings, found ${typeof item}` };
      }
      items.push(item);
    }
    return { valid: true, coercedValue: items };
  }
  return { valid: false, error: `Expected a list of strings, got ${typeof value}` };
}

function rateLimitScopeValue(value: unknown): ConfigValidationResult<RateLimitScope> {
  if (value === 'process' || value === 'session') {
    return { valid: true, coercedValue: value };
  }
  return { valid: false, error: 'rate_limit_scope must be one of: process, session' };
}

const CONFIG_VALIDATORS: ConfigValidators = {
  endpoint: nonEmptyString,
  model: nonEmptyString,
  api_key_env: stringValue,
  temperature: numberValue({ min: 0, max: 2 }),
  max_tokens: numberValue({ min: 1, integer: true }),

  max_iterations: numberValue({ min: 1, integer: true }),
  tool_timeout_ms: numberValue({ min: 1, integer: true }),
  turn_timeout_ms: numberValue({ min: 0, integer: true }),

  max_retries: numberValue({ min: 0, integer: true }),
  base_retry_delay_ms: numberValue({ min: 0 }),
  max_retry_delay_ms: numberValue({ min: 0 }),
  request_timeout_ms: numberValue({ min: 1, integer: true }),
  max_requests_per_minute: numberValue({ min: 1, integer: true }),
  max_tokens_per_minute: numberValue({ min: 1, integer: true }),
  rate_limit_scope: rateLimitScopeValue,

  trusted_roots: stringListValue,
  external_allowed_roots: stringListValue,
  excluded_glob_patterns: stringListValue,
  require_approval: booleanValue,
  allow_suspicious_commands: booleanValue,
};

export function isConfigKey(key: string): key is keyof Config {
  return Object.prototype.hasOwnProperty.call(DEFAULT_CONFIG, key);
}

/**
 * Validate a configuration value against its expected type, coercing
 * string input where the intent is unambiguous
 */
export function validateConfigValue<K extends keyof Config>(
  key: K,
  value: unknown
): ConfigValidationResult<Config[K]> {
  return CONFIG_VALIDATORS[key](value);
}
