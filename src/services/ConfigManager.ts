/**
 * ConfigManager - Configuration loading and validation
 *
 * Resolution order (highest wins):
 * 1. CLI overrides
 * 2. Config file (~/.bastion/config.json or --config <file>)
 * 3. Default values (DEFAULT_CONFIG)
 *
 * The resulting snapshot is frozen: a session never re-reads configuration.
 */

import { promises as fs } from 'fs';
import type { Config } from '../types/index.js';
import { DEFAULT_CONFIG, isConfigKey, validateConfigValue } from '../config/defaults.js';
import { CONFIG_FILE } from '../config/paths.js';
import { formatError, isFileNotFoundError } from '../utils/errorUtils.js';
import { logger } from './Logger.js';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Assign one validated key; returns the validation error, if any
 */
function applyConfigValue<K extends keyof Config>(target: Config, key: K, value: unknown): string | undefined {
  const validated = validateConfigValue(key, value);
  if (validated.valid) {
    target[key] = validated.coercedValue;
    return undefined;
  }
  return validated.error;
}

function freezeConfig(config: Config): Readonly<Config> {
  Object.freeze(config.trusted_roots);
  Object.freeze(config.external_allowed_roots);
  Object.freeze(config.excluded_glob_patterns);
  return Object.freeze(config);
}

export class ConfigManager {
  private _config: Readonly<Config> | null = null;
  private readonly _configPath: string;
  private readonly _explicitPath: boolean;

  constructor(configPath?: string) {
    this._configPath = configPath || CONFIG_FILE;
    this._explicitPath = configPath !== undefined;
  }

  /**
   * Load the config file and apply CLI overrides
   *
   * Invalid file values fall back to defaults with a warning. Invalid
   * overrides are the user's direct input and raise a ConfigError.
   */
  async initialize(overrides: Record<string, unknown> = {}): Promise<Readonly<Config>> {
    const config: Config = {
      ...DEFAULT_CONFIG,
      trusted_roots: [...DEFAULT_CONFIG.trusted_roots],
      external_allowed_roots: [...DEFAULT_CONFIG.external_allowed_roots],
      excluded_glob_patterns: [...DEFAULT_CONFIG.excluded_glob_patterns],
    };

    const fileValues = await this.readConfigFile();
    for (const [key, value] of Object.entries(fileValues)) {
      if (!isConfigKey(key)) {
        logger.warn(`[CONFIG] Unknown key '${key}' in ${this._configPath}, ignoring`);
        continue;
      }
      const error = applyConfigValue(config, key, value);
      if (error) {
        logger.warn(`[CONFIG] Invalid value for ${key} in config file: ${error}. Using default.`);
      }
    }

    for (const [key, value] of Object.entries(overrides)) {
      if (value === undefined) {
        continue;
      }
      if (!isConfigKey(key)) {
        throw new ConfigError(`Unknown configuration key: ${key}`);
      }
      const error = applyConfigValue(config, key, value);
      if (error) {
        throw new ConfigError(`Invalid value for ${key}: ${error}`);
      }
    }

    if (config.max_retry_delay_ms < config.base_retry_delay_ms) {
      logger.warn('[CONFIG] max_retry_delay_ms is below base_retry_delay_ms; raising it to match');
      config.max_retry_delay_ms = config.base_retry_delay_ms;
    }

    this._config = freezeConfig(config);
    logger.debug('[CONFIG] Loaded configuration from', this._configPath);
    return this._config;
  }

  private async readConfigFile(): Promise<Record<string, unknown>> {
    let content: string;
    try {
      content = await fs.readFile(this._configPath, 'utf-8');
    } catch (error) {
      if (isFileNotFoundError(error) && !this._explicitPath) {
        return {};
      }
      throw new ConfigError(`Cannot read config file ${this._configPath}: ${formatError(error)}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new ConfigError(`Config file ${this._configPath} is not valid JSON: ${formatError(error)}`);
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new ConfigError(`Config file ${this._configPath} must contain a JSON object`);
    }
    return Object.fromEntries(Object.entries(parsed));
  }

  getConfig(): Readonly<Config> {
    if (!this._config) {
      throw new ConfigError('ConfigManager.initialize() must be called before getConfig()');
    }
    return this._config;
  }

  getValue<K extends keyof Config>(key: K): Config[K] {
    return this.getConfig()[key];
  }

  getConfigPath(): string {
    return this._configPath;
  }
}
