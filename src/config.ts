/**
 * =============================================================================
 * Application Configuration
 *
 * All environment variable access happens here. Configuration is passed
 * to factories/services rather than reading globals deep inside functions.
 * =============================================================================
 */

import 'dotenv/config';
import { auditLog } from './core/audit-log';
import { createConfigError } from './core/errors';
import { AppError, SyncResult } from './core/types';

/**
 * Bot configuration
 */
export interface BotConfig {
  token: string;
}

/**
 * Reorder feature timings (all in milliseconds)
 */
export interface ReorderConfig {
  debounceMs: number;
  sessionTtlMs: number;
  warningCooldownMs: number;
  janitorIntervalMs: number;
  groupMaxAgeMs: number;
}

/**
 * Full application configuration
 */
export interface AppConfig {
  bot: BotConfig;
  reorder: ReorderConfig;
  nodeEnv: string;
}

/**
 * Configuration error codes
 */
export const CONFIG_ERROR_CODES = {
  MISSING_BOT_TOKEN: 'CONFIG_001',
} as const;

export const DEFAULT_REORDER_CONFIG: ReorderConfig = {
  debounceMs: 700,
  sessionTtlMs: 120_000,
  warningCooldownMs: 1_500,
  janitorIntervalMs: 30_000,
  groupMaxAgeMs: 30_000,
};

export type Env = Record<string, string | undefined>;

/**
 * Reads a required environment variable
 */
function requireEnv(env: Env, name: string, errorCode: string): SyncResult<string> {
  const value = env[name];
  if (!value) {
    const error = createConfigError(errorCode, `Missing required environment variable: ${name}`);
    auditLog.record(error.code, { message: error.message, variable: name });
    return [error, null];
  }
  return [null, value];
}

/**
 * Reads an optional environment variable with a default
 */
function optionalEnv(env: Env, name: string, defaultValue: string): string {
  return env[name] || defaultValue;
}

/**
 * Reads an optional positive integer with a default
 */
function optionalEnvNumber(env: Env, name: string, defaultValue: number): number {
  const value = env[name];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed <= 0 ? defaultValue : parsed;
}

/**
 * Loads and validates the application configuration.
 *
 * @param env - Variables to read; the process environment by default
 * @returns Result tuple with [error, config]
 */
export function loadConfig(env: Env = process.env): [AppError | null, AppConfig | null] {
  // Required: Bot token
  const [tokenError, token] = requireEnv(env, 'BOT_TOKEN', CONFIG_ERROR_CODES.MISSING_BOT_TOKEN);
  if (tokenError || !token) {
    return [tokenError, null];
  }

  const config: AppConfig = {
    bot: {
      token,
    },
    reorder: {
      debounceMs: optionalEnvNumber(env, 'DEBOUNCE_MS', DEFAULT_REORDER_CONFIG.debounceMs),
      sessionTtlMs: optionalEnvNumber(env, 'SESSION_TTL_MS', DEFAULT_REORDER_CONFIG.sessionTtlMs),
      warningCooldownMs: optionalEnvNumber(env, 'WARNING_COOLDOWN_MS', DEFAULT_REORDER_CONFIG.warningCooldownMs),
      janitorIntervalMs: optionalEnvNumber(env, 'JANITOR_INTERVAL_MS', DEFAULT_REORDER_CONFIG.janitorIntervalMs),
      groupMaxAgeMs: optionalEnvNumber(env, 'GROUP_MAX_AGE_MS', DEFAULT_REORDER_CONFIG.groupMaxAgeMs),
    },
    nodeEnv: optionalEnv(env, 'NODE_ENV', 'development'),
  };

  auditLog.trace('Configuration loaded successfully');

  return [null, config];
}
