/**
 * Environment variable configuration
 * Provides type-safe access to WB_* environment variables and the
 * default locations derived from them.
 *
 * Variables may also be set in <config dir>/.env (loaded by the CLI
 * through dotenv before any command runs).
 */

import path from 'path';
import { homedir } from 'os';

// ============================================================
// Environment Keys
// ============================================================

export const ENV_KEYS = [
  'WB_LOG_LEVEL',
  'WB_LOG_FORMAT',
  'WB_CONFIG_DIR',
  'WB_CONFIG_FILE',
  'WB_PLIST_PATH',
] as const;

export type EnvKey = (typeof ENV_KEYS)[number];

/**
 * Get environment variable value; empty strings count as unset
 */
export function getEnvByKey(key: EnvKey): string | undefined {
  const value = process.env[key];
  return value === undefined || value.trim() === '' ? undefined : value;
}

// ============================================================
// Log Configuration
// ============================================================

/**
 * Log level type (defined here to avoid circular dependency with logger.ts)
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log configuration
 */
export interface LogConfig {
  level: LogLevel;
  format: 'json' | 'text';
}

/**
 * Validate log level
 */
function isValidLogLevel(level: string | undefined): level is LogLevel {
  return level !== undefined && ['debug', 'info', 'warn', 'error'].includes(level);
}

/**
 * Get log configuration
 *
 * Defaults to `warn` so that scheduler-triggered runs stay quiet unless
 * WB_LOG_LEVEL asks for more.
 *
 * @example
 * ```typescript
 * process.env.WB_LOG_LEVEL = 'debug';
 * getLogConfig(); // { level: 'debug', format: 'text' }
 * ```
 */
export function getLogConfig(): LogConfig {
  const levelEnv = getEnvByKey('WB_LOG_LEVEL')?.toLowerCase();
  const formatEnv = getEnvByKey('WB_LOG_FORMAT')?.toLowerCase();

  return {
    level: isValidLogLevel(levelEnv) ? levelEnv : 'warn',
    format: formatEnv === 'json' ? 'json' : 'text',
  };
}

// ============================================================
// Paths
// ============================================================

/** launchd job label used for the installed definition */
export const LAUNCHD_LABEL = 'com.weekblock.scheduler';

/**
 * Directory holding config.json and .env
 * Default: ~/.config/weekblock
 */
export function getConfigDir(): string {
  return path.resolve(getEnvByKey('WB_CONFIG_DIR') ?? path.join(homedir(), '.config', 'weekblock'));
}

/**
 * Path to the JSON configuration file
 */
export function getConfigFilePath(): string {
  const override = getEnvByKey('WB_CONFIG_FILE');
  return override ? path.resolve(override) : path.join(getConfigDir(), 'config.json');
}

/**
 * Path to the optional .env file
 */
export function getEnvFilePath(): string {
  return path.join(getConfigDir(), '.env');
}

/**
 * Path of the launchd property list installed by `activate`
 * Default: /Library/LaunchDaemons/com.weekblock.scheduler.plist
 */
export function getPlistPath(): string {
  const override = getEnvByKey('WB_PLIST_PATH');
  return override
    ? path.resolve(override)
    : path.join('/Library', 'LaunchDaemons', `${LAUNCHD_LABEL}.plist`);
}
