/**
 * Path resolution for the CLI
 *
 * Resolves where the package is installed (for the bundled example config
 * and package.json) and the command line launchd runs at each trigger.
 */

import { readFileSync } from 'fs';
import path from 'path';
import { getConfigFilePath, getPlistPath } from '../../lib/env';

/** Example configuration shipped with the package */
export const EXAMPLE_CONFIG_FILE = 'config.example.json';

/**
 * Package root: two levels above src/cli/utils or dist/cli/utils
 */
export function getPackageRoot(): string {
  return path.resolve(__dirname, '..', '..', '..');
}

/**
 * Version from package.json ('0.0.0' if the field is missing)
 */
export function getPackageVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(path.join(getPackageRoot(), 'package.json'), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

/**
 * Compiled CLI entry point (dist/cli/index.js)
 */
export function getCliScriptPath(): string {
  return path.join(getPackageRoot(), 'dist', 'cli', 'index.js');
}

/**
 * Config file path from --config, falling back to WB_CONFIG_FILE / WB_CONFIG_DIR
 */
export function resolveConfigPath(option?: string): string {
  return option ? path.resolve(option) : getConfigFilePath();
}

/**
 * Property list path from --plist, falling back to WB_PLIST_PATH
 */
export function resolvePlistPath(option?: string): string {
  return option ? path.resolve(option) : getPlistPath();
}

/**
 * Arguments launchd (or cron) executes at every trigger
 */
export function getRunProgramArguments(configPath: string): string[] {
  return [process.execPath, getCliScriptPath(), 'run', '--config', configPath];
}
