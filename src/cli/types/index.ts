/**
 * CLI Common Type Definitions
 */

import { ErrorCode, isAppError, isUserConfigError } from '../../lib/errors';

/**
 * Exit codes for CLI commands
 */
export enum ExitCode {
  SUCCESS = 0,
  CONFIG_ERROR = 2,
  INSTALL_FAILED = 3,
  PERMISSION_ERROR = 4,
  UNEXPECTED_ERROR = 99,
}

/**
 * Options for activate command
 */
export interface ActivateOptions {
  /** Override config file path */
  config?: string;
  /** Override launchd property list path */
  plist?: string;
}

/**
 * Options for deactivate command
 */
export interface DeactivateOptions {
  plist?: string;
}

/**
 * Options for run command (invoked by launchd)
 */
export interface RunOptions {
  config?: string;
}

export const PREVIEW_FORMATS = ['table', 'json', 'plist', 'crontab'] as const;

export type PreviewFormat = (typeof PREVIEW_FORMATS)[number];

export function isPreviewFormat(value: unknown): value is PreviewFormat {
  return typeof value === 'string' && PREVIEW_FORMATS.some((format) => format === value);
}

/**
 * Options for preview command
 */
export interface PreviewOptions {
  config?: string;
  /** Output format (default: table) */
  format?: string;
}

/**
 * Options for status command
 */
export interface StatusOptions {
  config?: string;
  plist?: string;
}

/**
 * Options for config command
 */
export interface ConfigOptions {
  /** Open the file in an editor (false with --no-edit) */
  edit?: boolean;
}

/**
 * Map an error to the exit code a command should terminate with
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (isUserConfigError(error)) {
    return ExitCode.CONFIG_ERROR;
  }
  if (!isAppError(error)) {
    return ExitCode.UNEXPECTED_ERROR;
  }
  switch (error.code) {
    case ErrorCode.PERMISSION_DENIED:
      return ExitCode.PERMISSION_ERROR;
    case ErrorCode.COMMAND_FAILED:
    case ErrorCode.FILESYSTEM_ERROR:
      return ExitCode.INSTALL_FAILED;
    default:
      return ExitCode.UNEXPECTED_ERROR;
  }
}

export { getErrorMessage } from '../../lib/errors';
