/**
 * Error Definitions
 *
 * Centralized error handling for the schedule compiler and the CLI.
 * User-configuration errors carry enough detail to fix the config file;
 * InternalConsistencyFault marks a defect and is never shown as a user error.
 *
 * @module errors
 */

import type { ScheduleSource } from '../types/schedule';
import { describeSource } from './week-time';

/**
 * Standard error codes used throughout the application
 */
export const ErrorCode = {
  // Schedule validation errors
  INVALID_TIME: 'INVALID_TIME',
  DEGENERATE_INTERVAL: 'DEGENERATE_INTERVAL',
  SCHEDULE_OVERLAP: 'SCHEDULE_OVERLAP',

  // Configuration errors
  CONFIG_ERROR: 'CONFIG_ERROR',

  // Blocker errors
  ALREADY_RUNNING: 'ALREADY_RUNNING',
  NO_SCHEDULE_ACTIVE: 'NO_SCHEDULE_ACTIVE',

  // System errors
  PERMISSION_DENIED: 'PERMISSION_DENIED',
  COMMAND_FAILED: 'COMMAND_FAILED',
  FILESYSTEM_ERROR: 'FILESYSTEM_ERROR',

  // Defects
  INTERNAL_CONSISTENCY: 'INTERNAL_CONSISTENCY',

  // Generic errors
  UNKNOWN_ERROR: 'UNKNOWN_ERROR',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Application-specific error class
 *
 * @example
 * ```typescript
 * throw new AppError(ErrorCode.CONFIG_ERROR, 'No username specified in config.', { path: 'username' });
 * ```
 */
export class AppError extends Error {
  /**
   * Error code
   */
  readonly code: string;

  /**
   * Additional details for logs and tests
   */
  readonly details?: Record<string, unknown>;

  /**
   * Timestamp when error occurred
   */
  readonly timestamp: string;

  constructor(
    code: string,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.details = details;
    this.timestamp = new Date().toISOString();

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Create a log-safe representation (includes details for debugging)
   */
  toLogError(): { code: string; message: string; details?: Record<string, unknown>; timestamp: string } {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
      timestamp: this.timestamp,
    };
  }
}

// =============================================================================
// Schedule validation errors
// =============================================================================

/**
 * Hour or minute outside its domain (or not an integer)
 */
export class InvalidTimeError extends AppError {
  readonly entry: number;
  readonly field: string;
  readonly value: unknown;

  constructor(entry: number, field: string, value: unknown, expected: string) {
    super(
      ErrorCode.INVALID_TIME,
      `Schedule #${entry}: ${field} must be ${expected}, got ${JSON.stringify(value)}`,
      { entry, field, value }
    );
    this.name = 'InvalidTimeError';
    this.entry = entry;
    this.field = field;
    this.value = value;
  }
}

/**
 * Start and end fall on the same minute, so the length is ambiguous
 * (zero minutes or a full day)
 */
export class DegenerateIntervalError extends AppError {
  readonly source: ScheduleSource;

  constructor(source: ScheduleSource) {
    super(
      ErrorCode.DEGENERATE_INTERVAL,
      `Schedule #${source.entry} (${describeSource(source)}) starts and ends at the same time`,
      { entry: source.entry }
    );
    this.name = 'DegenerateIntervalError';
    this.source = source;
  }
}

/**
 * Two schedules share at least one minute of the week
 */
export class OverlapError extends AppError {
  readonly first: ScheduleSource;
  readonly second: ScheduleSource;

  constructor(first: ScheduleSource, second: ScheduleSource, weekday: string) {
    super(
      ErrorCode.SCHEDULE_OVERLAP,
      `Schedule #${first.entry} (${describeSource(first)}) overlaps schedule #${second.entry} (${describeSource(second)}) on ${weekday}`,
      {
        entries: [first.entry, second.entry],
        weekday,
      }
    );
    this.name = 'OverlapError';
    this.first = first;
    this.second = second;
  }
}

// =============================================================================
// Configuration and runtime errors
// =============================================================================

/**
 * Single problem found in the configuration document
 */
export interface ConfigValidationIssue {
  /** Dotted path of the offending key (e.g. "block-schedules[2].start-hour") */
  path: string;
  message: string;
}

export class ConfigError extends AppError {
  readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[] = []) {
    super(ErrorCode.CONFIG_ERROR, message, { issues });
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class AlreadyRunningError extends AppError {
  constructor() {
    super(ErrorCode.ALREADY_RUNNING, 'SelfControl is already running.');
    this.name = 'AlreadyRunningError';
  }
}

export class NoScheduleActiveError extends AppError {
  constructor() {
    super(ErrorCode.NO_SCHEDULE_ACTIVE, 'No schedule is active at the moment.');
    this.name = 'NoScheduleActiveError';
  }
}

export class PermissionError extends AppError {
  constructor(message: string) {
    super(ErrorCode.PERMISSION_DENIED, message);
    this.name = 'PermissionError';
  }
}

/**
 * Raised when data that should have passed validation breaks an invariant.
 * Indicates a defect, not a configuration problem.
 */
export class InternalConsistencyFault extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.INTERNAL_CONSISTENCY, message, details);
    this.name = 'InternalConsistencyFault';
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Type guard to check if an error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * True for errors the user can fix by editing the configuration
 */
export function isUserConfigError(error: unknown): error is AppError {
  return (
    error instanceof InvalidTimeError ||
    error instanceof DegenerateIntervalError ||
    error instanceof OverlapError ||
    error instanceof ConfigError
  );
}

/**
 * Wrap unknown error into AppError
 *
 * @param error - Unknown error
 * @param defaultCode - Default error code if error is not AppError
 * @returns AppError instance
 */
export function wrapError(error: unknown, defaultCode: string = ErrorCode.UNKNOWN_ERROR): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(defaultCode, error.message, { originalError: error.name });
  }

  return new AppError(defaultCode, String(error));
}

/**
 * Get error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
