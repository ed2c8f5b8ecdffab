/**
 * Structured logging utility for weekblock
 *
 * Features:
 * - Level filtering (WB_LOG_LEVEL) and text/json output (WB_LOG_FORMAT)
 * - Sensitive data filtering (sanitize)
 * - Context-attached child loggers (username, runId)
 *
 * Output goes to stderr so that commands printing machine-readable
 * results (preview --format json|plist|crontab) keep stdout clean.
 *
 * @example
 * ```typescript
 * const logger = createLogger('schedule-compiler');
 * logger.debug('compile:start', { entries: 3 });
 *
 * const log = logger.withContext({ username: 'alice', runId: generateRunId() });
 * log.info('block:started', { durationMinutes: 360 });
 * ```
 */

import { randomUUID } from 'crypto';
import { getLogConfig } from './env';

// ============================================================
// Type Definitions
// ============================================================

/**
 * Log level definition
 * debug < info < warn < error
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry
 */
export interface LogEntry {
  level: LogLevel;
  module: string;
  action: string;
  data?: Record<string, unknown>;
  timestamp: string;
  username?: string;
  runId?: string;
}

/**
 * Logger context
 */
export interface LoggerContext {
  username?: string;
  runId?: string;
}

/**
 * Logger instance type
 */
export interface Logger {
  debug: (action: string, data?: Record<string, unknown>) => void;
  info: (action: string, data?: Record<string, unknown>) => void;
  warn: (action: string, data?: Record<string, unknown>) => void;
  error: (action: string, data?: Record<string, unknown>) => void;
  /** Generate context-attached logger */
  withContext: (context: LoggerContext) => Logger;
}

// ============================================================
// Sensitive Data Filtering
// ============================================================

const SENSITIVE_PATTERNS: Array<{ pattern: RegExp; replacement: string }> = [
  { pattern: /Bearer\s+[A-Za-z0-9\-._~+/]+=*/gi, replacement: 'Bearer [REDACTED]' },
  { pattern: /(password|passwd|pwd)[=:]\s*\S+/gi, replacement: '$1=[REDACTED]' },
  { pattern: /(token|secret|api_key|apikey)[=:]\s*\S+/gi, replacement: '$1=[REDACTED]' },
];

const SENSITIVE_KEY_PATTERN = /password|secret|token/i;

/**
 * Sanitize value (mask sensitive data)
 */
function sanitize(value: unknown): unknown {
  if (typeof value === 'string') {
    let sanitized = value;
    for (const { pattern, replacement } of SENSITIVE_PATTERNS) {
      sanitized = sanitized.replace(pattern, replacement);
    }
    return sanitized;
  }

  if (typeof value === 'object' && value !== null) {
    if (Array.isArray(value)) {
      return value.map(sanitize);
    }
    const result: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      result[k] = SENSITIVE_KEY_PATTERN.test(k) ? '[REDACTED]' : sanitize(v);
    }
    return result;
  }

  return value;
}

function sanitizeData(data: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(data)) {
    result[k] = SENSITIVE_KEY_PATTERN.test(k) ? '[REDACTED]' : sanitize(v);
  }
  return result;
}

// ============================================================
// Log Level Control
// ============================================================

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ============================================================
// Log Output
// ============================================================

/**
 * Format log entry
 */
function formatLogEntry(entry: LogEntry, format: 'json' | 'text'): string {
  if (format === 'json') {
    return JSON.stringify(entry);
  }

  const { timestamp, level, module, action, data, username, runId } = entry;
  const contextStr = username ? ` [${username}]` : '';
  const runIdStr = runId ? ` (${runId.slice(0, 8)})` : '';
  const dataStr = data ? ` ${JSON.stringify(data)}` : '';

  return `[${timestamp}] [${level.toUpperCase()}] [${module}]${contextStr}${runIdStr} ${action}${dataStr}`;
}

/**
 * Execute log output
 */
function log(
  level: LogLevel,
  module: string,
  action: string,
  data?: Record<string, unknown>,
  context?: LoggerContext
): void {
  const config = getLogConfig();
  if (LOG_LEVELS[level] < LOG_LEVELS[config.level]) {
    return;
  }

  const entry: LogEntry = {
    level,
    module,
    action,
    timestamp: new Date().toISOString(),
    ...context,
    ...(data ? { data: sanitizeData(data) } : {}),
  };

  console.error(formatLogEntry(entry, config.format));
}

// ============================================================
// Run ID Generation
// ============================================================

/**
 * Generate an identifier for one CLI invocation (UUID v4)
 */
export function generateRunId(): string {
  return randomUUID();
}

// ============================================================
// Logger Factory
// ============================================================

/**
 * Create module-specific logger
 *
 * @param module - Module name (e.g., 'config-loader', 'launchd-store')
 */
export function createLogger(module: string): Logger {
  const createLoggerWithContext = (context?: LoggerContext): Logger => ({
    debug: (action, data) => log('debug', module, action, data, context),
    info: (action, data) => log('info', module, action, data, context),
    warn: (action, data) => log('warn', module, action, data, context),
    error: (action, data) => log('error', module, action, data, context),
    withContext: (newContext) => createLoggerWithContext({ ...context, ...newContext }),
  });

  return createLoggerWithContext();
}
