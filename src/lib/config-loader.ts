/**
 * Configuration Loader
 *
 * Reads config.json and converts it into a BlockConfig. Shape problems are
 * collected (not thrown one by one) and reported together in a single
 * ConfigError. Time ranges are left to the schedule validator, which
 * raises the typed schedule errors.
 *
 * Example document:
 * ```json
 * {
 *   "username": "alice",
 *   "selfcontrol-path": "/Applications/SelfControl.app",
 *   "host-blacklist": ["news.example.com"],
 *   "block-schedules": [
 *     { "weekday": 1, "start-hour": 9, "start-minute": 0, "end-hour": 17, "end-minute": 30 }
 *   ]
 * }
 * ```
 */

import { existsSync, readFileSync } from 'fs';
import {
  MAX_POLL_INTERVAL_MINUTES,
  MIN_POLL_INTERVAL_MINUTES,
  isWeekday,
  parseWeekdayName,
} from '../config/schedule-config';
import { ConfigError, getErrorMessage, type ConfigValidationIssue } from './errors';
import { createLogger } from './logger';
import type { BlockConfig, BlockSchedule, Weekday } from '../types/schedule';

const logger = createLogger('config-loader');

/** Time fields every schedule must define */
const TIME_FIELDS = [
  ['start-hour', 'startHour'],
  ['start-minute', 'startMinute'],
  ['end-hour', 'endHour'],
  ['end-minute', 'endMinute'],
] as const;

// =============================================================================
// Helpers
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function formatIssues(issues: ConfigValidationIssue[]): string {
  return issues.map((issue) => `  - ${issue.path}: ${issue.message}`).join('\n');
}

/**
 * Resolve the weekday key of a schedule (number, name or null)
 */
function parseWeekday(
  value: unknown,
  path: string,
  issues: ConfigValidationIssue[]
): Weekday | null {
  if (value === undefined || value === null) {
    return null;
  }
  if (isWeekday(value)) {
    return value;
  }
  if (typeof value === 'string') {
    const weekday = parseWeekdayName(value);
    if (weekday !== null) {
      return weekday;
    }
  }
  issues.push({
    path,
    message: `expected 1 (Monday) to 7 (Sunday), a weekday name or null, got ${JSON.stringify(value)}`,
  });
  return null;
}

function parseSchedule(
  raw: unknown,
  index: number,
  issues: ConfigValidationIssue[]
): BlockSchedule | null {
  const base = `block-schedules[${index}]`;
  if (!isRecord(raw)) {
    issues.push({ path: base, message: 'expected an object' });
    return null;
  }

  const issueCount = issues.length;
  const weekday = parseWeekday(raw['weekday'], `${base}.weekday`, issues);

  const times = { startHour: 0, startMinute: 0, endHour: 0, endMinute: 0 };
  for (const [key, field] of TIME_FIELDS) {
    const value = raw[key];
    if (typeof value !== 'number') {
      issues.push({
        path: `${base}.${key}`,
        message: value === undefined ? 'is required' : `expected a number, got ${JSON.stringify(value)}`,
      });
      continue;
    }
    times[field] = value;
  }

  const blockAsWhitelist = raw['block-as-whitelist'];
  if (blockAsWhitelist !== undefined && blockAsWhitelist !== null && typeof blockAsWhitelist !== 'boolean') {
    issues.push({ path: `${base}.block-as-whitelist`, message: 'expected a boolean' });
  }

  const hostBlacklist = raw['host-blacklist'];
  if (hostBlacklist !== undefined && hostBlacklist !== null && !isStringArray(hostBlacklist)) {
    issues.push({ path: `${base}.host-blacklist`, message: 'expected an array of host names' });
  }

  if (issues.length > issueCount) {
    return null;
  }

  return {
    weekday,
    ...times,
    ...(typeof blockAsWhitelist === 'boolean' ? { blockAsWhitelist } : {}),
    ...(isStringArray(hostBlacklist) ? { hostBlacklist } : {}),
  };
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Validate the shape of a parsed config document
 *
 * @throws {ConfigError} listing every problem found
 */
export function parseConfig(raw: unknown): BlockConfig {
  if (!isRecord(raw)) {
    throw new ConfigError('Configuration must be a JSON object.', [
      { path: '(root)', message: 'expected an object' },
    ]);
  }

  const issues: ConfigValidationIssue[] = [];

  const username = raw['username'];
  if (typeof username !== 'string' || username.trim() === '') {
    issues.push({ path: 'username', message: 'No username specified in config.' });
  }

  const selfcontrolPath = raw['selfcontrol-path'];
  if (typeof selfcontrolPath !== 'string' || selfcontrolPath.trim() === '') {
    issues.push({
      path: 'selfcontrol-path',
      message: 'is required and must point to the location of SelfControl.',
    });
  }

  const rawSchedules = raw['block-schedules'];
  const blockSchedules: BlockSchedule[] = [];
  if (!Array.isArray(rawSchedules)) {
    issues.push({ path: 'block-schedules', message: 'is required.' });
  } else if (rawSchedules.length === 0) {
    issues.push({ path: 'block-schedules', message: 'You need at least one schedule.' });
  } else {
    rawSchedules.forEach((item, index) => {
      const schedule = parseSchedule(item, index, issues);
      if (schedule !== null) {
        blockSchedules.push(schedule);
      }
    });
  }

  const hostBlacklist = raw['host-blacklist'];
  if (hostBlacklist !== undefined && !isStringArray(hostBlacklist)) {
    issues.push({ path: 'host-blacklist', message: 'expected an array of host names' });
  }

  const legacyMode = raw['legacy-mode'];
  if (legacyMode !== undefined && legacyMode !== null && typeof legacyMode !== 'boolean') {
    issues.push({ path: 'legacy-mode', message: 'expected a boolean' });
  }

  const pollInterval = raw['poll-interval-minutes'];
  if (
    pollInterval !== undefined &&
    pollInterval !== null &&
    (typeof pollInterval !== 'number' ||
      !Number.isInteger(pollInterval) ||
      pollInterval < MIN_POLL_INTERVAL_MINUTES ||
      pollInterval > MAX_POLL_INTERVAL_MINUTES)
  ) {
    issues.push({
      path: 'poll-interval-minutes',
      message: `expected an integer between ${MIN_POLL_INTERVAL_MINUTES} and ${MAX_POLL_INTERVAL_MINUTES}`,
    });
  }

  if (issues.length > 0 || typeof username !== 'string' || typeof selfcontrolPath !== 'string') {
    throw new ConfigError(`Invalid configuration:\n${formatIssues(issues)}`, issues);
  }

  if (hostBlacklist === undefined) {
    logger.warn('config:no-host-blacklist', {
      message: "It is not recommended to directly use SelfControl's blacklist. Please use the 'host-blacklist' setting instead.",
    });
  }

  return {
    username,
    selfcontrolPath,
    blockSchedules,
    ...(isStringArray(hostBlacklist) ? { hostBlacklist } : {}),
    ...(typeof legacyMode === 'boolean' ? { legacyMode } : {}),
    ...(typeof pollInterval === 'number' ? { pollIntervalMinutes: pollInterval } : {}),
  };
}

/**
 * Read and parse a config file
 *
 * @throws {ConfigError} if the file is missing, not JSON, or malformed
 */
export function loadConfig(filePath: string): BlockConfig {
  if (!existsSync(filePath)) {
    throw new ConfigError(
      `Configuration file not found: ${filePath}. Run "weekblock config" to create one.`
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error: unknown) {
    throw new ConfigError(`Could not read ${filePath}: ${getErrorMessage(error)}`);
  }

  logger.debug('config:loaded', { filePath });
  return parseConfig(raw);
}

/**
 * Facts about the host needed to verify a config before installing it
 */
export interface HostFacts {
  usernames: readonly string[];
  pathExists: (path: string) => boolean;
}

/**
 * Check the config against the machine it is about to be installed on
 *
 * @throws {ConfigError} unknown user or missing SelfControl bundle
 */
export function verifyHostEnvironment(config: BlockConfig, host: HostFacts): void {
  const issues: ConfigValidationIssue[] = [];

  if (!host.usernames.includes(config.username)) {
    issues.push({
      path: 'username',
      message:
        `Username '${config.username}' unknown. Please use your macOS username instead. ` +
        "If you have trouble finding it, just enter the command 'whoami' in your terminal.",
    });
  }

  if (!host.pathExists(config.selfcontrolPath)) {
    issues.push({
      path: 'selfcontrol-path',
      message:
        "The setting 'selfcontrol-path' does not point to the correct location of SelfControl. " +
        "Please make sure to use an absolute path and include the '.app' extension, " +
        'e.g. /Applications/SelfControl.app',
    });
  }

  if (issues.length > 0) {
    throw new ConfigError(`Invalid configuration:\n${formatIssues(issues)}`, issues);
  }
}
