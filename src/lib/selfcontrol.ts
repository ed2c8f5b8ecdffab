/**
 * SelfControl integration
 *
 * Reads and writes SelfControl's user defaults and launches its helper
 * binary. Settings are written as the configured user (`sudo -u`) because
 * the scheduler runs this tool as root.
 *
 * @module lib/selfcontrol
 */

import { format } from 'date-fns';
import path from 'path';
import {
  AlreadyRunningError,
  AppError,
  ErrorCode,
  NoScheduleActiveError,
} from './errors';
import { createLogger } from './logger';
import { runChecked, type CommandRunner } from './command-runner';
import { findActiveInterval, remainingMinutes } from './schedule-activity';
import type { CompiledSchedule, NormalizedInterval } from '../types/schedule';

const logger = createLogger('selfcontrol');

/** SelfControl's defaults domain */
export const SELFCONTROL_DOMAIN = 'org.eyebeam.SelfControl';

/** Helper binary inside the application bundle */
export const SELFCONTROL_BINARY = path.join('Contents', 'MacOS', 'org.eyebeam.SelfControl');

/** BlockStartedDate is reset to NSDate.distantFuture when no block runs */
const DISTANT_FUTURE_PREFIX = '4001-01-01';

/**
 * Settings applied before a block starts
 */
export interface BlockSettings {
  durationMinutes: number;
  blockAsWhitelist: boolean;
  hostBlacklist?: readonly string[];
  /** Older SelfControl releases need BlockStartedDate set by the caller */
  startedAt?: Date;
}

/**
 * Outcome of a scheduler-triggered start
 */
export interface StartedBlock {
  interval: NormalizedInterval;
  durationMinutes: number;
}

type DefaultsValue =
  | { type: 'int'; value: number }
  | { type: 'bool'; value: boolean }
  | { type: 'array'; value: readonly string[] }
  | { type: 'date'; value: Date };

function toDefaultsArgs(setting: DefaultsValue): string[] {
  switch (setting.type) {
    case 'int':
      return ['-int', String(setting.value)];
    case 'bool':
      return ['-bool', setting.value ? 'true' : 'false'];
    case 'array':
      return ['-array', ...setting.value];
    case 'date':
      return ['-date', format(setting.value, 'yyyy-MM-dd HH:mm:ss xx')];
  }
}

/**
 * Client for the SelfControl application and the macOS user database
 */
export class SelfControlClient {
  constructor(private readonly runner: CommandRunner) {}

  /**
   * Local account names (dscl . list /Users)
   */
  async listUsernames(): Promise<string[]> {
    const { stdout } = await runChecked(this.runner, 'dscl', ['.', 'list', '/Users']);
    return stdout
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }

  /**
   * Numeric uid of an account
   */
  async getUserId(username: string): Promise<number> {
    const { stdout } = await runChecked(this.runner, 'id', ['-u', username]);
    const uid = parseInt(stdout.trim(), 10);
    if (isNaN(uid)) {
      throw new AppError(ErrorCode.COMMAND_FAILED, `Could not resolve uid for ${username}`, { stdout });
    }
    return uid;
  }

  /**
   * Read one SelfControl default for the user
   *
   * @returns the printed value, or null when the key is not set
   */
  async readSetting(username: string, key: string): Promise<string | null> {
    const result = await this.runner.run('sudo', ['-u', username, 'defaults', 'read', SELFCONTROL_DOMAIN, key]);
    return result.exitCode === 0 ? result.stdout.trim() : null;
  }

  private async writeSetting(username: string, key: string, setting: DefaultsValue): Promise<void> {
    await runChecked(this.runner, 'sudo', [
      '-u',
      username,
      'defaults',
      'write',
      SELFCONTROL_DOMAIN,
      key,
      ...toDefaultsArgs(setting),
    ]);
  }

  /**
   * Whether a block is currently running for the user
   */
  async isRunning(username: string): Promise<boolean> {
    const started = await this.readSetting(username, 'BlockStartedDate');
    return started !== null && started !== '' && !started.startsWith(DISTANT_FUTURE_PREFIX);
  }

  /**
   * Write duration, whitelist mode, host list and (legacy) start date
   */
  async applySettings(username: string, settings: BlockSettings): Promise<void> {
    await this.writeSetting(username, 'BlockDuration', { type: 'int', value: settings.durationMinutes });
    await this.writeSetting(username, 'BlockAsWhitelist', { type: 'bool', value: settings.blockAsWhitelist });

    if (settings.hostBlacklist !== undefined) {
      await this.writeSetting(username, 'HostBlacklist', { type: 'array', value: settings.hostBlacklist });
    }

    if (settings.startedAt !== undefined) {
      await this.writeSetting(username, 'BlockStartedDate', { type: 'date', value: settings.startedAt });
    }

    logger.debug('settings:applied', {
      username,
      durationMinutes: settings.durationMinutes,
      blockAsWhitelist: settings.blockAsWhitelist,
      hosts: settings.hostBlacklist?.length ?? null,
    });
  }

  /**
   * Launch SelfControl's helper for the user
   */
  async launch(selfcontrolPath: string, username: string): Promise<void> {
    const uid = await this.getUserId(username);
    await runChecked(this.runner, path.join(selfcontrolPath, SELFCONTROL_BINARY), [String(uid), '--install']);
  }

  /**
   * Start a block for the interval active at `now`.
   * The interval's own host list wins over the global one.
   *
   * @throws {AlreadyRunningError} a block is already running
   * @throws {NoScheduleActiveError} no interval contains `now`
   */
  async startBlock(compiled: CompiledSchedule, now: Date): Promise<StartedBlock> {
    const { username } = compiled;

    if (await this.isRunning(username)) {
      throw new AlreadyRunningError();
    }

    const interval = findActiveInterval(compiled.intervals, now);
    if (interval === null) {
      throw new NoScheduleActiveError();
    }

    const durationMinutes = remainingMinutes(interval, now);
    const hostBlacklist = interval.hostBlacklist ?? compiled.hostBlacklist;

    await this.applySettings(username, {
      durationMinutes,
      blockAsWhitelist: interval.blockAsWhitelist === true,
      ...(hostBlacklist !== undefined ? { hostBlacklist } : {}),
      ...(compiled.legacyMode ? { startedAt: now } : {}),
    });
    await this.launch(compiled.selfcontrolPath, username);

    logger.info('block:started', { username, durationMinutes, entry: interval.source.entry });

    return { interval, durationMinutes };
  }
}
