/**
 * launchd job installation
 *
 * Owns the property list file in /Library/LaunchDaemons (or WB_PLIST_PATH).
 * Installing always unloads and removes a previous definition first so the
 * scheduler never holds two generations of triggers.
 */

import { existsSync, readFileSync, unlinkSync, writeFileSync } from 'fs';
import { AppError, ErrorCode, getErrorMessage } from '../errors';
import { createLogger } from '../logger';
import { runChecked, type CommandRunner } from '../command-runner';

const logger = createLogger('launchd-store');

export interface InstallResult {
  /** A previous definition was unloaded and removed */
  replaced: boolean;
  plistPath: string;
}

/**
 * launchd-backed store for the compiled trigger definition
 */
export class LaunchdStore {
  constructor(
    private readonly plistPath: string,
    private readonly runner: CommandRunner
  ) {}

  get path(): string {
    return this.plistPath;
  }

  isInstalled(): boolean {
    return existsSync(this.plistPath);
  }

  /**
   * Contents of the installed definition, or null when none is installed
   */
  readInstalled(): string | null {
    if (!this.isInstalled()) {
      return null;
    }
    return readFileSync(this.plistPath, 'utf-8');
  }

  /**
   * Replace the installed definition with `plist` and load it
   *
   * @throws {AppError} FILESYSTEM_ERROR if the file cannot be written,
   *   COMMAND_FAILED if launchctl refuses to load it
   */
  async install(plist: string): Promise<InstallResult> {
    const replaced = await this.uninstall();

    try {
      writeFileSync(this.plistPath, plist, { encoding: 'utf-8', mode: 0o644 });
    } catch (error: unknown) {
      throw new AppError(
        ErrorCode.FILESYSTEM_ERROR,
        `Failed to write ${this.plistPath}: ${getErrorMessage(error)}`,
        { plistPath: this.plistPath }
      );
    }

    await runChecked(this.runner, 'launchctl', ['load', '-w', this.plistPath]);
    logger.info('install:loaded', { plistPath: this.plistPath, replaced });

    return { replaced, plistPath: this.plistPath };
  }

  /**
   * Unload and delete the installed definition
   *
   * @returns true if a definition was removed
   */
  async uninstall(): Promise<boolean> {
    if (!this.isInstalled()) {
      return false;
    }

    const result = await this.runner.run('launchctl', ['unload', '-w', this.plistPath]);
    if (result.exitCode !== 0) {
      // Not loaded (e.g. after a reboot with the job disabled); the file still goes
      logger.warn('uninstall:unload-failed', {
        plistPath: this.plistPath,
        exitCode: result.exitCode,
        stderr: result.stderr.trim(),
      });
    }

    unlinkSync(this.plistPath);
    logger.info('uninstall:removed', { plistPath: this.plistPath });
    return true;
  }
}
