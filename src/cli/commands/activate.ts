/**
 * Activate Command
 * Compile the configuration, install it as a launchd job, and start a
 * block right away when one of the schedules is active.
 */

import { existsSync } from 'fs';
import { ActivateOptions, ExitCode, getErrorMessage } from '../types';
import { CLILogger } from '../utils/logger';
import { failCommand } from '../utils/command-error';
import { getRunProgramArguments, resolveConfigPath, resolvePlistPath } from '../utils/paths';
import { createRuntime, requireRoot } from '../utils/runtime';
import { loadConfig, verifyHostEnvironment } from '../../lib/config-loader';
import { AlreadyRunningError, NoScheduleActiveError } from '../../lib/errors';
import { compileSchedule } from '../../lib/schedule-compiler';
import { renderLaunchdPlist } from '../../lib/scheduler/launchd';
import { formatMinutes } from '../../lib/week-time';

const logger = new CLILogger();

/**
 * Execute activate command
 */
export async function activateCommand(options: ActivateOptions): Promise<void> {
  try {
    requireRoot('activate');

    const configPath = resolveConfigPath(options.config);
    const config = loadConfig(configPath);

    const runtime = createRuntime();
    verifyHostEnvironment(config, {
      usernames: await runtime.selfcontrol.listUsernames(),
      pathExists: existsSync,
    });

    // Any validation error above leaves the installed job untouched
    const compiled = compileSchedule(config);
    logger.info(
      `Compiled ${compiled.intervals.length} interval(s), ${compiled.triggers.length} trigger(s), ` +
        `${formatMinutes(compiled.totalBlockedMinutes)} blocked per week`
    );

    const plist = renderLaunchdPlist(compiled, {
      programArguments: getRunProgramArguments(configPath),
    });
    const store = runtime.createStore(resolvePlistPath(options.plist));

    try {
      const result = await store.install(plist);
      logger.success(
        result.replaced
          ? `Replaced the existing schedule (${result.plistPath})`
          : `Schedule installed (${result.plistPath})`
      );
    } catch (error) {
      logger.error(`Failed to install schedule: ${getErrorMessage(error)}`);
      process.exit(ExitCode.INSTALL_FAILED);
      return;
    }

    try {
      const started = await runtime.selfcontrol.startBlock(compiled, new Date());
      logger.success(`Block started for ${formatMinutes(started.durationMinutes)}`);
    } catch (error) {
      if (error instanceof AlreadyRunningError || error instanceof NoScheduleActiveError) {
        logger.info(error.message);
      } else {
        throw error;
      }
    }

    process.exit(ExitCode.SUCCESS);
  } catch (error) {
    failCommand(logger, 'activate', error);
  }
}
