/**
 * Run Command
 * Invoked by launchd at every trigger instant. Starts SelfControl for the
 * remainder of the active interval; at stop instants there is nothing
 * active and the run only logs.
 */

import { ExitCode, RunOptions } from '../types';
import { CLILogger } from '../utils/logger';
import { failCommand } from '../utils/command-error';
import { resolveConfigPath } from '../utils/paths';
import { createRuntime } from '../utils/runtime';
import { loadConfig } from '../../lib/config-loader';
import { AlreadyRunningError, NoScheduleActiveError } from '../../lib/errors';
import { createLogger, generateRunId } from '../../lib/logger';
import { compileSchedule } from '../../lib/schedule-compiler';
import { formatMinutes } from '../../lib/week-time';

const logger = new CLILogger();

export async function runCommand(options: RunOptions): Promise<void> {
  const log = createLogger('run').withContext({ runId: generateRunId() });

  try {
    const configPath = resolveConfigPath(options.config);
    const compiled = compileSchedule(loadConfig(configPath));
    const runLog = log.withContext({ username: compiled.username });
    runLog.info('run:start', { configPath });

    try {
      const started = await createRuntime().selfcontrol.startBlock(compiled, new Date());
      runLog.info('run:block-started', {
        entry: started.interval.source.entry,
        durationMinutes: started.durationMinutes,
      });
      logger.success(`Block started for ${formatMinutes(started.durationMinutes)}`);
    } catch (error) {
      if (error instanceof AlreadyRunningError || error instanceof NoScheduleActiveError) {
        runLog.info('run:skipped', { reason: error.code });
        logger.info(error.message);
      } else {
        throw error;
      }
    }

    process.exit(ExitCode.SUCCESS);
  } catch (error) {
    failCommand(logger, 'run', error);
  }
}
