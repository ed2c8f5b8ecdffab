/**
 * Status Command
 * Show whether the launchd job is installed, which schedule is active now
 * and when the next trigger fires.
 */

import { format } from 'date-fns';
import { ExitCode, StatusOptions } from '../types';
import { CLILogger } from '../utils/logger';
import { failCommand } from '../utils/command-error';
import { resolveConfigPath, resolvePlistPath } from '../utils/paths';
import { createRuntime } from '../utils/runtime';
import { loadConfig } from '../../lib/config-loader';
import { compileSchedule } from '../../lib/schedule-compiler';
import {
  findActiveInterval,
  nextTrigger,
  remainingMinutes,
} from '../../lib/schedule-activity';
import { describeSource, formatMinutes } from '../../lib/week-time';

const logger = new CLILogger();

export async function statusCommand(options: StatusOptions): Promise<void> {
  try {
    const store = createRuntime().createStore(resolvePlistPath(options.plist));
    const configPath = resolveConfigPath(options.config);
    const compiled = compileSchedule(loadConfig(configPath));
    const now = new Date();

    const active = findActiveInterval(compiled.intervals, now);
    const upcoming = nextTrigger(compiled, now);

    logger.header('weekblock status');
    logger.fields([
      ['Scheduler', store.isInstalled() ? `installed (${store.path})` : 'not installed'],
      ['Config', configPath],
      ['User', compiled.username],
      [
        'Active',
        active === null
          ? 'none'
          : `#${active.source.entry} ${describeSource(active.source)} (${formatMinutes(remainingMinutes(active, now))} left)`,
      ],
      [
        'Next',
        upcoming === null
          ? 'none'
          : `${upcoming.trigger.action} at ${format(upcoming.at, 'EEEE HH:mm')} (${format(upcoming.at, 'yyyy-MM-dd')})`,
      ],
      ['Weekly', formatMinutes(compiled.totalBlockedMinutes)],
    ]);

    process.exit(ExitCode.SUCCESS);
  } catch (error) {
    failCommand(logger, 'status', error);
  }
}
