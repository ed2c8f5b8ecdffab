/**
 * weekblock library entry point
 */

export * from './types/schedule';
export * from './lib/errors';
export { normalize, toBlockSchedules } from './lib/schedule-validator';
export { expand, totalStartMinutes } from './lib/trigger-expander';
export { compileSchedule, coveredMinutes } from './lib/schedule-compiler';
export {
  findActiveInterval,
  isIntervalActive,
  isOffsetBlocked,
  nextTrigger,
  remainingMinutes,
  weekOffsetOf,
  type UpcomingTrigger,
} from './lib/schedule-activity';
export { loadConfig, parseConfig, verifyHostEnvironment, type HostFacts } from './lib/config-loader';
export { renderLaunchdPlist, type LaunchdPlistOptions } from './lib/scheduler/launchd';
export { renderCrontab, mergeCrontab, toCronExpression, type CrontabOptions } from './lib/scheduler/crontab';
export { LaunchdStore, type InstallResult } from './lib/scheduler/launchd-store';
export { SelfControlClient, type BlockSettings, type StartedBlock } from './lib/selfcontrol';
export {
  ExecFileRunner,
  runChecked,
  type CommandResult,
  type CommandRunner,
} from './lib/command-runner';
