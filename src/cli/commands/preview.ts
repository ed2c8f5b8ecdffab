/**
 * Preview Command
 * Compile the configuration and print the result without installing
 * anything.
 */

import {
  ExitCode,
  PREVIEW_FORMATS,
  PreviewOptions,
  isPreviewFormat,
} from '../types';
import { CLILogger } from '../utils/logger';
import { failCommand } from '../utils/command-error';
import { getRunProgramArguments, resolveConfigPath } from '../utils/paths';
import { loadConfig } from '../../lib/config-loader';
import { compileSchedule } from '../../lib/schedule-compiler';
import { renderCrontab } from '../../lib/scheduler/crontab';
import { renderLaunchdPlist } from '../../lib/scheduler/launchd';
import {
  describeSource,
  formatMinutes,
  formatWeekOffset,
} from '../../lib/week-time';
import type { CompiledSchedule, TriggerInstant } from '../../types/schedule';

const logger = new CLILogger();

function formatIntervalRow(compiled: CompiledSchedule, index: number): string {
  const interval = compiled.intervals[index];
  if (interval === undefined) {
    return '';
  }
  const flags = [
    interval.blockAsWhitelist === true ? 'whitelist' : null,
    interval.hostBlacklist !== undefined ? `${interval.hostBlacklist.length} host(s)` : null,
  ].filter((flag): flag is string => flag !== null);

  const range = `${formatWeekOffset(interval.start)} - ${formatWeekOffset(interval.end)}`;
  const suffix = flags.length > 0 ? `  [${flags.join(', ')}]` : '';
  return `  ${range}  ${formatMinutes(interval.durationMinutes).padEnd(7)} #${interval.source.entry} ${describeSource(interval.source)}${suffix}`;
}

function formatTriggerRow(trigger: TriggerInstant): string {
  const when = formatWeekOffset(trigger.offset).padEnd(16);
  if (trigger.action === 'stop') {
    return `  ${when}stop`;
  }
  const label = trigger.reassert ? 'reassert' : 'start';
  return `  ${when}${label.padEnd(9)}${formatMinutes(trigger.durationMinutes)}`;
}

/**
 * Human-readable summary of a compiled schedule
 */
export function formatScheduleTable(compiled: CompiledSchedule): string {
  const lines = [
    `Intervals (${compiled.intervals.length}, ${formatMinutes(compiled.totalBlockedMinutes)} per week)`,
    ...compiled.intervals.map((_, index) => formatIntervalRow(compiled, index)),
    '',
    `Triggers (${compiled.triggers.length})`,
    ...compiled.triggers.map(formatTriggerRow),
  ];
  return lines.join('\n');
}

export async function previewCommand(options: PreviewOptions): Promise<void> {
  try {
    const format = options.format ?? 'table';
    if (!isPreviewFormat(format)) {
      logger.error(`Unknown format "${format}" (expected one of: ${PREVIEW_FORMATS.join(', ')})`);
      process.exit(ExitCode.CONFIG_ERROR);
      return;
    }

    const configPath = resolveConfigPath(options.config);
    const compiled = compileSchedule(loadConfig(configPath));

    switch (format) {
      case 'json':
        console.log(JSON.stringify(compiled, null, 2));
        break;
      case 'plist':
        process.stdout.write(
          renderLaunchdPlist(compiled, { programArguments: getRunProgramArguments(configPath) })
        );
        break;
      case 'crontab':
        process.stdout.write(
          renderCrontab(compiled, { command: getRunProgramArguments(configPath).join(' ') })
        );
        break;
      case 'table':
        console.log(formatScheduleTable(compiled));
        break;
    }

    process.exit(ExitCode.SUCCESS);
  } catch (error) {
    failCommand(logger, 'preview', error);
  }
}
