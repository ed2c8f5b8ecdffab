/**
 * Crontab rendering
 *
 * Cron matches exact minute/hour/weekday tuples just like launchd's
 * StartCalendarInterval, so each trigger maps to one crontab line.
 * Intended for hosts without launchd.
 */

import { WEEKDAY_NAMES } from '../../config/schedule-config';
import { formatClock, formatMinutes } from '../week-time';
import type { CompiledSchedule, TriggerInstant } from '../../types/schedule';

/** Markers delimiting the managed block inside a user's crontab */
export const CRONTAB_BEGIN_MARKER = '# BEGIN weekblock';
export const CRONTAB_END_MARKER = '# END weekblock';

export interface CrontabOptions {
  /** Command run at every trigger (e.g. "/usr/local/bin/weekblock run") */
  command: string;
}

/**
 * Five-field cron expression for a trigger ("M H * * D", Sunday = 0)
 */
export function toCronExpression(trigger: Pick<TriggerInstant, 'weekday' | 'hour' | 'minute'>): string {
  return `${trigger.minute} ${trigger.hour} * * ${trigger.weekday % 7}`;
}

function describeTrigger(trigger: TriggerInstant): string {
  const when = `${WEEKDAY_NAMES[trigger.weekday]} ${formatClock(trigger.hour, trigger.minute)}`;
  if (trigger.action === 'stop') {
    return `stop ${when}`;
  }
  const label = trigger.reassert ? 'reassert' : 'start';
  return `${label} ${when} (${formatMinutes(trigger.durationMinutes)})`;
}

/**
 * Render the managed crontab block for a compiled schedule
 */
export function renderCrontab(compiled: CompiledSchedule, options: CrontabOptions): string {
  const lines = [CRONTAB_BEGIN_MARKER];
  for (const trigger of compiled.triggers) {
    lines.push(`# ${describeTrigger(trigger)}`);
    lines.push(`${toCronExpression(trigger)} ${options.command}`);
  }
  lines.push(CRONTAB_END_MARKER);
  return lines.join('\n') + '\n';
}

/**
 * Replace (or append) the managed block inside an existing crontab
 */
export function mergeCrontab(existing: string, block: string): string {
  const begin = existing.indexOf(CRONTAB_BEGIN_MARKER);
  const end = existing.indexOf(CRONTAB_END_MARKER);

  if (begin === -1 || end === -1 || end < begin) {
    const separator = existing === '' || existing.endsWith('\n') ? '' : '\n';
    return existing + separator + block;
  }

  const after = existing.slice(end + CRONTAB_END_MARKER.length).replace(/^\n/, '');
  return existing.slice(0, begin) + block + after;
}
