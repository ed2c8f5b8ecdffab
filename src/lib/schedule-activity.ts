/**
 * Schedule Activity Lookup
 *
 * Answers "is a block active right now, and for how long?" against a
 * compiled schedule. Used by the `run` command when the scheduler fires and
 * by `status`.
 *
 * @module lib/schedule-activity
 */

import { Cron } from 'croner';
import { getHours, getISODay, getMinutes, getSeconds } from 'date-fns';
import { isWeekday } from '../config/schedule-config';
import { foldWeekOffset, toWeekOffset } from './week-time';
import { toCronExpression } from './scheduler/crontab';
import type {
  CompiledSchedule,
  NormalizedInterval,
  TriggerInstant,
} from '../types/schedule';

/**
 * Next trigger of a compiled schedule and when it fires
 */
export interface UpcomingTrigger {
  trigger: TriggerInstant;
  at: Date;
}

/**
 * Minute of week (local time) for a date
 */
export function weekOffsetOf(date: Date): number {
  const weekday = getISODay(date);
  if (!isWeekday(weekday)) {
    throw new RangeError(`Invalid date: ${String(date)}`);
  }
  return toWeekOffset(weekday, getHours(date), getMinutes(date));
}

/**
 * Minutes elapsed since the interval started, on the circular week
 */
function minutesSinceStart(interval: NormalizedInterval, offset: number): number {
  return foldWeekOffset(offset - interval.start);
}

/**
 * Whether the interval contains the given instant (half-open: the end
 * minute is not included)
 */
export function isIntervalActive(interval: NormalizedInterval, date: Date): boolean {
  return minutesSinceStart(interval, weekOffsetOf(date)) < interval.durationMinutes;
}

/**
 * Interval containing the instant, or null when no block is active
 */
export function findActiveInterval(
  intervals: readonly NormalizedInterval[],
  date: Date
): NormalizedInterval | null {
  return intervals.find((interval) => isIntervalActive(interval, date)) ?? null;
}

/**
 * Minutes left until the interval ends, rounded to the nearest minute.
 * Never less than 1, so a run fired in the last seconds still blocks.
 */
export function remainingMinutes(interval: NormalizedInterval, date: Date): number {
  const elapsedSeconds =
    minutesSinceStart(interval, weekOffsetOf(date)) * 60 + getSeconds(date);
  const remainingSeconds = interval.durationMinutes * 60 - elapsedSeconds;
  return Math.max(1, Math.round(remainingSeconds / 60));
}

/**
 * Next trigger to fire strictly after `from`.
 *
 * Each trigger is evaluated as its cron expression so the returned date
 * follows the local calendar (DST included).
 *
 * @returns null when the schedule has no triggers
 */
export function nextTrigger(compiled: CompiledSchedule, from: Date): UpcomingTrigger | null {
  let upcoming: UpcomingTrigger | null = null;

  for (const trigger of compiled.triggers) {
    const job = new Cron(toCronExpression(trigger), { paused: true });
    const at = job.nextRun(from);
    job.stop();

    if (at !== null && (upcoming === null || at.getTime() < upcoming.at.getTime())) {
      upcoming = { trigger, at };
    }
  }

  return upcoming;
}

/**
 * Whether a minute-of-week offset lies inside any interval
 */
export function isOffsetBlocked(intervals: readonly NormalizedInterval[], offset: number): boolean {
  const folded = foldWeekOffset(offset);
  return intervals.some((interval) => minutesSinceStart(interval, folded) < interval.durationMinutes);
}
