/**
 * Week Timeline Helpers
 *
 * Conversions between (weekday, hour, minute) tuples and minute-of-week
 * offsets on the circular timeline where Monday 00:00 = 0.
 *
 * @module lib/week-time
 */

import {
  MINUTES_PER_DAY,
  MINUTES_PER_HOUR,
  MINUTES_PER_WEEK,
  WEEKDAY_NAMES,
  isWeekday,
} from '../config/schedule-config';
import type { ScheduleSource, Weekday } from '../types/schedule';

/**
 * Calendar position of a minute-of-week offset
 */
export interface WeekInstant {
  weekday: Weekday;
  hour: number;
  minute: number;
}

/**
 * Minutes since Monday 00:00 for the given weekday and time of day
 */
export function toWeekOffset(weekday: Weekday, hour: number, minute: number): number {
  return (weekday - 1) * MINUTES_PER_DAY + hour * MINUTES_PER_HOUR + minute;
}

/**
 * Fold any integer offset onto [0, MINUTES_PER_WEEK)
 */
export function foldWeekOffset(offset: number): number {
  return ((offset % MINUTES_PER_WEEK) + MINUTES_PER_WEEK) % MINUTES_PER_WEEK;
}

/**
 * Convert a minute offset (folded onto the week first) back into a calendar tuple
 */
export function fromWeekOffset(offset: number): WeekInstant {
  const folded = foldWeekOffset(offset);
  const dayIndex = Math.floor(folded / MINUTES_PER_DAY);
  const minuteOfDay = folded % MINUTES_PER_DAY;
  const weekday = dayIndex + 1;
  if (!isWeekday(weekday)) {
    throw new RangeError(`Weekday out of range: ${weekday}`);
  }
  return {
    weekday,
    hour: Math.floor(minuteOfDay / MINUTES_PER_HOUR),
    minute: minuteOfDay % MINUTES_PER_HOUR,
  };
}

/**
 * Zero-padded HH:MM
 */
export function formatClock(hour: number, minute: number): string {
  return `${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}`;
}

/**
 * "Sunday 23:00" style label for an offset
 */
export function formatWeekOffset(offset: number): string {
  const { weekday, hour, minute } = fromWeekOffset(offset);
  return `${WEEKDAY_NAMES[weekday]} ${formatClock(hour, minute)}`;
}

/**
 * Human-readable form of an authored schedule, e.g. "Monday 09:00-17:00"
 * or "every day 22:00-05:00"
 */
export function describeSource(source: ScheduleSource): string {
  const day = source.weekday === null ? 'every day' : WEEKDAY_NAMES[source.weekday];
  const start = formatClock(source.startHour, source.startMinute);
  const end = formatClock(source.endHour, source.endMinute);
  return `${day} ${start}-${end}`;
}

/**
 * Format a minute count as "6h", "8h 30m" or "45m"
 */
export function formatMinutes(total: number): string {
  const hours = Math.floor(total / MINUTES_PER_HOUR);
  const minutes = total % MINUTES_PER_HOUR;
  if (hours === 0) {
    return `${minutes}m`;
  }
  return minutes === 0 ? `${hours}h` : `${hours}h ${minutes}m`;
}
