/**
 * Schedule Validator
 *
 * Turns user-authored weekly block schedules into a sorted set of disjoint
 * half-open intervals on the circular week timeline. Validation is
 * all-or-nothing: the first problem found aborts with a typed error and
 * no partial result is returned.
 *
 * This module is a pure function of its input (no fs, no logging).
 *
 * @module lib/schedule-validator
 */

import {
  MINUTES_PER_DAY,
  MINUTES_PER_HOUR,
  MINUTES_PER_WEEK,
  WEEKDAYS,
  WEEKDAY_NAMES,
  isWeekday,
} from '../config/schedule-config';
import {
  DegenerateIntervalError,
  InvalidTimeError,
  OverlapError,
} from './errors';
import { fromWeekOffset, toWeekOffset } from './week-time';
import type {
  BlockSchedule,
  NormalizedInterval,
  ScheduleSource,
  Weekday,
} from '../types/schedule';

// =============================================================================
// Types
// =============================================================================

/** Piece of an interval that lies inside [0, MINUTES_PER_WEEK) */
interface Segment {
  from: number;
  to: number;
  interval: NormalizedInterval;
}

// =============================================================================
// Field validation
// =============================================================================

function assertInRange(
  entry: number,
  field: string,
  value: unknown,
  max: number
): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value > max) {
    throw new InvalidTimeError(entry, field, value, `an integer between 0 and ${max}`);
  }
  return value;
}

/**
 * Check the hour/minute domain of one entry and build its source reference.
 *
 * @param schedule - Authored schedule
 * @param entry - 1-based position in block-schedules
 */
function validateEntry(schedule: BlockSchedule, entry: number): ScheduleSource {
  const weekday = schedule.weekday ?? null;
  if (weekday !== null && !isWeekday(weekday)) {
    throw new InvalidTimeError(entry, 'weekday', weekday, 'a weekday between 1 (Monday) and 7 (Sunday)');
  }

  const source: ScheduleSource = {
    entry,
    weekday,
    startHour: assertInRange(entry, 'start-hour', schedule.startHour, 23),
    startMinute: assertInRange(entry, 'start-minute', schedule.startMinute, 59),
    endHour: assertInRange(entry, 'end-hour', schedule.endHour, 23),
    endMinute: assertInRange(entry, 'end-minute', schedule.endMinute, 59),
  };

  if (
    source.startHour === source.endHour &&
    source.startMinute === source.endMinute
  ) {
    throw new DegenerateIntervalError(source);
  }

  return source;
}

// =============================================================================
// Interval construction
// =============================================================================

/**
 * Length in minutes of an authored time range; wraps past midnight when
 * the end is not after the start.
 */
function durationOf(source: ScheduleSource): number {
  const startOfDay = source.startHour * MINUTES_PER_HOUR + source.startMinute;
  const endOfDay = source.endHour * MINUTES_PER_HOUR + source.endMinute;
  return endOfDay > startOfDay
    ? endOfDay - startOfDay
    : endOfDay + MINUTES_PER_DAY - startOfDay;
}

function toInterval(
  schedule: BlockSchedule,
  source: ScheduleSource,
  weekday: Weekday
): NormalizedInterval {
  const start = toWeekOffset(weekday, source.startHour, source.startMinute);
  const durationMinutes = durationOf(source);
  return Object.freeze({
    weekday,
    start,
    end: start + durationMinutes,
    durationMinutes,
    ...(schedule.blockAsWhitelist !== undefined ? { blockAsWhitelist: schedule.blockAsWhitelist } : {}),
    ...(schedule.hostBlacklist !== undefined ? { hostBlacklist: Object.freeze([...schedule.hostBlacklist]) } : {}),
    source,
  });
}

/**
 * Split intervals at the week boundary so every piece lies inside one week.
 */
function toSegments(intervals: readonly NormalizedInterval[]): Segment[] {
  const segments: Segment[] = [];
  for (const interval of intervals) {
    if (interval.end <= MINUTES_PER_WEEK) {
      segments.push({ from: interval.start, to: interval.end, interval });
    } else {
      segments.push({ from: interval.start, to: MINUTES_PER_WEEK, interval });
      segments.push({ from: 0, to: interval.end - MINUTES_PER_WEEK, interval });
    }
  }
  return segments.sort((a, b) => a.from - b.from || a.to - b.to);
}

/**
 * Fail with OverlapError on the first pair of segments sharing a minute.
 * Touching segments ([a, b) and [b, c)) are accepted.
 */
function assertDisjoint(intervals: readonly NormalizedInterval[]): void {
  const segments = toSegments(intervals);

  for (let i = 1; i < segments.length; i++) {
    const previous = segments[i - 1];
    const current = segments[i];
    if (current.from < previous.to) {
      const [first, second] =
        previous.interval.source.entry <= current.interval.source.entry
          ? [previous.interval.source, current.interval.source]
          : [current.interval.source, previous.interval.source];
      const weekday = WEEKDAY_NAMES[fromWeekOffset(current.from).weekday];
      throw new OverlapError(first, second, weekday);
    }
  }
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Validate and normalize a list of authored block schedules.
 *
 * Entries without a weekday are expanded into one interval per weekday.
 * The result is sorted by start offset and every interval is frozen.
 *
 * @throws {InvalidTimeError} hour/minute/weekday out of domain
 * @throws {DegenerateIntervalError} start and end on the same minute
 * @throws {OverlapError} two intervals share a minute, wraparound included
 *
 * @example
 * ```typescript
 * const intervals = normalize([
 *   { weekday: 7, startHour: 23, startMinute: 0, endHour: 5, endMinute: 0 },
 * ]);
 * // => [{ weekday: 7, start: 10020, end: 10380, durationMinutes: 360, ... }]
 * ```
 */
export function normalize(entries: readonly BlockSchedule[]): NormalizedInterval[] {
  const intervals: NormalizedInterval[] = [];

  entries.forEach((schedule, index) => {
    const source = validateEntry(schedule, index + 1);
    const weekdays = source.weekday === null ? WEEKDAYS : [source.weekday];
    for (const weekday of weekdays) {
      intervals.push(toInterval(schedule, source, weekday));
    }
  });

  assertDisjoint(intervals);

  return intervals.sort((a, b) => a.start - b.start);
}

/**
 * Convert a normalized interval set back into explicit per-weekday schedules.
 * normalize(toBlockSchedules(intervals)) yields the same ranges.
 */
export function toBlockSchedules(intervals: readonly NormalizedInterval[]): BlockSchedule[] {
  return intervals.map((interval) => {
    const start = fromWeekOffset(interval.start);
    const end = fromWeekOffset(interval.end);
    return {
      weekday: interval.weekday,
      startHour: start.hour,
      startMinute: start.minute,
      endHour: end.hour,
      endMinute: end.minute,
      ...(interval.blockAsWhitelist !== undefined ? { blockAsWhitelist: interval.blockAsWhitelist } : {}),
      ...(interval.hostBlacklist !== undefined ? { hostBlacklist: [...interval.hostBlacklist] } : {}),
    };
  });
}
