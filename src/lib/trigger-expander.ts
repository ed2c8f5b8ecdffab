/**
 * Trigger Expander
 *
 * Expands validated intervals into the exact calendar instants at which the
 * OS scheduler must fire. Calendar triggers match a single
 * (weekday, hour, minute) tuple, never a range, so every interval becomes
 * one start instant and one stop instant (plus optional re-assertion
 * instants when polling is enabled).
 *
 * The expander has no user-facing errors: input that breaks a validator
 * invariant raises InternalConsistencyFault.
 *
 * @module lib/trigger-expander
 */

import { MAX_INTERVAL_MINUTES, MINUTES_PER_WEEK } from '../config/schedule-config';
import { InternalConsistencyFault } from './errors';
import { foldWeekOffset, fromWeekOffset } from './week-time';
import type {
  ExpandOptions,
  NormalizedInterval,
  StartTrigger,
  StopTrigger,
  TriggerInstant,
} from '../types/schedule';

/** Stop sorts before start on the same minute */
const ACTION_ORDER: Record<TriggerInstant['action'], number> = {
  stop: 0,
  start: 1,
};

// =============================================================================
// Invariant checks
// =============================================================================

function assertNormalized(intervals: readonly NormalizedInterval[]): void {
  intervals.forEach((interval, index) => {
    const { start, end, durationMinutes } = interval;
    if (!Number.isInteger(start) || start < 0 || start >= MINUTES_PER_WEEK) {
      throw new InternalConsistencyFault(`Interval ${index} starts outside the week`, { index, start });
    }
    if (durationMinutes !== end - start || durationMinutes < 1 || durationMinutes > MAX_INTERVAL_MINUTES) {
      throw new InternalConsistencyFault(`Interval ${index} has an invalid duration`, {
        index,
        start,
        end,
        durationMinutes,
      });
    }
    if (index > 0 && start < intervals[index - 1].end) {
      throw new InternalConsistencyFault(`Interval ${index} is unsorted or overlaps its predecessor`, {
        index,
        start,
        previousEnd: intervals[index - 1].end,
      });
    }
  });

  if (intervals.length > 1) {
    const last = intervals[intervals.length - 1];
    if (last.end - MINUTES_PER_WEEK > intervals[0].start) {
      throw new InternalConsistencyFault('Last interval wraps into the first one', {
        lastEnd: last.end,
        firstStart: intervals[0].start,
      });
    }
  }
}

function assertPollInterval(pollIntervalMinutes: number | undefined): void {
  if (
    pollIntervalMinutes !== undefined &&
    (!Number.isInteger(pollIntervalMinutes) || pollIntervalMinutes < 1)
  ) {
    throw new InternalConsistencyFault('Poll interval must be a positive integer', { pollIntervalMinutes });
  }
}

// =============================================================================
// Trigger construction
// =============================================================================

function startTrigger(
  offset: number,
  interval: number,
  durationMinutes: number,
  reassert: boolean
): StartTrigger {
  const folded = foldWeekOffset(offset);
  const trigger: StartTrigger = {
    action: 'start',
    ...fromWeekOffset(folded),
    offset: folded,
    interval,
    durationMinutes,
    reassert,
  };
  return Object.freeze(trigger);
}

function stopTrigger(offset: number, interval: number): StopTrigger {
  const folded = foldWeekOffset(offset);
  const trigger: StopTrigger = {
    action: 'stop',
    ...fromWeekOffset(folded),
    offset: folded,
    interval,
  };
  return Object.freeze(trigger);
}

function compareTriggers(a: TriggerInstant, b: TriggerInstant): number {
  return (
    a.offset - b.offset ||
    ACTION_ORDER[a.action] - ACTION_ORDER[b.action] ||
    a.interval - b.interval
  );
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Expand normalized intervals into calendar trigger instants.
 *
 * - One start instant per interval, carrying the full (unsplit) duration
 * - One stop instant at the interval end, folded onto the week
 * - With pollIntervalMinutes, re-assertion start instants every N minutes
 *   inside the interval, carrying the minutes remaining
 *
 * The result is ordered by minute of week. Instants that land on the same
 * minute are all kept, stop first.
 *
 * @throws {InternalConsistencyFault} if the input was not produced by normalize()
 *
 * @example
 * ```typescript
 * const triggers = expand(normalize([
 *   { weekday: 7, startHour: 23, startMinute: 0, endHour: 5, endMinute: 0 },
 * ]));
 * // => stop  Monday 05:00
 * //    start Sunday 23:00 (360 minutes)
 * ```
 */
export function expand(
  intervals: readonly NormalizedInterval[],
  options: ExpandOptions = {}
): TriggerInstant[] {
  assertNormalized(intervals);
  assertPollInterval(options.pollIntervalMinutes);

  const triggers: TriggerInstant[] = [];

  intervals.forEach((interval, index) => {
    triggers.push(startTrigger(interval.start, index, interval.durationMinutes, false));

    const step = options.pollIntervalMinutes;
    if (step !== undefined) {
      for (let offset = interval.start + step; offset < interval.end; offset += step) {
        triggers.push(startTrigger(offset, index, interval.end - offset, true));
      }
    }

    triggers.push(stopTrigger(interval.end, index));
  });

  return triggers.sort(compareTriggers);
}

/**
 * Sum of durations over primary start instants (re-assertions excluded)
 */
export function totalStartMinutes(triggers: readonly TriggerInstant[]): number {
  return triggers.reduce(
    (sum, trigger) =>
      trigger.action === 'start' && !trigger.reassert ? sum + trigger.durationMinutes : sum,
    0
  );
}
