/**
 * Schedule Compiler Constants
 *
 * Week timeline dimensions and weekday naming shared by the validator,
 * the expander and the scheduler renderers.
 */

import type { Weekday } from '../types/schedule';

// =============================================================================
// Timeline
// =============================================================================

export const MINUTES_PER_HOUR = 60;

export const MINUTES_PER_DAY = 24 * MINUTES_PER_HOUR;

/** Length of the circular week timeline (Monday 00:00 = 0) */
export const MINUTES_PER_WEEK = 7 * MINUTES_PER_DAY;

/** Longest interval a single schedule can describe (23:59) */
export const MAX_INTERVAL_MINUTES = MINUTES_PER_DAY - 1;

// =============================================================================
// Weekdays
// =============================================================================

/** ISO weekdays in timeline order */
export const WEEKDAYS: readonly Weekday[] = [1, 2, 3, 4, 5, 6, 7];

export const WEEKDAY_NAMES: Record<Weekday, string> = {
  1: 'Monday',
  2: 'Tuesday',
  3: 'Wednesday',
  4: 'Thursday',
  5: 'Friday',
  6: 'Saturday',
  7: 'Sunday',
};

/**
 * Type guard for ISO weekday numbers
 */
export function isWeekday(value: unknown): value is Weekday {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= 7;
}

/**
 * Resolve a weekday name ("monday", "Mon", "SUN") to its ISO number.
 * Accepts the full name or any prefix of at least three letters.
 *
 * @returns ISO weekday, or null when the name is not recognised
 */
export function parseWeekdayName(name: string): Weekday | null {
  const normalized = name.trim().toLowerCase();
  if (normalized.length < 3) {
    return null;
  }
  for (const day of WEEKDAYS) {
    if (WEEKDAY_NAMES[day].toLowerCase().startsWith(normalized)) {
      return day;
    }
  }
  return null;
}

// =============================================================================
// Polling
// =============================================================================

/** Bounds for poll-interval-minutes */
export const MIN_POLL_INTERVAL_MINUTES = 1;
export const MAX_POLL_INTERVAL_MINUTES = MAX_INTERVAL_MINUTES;
