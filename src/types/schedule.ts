/**
 * Weekly block-schedule type definitions
 *
 * Shared by the validator, the trigger expander and the scheduler adapters.
 * All minute offsets are measured from Monday 00:00 (local time).
 */

/**
 * ISO weekday number: 1 = Monday ... 7 = Sunday
 */
export type Weekday = 1 | 2 | 3 | 4 | 5 | 6 | 7;

/**
 * One user-authored block schedule (as it appears in the config file,
 * converted to camelCase).
 */
export interface BlockSchedule {
  /** Weekday the block starts on; null/undefined applies to every day */
  weekday?: Weekday | null;
  startHour: number;
  startMinute: number;
  endHour: number;
  endMinute: number;
  /** Treat the host list as a whitelist while this schedule is active */
  blockAsWhitelist?: boolean;
  /** Host list overriding the global blacklist for this schedule */
  hostBlacklist?: readonly string[];
}

/**
 * Reference back to the authored entry an interval was derived from
 */
export interface ScheduleSource {
  /** 1-based position of the entry in block-schedules */
  entry: number;
  /** Weekday as authored (null = every day) */
  weekday: Weekday | null;
  startHour: number;
  startMinute: number;
  endHour: number;
  endMinute: number;
}

/**
 * Validated half-open interval [start, end) on the circular week timeline.
 *
 * `end` may exceed MINUTES_PER_WEEK when the interval crosses
 * Sunday midnight; it is never split here.
 */
export interface NormalizedInterval {
  readonly weekday: Weekday;
  readonly start: number;
  readonly end: number;
  readonly durationMinutes: number;
  readonly blockAsWhitelist?: boolean;
  readonly hostBlacklist?: readonly string[];
  readonly source: ScheduleSource;
}

export type TriggerAction = 'start' | 'stop';

interface TriggerBase {
  readonly weekday: Weekday;
  readonly hour: number;
  readonly minute: number;
  /** Minute of week the trigger fires at */
  readonly offset: number;
  /** Index into CompiledSchedule.intervals */
  readonly interval: number;
}

export interface StartTrigger extends TriggerBase {
  readonly action: 'start';
  /** Minutes the blocking tool should run when started here */
  readonly durationMinutes: number;
  /** True for periodic re-assertion instants inside an interval */
  readonly reassert: boolean;
}

export interface StopTrigger extends TriggerBase {
  readonly action: 'stop';
}

export type TriggerInstant = StartTrigger | StopTrigger;

/**
 * Options accepted by the trigger expander
 */
export interface ExpandOptions {
  /** Emit re-assertion start triggers every N minutes inside each interval */
  pollIntervalMinutes?: number;
}

/**
 * Parsed configuration file
 */
export interface BlockConfig {
  username: string;
  selfcontrolPath: string;
  blockSchedules: BlockSchedule[];
  hostBlacklist?: string[];
  legacyMode?: boolean;
  pollIntervalMinutes?: number;
}

/**
 * Result of compiling a configuration. Frozen; handed to the
 * scheduler collaborators as-is.
 */
export interface CompiledSchedule {
  readonly username: string;
  readonly selfcontrolPath: string;
  readonly hostBlacklist?: readonly string[];
  readonly legacyMode: boolean;
  readonly intervals: readonly NormalizedInterval[];
  readonly triggers: readonly TriggerInstant[];
  readonly totalBlockedMinutes: number;
}
