/**
 * Schedule Compiler
 *
 * Validator + expander in one step. Returns an immutable CompiledSchedule
 * that the scheduler adapters consume; nothing here touches the OS.
 *
 * @module lib/schedule-compiler
 */

import { normalize } from './schedule-validator';
import { expand } from './trigger-expander';
import { createLogger } from './logger';
import type {
  BlockConfig,
  CompiledSchedule,
  NormalizedInterval,
} from '../types/schedule';

const logger = createLogger('schedule-compiler');

/**
 * Total minutes covered by a normalized interval set
 */
export function coveredMinutes(intervals: readonly NormalizedInterval[]): number {
  return intervals.reduce((sum, interval) => sum + interval.durationMinutes, 0);
}

/**
 * Compile a parsed configuration into intervals and triggers.
 *
 * Validation errors propagate unchanged; no partial schedule is ever
 * returned.
 *
 * @throws {InvalidTimeError | DegenerateIntervalError | OverlapError}
 */
export function compileSchedule(config: BlockConfig): CompiledSchedule {
  logger.debug('compile:start', { entries: config.blockSchedules.length });

  const intervals = Object.freeze(normalize(config.blockSchedules));
  const triggers = Object.freeze(
    expand(intervals, { pollIntervalMinutes: config.pollIntervalMinutes })
  );

  const compiled: CompiledSchedule = {
    username: config.username,
    selfcontrolPath: config.selfcontrolPath,
    ...(config.hostBlacklist !== undefined
      ? { hostBlacklist: Object.freeze([...config.hostBlacklist]) }
      : {}),
    legacyMode: config.legacyMode === true,
    intervals,
    triggers,
    totalBlockedMinutes: coveredMinutes(intervals),
  };

  logger.debug('compile:complete', {
    intervals: intervals.length,
    triggers: triggers.length,
    totalBlockedMinutes: compiled.totalBlockedMinutes,
  });

  return Object.freeze(compiled);
}
