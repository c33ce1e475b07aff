/**
 * Programme time retention
 */

import { MS_PER_DAY, MS_PER_HOUR } from '../utils';
import type { ProgrammeWindow, RetentionPolicy } from './types';

export const DEFAULT_RETENTION_POLICY: RetentionPolicy = {
  pastRetentionDays: 0,
  futureRetentionDays: 10,
  excludedChannelFutureLimitDays: 1,
  excludedChannelPastLimitHours: 1,
  fallbackWindowDays: 7,
};

/** Age limit of ended programmes under the permissive branch */
const PERMISSIVE_PAST_LIMIT_MS = 365 * MS_PER_DAY;

/**
 * Whether a programme with parsed start/stop survives the time filter.
 *
 * Three branches, first match decides:
 * - a past retention window is configured: bounded on both sides
 * - the channel is excluded: short window around now
 * - otherwise permissive
 */
export function shouldRetainProgramme(
  window: ProgrammeWindow,
  isExcludedChannel: boolean,
  policy: RetentionPolicy,
  nowMs: number
): boolean {
  const { startMs, stopMs } = window;
  const futureLimit = nowMs + policy.futureRetentionDays * MS_PER_DAY;

  if (policy.pastRetentionDays > 0) {
    const pastLimit = nowMs - policy.pastRetentionDays * MS_PER_DAY;
    return (stopMs >= pastLimit || startMs <= futureLimit) && (startMs >= pastLimit || stopMs >= pastLimit);
  }

  if (isExcludedChannel) {
    return (
      stopMs >= nowMs - policy.excludedChannelPastLimitHours * MS_PER_HOUR &&
      startMs <= nowMs + policy.excludedChannelFutureLimitDays * MS_PER_DAY
    );
  }

  return (
    stopMs >= nowMs ||
    startMs <= futureLimit ||
    nowMs - stopMs <= PERMISSIVE_PAST_LIMIT_MS ||
    (startMs <= nowMs && nowMs <= stopMs)
  );
}

/**
 * Fallback tier: programme airing now or starting within the fallback window
 */
export function isInFallbackWindow(
  window: ProgrammeWindow,
  policy: RetentionPolicy,
  nowMs: number
): boolean {
  const { startMs, stopMs } = window;
  if (startMs <= nowMs && nowMs <= stopMs) return true;
  return startMs >= nowMs && startMs <= nowMs + policy.fallbackWindowDays * MS_PER_DAY;
}
