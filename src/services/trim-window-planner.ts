/**
 * TrimWindowPlanner
 *
 * Derives the half-open [trimBegin, trimEnd) range to delete from the bounds
 * of the data currently stored and the retention policy.
 */

import { SECONDS_PER_WEEK } from '../config/constants';
import { nextWeek } from '../utils/time';

export type RetentionPolicy = Readonly<{
  keepWeeks: number;
  /** Trim only the oldest week of data, ignoring keepWeeks */
  includeOldestWeek: boolean;
}>;

export interface TrimWindow {
  trimBegin: number;
  trimEnd: number;
}

/**
 * Plan the window for data spanning [minTime, maxTime].
 *
 * trimEnd is not clamped to trimBegin: an empty or inverted window is still
 * returned, and counting or deleting it affects zero rows.
 */
export function planTrimWindow(minTime: number, maxTime: number, policy: RetentionPolicy): TrimWindow {
  const trimBegin = minTime;

  // TODO: switch to integer-second arithmetic once callers no longer depend
  // on the unaligned end; it currently carries through any fractional input.
  let trimEnd = maxTime - policy.keepWeeks * SECONDS_PER_WEEK;

  if (policy.includeOldestWeek) {
    trimEnd = nextWeek(minTime);
  }

  return { trimBegin, trimEnd };
}
