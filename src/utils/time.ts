/**
 * Week alignment helpers for trim windows.
 *
 * All timestamps are Unix epoch seconds; weeks start on Monday 00:00 UTC.
 */

import { SECONDS_PER_DAY, SECONDS_PER_WEEK } from '../config/constants';

// 1970-01-01 was a Thursday, three days after the Monday that starts its week.
const EPOCH_WEEKDAY_OFFSET = 3;

/**
 * Start of the week following the one containing `timestamp`.
 *
 * A timestamp that is itself Monday midnight yields the Monday after it, so
 * the result is always strictly later than the input.
 */
export function nextWeek(timestamp: number): number {
  const day = Math.floor(timestamp / SECONDS_PER_DAY);
  const weekday = (((day + EPOCH_WEEKDAY_OFFSET) % 7) + 7) % 7;
  const monday = day - weekday;
  return monday * SECONDS_PER_DAY + SECONDS_PER_WEEK;
}

/** UTC calendar date as YYYY-MM-DD, for display only. */
export function formatDate(timestamp: number): string {
  return new Date(timestamp * 1000).toISOString().slice(0, 10);
}
