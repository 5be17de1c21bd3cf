/**
 * Trimming constants shared by the CLI, planner and executor.
 */

export const SECONDS_PER_DAY = 24 * 60 * 60;
export const SECONDS_PER_WEEK = 7 * SECONDS_PER_DAY;

/** Weeks of recent data kept when --keep is not given. */
export const DEFAULT_KEEP_WEEKS = 4;

/** Countdown before a read-write run deletes anything. */
export const WARN_SECONDS = 5;

/**
 * First day countme data was collected (2020-04-20, a Monday, 00:00 UTC).
 * Only a sanity floor for generated test input; not enforced at runtime.
 */
export const COUNTME_START_TIME = 1587340800;

export const RAW_TABLE = 'countme_raw';
