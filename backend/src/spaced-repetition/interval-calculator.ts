/**
 * Interval table lookup and due-date calculation.
 */

import { addDays, formatDate } from "./review-dates.js";

/**
 * Days until the next quiz, indexed by level.
 */
export const DEFAULT_INTERVALS: readonly number[] = [1, 3, 7, 14, 30, 60];

/**
 * Interval for a level. Levels past the end of the table use the last entry.
 *
 * @throws Error if the table is empty
 */
export function getIntervalDays(level: number, intervals: readonly number[] = DEFAULT_INTERVALS): number {
  if (intervals.length === 0) {
    throw new Error("Interval table is empty");
  }
  const index = Math.min(Math.max(level, 0), intervals.length - 1);
  return intervals[index];
}

/**
 * Local calendar date of `now` plus the level's interval, as YYYY-MM-DD.
 */
export function calculateNextQuizDate(
  level: number,
  intervals: readonly number[] = DEFAULT_INTERVALS,
  now: Date = new Date()
): string {
  return addDays(formatDate(now), getIntervalDays(level, intervals));
}
