/**
 * Calendar date helpers for review scheduling.
 *
 * All dates are local calendar dates in YYYY-MM-DD form. Nothing here reads
 * the clock; callers pass the reference time explicitly.
 */

/**
 * ISO 8601 date pattern (YYYY-MM-DD).
 */
export const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Format a Date object to YYYY-MM-DD string (local calendar date).
 */
export function formatDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

/**
 * Parse a YYYY-MM-DD string to a Date at local midnight.
 * Returns null if the string is invalid.
 */
export function parseDate(dateStr: string): Date | null {
  if (!DATE_PATTERN.test(dateStr)) {
    return null;
  }

  const [year, month, day] = dateStr.split("-").map(Number);
  const date = new Date(year, month - 1, day);

  // Reject dates that roll over (e.g. Feb 30)
  if (
    date.getFullYear() !== year ||
    date.getMonth() !== month - 1 ||
    date.getDate() !== day
  ) {
    return null;
  }

  return date;
}

/**
 * Add days to a date string and return the result in YYYY-MM-DD format.
 */
export function addDays(dateStr: string, days: number): string {
  const date = parseDate(dateStr);
  if (!date) {
    throw new Error(`Invalid date: ${dateStr}`);
  }

  date.setDate(date.getDate() + days);
  return formatDate(date);
}

/**
 * Day number of a local calendar date, independent of DST shifts.
 */
function dayNumber(date: Date): number {
  return Math.floor(Date.UTC(date.getFullYear(), date.getMonth(), date.getDate()) / MS_PER_DAY);
}

/**
 * Whole calendar days from `from` to `to` (negative when `to` is earlier).
 * Time of day is ignored.
 */
export function daysBetween(from: Date, to: Date): number {
  return dayNumber(to) - dayNumber(from);
}

/**
 * Compare two YYYY-MM-DD strings chronologically.
 * Returns null if either side is not a valid date.
 */
export function compareDates(a: string, b: string): number | null {
  const left = parseDate(a);
  const right = parseDate(b);
  if (!left || !right) {
    return null;
  }
  return dayNumber(left) - dayNumber(right);
}
