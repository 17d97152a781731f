/**
 * Local time formatting for prompts, file names and result sections.
 */

import { formatDate } from "../spaced-repetition/review-dates.js";

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * "YYYY-MM-DD HH:mm"
 */
export function formatDateTime(date: Date): string {
  return `${formatDate(date)} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

/**
 * "YYYY-MM-DD_HHmmss", used in briefing file names.
 */
export function formatFileStamp(date: Date): string {
  return `${formatDate(date)}_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}
