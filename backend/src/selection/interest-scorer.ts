/**
 * Interest Scorer
 *
 * Additive integer score for a note, computed from metadata only:
 * recency, priority, deadline proximity and open checklist items.
 */

import { createLogger } from "../logger.js";
import type { NoteRecord } from "../notes/note-record.js";
import { daysBetween, parseDate } from "../spaced-repetition/review-dates.js";

const log = createLogger("interest-scorer");

// =============================================================================
// Types
// =============================================================================

export type ScoreLabel =
  | "modified_today"
  | "modified_week"
  | "modified_month"
  | "priority_high"
  | "priority_medium"
  | "deadline_3days"
  | "deadline_7days"
  | "has_unchecked";

export interface ScoredNote {
  note: NoteRecord;
  score: number;
  /** Only the rules that fired */
  breakdown: Partial<Record<ScoreLabel, number>>;
}

// =============================================================================
// Constants
// =============================================================================

export const SCORE_POINTS: Readonly<Record<ScoreLabel, number>> = {
  modified_today: 50,
  modified_week: 30,
  modified_month: 10,
  priority_high: 30,
  priority_medium: 15,
  deadline_3days: 25,
  deadline_7days: 15,
  has_unchecked: 10,
};

const MS_PER_DAY = 24 * 60 * 60 * 1000;

// =============================================================================
// Rules
// =============================================================================

function recencyLabel(modifiedAt: Date | null, now: Date): ScoreLabel | null {
  if (!modifiedAt) return null;
  const elapsed = now.getTime() - modifiedAt.getTime();
  if (elapsed <= MS_PER_DAY) return "modified_today";
  if (elapsed <= 7 * MS_PER_DAY) return "modified_week";
  if (elapsed <= 30 * MS_PER_DAY) return "modified_month";
  return null;
}

function priorityLabel(priority: string): ScoreLabel | null {
  switch (priority.trim().toLowerCase()) {
    case "high":
      return "priority_high";
    case "medium":
      return "priority_medium";
    default:
      return null;
  }
}

function deadlineLabel(deadline: string | null, now: Date, relativePath: string): ScoreLabel | null {
  if (!deadline) return null;

  const date = parseDate(deadline);
  if (!date) {
    log.debug(`Unparsable deadline in ${relativePath}: ${deadline}`);
    return null;
  }

  const daysUntil = daysBetween(now, date);
  if (daysUntil < 0) return null;
  if (daysUntil <= 3) return "deadline_3days";
  if (daysUntil <= 7) return "deadline_7days";
  return null;
}

// =============================================================================
// Scoring
// =============================================================================

/**
 * Score a note relative to `now`.
 */
export function scoreNote(note: NoteRecord, now: Date): ScoredNote {
  const labels = [
    recencyLabel(note.modifiedAt, now),
    priorityLabel(note.priority),
    deadlineLabel(note.deadline, now, note.relativePath),
    note.uncheckedCount > 0 ? ("has_unchecked" as const) : null,
  ];

  let score = 0;
  const breakdown: Partial<Record<ScoreLabel, number>> = {};
  for (const label of labels) {
    if (label === null) continue;
    breakdown[label] = SCORE_POINTS[label];
    score += SCORE_POINTS[label];
  }

  return { note, score, breakdown };
}
