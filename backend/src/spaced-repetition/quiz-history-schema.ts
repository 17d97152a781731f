/**
 * Quiz History Schema
 *
 * Zod schemas and types for per-topic repetition state.
 * A topic is keyed by "<relative path>#<heading>".
 */

import { z } from "zod";
import {
  Q2EvaluationSchema,
  QuizPatternSchema,
  PendingQuizSchema,
  type LevelChange,
} from "@study-brief/shared";
import { DATE_PATTERN } from "./review-dates.js";

// =============================================================================
// Schemas
// =============================================================================

/**
 * One scored attempt at a topic.
 */
export const QuizResultSchema = z.object({
  /** ISO timestamp of scoring */
  date: z.string(),
  q1Correct: z.boolean(),
  q2Evaluation: Q2EvaluationSchema,
  pattern: QuizPatternSchema,
});

/**
 * Repetition state for one topic.
 */
export const QuizHistoryEntrySchema = z.object({
  level: z.number().int().min(0),
  intervalDays: z.number().int().min(0),
  nextQuizAt: z.string().regex(DATE_PATTERN, "Date must be YYYY-MM-DD format"),
  lastQuizzedAt: z.string(),
  results: z.array(QuizResultSchema),
});

export { PendingQuizSchema };

// =============================================================================
// Types
// =============================================================================

export type QuizResult = z.infer<typeof QuizResultSchema>;
export type QuizHistoryEntry = z.infer<typeof QuizHistoryEntrySchema>;
export type PendingQuiz = z.infer<typeof PendingQuizSchema>;

/**
 * Outcome of applying one scored attempt to a topic's level.
 */
export interface SchedulingUpdate {
  newLevel: number;
  newIntervalDays: number;
  /** YYYY-MM-DD */
  nextQuizAt: string;
  levelChange: LevelChange;
}

/**
 * Read-only view of stored history, keyed by topic.
 */
export interface QuizHistoryLookup {
  getQuizHistory(topicKey: string): QuizHistoryEntry | null;
}

/**
 * Settings the scheduler reads from configuration.
 */
export interface RepetitionConfig {
  maxLevel: number;
  intervals: readonly number[];
}
