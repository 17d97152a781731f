/**
 * Spaced Repetition Module
 *
 * Re-exports from spaced-repetition submodules for convenient access.
 */

// Scheduler (main API)
export {
  updateAfterScoring,
  getDueTopics,
  buildQuizScheduleInfo,
  type DueTopic,
} from "./repetition-scheduler.js";

// Level and interval rules
export { calculateNextLevel, DEFAULT_MAX_LEVEL } from "./level-calculator.js";
export {
  DEFAULT_INTERVALS,
  getIntervalDays,
  calculateNextQuizDate,
} from "./interval-calculator.js";

// History schema
export {
  QuizResultSchema,
  QuizHistoryEntrySchema,
  PendingQuizSchema,
  type QuizResult,
  type QuizHistoryEntry,
  type PendingQuiz,
  type SchedulingUpdate,
  type QuizHistoryLookup,
  type RepetitionConfig,
} from "./quiz-history-schema.js";

// Dates
export {
  DATE_PATTERN,
  formatDate,
  parseDate,
  addDays,
  daysBetween,
  compareDates,
} from "./review-dates.js";
