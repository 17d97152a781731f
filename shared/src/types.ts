/**
 * Study Brief Shared Types
 *
 * Domain enums used by both the backend and clients of the quiz endpoint.
 */

/**
 * Qualitative evaluation of the free-form (Q2) answer.
 *
 * - good: the core points are explained correctly
 * - partial: on the right track but missing important elements
 * - poor: fundamentally wrong, or not an answer
 */
export type Q2Evaluation = "good" | "partial" | "poor";

/**
 * Whether a quiz topic was drawn from recent material ("learning")
 * or older material ("review").
 */
export type QuizPattern = "learning" | "review";

/**
 * Direction of a topic's level after scoring.
 */
export type LevelChange = "upgrade" | "downgrade" | "same";

/**
 * The two scheduled feature streams.
 *
 * - news: digest of what changed in the notes
 * - quiz: spaced-repetition quiz briefing
 */
export type BriefingFeature = "news" | "quiz";

/**
 * Error codes for the quiz HTTP protocol.
 */
export type ErrorCode =
  | "VALIDATION_ERROR"
  | "FILE_NOT_FOUND"
  | "TOPIC_NOT_FOUND"
  | "SDK_ERROR"
  | "SCORING_FAILED"
  | "INTERNAL_ERROR";
