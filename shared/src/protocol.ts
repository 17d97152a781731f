/**
 * Study Brief Quiz Protocol
 *
 * Zod schemas for the local HTTP endpoint that receives quiz answers.
 */

import { z } from "zod";

// =============================================================================
// Enum Schemas
// =============================================================================

export const Q2EvaluationSchema = z.enum(["good", "partial", "poor"]);

export const QuizPatternSchema = z.enum(["learning", "review"]);

export const LevelChangeSchema = z.enum(["upgrade", "downgrade", "same"]);

export const ErrorCodeSchema = z.enum([
  "VALIDATION_ERROR",
  "FILE_NOT_FOUND",
  "TOPIC_NOT_FOUND",
  "SDK_ERROR",
  "SCORING_FAILED",
  "INTERNAL_ERROR",
]);

/**
 * YYYY-MM-DD calendar date.
 */
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

// =============================================================================
// Request Schemas
// =============================================================================

/**
 * One answered topic.
 */
export const QuizAnswerSchema = z.object({
  topicKey: z.string().min(1, "topicKey is required"),
  /** Choice for the multiple-choice question, e.g. "B" */
  q1Choice: z.string().trim().min(1, "q1Choice is required"),
  /** Free-form answer; may be empty when the user skipped it */
  q2Answer: z.string(),
});

/**
 * Body of POST /api/quiz/submit.
 */
export const QuizSubmissionSchema = z.object({
  briefingFile: z.string().min(1, "briefingFile is required"),
  answers: z.array(QuizAnswerSchema).min(1, "At least one answer is required"),
});

/**
 * Query of GET /api/quiz/due.
 */
export const DueTopicsQuerySchema = z.object({
  today: z.string().regex(DATE_PATTERN, "Date must be YYYY-MM-DD format").optional(),
});

// =============================================================================
// Response Schemas
// =============================================================================

/**
 * Scoring outcome for one topic.
 */
export const ScoredTopicSchema = z.object({
  topicKey: z.string(),
  q1Correct: z.boolean(),
  q1CorrectAnswer: z.string(),
  q1Explanation: z.string(),
  q2Evaluation: Q2EvaluationSchema,
  q2Feedback: z.string(),
  newLevel: z.number().int().min(0),
  newIntervalDays: z.number().int().min(0),
  nextQuizAt: z.string().regex(DATE_PATTERN),
  levelChange: LevelChangeSchema,
});

export const QuizSubmissionResponseSchema = z.object({
  results: z.array(ScoredTopicSchema),
});

export const PendingQuizSchema = z.object({
  briefingFile: z.string(),
  topicKey: z.string().min(1),
  pattern: QuizPatternSchema,
  createdAt: z.string(),
});

export const DueTopicSchema = z.object({
  topicKey: z.string(),
  level: z.number().int().min(0),
  intervalDays: z.number().int().min(0),
  nextQuizAt: z.string(),
});

/**
 * Body of GET /api/quiz/pending.
 */
export const PendingQuizzesResponseSchema = z.object({
  pending: z.array(PendingQuizSchema),
  count: z.number().int().min(0),
});

/**
 * Body of GET /api/quiz/due.
 */
export const DueTopicsResponseSchema = z.object({
  today: z.string().regex(DATE_PATTERN),
  topics: z.array(DueTopicSchema),
  count: z.number().int().min(0),
});

export const ErrorResponseSchema = z.object({
  error: z.object({
    code: ErrorCodeSchema,
    message: z.string().min(1, "Error message is required"),
  }),
});

// =============================================================================
// Types
// =============================================================================

export type QuizAnswer = z.infer<typeof QuizAnswerSchema>;
export type QuizSubmission = z.infer<typeof QuizSubmissionSchema>;
export type DueTopicsQuery = z.infer<typeof DueTopicsQuerySchema>;
export type ScoredTopic = z.infer<typeof ScoredTopicSchema>;
export type QuizSubmissionResponse = z.infer<typeof QuizSubmissionResponseSchema>;
export type PendingQuizzesResponse = z.infer<typeof PendingQuizzesResponseSchema>;
export type DueTopicsResponse = z.infer<typeof DueTopicsResponseSchema>;
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;

// =============================================================================
// Validation Utilities
// =============================================================================

/**
 * Parse and validate a quiz submission body.
 * @throws ZodError if validation fails
 */
export function parseQuizSubmission(data: unknown): QuizSubmission {
  return QuizSubmissionSchema.parse(data);
}

/**
 * Safely parse a quiz submission body, returning success/error result.
 */
export function safeParseQuizSubmission(data: unknown) {
  return QuizSubmissionSchema.safeParse(data);
}

/**
 * Format a Zod validation error into a single-line message.
 */
export function formatValidationError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}
