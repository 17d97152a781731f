/**
 * Study Brief Shared Types and Protocols
 *
 * This package contains:
 * - Zod schemas for the quiz answer endpoint
 * - Domain enums shared by the backend and its clients
 */

export const VERSION = "0.1.0";

// Core types
export type {
  Q2Evaluation,
  QuizPattern,
  LevelChange,
  BriefingFeature,
  ErrorCode,
} from "./types.js";

// Protocol schemas
export {
  Q2EvaluationSchema,
  QuizPatternSchema,
  LevelChangeSchema,
  ErrorCodeSchema,
  QuizAnswerSchema,
  QuizSubmissionSchema,
  DueTopicsQuerySchema,
  ScoredTopicSchema,
  QuizSubmissionResponseSchema,
  PendingQuizSchema,
  DueTopicSchema,
  PendingQuizzesResponseSchema,
  DueTopicsResponseSchema,
  ErrorResponseSchema,
  // Validation utilities
  parseQuizSubmission,
  safeParseQuizSubmission,
  formatValidationError,
} from "./protocol.js";

// Protocol types (inferred from Zod schemas)
export type {
  QuizAnswer,
  QuizSubmission,
  DueTopicsQuery,
  ScoredTopic,
  QuizSubmissionResponse,
  PendingQuizzesResponse,
  DueTopicsResponse,
  ErrorResponse,
} from "./protocol.js";
