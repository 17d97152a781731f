/**
 * Error Handling Middleware
 *
 * Hono error handler that maps domain exceptions to HTTP status codes with
 * JSON bodies of the form { error: { code, message } }.
 */

import type { Context, ErrorHandler } from "hono";
import type { ErrorCode, ErrorResponse } from "@study-brief/shared";
import { QuizScoringError } from "../quiz/quiz-scorer.js";
import { createLogger } from "../logger.js";

const log = createLogger("ErrorHandler");

export type ErrorStatus = 400 | 404 | 500 | 502;

/**
 * Send a JSON error response.
 */
export function jsonError(c: Context, status: ErrorStatus, code: ErrorCode, message: string) {
  const body: ErrorResponse = { error: { code, message } };
  return c.json(body, status);
}

/**
 * - VALIDATION_ERROR: 400
 * - FILE_NOT_FOUND, TOPIC_NOT_FOUND: 404
 * - SDK_ERROR, SCORING_FAILED: 502 (the model failed, not the request)
 * - INTERNAL_ERROR: 500
 */
export function mapErrorCodeToStatus(code: ErrorCode): ErrorStatus {
  switch (code) {
    case "VALIDATION_ERROR":
      return 400;
    case "FILE_NOT_FOUND":
    case "TOPIC_NOT_FOUND":
      return 404;
    case "SDK_ERROR":
    case "SCORING_FAILED":
      return 502;
    case "INTERNAL_ERROR":
      return 500;
  }
}

/**
 * Known errors are logged at warn; anything else at error with its stack.
 * Stacks never reach the response.
 */
export const restErrorHandler: ErrorHandler = (err, c) => {
  const method = c.req.method;
  const path = c.req.path;

  if (err instanceof QuizScoringError) {
    log.warn(`${method} ${path} - ${err.code}: ${err.message}`);
    return jsonError(c, mapErrorCodeToStatus(err.code), err.code, err.message);
  }

  log.error(`${method} ${path} - Unexpected error: ${err.message}`, { stack: err.stack });
  return jsonError(
    c,
    500,
    "INTERNAL_ERROR",
    "An unexpected error occurred. Please try again later."
  );
};
