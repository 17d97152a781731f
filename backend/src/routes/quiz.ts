/**
 * Quiz Routes
 *
 * - POST /submit  - score answers to a quiz briefing
 * - GET  /pending - quizzes waiting for an answer
 * - GET  /due     - topics due for review (?today=YYYY-MM-DD)
 */

import { Hono } from "hono";
import {
  DueTopicsQuerySchema,
  formatValidationError,
  safeParseQuizSubmission,
  type DueTopicsResponse,
  type PendingQuizzesResponse,
  type QuizSubmissionResponse,
} from "@study-brief/shared";
import { jsonError } from "../middleware/error-handler.js";
import { createLogger } from "../logger.js";
import type { StateStore } from "../state-store.js";
import type { QuizScorer } from "../quiz/quiz-scorer.js";
import { formatDate, getDueTopics, parseDate } from "../spaced-repetition/index.js";

const log = createLogger("QuizRoutes");

export interface QuizRouteDeps {
  store: StateStore;
  scorer: QuizScorer;
  now?: () => Date;
}

export function createQuizRoutes(deps: QuizRouteDeps): Hono {
  const { store, scorer } = deps;
  const now = deps.now ?? (() => new Date());
  const routes = new Hono();

  routes.post("/submit", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return jsonError(c, 400, "VALIDATION_ERROR", "Invalid JSON body");
    }

    const parsed = safeParseQuizSubmission(body);
    if (!parsed.success) {
      return jsonError(c, 400, "VALIDATION_ERROR", formatValidationError(parsed.error));
    }

    log.info(`Scoring ${parsed.data.answers.length} answer(s) for ${parsed.data.briefingFile}`);
    const results = await scorer.score(parsed.data);
    const response: QuizSubmissionResponse = { results };
    return c.json(response);
  });

  routes.get("/pending", (c) => {
    const pending = store.getPendingQuizzes();
    const response: PendingQuizzesResponse = { pending, count: pending.length };
    return c.json(response);
  });

  routes.get("/due", (c) => {
    const parsed = DueTopicsQuerySchema.safeParse({ today: c.req.query("today") });
    if (!parsed.success) {
      return jsonError(c, 400, "VALIDATION_ERROR", formatValidationError(parsed.error));
    }

    const today = parsed.data.today ?? formatDate(now());
    if (!parseDate(today)) {
      return jsonError(c, 400, "VALIDATION_ERROR", `Invalid date: ${today}`);
    }

    const topics: DueTopicsResponse["topics"] = getDueTopics(store.getAllQuizHistory(), today).map(
      (topic) => ({
        topicKey: topic.topicKey,
        level: topic.level,
        intervalDays: topic.intervalDays,
        nextQuizAt: topic.nextQuizAt,
      })
    );
    const response: DueTopicsResponse = { today, topics, count: topics.length };
    return c.json(response);
  });

  return routes;
}
