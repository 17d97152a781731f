/**
 * Hono application for the quiz answer endpoint
 *
 * Provides:
 * - Health check at /api/health
 * - Quiz routes under /api/quiz
 * - CORS for browsers viewing a briefing locally
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import { restErrorHandler } from "./middleware/error-handler.js";
import { createQuizRoutes, type QuizRouteDeps } from "./routes/quiz.js";

export const SERVICE_NAME = "Study Brief";

export type AppDeps = QuizRouteDeps;

/**
 * Create and configure the Hono application.
 */
export const createApp = (deps: AppDeps) => {
  const app = new Hono();

  app.use(
    "/api/*",
    cors({
      origin: "*",
      allowMethods: ["GET", "POST", "OPTIONS"],
      allowHeaders: ["Content-Type"],
    })
  );

  app.get("/api/health", (c) => {
    return c.text(SERVICE_NAME);
  });

  app.route("/api/quiz", createQuizRoutes(deps));

  app.onError(restErrorHandler);

  return app;
};
