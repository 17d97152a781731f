/**
 * Study Brief Backend
 *
 * Entry point. Starts:
 * - the cron scheduler for the news and quiz briefings
 * - the local HTTP endpoint that scores quiz answers
 *
 * `--run news|quiz|all` runs the given features once and exits instead.
 * A missing config file is created with the defaults on first start.
 */

import { serve } from "@hono/node-server";
import type { BriefingFeature } from "@study-brief/shared";
import { generateDefaultConfig, getConfigFilePath, loadConfig } from "./app-config.js";
import { readFileIfExists } from "./file-utils.js";
import { serverLog as log } from "./logger.js";
import { initializeSdkProvider } from "./sdk-provider.js";
import { StateStore } from "./state-store.js";
import { QuizScorer } from "./quiz/quiz-scorer.js";
import { runJob } from "./jobs/job-runner.js";
import { JobScheduler } from "./jobs/job-scheduler.js";
import { createApp } from "./server.js";

const RUN_TARGETS: Readonly<Record<string, BriefingFeature[]>> = {
  news: ["news"],
  quiz: ["quiz"],
  all: ["news", "quiz"],
};

function parseRunFlag(argv: readonly string[]): BriefingFeature[] | null {
  const index = argv.indexOf("--run");
  if (index === -1) {
    return null;
  }
  const target = argv[index + 1] ?? "all";
  const features = RUN_TARGETS[target];
  if (!features) {
    throw new Error(`Unknown --run target "${target}" (expected news, quiz or all)`);
  }
  return features;
}

async function main(): Promise<void> {
  const manualFeatures = parseRunFlag(process.argv.slice(2));

  if ((await readFileIfExists(getConfigFilePath())) === null) {
    log.warn(`No config at ${getConfigFilePath()}, writing defaults`);
    await generateDefaultConfig();
  }
  const config = await loadConfig();
  if (config.inputFolders.length === 0) {
    log.warn("No input folders configured; briefings will be skipped");
  }

  initializeSdkProvider();
  const store = await StateStore.load();
  const scheduler = new JobScheduler({
    runJob: (feature) => runJob(feature, { config, store }),
  });

  if (manualFeatures) {
    const outcomes = await scheduler.runNow(manualFeatures);
    for (const outcome of outcomes) {
      if (outcome?.status === "completed") {
        log.info(`Wrote ${outcome.briefingFile}`);
      }
    }
    return;
  }

  const app = createApp({ store, scorer: new QuizScorer({ store, config }) });
  const server = serve(
    { fetch: app.fetch, hostname: config.quiz.serverHost, port: config.quiz.serverPort },
    (info) => {
      log.info(`Quiz endpoint listening at http://${config.quiz.serverHost}:${info.port}`);
      log.info(`Health check at http://${config.quiz.serverHost}:${info.port}/api/health`);
    }
  );

  scheduler.start(config);
  const next = scheduler.nextRuns()[0];
  if (next) {
    log.info(`Next briefing at ${next.toLocaleString()}`);
  }

  const shutdown = (signal: string) => {
    log.info(`${signal} received, shutting down`);
    scheduler.stop();
    server.close();
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  log.error("Fatal error", error);
  process.exitCode = 1;
});
