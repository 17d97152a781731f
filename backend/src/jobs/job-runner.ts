/**
 * Job Runner
 *
 * One run of a feature stream:
 * 1. Scan the input folders
 * 2. (quiz) Resolve quizzes left unanswered since the last run
 * 3. Select notes for run number `stored + 1`
 * 4. Build prompts and generate the briefing
 * 5. Write the briefing
 * 6. (quiz) Register the briefing's topics as pending quizzes
 * 7. Advance the run counter, stamp the run, slide the random pick window, save
 */

import type { BriefingFeature } from "@study-brief/shared";
import type { AppConfig } from "../app-config.js";
import { createLogger } from "../logger.js";
import type { StateStore } from "../state-store.js";
import { scanFolders } from "../notes/note-scanner.js";
import type { NoteRecord } from "../notes/note-record.js";
import { getRandomPickedPaths, selectNotes, type SelectionResult } from "../selection/file-selector.js";
import {
  buildNewsSystemPrompt,
  buildNewsUserPrompt,
  buildQuizSystemPrompt,
  buildQuizUserPrompt,
} from "../briefing/prompt-builder.js";
import { generateText } from "../briefing/briefing-generator.js";
import { resolveOutputFolder, writeBriefing } from "../briefing/briefing-writer.js";
import { extractTopics } from "../briefing/topic-extractor.js";
import { resolveUnansweredQuizzes } from "../quiz/quiz-scorer.js";
import { buildQuizScheduleInfo, formatDate, getDueTopics } from "../spaced-repetition/index.js";

const log = createLogger("job-runner");

// =============================================================================
// Types
// =============================================================================

export interface JobContext {
  config: AppConfig;
  store: StateStore;
  now?: () => Date;
  /** Uniform source for the weighted random picks */
  random?: () => number;
  retryDelaysMs?: readonly number[];
}

export type JobOutcome =
  | {
      status: "completed";
      feature: BriefingFeature;
      runCount: number;
      briefingFile: string;
      selectedCount: number;
      isDiscovery: boolean;
      /** Topic keys registered as pending quizzes */
      topicKeys: string[];
    }
  | { status: "skipped"; feature: BriefingFeature; reason: string }
  | { status: "failed"; feature: BriefingFeature; error: string; retriable: boolean };

interface Prompts {
  systemPrompt: string;
  userPrompt: string;
}

// =============================================================================
// Prompts
// =============================================================================

function buildPrompts(
  feature: BriefingFeature,
  context: JobContext,
  selection: SelectionResult,
  runCount: number,
  now: Date
): Prompts {
  const { config, store } = context;
  const input = {
    now,
    inputFolders: config.inputFolders,
    notes: selection.selected,
    maxContextTokens: config.llm.maxContextTokens,
  };

  if (feature === "news") {
    return {
      systemPrompt: buildNewsSystemPrompt(selection.isDiscovery),
      userPrompt: buildNewsUserPrompt(input),
    };
  }

  const dueTopics = config.quiz.spacedRepetition.enabled
    ? getDueTopics(store.getAllQuizHistory(), formatDate(now))
    : [];
  return {
    systemPrompt: buildQuizSystemPrompt(runCount, selection.isDiscovery),
    userPrompt: buildQuizUserPrompt({ ...input, scheduleInfo: buildQuizScheduleInfo(dueTopics) }),
  };
}

// =============================================================================
// Runs
// =============================================================================

async function runFeature(feature: BriefingFeature, context: JobContext): Promise<JobOutcome> {
  const { config, store } = context;
  const now = context.now?.() ?? new Date();

  if (config.inputFolders.length === 0) {
    log.warn(`${feature}: no input folders configured`);
    return { status: "skipped", feature, reason: "No input folders configured" };
  }

  const notes: NoteRecord[] = await scanFolders(config.inputFolders, {
    targetExtensions: config.targetExtensions,
    outputFolderName: config.outputFolderName,
    excludePatterns: config.excludePatterns,
  });
  if (notes.length === 0) {
    log.warn(`${feature}: no notes found`);
    return { status: "skipped", feature, reason: "No notes found in the input folders" };
  }

  if (feature === "quiz") {
    await resolveUnansweredQuizzes(store, config, now);
  }

  const runCount = store.getRunCount(feature) + 1;
  const selection = selectNotes(notes, {
    runCount,
    discoveryInterval: config.fileSelection.discoveryInterval,
    maxFiles: config.fileSelection.maxFiles,
    recentRandomPicks: store.getRandomPickHistory(),
    now,
    random: context.random,
  });
  if (selection.selected.length === 0) {
    return { status: "skipped", feature, reason: "No notes selected" };
  }

  const prompts = buildPrompts(feature, context, selection, runCount, now);
  const generation = await generateText({
    ...prompts,
    feature,
    model: config.llm.model,
    timeoutSeconds: config.llm.timeoutSeconds,
    retryDelaysMs: context.retryDelaysMs,
  });
  if (!generation.success) {
    log.error(`${feature}: generation failed: ${generation.error}`);
    return { status: "failed", feature, error: generation.error, retriable: generation.retriable };
  }
  if (!generation.text.trim()) {
    log.warn(`${feature}: empty briefing, nothing written`);
    return { status: "skipped", feature, reason: "The model returned an empty briefing" };
  }

  const outputFolder = await resolveOutputFolder(
    config.inputFolders,
    config.outputFolderName,
    store.getOutputFolderPath()
  );
  store.setOutputFolderPath(outputFolder);
  const briefingFile = await writeBriefing(generation.text, feature, outputFolder, now);

  const topicKeys: string[] = [];
  if (feature === "quiz") {
    for (const topic of extractTopics(generation.text)) {
      store.addPendingQuiz({
        briefingFile,
        topicKey: topic.topicKey,
        pattern: topic.pattern,
        createdAt: now.toISOString(),
      });
      topicKeys.push(topic.topicKey);
    }
    if (topicKeys.length === 0) {
      log.warn(`quiz: no topic markers found in ${briefingFile}`);
    }
  }

  store.incrementRunCount(feature);
  store.markRun(now);
  store.updateRandomPickHistory(getRandomPickedPaths(selection));
  await store.save();

  log.info(`${feature} run ${runCount} completed: ${briefingFile}`);
  return {
    status: "completed",
    feature,
    runCount,
    briefingFile,
    selectedCount: selection.selected.length,
    isDiscovery: selection.isDiscovery,
    topicKeys,
  };
}

export function runNewsJob(context: JobContext): Promise<JobOutcome> {
  return runFeature("news", context);
}

export function runQuizJob(context: JobContext): Promise<JobOutcome> {
  return runFeature("quiz", context);
}

export function runJob(feature: BriefingFeature, context: JobContext): Promise<JobOutcome> {
  return feature === "news" ? runNewsJob(context) : runQuizJob(context);
}
