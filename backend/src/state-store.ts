/**
 * State Store
 *
 * Persists run counters, the random pick window, pending quizzes and
 * per-topic quiz history in ~/.config/study-brief/state.json.
 *
 * Mutations are in memory; call save() to persist. Saves use the
 * temp-file + rename pattern and keep state.json.bak. Load falls back to
 * the backup, then to an empty state.
 */

import { join } from "node:path";
import { z } from "zod";
import type { BriefingFeature } from "@study-brief/shared";
import { createLogger } from "./logger.js";
import { getConfigDir, readWithBackupFallback, writeFileAtomic } from "./file-utils.js";
import {
  PendingQuizSchema,
  QuizHistoryEntrySchema,
  type PendingQuiz,
  type QuizHistoryEntry,
  type QuizHistoryLookup,
  type QuizResult,
  type SchedulingUpdate,
} from "./spaced-repetition/index.js";

const log = createLogger("state-store");

/**
 * State file name.
 */
const STATE_FILE = "state.json";

/**
 * Random picks are remembered for this many runs.
 */
export const RANDOM_PICK_WINDOW_RUNS = 3;

/**
 * Hard cap on remembered random picks.
 */
export const RANDOM_PICK_HISTORY_LIMIT = 60;

// =============================================================================
// Schema
// =============================================================================

export const AppStateSchema = z.object({
  runCounts: z
    .object({
      news: z.number().int().min(0).default(0),
      quiz: z.number().int().min(0).default(0),
    })
    .default({}),
  /** ISO datetime of the last completed run, null if never run */
  lastRunAt: z.string().nullable().default(null),
  /** Folder briefings were last written to */
  outputFolderPath: z.string().nullable().default(null),
  /** Newest first */
  randomPickHistory: z.array(z.string()).default([]),
  pendingQuizzes: z.array(PendingQuizSchema).default([]),
  quizHistory: z.record(z.string(), QuizHistoryEntrySchema).default({}),
});

export type AppState = z.infer<typeof AppStateSchema>;

// =============================================================================
// Path Resolution
// =============================================================================

/**
 * Get the absolute path to the state file.
 */
export function getStateFilePath(): string {
  return join(getConfigDir(), STATE_FILE);
}

/**
 * Create a new empty state.
 */
export function createEmptyState(): AppState {
  return AppStateSchema.parse({});
}

function parseState(content: string): AppState | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    log.warn("Invalid JSON in state file");
    return null;
  }

  const result = AppStateSchema.safeParse(parsed);
  if (!result.success) {
    log.warn("Invalid state file schema", result.error.issues);
    return null;
  }
  return result.data;
}

// =============================================================================
// State Store
// =============================================================================

export class StateStore implements QuizHistoryLookup {
  private state: AppState;

  constructor(
    private readonly statePath: string = getStateFilePath(),
    initial: AppState = createEmptyState()
  ) {
    this.state = initial;
  }

  /**
   * Load state from disk. Missing or invalid files yield an empty state.
   */
  static async load(statePath: string = getStateFilePath()): Promise<StateStore> {
    const loaded = await readWithBackupFallback(statePath, parseState);
    if (!loaded) {
      log.debug(`No usable state at ${statePath}, starting empty`);
      return new StateStore(statePath);
    }
    return new StateStore(statePath, loaded.value);
  }

  get path(): string {
    return this.statePath;
  }

  /**
   * Deep copy of the current state.
   */
  snapshot(): AppState {
    return structuredClone(this.state);
  }

  async save(): Promise<void> {
    await writeFileAtomic(this.statePath, JSON.stringify(this.state, null, 2), { backup: true });
    log.debug(`Saved state to ${this.statePath}`);
  }

  // ---------------------------------------------------------------------------
  // Runs
  // ---------------------------------------------------------------------------

  getRunCount(feature: BriefingFeature): number {
    return this.state.runCounts[feature];
  }

  incrementRunCount(feature: BriefingFeature): number {
    this.state.runCounts[feature] += 1;
    log.debug(`Run count ${feature} = ${this.state.runCounts[feature]}`);
    return this.state.runCounts[feature];
  }

  markRun(now: Date = new Date()): void {
    this.state.lastRunAt = now.toISOString();
  }

  getOutputFolderPath(): string | null {
    return this.state.outputFolderPath;
  }

  setOutputFolderPath(path: string): void {
    this.state.outputFolderPath = path;
  }

  // ---------------------------------------------------------------------------
  // Random Pick Window
  // ---------------------------------------------------------------------------

  getRandomPickHistory(): string[] {
    return [...this.state.randomPickHistory];
  }

  /**
   * Prepend this run's random picks, keeping three runs' worth (capped).
   * An empty pick list leaves the window unchanged.
   */
  updateRandomPickHistory(picked: readonly string[]): void {
    if (picked.length === 0) {
      return;
    }
    this.state.randomPickHistory = [...picked, ...this.state.randomPickHistory]
      .slice(0, RANDOM_PICK_WINDOW_RUNS * picked.length)
      .slice(0, RANDOM_PICK_HISTORY_LIMIT);
    log.debug(`Random pick history: ${this.state.randomPickHistory.length} entries`);
  }

  // ---------------------------------------------------------------------------
  // Pending Quizzes
  // ---------------------------------------------------------------------------

  getPendingQuizzes(): PendingQuiz[] {
    return this.state.pendingQuizzes.map((pending) => ({ ...pending }));
  }

  addPendingQuiz(pending: PendingQuiz): void {
    this.state.pendingQuizzes.push({ ...pending });
    log.debug(`Pending quiz added: ${pending.topicKey}`);
  }

  /**
   * Remove the first pending quiz for the topic. Returns null when none.
   */
  removePendingQuiz(topicKey: string): PendingQuiz | null {
    const index = this.state.pendingQuizzes.findIndex((pending) => pending.topicKey === topicKey);
    if (index === -1) {
      return null;
    }
    const [removed] = this.state.pendingQuizzes.splice(index, 1);
    return removed;
  }

  clearPendingQuizzes(): PendingQuiz[] {
    const cleared = this.state.pendingQuizzes;
    this.state.pendingQuizzes = [];
    return cleared;
  }

  // ---------------------------------------------------------------------------
  // Quiz History
  // ---------------------------------------------------------------------------

  getQuizHistory(topicKey: string): QuizHistoryEntry | null {
    const entry = this.state.quizHistory[topicKey];
    return entry ? structuredClone(entry) : null;
  }

  getAllQuizHistory(): Record<string, QuizHistoryEntry> {
    return structuredClone(this.state.quizHistory);
  }

  /**
   * Store the scheduling update and append the result.
   */
  recordQuizResult(topicKey: string, result: QuizResult, update: SchedulingUpdate): void {
    const existing = this.state.quizHistory[topicKey];
    this.state.quizHistory[topicKey] = {
      level: update.newLevel,
      intervalDays: update.newIntervalDays,
      nextQuizAt: update.nextQuizAt,
      lastQuizzedAt: result.date,
      results: [...(existing?.results ?? []), { ...result }],
    };
    log.debug(`Quiz history ${topicKey}: level ${update.newLevel}, next ${update.nextQuizAt}`);
  }
}
