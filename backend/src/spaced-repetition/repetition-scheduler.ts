/**
 * Repetition Scheduler
 *
 * Applies scored quiz attempts to topic levels and answers which topics are
 * due. Functions here read history but never write it; the state store
 * persists whatever they return.
 */

import type { LevelChange, Q2Evaluation } from "@study-brief/shared";
import { createLogger } from "../logger.js";
import { calculateNextLevel } from "./level-calculator.js";
import { calculateNextQuizDate, getIntervalDays } from "./interval-calculator.js";
import { compareDates, parseDate } from "./review-dates.js";
import type {
  QuizHistoryEntry,
  QuizHistoryLookup,
  QuizResult,
  RepetitionConfig,
  SchedulingUpdate,
} from "./quiz-history-schema.js";

const log = createLogger("repetition-scheduler");

// =============================================================================
// Types
// =============================================================================

export interface DueTopic {
  topicKey: string;
  level: number;
  intervalDays: number;
  nextQuizAt: string;
  lastResult: QuizResult | null;
}

// =============================================================================
// Scoring Updates
// =============================================================================

function classifyLevelChange(previous: number, next: number): LevelChange {
  if (next > previous) return "upgrade";
  if (next < previous) return "downgrade";
  return "same";
}

/**
 * Compute the new level, interval and due date for a topic after one attempt.
 * Topics with no history start at level 0.
 */
export function updateAfterScoring(
  history: QuizHistoryLookup,
  topicKey: string,
  q1Correct: boolean,
  q2Evaluation: Q2Evaluation,
  config: RepetitionConfig,
  now: Date
): SchedulingUpdate {
  const entry = history.getQuizHistory(topicKey);
  const currentLevel = entry ? entry.level : 0;

  const newLevel = calculateNextLevel(q1Correct, q2Evaluation, currentLevel, config.maxLevel);
  const newIntervalDays = getIntervalDays(newLevel, config.intervals);
  const nextQuizAt = calculateNextQuizDate(newLevel, config.intervals, now);
  const levelChange = classifyLevelChange(currentLevel, newLevel);

  log.info(
    `Repetition update: ${topicKey} level ${currentLevel} -> ${newLevel} (${levelChange}), next ${nextQuizAt}`
  );

  return { newLevel, newIntervalDays, nextQuizAt, levelChange };
}

// =============================================================================
// Due Topics
// =============================================================================

/**
 * Topics whose next quiz date is on or before `today` (YYYY-MM-DD),
 * sorted by topic key.
 */
export function getDueTopics(
  entries: Readonly<Record<string, QuizHistoryEntry>>,
  today: string
): DueTopic[] {
  if (!parseDate(today)) {
    throw new Error(`Invalid date: ${today}`);
  }

  const due: DueTopic[] = [];

  for (const [topicKey, entry] of Object.entries(entries)) {
    const cmp = compareDates(entry.nextQuizAt, today);
    if (cmp === null) {
      log.debug(`Skipping ${topicKey}: unparsable nextQuizAt "${entry.nextQuizAt}"`);
      continue;
    }
    if (cmp <= 0) {
      due.push({
        topicKey,
        level: entry.level,
        intervalDays: entry.intervalDays,
        nextQuizAt: entry.nextQuizAt,
        lastResult: entry.results.length > 0 ? entry.results[entry.results.length - 1] : null,
      });
    }
  }

  due.sort((a, b) => (a.topicKey < b.topicKey ? -1 : a.topicKey > b.topicKey ? 1 : 0));
  log.debug(`Due topics: ${due.length}`);
  return due;
}

/**
 * Markdown block listing due topics, embedded in the quiz prompt.
 */
export function buildQuizScheduleInfo(dueTopics: readonly DueTopic[]): string {
  if (dueTopics.length === 0) {
    return "No topics due for review";
  }

  const lines = ["The following topics are due for review:"];
  for (const topic of dueTopics) {
    let line = `- **${topic.topicKey}** (Level ${topic.level}, interval ${topic.intervalDays}d)`;
    if (topic.lastResult) {
      const q1 = topic.lastResult.q1Correct ? "correct" : "incorrect";
      line += ` previous: Q1 ${q1}, Q2 ${topic.lastResult.q2Evaluation}`;
    }
    lines.push(line);
  }
  return lines.join("\n");
}
