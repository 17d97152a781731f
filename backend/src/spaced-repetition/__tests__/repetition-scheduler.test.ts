/**
 * Repetition Scheduler Tests
 */

import { describe, test, expect } from "vitest";
import {
  updateAfterScoring,
  getDueTopics,
  buildQuizScheduleInfo,
} from "../repetition-scheduler.js";
import type { QuizHistoryEntry, QuizHistoryLookup } from "../quiz-history-schema.js";
import { DEFAULT_INTERVALS } from "../interval-calculator.js";
import { addDays, compareDates, daysBetween, parseDate } from "../review-dates.js";

// =============================================================================
// Helpers
// =============================================================================

const config = { maxLevel: 5, intervals: DEFAULT_INTERVALS };

function entry(overrides: Partial<QuizHistoryEntry> = {}): QuizHistoryEntry {
  return {
    level: 2,
    intervalDays: 7,
    nextQuizAt: "2026-01-10",
    lastQuizzedAt: "2026-01-03T08:00:00.000Z",
    results: [],
    ...overrides,
  };
}

function lookup(entries: Record<string, QuizHistoryEntry>): QuizHistoryLookup {
  return { getQuizHistory: (topicKey) => entries[topicKey] ?? null };
}

// =============================================================================
// updateAfterScoring
// =============================================================================

describe("updateAfterScoring", () => {
  const now = new Date(2026, 0, 10, 8, 30);

  test("starts a new topic at level 0 and upgrades it", () => {
    const update = updateAfterScoring(lookup({}), "a.md#x", true, "good", config, now);

    expect(update).toEqual({
      newLevel: 1,
      newIntervalDays: 3,
      nextQuizAt: "2026-01-13",
      levelChange: "upgrade",
    });
  });

  test("downgrades a known topic on a wrong answer", () => {
    const history = lookup({ "a.md#x": entry({ level: 3 }) });

    const update = updateAfterScoring(history, "a.md#x", false, "good", config, now);

    expect(update).toEqual({
      newLevel: 0,
      newIntervalDays: 1,
      nextQuizAt: "2026-01-11",
      levelChange: "downgrade",
    });
  });

  test("reports same when the level holds", () => {
    const history = lookup({ "a.md#x": entry({ level: 3 }) });

    const update = updateAfterScoring(history, "a.md#x", true, "partial", config, now);

    expect(update.levelChange).toBe("same");
    expect(update.newLevel).toBe(3);
    expect(update.nextQuizAt).toBe("2026-01-24");
  });

  test("reports same for a new topic answered poorly", () => {
    const update = updateAfterScoring(lookup({}), "new.md#t", true, "poor", config, now);

    expect(update.levelChange).toBe("same");
    expect(update.newLevel).toBe(0);
  });

  test("does not modify the stored entry", () => {
    const stored = entry({ level: 1 });
    updateAfterScoring(lookup({ "a.md#x": stored }), "a.md#x", true, "good", config, now);

    expect(stored.level).toBe(1);
  });
});

// =============================================================================
// getDueTopics
// =============================================================================

describe("getDueTopics", () => {
  test("includes topics due today or earlier, sorted by key", () => {
    const due = getDueTopics(
      {
        "b.md#late": entry({ nextQuizAt: "2026-01-09" }),
        "a.md#today": entry({ nextQuizAt: "2026-01-10" }),
        "c.md#future": entry({ nextQuizAt: "2026-01-11" }),
      },
      "2026-01-10"
    );

    expect(due.map((topic) => topic.topicKey)).toEqual(["a.md#today", "b.md#late"]);
  });

  test("compares dates across month boundaries", () => {
    const due = getDueTopics({ "a.md#x": entry({ nextQuizAt: "2026-01-31" }) }, "2026-02-01");

    expect(due).toHaveLength(1);
  });

  test("skips entries with an unparsable next date", () => {
    const due = getDueTopics({ "a.md#x": entry({ nextQuizAt: "2026-02-30" }) }, "2026-03-01");

    expect(due).toEqual([]);
  });

  test("carries the last result", () => {
    const last = {
      date: "2026-01-09T08:00:00.000Z",
      q1Correct: false,
      q2Evaluation: "partial" as const,
      pattern: "review" as const,
    };
    const due = getDueTopics(
      {
        "a.md#x": entry({
          results: [{ ...last, q1Correct: true, q2Evaluation: "good" }, last],
        }),
      },
      "2026-01-10"
    );

    expect(due[0].lastResult).toEqual(last);
  });

  test("throws on an invalid reference date", () => {
    expect(() => getDueTopics({}, "tomorrow")).toThrow("Invalid date: tomorrow");
  });
});

// =============================================================================
// buildQuizScheduleInfo
// =============================================================================

describe("buildQuizScheduleInfo", () => {
  test("reports that nothing is due", () => {
    expect(buildQuizScheduleInfo([])).toBe("No topics due for review");
  });

  test("lists due topics with their previous result", () => {
    const info = buildQuizScheduleInfo([
      {
        topicKey: "a.md#x",
        level: 2,
        intervalDays: 7,
        nextQuizAt: "2026-01-10",
        lastResult: {
          date: "2026-01-03T08:00:00.000Z",
          q1Correct: true,
          q2Evaluation: "partial",
          pattern: "learning",
        },
      },
      { topicKey: "b.md#y", level: 0, intervalDays: 1, nextQuizAt: "2026-01-09", lastResult: null },
    ]);

    expect(info).toBe(
      [
        "The following topics are due for review:",
        "- **a.md#x** (Level 2, interval 7d) previous: Q1 correct, Q2 partial",
        "- **b.md#y** (Level 0, interval 1d)",
      ].join("\n")
    );
  });
});

// =============================================================================
// Date helpers
// =============================================================================

describe("review dates", () => {
  test("parseDate rejects rolled-over dates", () => {
    expect(parseDate("2026-02-29")).toBeNull();
    expect(parseDate("2028-02-29")).not.toBeNull();
  });

  test("addDays handles leap years", () => {
    expect(addDays("2028-02-28", 1)).toBe("2028-02-29");
  });

  test("daysBetween ignores the time of day", () => {
    expect(daysBetween(new Date(2026, 0, 10, 23, 0), new Date(2026, 0, 11, 1, 0))).toBe(1);
  });

  test("compareDates returns null for invalid input", () => {
    expect(compareDates("2026-01-01", "nope")).toBeNull();
    expect(compareDates("2026-01-02", "2026-01-01")).toBe(1);
  });
});
