/**
 * Result Formatter Tests
 */

import { describe, test, expect } from "vitest";
import { formatQuizResultSection, type QuizResultItem } from "../result-formatter.js";

const now = new Date(2026, 0, 12, 8, 30);

const answered: QuizResultItem[] = [
  {
    topicKey: "networking/dns.md#cache-ttl",
    pattern: "learning",
    newLevel: 1,
    levelChange: "upgrade",
    nextQuizAt: "2026-01-15",
    verdict: {
      q1Correct: true,
      q1CorrectAnswer: "A",
      q2Evaluation: "good",
      q2Feedback: "Clear and complete.",
    },
  },
  {
    topicKey: "db/indexes.md#btree",
    pattern: "review",
    newLevel: 0,
    levelChange: "downgrade",
    nextQuizAt: "2026-01-13",
    verdict: {
      q1Correct: false,
      q1CorrectAnswer: "B",
      q2Evaluation: "partial",
      q2Feedback: "Mention selectivity.",
    },
  },
];

describe("formatQuizResultSection", () => {
  test("renders scored answers under a timestamped heading", () => {
    expect(formatQuizResultSection(answered, { now })).toBe(
      [
        "## 📝 Quiz Results (2026-01-12 08:30)",
        "",
        "### 📘 cache-ttl",
        "- Q1 (Multiple Choice): ✅ Correct",
        "- Q2 (Written): ✅ good: Clear and complete.",
        "- Next review: 2026-01-15 (Level 1, upgraded)",
        "",
        "### 📗 btree",
        "- Q1 (Multiple Choice): ❌ Incorrect (Answer: B)",
        "- Q2 (Written): 🟡 partial: Mention selectivity.",
        "- Next review: 2026-01-13 (Level 0, downgraded)",
        "",
      ].join("\n")
    );
  });

  test("renders unanswered quizzes in auto mode", () => {
    const unanswered: QuizResultItem[] = [
      {
        topicKey: "a.md#x",
        pattern: "learning",
        newLevel: 0,
        levelChange: "same",
        nextQuizAt: "2026-01-13",
      },
    ];

    expect(formatQuizResultSection(unanswered, { auto: true, now })).toBe(
      [
        "## 📝 Quiz Results (Auto-processed: Unanswered)",
        "",
        "### 📘 x",
        "- Q1 (Multiple Choice): ⬜ Unanswered (marked incorrect)",
        "- Q2 (Written): ⬜ Unanswered (marked poor)",
        "- Next review: 2026-01-13 (Level 0, unchanged)",
        "",
      ].join("\n")
    );
  });

  test("auto mode ignores verdicts", () => {
    const section = formatQuizResultSection(answered.slice(0, 1), { auto: true, now });

    expect(section.split("\n")[3]).toBe("- Q1 (Multiple Choice): ⬜ Unanswered (marked incorrect)");
  });
});
