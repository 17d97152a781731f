/**
 * Markdown for the "Quiz Results" section appended to a quiz briefing.
 */

import type { LevelChange, Q2Evaluation, QuizPattern } from "@study-brief/shared";
import { PATTERN_EMOJI } from "../briefing/prompt-builder.js";
import { topicTitleFromKey } from "../briefing/topic-extractor.js";
import { formatDateTime } from "../briefing/time-format.js";

export const RESULTS_HEADING = "## 📝 Quiz Results";

export interface AnswerVerdict {
  q1Correct: boolean;
  q1CorrectAnswer: string;
  q2Evaluation: Q2Evaluation;
  q2Feedback: string;
}

export interface QuizResultItem {
  topicKey: string;
  pattern: QuizPattern;
  newLevel: number;
  levelChange: LevelChange;
  nextQuizAt: string;
  /** Absent for quizzes resolved as unanswered */
  verdict?: AnswerVerdict;
}

export interface FormatOptions {
  /** Unanswered quizzes resolved at the start of a quiz run */
  auto?: boolean;
  now?: Date;
}

const LEVEL_CHANGE_LABEL: Readonly<Record<LevelChange, string>> = {
  upgrade: "upgraded",
  downgrade: "downgraded",
  same: "unchanged",
};

const Q2_MARK: Readonly<Record<Q2Evaluation, string>> = {
  good: "✅",
  partial: "🟡",
  poor: "❌",
};

function verdictLines(verdict: AnswerVerdict | undefined): string[] {
  if (!verdict) {
    return [
      "- Q1 (Multiple Choice): ⬜ Unanswered (marked incorrect)",
      "- Q2 (Written): ⬜ Unanswered (marked poor)",
    ];
  }
  const q1 = verdict.q1Correct
    ? "- Q1 (Multiple Choice): ✅ Correct"
    : `- Q1 (Multiple Choice): ❌ Incorrect (Answer: ${verdict.q1CorrectAnswer})`;
  const q2 = `- Q2 (Written): ${Q2_MARK[verdict.q2Evaluation]} ${verdict.q2Evaluation}: ${verdict.q2Feedback}`;
  return [q1, q2];
}

export function formatQuizResultSection(
  items: readonly QuizResultItem[],
  options: FormatOptions = {}
): string {
  const now = options.now ?? new Date();
  const header = options.auto
    ? `${RESULTS_HEADING} (Auto-processed: Unanswered)`
    : `${RESULTS_HEADING} (${formatDateTime(now)})`;

  const lines = [header, ""];
  for (const item of items) {
    lines.push(`### ${PATTERN_EMOJI[item.pattern]} ${topicTitleFromKey(item.topicKey)}`);
    lines.push(...verdictLines(options.auto ? undefined : item.verdict));
    lines.push(
      `- Next review: ${item.nextQuizAt} (Level ${item.newLevel}, ${LEVEL_CHANGE_LABEL[item.levelChange]})`
    );
    lines.push("");
  }

  return lines.join("\n");
}
