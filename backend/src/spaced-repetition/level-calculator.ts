/**
 * Repetition level transitions.
 *
 * A wrong multiple-choice answer or a poor free-form answer sends the topic
 * back to level 0. Both answers good moves it up one level, capped at
 * maxLevel. Anything else holds the level.
 */

import type { Q2Evaluation } from "@study-brief/shared";

export const DEFAULT_MAX_LEVEL = 5;

export function calculateNextLevel(
  q1Correct: boolean,
  q2Evaluation: Q2Evaluation,
  currentLevel: number,
  maxLevel: number = DEFAULT_MAX_LEVEL
): number {
  if (!q1Correct || q2Evaluation === "poor") {
    return 0;
  }

  if (q2Evaluation === "good") {
    return Math.min(currentLevel + 1, maxLevel);
  }

  return currentLevel;
}
