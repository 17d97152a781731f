/**
 * Level and Interval Calculator Tests
 */

import { describe, test, expect } from "vitest";
import { calculateNextLevel, DEFAULT_MAX_LEVEL } from "../level-calculator.js";
import {
  DEFAULT_INTERVALS,
  getIntervalDays,
  calculateNextQuizDate,
} from "../interval-calculator.js";

describe("calculateNextLevel", () => {
  test("upgrades on correct and good", () => {
    expect(calculateNextLevel(true, "good", 0, 5)).toBe(1);
  });

  test("caps the upgrade at maxLevel", () => {
    expect(calculateNextLevel(true, "good", 5, 5)).toBe(5);
  });

  test("downgrades to 0 on a wrong multiple-choice answer", () => {
    expect(calculateNextLevel(false, "good", 3, 5)).toBe(0);
  });

  test("downgrades to 0 on a poor free-form answer", () => {
    expect(calculateNextLevel(true, "poor", 3, 5)).toBe(0);
  });

  test("holds on correct and partial", () => {
    expect(calculateNextLevel(true, "partial", 3, 5)).toBe(3);
  });

  test("downgrades on wrong and partial", () => {
    expect(calculateNextLevel(false, "partial", 2, 5)).toBe(0);
  });

  test("uses the default max level", () => {
    expect(DEFAULT_MAX_LEVEL).toBe(5);
    expect(calculateNextLevel(true, "good", 5)).toBe(5);
  });
});

describe("getIntervalDays", () => {
  test("looks up the default table by level", () => {
    expect(DEFAULT_INTERVALS.map((_, level) => getIntervalDays(level))).toEqual([
      1, 3, 7, 14, 30, 60,
    ]);
  });

  test("clamps levels past the end of the table", () => {
    expect(getIntervalDays(100, [1, 3, 7])).toBe(7);
  });

  test("throws on an empty table", () => {
    expect(() => getIntervalDays(0, [])).toThrow("Interval table is empty");
  });
});

describe("calculateNextQuizDate", () => {
  test("adds the level interval to the local date", () => {
    expect(calculateNextQuizDate(3, DEFAULT_INTERVALS, new Date(2026, 0, 10, 9, 0))).toBe(
      "2026-01-24"
    );
  });

  test("ignores the time of day", () => {
    expect(calculateNextQuizDate(0, DEFAULT_INTERVALS, new Date(2026, 0, 10, 23, 59))).toBe(
      "2026-01-11"
    );
  });

  test("crosses month and year boundaries", () => {
    expect(calculateNextQuizDate(5, DEFAULT_INTERVALS, new Date(2025, 11, 15, 8))).toBe(
      "2026-02-13"
    );
  });
});
