/**
 * File Selector Tests
 */

import { describe, test, expect } from "vitest";
import {
  isDiscoveryRound,
  calculateRandomWeights,
  sampleWeighted,
  selectNotes,
  getRandomPickedPaths,
} from "../file-selector.js";
import { scoreNote } from "../interest-scorer.js";
import type { NoteRecord } from "../../notes/note-record.js";
import { createMockNote, daysBefore, sequenceRandom } from "../../__tests__/test-helpers.js";

const now = new Date(2026, 0, 10, 12, 0);

function notePath(i: number): string {
  return `note-${String(i).padStart(2, "0")}.md`;
}

/**
 * 30 notes, all 60 days old. Every third note (0, 3, ..., 27) is high priority.
 */
function buildVault(): NoteRecord[] {
  return Array.from({ length: 30 }, (_, i) =>
    createMockNote({
      relativePath: notePath(i),
      modifiedAt: daysBefore(now, 60),
      priority: i % 3 === 0 ? "high" : "",
    })
  );
}

function paths(notes: NoteRecord[]): string[] {
  return notes.map((note) => note.relativePath);
}

// =============================================================================
// isDiscoveryRound
// =============================================================================

describe("isDiscoveryRound", () => {
  test("every Nth run is a discovery round", () => {
    expect(isDiscoveryRound(5, 5)).toBe(true);
    expect(isDiscoveryRound(10, 5)).toBe(true);
    expect(isDiscoveryRound(7, 5)).toBe(false);
  });

  test("run 0 is never a discovery round", () => {
    expect(isDiscoveryRound(0, 5)).toBe(false);
    expect(isDiscoveryRound(0, 1)).toBe(false);
  });

  test("a non-positive interval disables discovery rounds", () => {
    expect(isDiscoveryRound(5, 0)).toBe(false);
    expect(isDiscoveryRound(5, -1)).toBe(false);
  });
});

// =============================================================================
// calculateRandomWeights
// =============================================================================

describe("calculateRandomWeights", () => {
  test("weights by whole days since modification", () => {
    const notes = [
      createMockNote({ modifiedAt: now }),
      createMockNote({ modifiedAt: daysBefore(now, 10.5) }),
      createMockNote({ modifiedAt: daysBefore(now, 29) }),
      createMockNote({ modifiedAt: daysBefore(now, 30) }),
      createMockNote({ modifiedAt: null }),
    ];

    expect(calculateRandomWeights(notes, now)).toEqual([1, 10, 29, 90, 15]);
  });
});

// =============================================================================
// sampleWeighted
// =============================================================================

describe("sampleWeighted", () => {
  test("draws in proportion to the remaining weights", () => {
    const picked = sampleWeighted(["a", "b", "c"], [1, 1, 2], 2, sequenceRandom([0.6, 0]));

    expect(picked).toEqual(["c", "a"]);
  });

  test("never picks a zero-weight item while positive weight remains", () => {
    const picked = sampleWeighted(["a", "b", "c"], [0, 0, 5], 1, sequenceRandom([0.5]));

    expect(picked).toEqual(["c"]);
  });

  test("returns distinct items even when asked for all of them", () => {
    const picked = sampleWeighted(["a", "b", "c"], [0, 0, 5], 3, sequenceRandom([0.99, 0.2]));

    expect([...picked].sort()).toEqual(["a", "b", "c"]);
    expect(picked[0]).toBe("c");
  });

  test("falls back to uniform sampling when all weights are zero", () => {
    const picked = sampleWeighted(["a", "b", "c"], [0, 0, 0], 2, sequenceRandom([0]));

    expect(picked).toEqual(["a", "b"]);
  });

  test("falls back to uniform sampling on non-finite weights", () => {
    const picked = sampleWeighted(["a", "b"], [Number.NaN, 1], 2, sequenceRandom([0.9]));

    expect(picked).toEqual(["b", "a"]);
  });

  test("stops at the pool size", () => {
    expect(sampleWeighted(["a"], [1], 5, sequenceRandom([0.3]))).toEqual(["a"]);
  });
});

// =============================================================================
// selectNotes
// =============================================================================

describe("selectNotes", () => {
  test("returns an empty result for no candidates", () => {
    expect(selectNotes([], { runCount: 5, now })).toEqual({
      selected: [],
      top: [],
      randomPicks: [],
      isDiscovery: false,
      totalCandidates: 0,
    });
  });

  test("selects everything when the candidates fit", () => {
    const notes = buildVault().slice(0, 20);

    const result = selectNotes(notes, { runCount: 5, maxFiles: 20, now });

    expect(paths(result.selected)).toEqual(paths(notes));
    expect(result.top).toEqual(result.selected);
    expect(result.randomPicks).toEqual([]);
    expect(result.isDiscovery).toBe(false);
    expect(result.totalCandidates).toBe(20);
  });

  test("discovery round takes 5 top notes and up to 15 random ones", () => {
    const result = selectNotes(buildVault(), {
      runCount: 5,
      discoveryInterval: 5,
      maxFiles: 20,
      now,
      random: sequenceRandom([0.13, 0.57, 0.91, 0.42]),
    });

    expect(result.isDiscovery).toBe(true);
    expect(result.totalCandidates).toBe(30);
    expect(paths(result.top)).toEqual([
      "note-00.md",
      "note-03.md",
      "note-06.md",
      "note-09.md",
      "note-12.md",
    ]);
    expect(result.randomPicks).toHaveLength(15);
    expect(result.selected).toHaveLength(20);
    expect(result.selected).toEqual([...result.top, ...result.randomPicks]);

    const selectedPaths = paths(result.selected);
    expect(new Set(selectedPaths).size).toBe(selectedPaths.length);

    const scores = result.top.map((note) => scoreNote(note, now).score);
    expect(scores).toEqual([...scores].sort((a, b) => b - a));
  });

  test("normal round takes 17 top notes with ties in input order", () => {
    const result = selectNotes(buildVault(), {
      runCount: 4,
      discoveryInterval: 5,
      maxFiles: 20,
      now,
      random: sequenceRandom([0.5]),
    });

    expect(result.isDiscovery).toBe(false);
    expect(paths(result.top)).toEqual([
      "note-00.md",
      "note-03.md",
      "note-06.md",
      "note-09.md",
      "note-12.md",
      "note-15.md",
      "note-18.md",
      "note-21.md",
      "note-24.md",
      "note-27.md",
      "note-01.md",
      "note-02.md",
      "note-04.md",
      "note-05.md",
      "note-07.md",
      "note-08.md",
      "note-10.md",
    ]);
    expect(result.randomPicks).toHaveLength(3);
  });

  test("excludes recent random picks from the pool", () => {
    const remainder = [11, 13, 14, 16, 17, 19, 20, 22, 23, 25, 26, 28, 29].map(notePath);
    const keep = new Set(["note-13.md", "note-20.md", "note-29.md"]);

    const result = selectNotes(buildVault(), {
      runCount: 4,
      now,
      recentRandomPicks: remainder.filter((path) => !keep.has(path)),
      random: sequenceRandom([0.7, 0.1, 0.4]),
    });

    expect(paths(result.randomPicks).sort()).toEqual(["note-13.md", "note-20.md", "note-29.md"]);
  });

  test("relaxes the exclusion when too few fresh notes remain", () => {
    const remainder = [11, 13, 14, 16, 17, 19, 20, 22, 23, 25, 26, 28, 29].map(notePath);

    const result = selectNotes(buildVault(), {
      runCount: 4,
      now,
      recentRandomPicks: remainder.filter((path) => path !== "note-11.md"),
      random: () => 0,
    });

    expect(paths(result.randomPicks)).toEqual(["note-11.md", "note-13.md", "note-14.md"]);
  });

  test("clamps the split to maxFiles", () => {
    const result = selectNotes(buildVault(), { runCount: 4, maxFiles: 3, now });

    expect(paths(result.top)).toEqual(["note-00.md", "note-03.md", "note-06.md"]);
    expect(result.randomPicks).toEqual([]);
  });

  test("clamps the random share when maxFiles is between the splits", () => {
    const result = selectNotes(buildVault(), {
      runCount: 5,
      maxFiles: 8,
      now,
      random: () => 0,
    });

    expect(result.top).toHaveLength(5);
    expect(result.randomPicks).toHaveLength(3);
  });

  test("a zero interval always uses the normal split", () => {
    const result = selectNotes(buildVault(), { runCount: 5, discoveryInterval: 0, now });

    expect(result.isDiscovery).toBe(false);
    expect(result.top).toHaveLength(17);
  });

  test("getRandomPickedPaths lists the random picks", () => {
    const result = selectNotes(buildVault(), { runCount: 4, now, random: () => 0 });

    expect(getRandomPickedPaths(result)).toEqual(["note-11.md", "note-13.md", "note-14.md"]);
  });
});
