/**
 * File Selector
 *
 * Picks the notes that go into a briefing: the highest-scored notes plus a
 * weighted random sample of the rest that favors notes left untouched for a
 * long time. Every Nth run is a discovery round that shifts the split toward
 * the random sample.
 */

import { createLogger } from "../logger.js";
import type { NoteRecord } from "../notes/note-record.js";
import { scoreNote, type ScoredNote } from "./interest-scorer.js";

const log = createLogger("file-selector");

// =============================================================================
// Types
// =============================================================================

export interface SelectionResult {
  /** top followed by randomPicks */
  selected: NoteRecord[];
  top: NoteRecord[];
  randomPicks: NoteRecord[];
  isDiscovery: boolean;
  totalCandidates: number;
}

export interface SelectionOptions {
  runCount: number;
  discoveryInterval?: number;
  /** Must be at least 1 */
  maxFiles?: number;
  /** Paths picked at random in recent runs */
  recentRandomPicks?: Iterable<string>;
  now?: Date;
  /** Uniform source in [0, 1) */
  random?: () => number;
}

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_MAX_FILES = 20;
export const DEFAULT_DISCOVERY_INTERVAL = 5;

export const NORMAL_SPLIT = { top: 17, random: 3 } as const;
export const DISCOVERY_SPLIT = { top: 5, random: 15 } as const;

/** Notes untouched this long get the multiplier */
const OLD_NOTE_THRESHOLD_DAYS = 30;
const OLD_NOTE_WEIGHT_MULTIPLIER = 3;
const UNKNOWN_MTIME_WEIGHT = 15;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

// =============================================================================
// Discovery Rounds
// =============================================================================

/**
 * Run 0 is never a discovery round; an interval of 0 or less disables them.
 */
export function isDiscoveryRound(runCount: number, discoveryInterval: number): boolean {
  if (discoveryInterval <= 0) {
    return false;
  }
  return runCount > 0 && runCount % discoveryInterval === 0;
}

// =============================================================================
// Weighted Sampling
// =============================================================================

/**
 * Sampling weight per note. Older notes weigh more.
 */
export function calculateRandomWeights(notes: readonly NoteRecord[], now: Date): number[] {
  return notes.map((note) => {
    if (!note.modifiedAt) {
      return UNKNOWN_MTIME_WEIGHT;
    }
    const daysSince = Math.floor((now.getTime() - note.modifiedAt.getTime()) / MS_PER_DAY);
    if (daysSince >= OLD_NOTE_THRESHOLD_DAYS) {
      return daysSince * OLD_NOTE_WEIGHT_MULTIPLIER;
    }
    return Math.max(1, daysSince);
  });
}

function sampleUniform<T>(items: readonly T[], count: number, random: () => number): T[] {
  const pool = [...items];
  const picked: T[] = [];
  while (picked.length < count && pool.length > 0) {
    const index = Math.min(Math.floor(random() * pool.length), pool.length - 1);
    picked.push(...pool.splice(index, 1));
  }
  return picked;
}

/**
 * Draw `count` distinct items, each draw proportional to the remaining weights.
 * Falls back to uniform sampling when the weights cannot be used.
 */
export function sampleWeighted<T>(
  items: readonly T[],
  weights: readonly number[],
  count: number,
  random: () => number = Math.random
): T[] {
  const total = weights.reduce((sum, weight) => sum + weight, 0);
  const usable =
    weights.length === items.length &&
    Number.isFinite(total) &&
    total > 0 &&
    weights.every((weight) => Number.isFinite(weight) && weight >= 0);

  if (!usable) {
    log.warn("Weights unusable, falling back to uniform sampling");
    return sampleUniform(items, count, random);
  }

  const pool = items.map((item, i) => ({ item, weight: weights[i] }));
  const picked: T[] = [];

  while (picked.length < count && pool.length > 0) {
    const remaining = pool.reduce((sum, entry) => sum + entry.weight, 0);
    if (remaining <= 0) {
      picked.push(...sampleUniform(pool.map((entry) => entry.item), count - picked.length, random));
      break;
    }

    let target = random() * remaining;
    let index = pool.length - 1;
    for (let i = 0; i < pool.length; i++) {
      target -= pool[i].weight;
      if (target < 0) {
        index = i;
        break;
      }
    }
    picked.push(pool[index].item);
    pool.splice(index, 1);
  }

  return picked;
}

// =============================================================================
// Selection
// =============================================================================

/**
 * Select at most `maxFiles` notes from the candidates.
 */
export function selectNotes(
  candidates: readonly NoteRecord[],
  options: SelectionOptions
): SelectionResult {
  const {
    runCount,
    discoveryInterval = DEFAULT_DISCOVERY_INTERVAL,
    maxFiles = DEFAULT_MAX_FILES,
    recentRandomPicks = [],
    now = new Date(),
    random = Math.random,
  } = options;

  if (candidates.length === 0) {
    log.warn("No candidate notes to select from");
    return { selected: [], top: [], randomPicks: [], isDiscovery: false, totalCandidates: 0 };
  }

  if (candidates.length <= maxFiles) {
    log.info(`All ${candidates.length} notes fit within maxFiles (${maxFiles}), selecting all`);
    return {
      selected: [...candidates],
      top: [...candidates],
      randomPicks: [],
      isDiscovery: false,
      totalCandidates: candidates.length,
    };
  }

  // Array.prototype.sort is stable, so equal scores keep scan order
  const scored: ScoredNote[] = candidates.map((note) => scoreNote(note, now));
  scored.sort((a, b) => b.score - a.score);

  const isDiscovery = isDiscoveryRound(runCount, discoveryInterval);
  const split = isDiscovery ? DISCOVERY_SPLIT : NORMAL_SPLIT;
  const topCount = Math.min(split.top, maxFiles);
  const randomCount = Math.min(split.random, maxFiles - topCount);

  log.info(
    `${isDiscovery ? "Discovery" : "Normal"} round (runCount=${runCount}): top ${topCount} + random ${randomCount}`
  );

  const top = scored.slice(0, topCount).map((entry) => entry.note);
  const remainder = scored.slice(topCount).map((entry) => entry.note);

  const recent = new Set(recentRandomPicks);
  let pool = remainder.filter((note) => !recent.has(note.relativePath));
  if (pool.length < randomCount) {
    pool = pool.concat(remainder.filter((note) => recent.has(note.relativePath)));
  }

  let randomPicks: NoteRecord[] = [];
  if (randomCount > 0 && pool.length > 0) {
    const weights = calculateRandomWeights(pool, now);
    randomPicks = sampleWeighted(pool, weights, Math.min(randomCount, pool.length), random);
  }

  const selected = [...top, ...randomPicks];
  log.info(
    `Selected ${top.length} top + ${randomPicks.length} random = ${selected.length} of ${candidates.length} candidates`
  );

  return {
    selected,
    top,
    randomPicks,
    isDiscovery,
    totalCandidates: candidates.length,
  };
}

/**
 * Paths of the randomly picked notes, for the recent-picks window.
 */
export function getRandomPickedPaths(result: SelectionResult): string[] {
  return result.randomPicks.map((note) => note.relativePath);
}
