/**
 * Briefing Writer
 *
 * Picks the output folder, writes briefing files and appends quiz result
 * sections to briefings that were already written.
 */

import { mkdir, stat } from "node:fs/promises";
import { join, resolve } from "node:path";
import type { BriefingFeature } from "@study-brief/shared";
import { createLogger } from "../logger.js";
import { errorMessage, isNotFoundError, readFileIfExists, writeFileAtomic } from "../file-utils.js";
import { formatFileStamp } from "./time-format.js";

const log = createLogger("briefing-writer");

/**
 * Highest numbered suffix tried when the output folder name is taken.
 */
const MAX_FOLDER_SUFFIX = 99;

async function pathKind(path: string): Promise<"dir" | "file" | null> {
  try {
    const stats = await stat(path);
    return stats.isDirectory() ? "dir" : "file";
  } catch (error) {
    if (isNotFoundError(error)) {
      return null;
    }
    throw error;
  }
}

// =============================================================================
// Output Folder
// =============================================================================

/**
 * Resolve (and create) the folder briefings are written to.
 *
 * Reuses `previousPath` while it is still a directory. Otherwise creates
 * `<first input folder>/<outputFolderName>`, or `<outputFolderName>_2`,
 * `_3`, ... when that name is already taken.
 */
export async function resolveOutputFolder(
  inputFolders: readonly string[],
  outputFolderName: string,
  previousPath: string | null
): Promise<string> {
  if (previousPath && (await pathKind(previousPath)) === "dir") {
    log.debug(`Using existing output folder ${previousPath}`);
    return resolve(previousPath);
  }

  const baseDir = inputFolders[0];
  if (baseDir === undefined) {
    throw new Error("Cannot create an output folder without input folders");
  }

  const candidates = [outputFolderName];
  for (let i = 2; i <= MAX_FOLDER_SUFFIX; i++) {
    candidates.push(`${outputFolderName}_${i}`);
  }

  for (const name of candidates) {
    const candidate = resolve(baseDir, name);
    if ((await pathKind(candidate)) === null) {
      await mkdir(candidate, { recursive: true });
      log.info(`Created output folder ${candidate}`);
      return candidate;
    }
  }

  const fallback = resolve(baseDir, outputFolderName);
  await mkdir(fallback, { recursive: true });
  return fallback;
}

// =============================================================================
// Briefing Files
// =============================================================================

export function briefingFileName(feature: BriefingFeature, now: Date): string {
  return `briefing_${feature}_${formatFileStamp(now)}.md`;
}

/**
 * Write a briefing and return its absolute path. Briefings are written once,
 * so no backup is kept.
 */
export async function writeBriefing(
  content: string,
  feature: BriefingFeature,
  outputFolder: string,
  now: Date = new Date()
): Promise<string> {
  const path = resolve(join(outputFolder, briefingFileName(feature, now)));
  await writeFileAtomic(path, content);
  log.info(`Wrote briefing ${path}`);
  return path;
}

/**
 * Append a result section to the end of a briefing. Returns false when the
 * briefing no longer exists or cannot be read.
 */
export async function appendQuizResult(briefingFile: string, section: string): Promise<boolean> {
  let existing: string | null;
  try {
    existing = await readFileIfExists(briefingFile);
  } catch (error) {
    log.error(`Failed to read ${briefingFile}: ${errorMessage(error)}`);
    return false;
  }
  if (existing === null) {
    log.warn(`Briefing not found, result not appended: ${briefingFile}`);
    return false;
  }

  const updated = `${existing.replace(/\n+$/, "")}\n\n${section.trim()}\n`;
  await writeFileAtomic(briefingFile, updated);
  log.info(`Appended quiz results to ${briefingFile}`);
  return true;
}
