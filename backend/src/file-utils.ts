/**
 * File Utilities
 *
 * Config directory resolution and the temp-file + rename write pattern
 * shared by the config loader, the state store and the briefing writer.
 */

import { copyFile, mkdir, readFile, rename, unlink, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { homedir } from "node:os";
import { createLogger } from "./logger.js";

const log = createLogger("file-utils");

/**
 * Config directory name within user home.
 */
const CONFIG_DIR = ".config/study-brief";

export const BACKUP_SUFFIX = ".bak";

// =============================================================================
// Paths
// =============================================================================

/**
 * Absolute path of the config directory.
 *
 * Checks HOME environment variable first (for testing), then uses os.homedir().
 */
export function getConfigDir(): string {
  const home = process.env.HOME ?? homedir();
  return join(home, CONFIG_DIR);
}

// =============================================================================
// Error Helpers
// =============================================================================

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * True for filesystem errors reporting a missing path.
 */
export function isNotFoundError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

// =============================================================================
// Reading
// =============================================================================

/**
 * Read a UTF-8 file, returning null when it does not exist.
 */
export async function readFileIfExists(path: string): Promise<string | null> {
  try {
    return await readFile(path, "utf-8");
  } catch (error) {
    if (isNotFoundError(error)) {
      return null;
    }
    throw error;
  }
}

export interface BackupReadResult<T> {
  value: T;
  source: "primary" | "backup";
}

/**
 * Read and parse a file, falling back to its `.bak` copy when the primary is
 * missing, unreadable or rejected by `parse` (which returns null to reject).
 * Returns null when neither copy yields a value.
 */
export async function readWithBackupFallback<T>(
  path: string,
  parse: (content: string) => T | null
): Promise<BackupReadResult<T> | null> {
  const candidates: Array<[string, BackupReadResult<T>["source"]]> = [
    [path, "primary"],
    [path + BACKUP_SUFFIX, "backup"],
  ];

  for (const [candidate, source] of candidates) {
    let content: string | null;
    try {
      content = await readFileIfExists(candidate);
    } catch (error) {
      log.warn(`Failed to read ${candidate}: ${errorMessage(error)}`);
      continue;
    }
    if (content === null) {
      continue;
    }

    const value = parse(content);
    if (value !== null) {
      if (source === "backup") {
        log.warn(`Recovered ${basename(path)} from backup`);
      }
      return { value, source };
    }
    log.warn(`Ignoring invalid contents of ${candidate}`);
  }

  return null;
}

// =============================================================================
// Writing
// =============================================================================

export interface AtomicWriteOptions {
  /** Copy the existing file to `<path>.bak` before replacing it */
  backup?: boolean;
}

/**
 * Write a file via temp file + rename so readers never see a partial write.
 */
export async function writeFileAtomic(
  path: string,
  content: string,
  options: AtomicWriteOptions = {}
): Promise<void> {
  const dir = dirname(path);
  const tempPath = join(dir, `.${basename(path)}.${process.pid}.${Date.now()}.tmp`);

  try {
    await mkdir(dir, { recursive: true });

    if (options.backup) {
      try {
        await copyFile(path, path + BACKUP_SUFFIX);
      } catch (error) {
        if (!isNotFoundError(error)) {
          throw error;
        }
      }
    }

    await writeFile(tempPath, content, "utf-8");
    await rename(tempPath, path);
    log.debug(`Wrote ${path}`);
  } catch (error) {
    await unlink(tempPath).catch((cleanupError: unknown) => {
      if (!isNotFoundError(cleanupError)) {
        log.debug(`Could not remove temp file ${tempPath}: ${errorMessage(cleanupError)}`);
      }
    });
    throw error;
  }
}
