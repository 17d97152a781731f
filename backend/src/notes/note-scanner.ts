/**
 * Note Scanner
 *
 * Walks input folders and builds a NoteRecord for every matching file:
 * frontmatter metadata via gray-matter, checklist counts from the body,
 * timestamps and size from the filesystem.
 */

import type { Dirent } from "node:fs";
import { readdir, readFile, stat } from "node:fs/promises";
import { basename, dirname, extname, join, relative, resolve, sep } from "node:path";
import matter from "gray-matter";
import picomatch from "picomatch";
import { createLogger } from "../logger.js";
import type { NoteRecord } from "./note-record.js";

const log = createLogger("note-scanner");

// =============================================================================
// Types
// =============================================================================

export interface ScanOptions {
  /** Lower-case extensions including the dot */
  targetExtensions?: readonly string[];
  /** Directories whose name starts with this are skipped */
  outputFolderName?: string;
  /** Glob patterns relative to the scan root */
  excludePatterns?: readonly string[];
}

interface ParsedNote {
  frontmatter: Record<string, unknown>;
  body: string;
}

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_TARGET_EXTENSIONS: readonly string[] = [".md"];
export const DEFAULT_OUTPUT_FOLDER_NAME = "_briefings";

const UNCHECKED_PATTERN = /- \[ \]/g;
const CHECKED_PATTERN = /- \[x\]/gi;

// =============================================================================
// Metadata Extraction
// =============================================================================

/**
 * Split frontmatter from the body. Malformed YAML yields empty metadata
 * and the raw text as body.
 */
export function parseNoteContent(raw: string, filePath: string): ParsedNote {
  try {
    const parsed = matter(raw);
    return { frontmatter: parsed.data, body: parsed.content };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.warn(`Malformed frontmatter in ${filePath}: ${message}`);
    return { frontmatter: {}, body: raw };
  }
}

export function countCheckboxes(body: string): { unchecked: number; checked: number } {
  return {
    unchecked: body.match(UNCHECKED_PATTERN)?.length ?? 0,
    checked: body.match(CHECKED_PATTERN)?.length ?? 0,
  };
}

/**
 * YAML parses bare dates into Date objects; bring them back to YYYY-MM-DD.
 */
export function normalizeDeadline(value: unknown): string | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString().slice(0, 10);
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  if (typeof value === "number") {
    return String(value);
  }
  return null;
}

export function normalizePriority(value: unknown): string {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return "";
}

export function normalizeTags(value: unknown): string[] {
  if (typeof value === "string") {
    return value.trim().length > 0 ? [value.trim()] : [];
  }
  if (Array.isArray(value)) {
    return value.filter((tag): tag is string => typeof tag === "string");
  }
  return [];
}

function toPosix(path: string): string {
  return path.split(sep).join("/");
}

// =============================================================================
// Scanning
// =============================================================================

async function readNote(
  absolutePath: string,
  root: string
): Promise<NoteRecord | null> {
  let raw: string;
  try {
    raw = await readFile(absolutePath, "utf-8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.warn(`Skipping unreadable file ${absolutePath}: ${message}`);
    return null;
  }

  const { frontmatter, body } = parseNoteContent(raw, absolutePath);
  const { unchecked, checked } = countCheckboxes(body);

  let modifiedAt: Date | null = null;
  let createdAt: Date | null = null;
  let sizeBytes = 0;
  try {
    const info = await stat(absolutePath);
    modifiedAt = info.mtime;
    createdAt = info.birthtime;
    sizeBytes = info.size;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.warn(`Could not stat ${absolutePath}: ${message}`);
  }

  return {
    relativePath: toPosix(relative(root, absolutePath)),
    absolutePath,
    folderName: basename(dirname(absolutePath)),
    modifiedAt,
    createdAt,
    sizeBytes,
    priority: normalizePriority(frontmatter.priority),
    deadline: normalizeDeadline(frontmatter.deadline),
    tags: normalizeTags(frontmatter.tags),
    uncheckedCount: unchecked,
    checkedCount: checked,
    frontmatter,
    content: body,
  };
}

/**
 * Recursively scan one folder. A missing folder yields no notes.
 */
export async function scanFolder(folderPath: string, options: ScanOptions = {}): Promise<NoteRecord[]> {
  const extensions = (options.targetExtensions ?? DEFAULT_TARGET_EXTENSIONS).map((ext) =>
    ext.toLowerCase()
  );
  const outputFolderName = options.outputFolderName ?? DEFAULT_OUTPUT_FOLDER_NAME;
  const excludePatterns = options.excludePatterns ?? [];
  const isExcluded: (path: string) => boolean =
    excludePatterns.length > 0 ? picomatch([...excludePatterns], { dot: true }) : () => false;

  const root = resolve(folderPath);
  const notes: NoteRecord[] = [];

  async function walk(dir: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.warn(`Cannot read folder ${dir}: ${message}`);
      return;
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      if (entry.name.startsWith(".")) continue;

      const fullPath = join(dir, entry.name);
      const relativePath = toPosix(relative(root, fullPath));
      if (isExcluded(relativePath)) continue;

      if (entry.isDirectory()) {
        if (entry.name.startsWith(outputFolderName)) continue;
        await walk(fullPath);
      } else if (entry.isFile() && extensions.includes(extname(entry.name).toLowerCase())) {
        const note = await readNote(fullPath, root);
        if (note) {
          notes.push(note);
        }
      }
    }
  }

  await walk(root);
  log.info(`Scanned ${root}: ${notes.length} notes`);
  return notes;
}

/**
 * Scan several folders, dropping notes already seen by absolute path.
 * Relative paths stay unique across folders: when two folders hold the same
 * relative path, the note from the earlier folder is kept, which is also the
 * one a topic key resolves to.
 */
export async function scanFolders(
  folderPaths: readonly string[],
  options: ScanOptions = {}
): Promise<NoteRecord[]> {
  const seen = new Set<string>();
  const byRelativePath = new Map<string, string>();
  const all: NoteRecord[] = [];

  for (const folderPath of folderPaths) {
    for (const note of await scanFolder(folderPath, options)) {
      if (seen.has(note.absolutePath)) {
        log.debug(`Skipping duplicate ${note.absolutePath}`);
        continue;
      }
      seen.add(note.absolutePath);

      const kept = byRelativePath.get(note.relativePath);
      if (kept !== undefined) {
        log.warn(`Skipping ${note.absolutePath}: ${note.relativePath} already taken by ${kept}`);
        continue;
      }
      byRelativePath.set(note.relativePath, note.absolutePath);
      all.push(note);
    }
  }

  log.info(`Scanned ${folderPaths.length} folders: ${all.length} notes`);
  return all;
}
