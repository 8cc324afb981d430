/**
 * Log Scanner
 *
 * Walks the data directory and yields every session log with its
 * derived identity (session id from the filename, project path from
 * the parent directory relative to the root).
 */

import type { Dirent, Stats } from "fs";
import { readdir, stat } from "fs/promises";
import { basename, dirname, join, relative, sep } from "path";
import { minimatch } from "minimatch";
import { ScanError } from "./errors.js";

export const LOG_EXTENSION = ".jsonl";

// Hidden directories are skipped, except the one that holds the logs
const HIDDEN_DIR_EXCEPTION = ".claude";

export interface LogFile {
  path: string;
  projectPath: string;
  sessionId: string;
  /** Last modification, epoch milliseconds */
  modTime: number;
  size: number;
}

// --- Identity Derivation ---

export function extractSessionId(filename: string): string {
  return filename.endsWith(LOG_EXTENSION) ? filename.slice(0, -LOG_EXTENSION.length) : filename;
}

/**
 * `session.jsonl` -> `/`, `org/project/session.jsonl` -> `/org/project`
 */
export function extractProjectPath(relPath: string): string {
  const dir = dirname(relPath);
  if (dir === ".") return "/";
  return "/" + dir.split(sep).join("/");
}

// --- Exclusion ---

/**
 * Two independent rules: a shell glob against the basename, or a plain
 * substring of the full path. Either one excludes the file.
 */
export function isExcluded(path: string, patterns: readonly string[]): boolean {
  const name = basename(path);
  for (const pattern of patterns) {
    if (pattern === "") continue;
    if (
      minimatch(name, pattern, {
        dot: true,
        nobrace: true,
        noext: true,
        noglobstar: true,
        nocomment: true,
        nonegate: true,
      })
    ) {
      return true;
    }
    if (path.includes(pattern)) return true;
  }
  return false;
}

function shouldSkipDirectory(name: string): boolean {
  return name.startsWith(".") && name !== HIDDEN_DIR_EXCEPTION;
}

// --- Walk ---

async function walk(
  rootDir: string,
  dir: string,
  excludePatterns: readonly string[],
  out: LogFile[]
): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (err) {
    if (dir === rootDir) throw new ScanError(rootDir, err);
    // Unreadable subdirectories are skipped
    return;
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const entryPath = join(dir, entry.name);

    if (entry.isDirectory()) {
      if (shouldSkipDirectory(entry.name)) continue;
      await walk(rootDir, entryPath, excludePatterns, out);
      continue;
    }

    if (!(entry.isFile() || entry.isSymbolicLink()) || !entry.name.endsWith(LOG_EXTENSION)) continue;
    if (isExcluded(entryPath, excludePatterns)) continue;

    let info: Stats;
    try {
      info = await stat(entryPath);
    } catch {
      // Removed between readdir and stat, or a dangling link
      continue;
    }
    // Links are followed; only regular files are logs
    if (!info.isFile()) continue;

    out.push({
      path: entryPath,
      projectPath: extractProjectPath(relative(rootDir, entryPath)),
      sessionId: extractSessionId(entry.name),
      modTime: info.mtimeMs,
      size: info.size,
    });
  }
}

/**
 * Find every session log under `rootDir`, in lexical walk order.
 *
 * Only an unreadable root is fatal (ScanError).
 */
export async function scanForLogs(
  rootDir: string,
  excludePatterns: readonly string[] = []
): Promise<LogFile[]> {
  const files: LogFile[] = [];
  await walk(rootDir, rootDir, excludePatterns, files);
  return files;
}
