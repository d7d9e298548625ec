import { existsSync } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import { homedir } from "node:os";
import { join, relative, sep } from "node:path";

/** Directory (relative to the data dir) holding one sub-directory per project. */
export const PROJECTS_DIR = "projects";

/** Session files carry this extension. */
export const SESSION_EXTENSION = ".jsonl";

/** Path segment marking internally spawned sub-sessions, hidden from discovery. */
export const EXCLUDED_SEGMENT = "subagents";

/**
 * Data directory candidates, most specific first. When none exists the
 * last one is used.
 */
export function defaultDataDirCandidates(): string[] {
  return [
    join(homedir(), ".config", "claude"),
    "/root/.claude",
    join(homedir(), ".claude"),
  ];
}

/**
 * Return the first existing candidate, or the last candidate if none exist.
 */
export function findDataDir(candidates: string[] = defaultDataDirCandidates()): string {
  for (const candidate of candidates) {
    if (existsSync(candidate)) return candidate;
  }
  return candidates[candidates.length - 1];
}

/** Recursively list files ending in `.jsonl` below `dir`. Unreadable dirs are skipped. */
async function walk(dir: string, out: string[]): Promise<void> {
  let entries;
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch {
    return;
  }

  await Promise.all(
    entries.map(async (entry) => {
      const full = join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(full, out);
      } else if (entry.isFile() && entry.name.endsWith(SESSION_EXTENSION)) {
        out.push(full);
      }
    }),
  );
}

/**
 * Find all session log files under `<dataDir>/projects`.
 *
 * Files under a `subagents` segment are excluded. Sorted by modification
 * time descending (newest first); files that cannot be stat'ed sort last.
 * A missing data dir yields an empty list.
 */
export async function discoverSessions(dataDir: string): Promise<string[]> {
  const projectsDir = join(dataDir, PROJECTS_DIR);

  const files: string[] = [];
  await walk(projectsDir, files);

  const candidates = files.filter(
    (file) => !relative(projectsDir, file).split(sep).includes(EXCLUDED_SEGMENT),
  );

  const withTimes = await Promise.all(
    candidates.map(async (path) => {
      try {
        const info = await stat(path);
        return { path, mtimeMs: info.mtimeMs };
      } catch {
        return { path, mtimeMs: 0 };
      }
    }),
  );

  // Newest first; equal times fall back to path order so the result is deterministic
  withTimes.sort((a, b) => b.mtimeMs - a.mtimeMs || a.path.localeCompare(b.path));

  return withTimes.map((f) => f.path);
}
