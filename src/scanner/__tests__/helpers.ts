/**
 * Temp data-dir builder for scanner tests.
 */

import { mkdir, mkdtemp, rm, utimes, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

export interface TempDataDir {
  /** Absolute path of the data dir (contains `projects/`). */
  root: string;
  /**
   * Write a file relative to the data dir, creating parent dirs.
   * `mtimeSec` pins the modification time (epoch seconds).
   */
  write: (relPath: string, content: string, mtimeSec?: number) => Promise<string>;
  cleanup: () => Promise<void>;
}

export async function createTempDataDir(): Promise<TempDataDir> {
  const root = await mkdtemp(join(tmpdir(), "tokentally-scanner-test-"));
  return {
    root,
    write: async (relPath, content, mtimeSec) => {
      const full = join(root, relPath);
      await mkdir(dirname(full), { recursive: true });
      await writeFile(full, content);
      if (mtimeSec !== undefined) await utimes(full, mtimeSec, mtimeSec);
      return full;
    },
    cleanup: () => rm(root, { recursive: true, force: true }),
  };
}
