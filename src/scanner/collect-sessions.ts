import pLimit from "p-limit";
import { parseSessionFile, type SessionRecord } from "../parser";
import { discoverSessions } from "./discover-sessions";

/** Session files parsed at once; each holds one open descriptor while read. */
export const PARSE_CONCURRENCY = 16;

export interface CollectOptions {
  concurrency?: number;
  /** Override for testing. Defaults to parseSessionFile. */
  parse?: (path: string) => Promise<SessionRecord>;
}

/**
 * Discover and parse every session under a data dir.
 *
 * Files are parsed a few at a time so large histories stay under the
 * process descriptor limit. The result keeps discovery order (newest first).
 */
export async function collectSessions(
  dataDir: string,
  options: CollectOptions = {},
): Promise<SessionRecord[]> {
  const parse = options.parse ?? parseSessionFile;
  const limit = pLimit(options.concurrency ?? PARSE_CONCURRENCY);
  const paths = await discoverSessions(dataDir);
  return Promise.all(paths.map((path) => limit(() => parse(path))));
}
