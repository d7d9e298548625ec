import { createReadStream } from "node:fs";
import { stat } from "node:fs/promises";
import { parseLine } from "./parse-line";
import { applyRecord, createSessionRecord } from "./session";
import type { FileInfo, SessionRecord } from "./types";

/**
 * Parse one `.jsonl` session log into a SessionRecord.
 *
 * Streams the file and folds it line by line. Blank and undecodable lines
 * are skipped. A stat or read failure ends the scan and returns whatever was
 * aggregated up to that point (an empty record if nothing was read).
 * Never throws.
 */
export async function parseSessionFile(filePath: string): Promise<SessionRecord> {
  let file: FileInfo;
  try {
    const info = await stat(filePath);
    file = { size: info.size, mtimeMs: info.mtimeMs };
  } catch {
    // Missing or unreadable: nothing to aggregate
    return createSessionRecord(filePath, { size: 0, mtimeMs: 0 });
  }

  const session = createSessionRecord(filePath, file);

  /** Partial line carried over from the previous chunk (no trailing \n yet). */
  let lineBuffer = "";
  try {
    for await (const chunk of createReadStream(filePath, { encoding: "utf-8" })) {
      const segments = (lineBuffer + String(chunk)).split("\n");
      lineBuffer = segments.pop() ?? "";
      for (const line of segments) {
        const record = parseLine(line);
        if (record !== null) applyRecord(session, record);
      }
    }
    // Last line without a trailing newline
    const record = parseLine(lineBuffer);
    if (record !== null) applyRecord(session, record);
  } catch {
    // Read failed part-way; keep the partial aggregate
  }

  return session;
}

/**
 * Parse session log content already held in memory.
 * Same folding rules as {@link parseSessionFile}.
 */
export function parseSessionContent(
  content: string,
  filePath: string,
  file: FileInfo = { size: Buffer.byteLength(content), mtimeMs: 0 },
): SessionRecord {
  const session = createSessionRecord(filePath, file);
  for (const line of content.split("\n")) {
    const record = parseLine(line);
    if (record !== null) applyRecord(session, record);
  }
  return session;
}
