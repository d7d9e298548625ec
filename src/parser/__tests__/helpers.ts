/**
 * Fixture builders for raw JSONL records and temp session files.
 */

import { appendFile, mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

export interface UsageFields {
  input_tokens?: number;
  output_tokens?: number;
  cache_creation_input_tokens?: number;
  cache_read_input_tokens?: number;
}

export function makeUserRecord(timestamp: string, overrides: Record<string, unknown> = {}) {
  return {
    type: "user" as const,
    timestamp,
    message: { role: "user" as const, content: "hello" },
    ...overrides,
  };
}

export function makeAssistantRecord(
  timestamp: string,
  usage: UsageFields,
  model = "claude-sonnet-4-5-20250929",
  overrides: Record<string, unknown> = {},
) {
  return {
    type: "assistant" as const,
    timestamp,
    message: { model, role: "assistant" as const, usage },
    ...overrides,
  };
}

/** Serialize a record to a JSONL line */
export function toLine(record: Record<string, unknown>): string {
  return JSON.stringify(record);
}

export interface TempSessionFile {
  /** Absolute path to the .jsonl file */
  path: string;
  /** Append lines (each terminated with \n) */
  append: (lines: string[]) => Promise<void>;
  /** Remove the temp directory and its contents */
  cleanup: () => Promise<void>;
}

/**
 * Create `<tmp>/projects/<project>/<name>.jsonl` with the given lines.
 */
export async function createSessionFile(
  lines: string[],
  project = "-home-user-testproject",
  name = "session-abc",
): Promise<TempSessionFile> {
  const root = await mkdtemp(join(tmpdir(), "tokentally-parser-test-"));
  const dir = join(root, "projects", project);
  await mkdir(dir, { recursive: true });
  const path = join(dir, `${name}.jsonl`);
  await writeFile(path, lines.map((l) => l + "\n").join(""));
  return {
    path,
    append: (more) => appendFile(path, more.map((l) => l + "\n").join("")),
    cleanup: () => rm(root, { recursive: true, force: true }),
  };
}
