import type { RawRecord } from "./types";
import { RawRecordSchema } from "./schemas";

/**
 * Parse a single JSONL line into a raw record.
 *
 * - Empty/blank line → null
 * - Invalid JSON → null
 * - Valid JSON that is not an object (number, string, array, null) → null
 * - Object → RawRecord, with unusable fields degraded to empty values
 *
 * Never throws.
 */
export function parseLine(line: string): RawRecord | null {
  const trimmed = line.trim();
  if (trimmed === "") return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return null;
  }

  const result = RawRecordSchema.safeParse(parsed);
  return result.success ? result.data : null;
}
