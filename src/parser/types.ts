import type { z } from "zod";
import type { RawRecordSchema, AssistantMessageSchema, TokenUsageSchema } from "./schemas";

// ============================================================
// Inferred types from Zod schemas
// ============================================================

export type RawRecord = z.infer<typeof RawRecordSchema>;
export type AssistantMessage = z.infer<typeof AssistantMessageSchema>;
export type TokenUsage = z.infer<typeof TokenUsageSchema>;

// ============================================================
// Session types (built by the parser, not Zod-validated)
// ============================================================

/** Token usage of one assistant turn. Appended in file order, never mutated. */
export interface MessageStat {
  /** ISO 8601 timestamp of the record, "" when the record had none */
  readonly timestamp: string;
  /** Model id reported on this message, "" when absent */
  readonly model: string;
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly cacheCreationTokens: number;
  readonly cacheReadTokens: number;
  /** Record type the stat came from, e.g. "assistant" */
  readonly messageType: string;
}

export interface FileInfo {
  /** Size in bytes at parse time */
  size: number;
  /** Modification time in epoch milliseconds, 0 when unknown */
  mtimeMs: number;
}

/** Aggregated state for one session log file. */
export interface SessionRecord {
  /** File name without the `.jsonl` extension */
  sessionId: string;
  /** Parent directory name, e.g. "-home-user-myproject" */
  projectPath: string;
  /** Last model seen on an assistant message, "" if none */
  model: string;
  /** First timestamp seen in the file, "" if none */
  startedAt: string;
  /** Last timestamp seen in the file (file order), "" if none */
  lastActivity: string;
  totalInputTokens: number;
  totalOutputTokens: number;
  totalCacheCreationTokens: number;
  totalCacheReadTokens: number;
  /** Every decoded record, whatever its type */
  messageCount: number;
  userMessageCount: number;
  assistantMessageCount: number;
  /** One entry per assistant record, in file order */
  messages: MessageStat[];
  /** Context fill of the most recent assistant turn (input + cache creation + cache read) */
  latestContextUsed: number;
  /** Resolved from the model registry; 200,000 until a known model is seen */
  contextWindowSize: number;
  filePath: string;
  fileSize: number;
  fileMtimeMs: number;
}
