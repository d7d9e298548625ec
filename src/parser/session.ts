import { basename, dirname, extname } from "node:path";
import { contextWindowFor, computeCost, DEFAULT_CONTEXT_WINDOW } from "../pricing";
import { AssistantMessageSchema } from "./schemas";
import type { AssistantMessage, FileInfo, RawRecord, SessionRecord } from "./types";

const EMPTY_MESSAGE: AssistantMessage = {
  model: "",
  usage: {
    input_tokens: 0,
    output_tokens: 0,
    cache_creation_input_tokens: 0,
    cache_read_input_tokens: 0,
  },
};

/**
 * Create an empty session record for a log file.
 * Identity is the file path; id and project come from its name and parent dir.
 */
export function createSessionRecord(filePath: string, file: FileInfo): SessionRecord {
  return {
    sessionId: basename(filePath, extname(filePath)),
    projectPath: basename(dirname(filePath)),
    model: "",
    startedAt: "",
    lastActivity: "",
    totalInputTokens: 0,
    totalOutputTokens: 0,
    totalCacheCreationTokens: 0,
    totalCacheReadTokens: 0,
    messageCount: 0,
    userMessageCount: 0,
    assistantMessageCount: 0,
    messages: [],
    latestContextUsed: 0,
    contextWindowSize: DEFAULT_CONTEXT_WINDOW,
    filePath,
    fileSize: file.size,
    fileMtimeMs: file.mtimeMs,
  };
}

/**
 * Fold one decoded record into a session (mutates `session`).
 *
 * Totals only ever grow, so applying the records of a longer copy of the
 * same file yields totals at least as large.
 */
export function applyRecord(session: SessionRecord, record: RawRecord): void {
  const { type, timestamp } = record;

  if (timestamp) {
    if (!session.startedAt) session.startedAt = timestamp;
    session.lastActivity = timestamp;
  }

  session.messageCount++;

  if (type === "user") {
    session.userMessageCount++;
    return;
  }
  if (type !== "assistant") return;

  session.assistantMessageCount++;

  const parsed = AssistantMessageSchema.safeParse(record.message ?? {});
  const { model, usage } = parsed.success ? parsed.data : EMPTY_MESSAGE;

  if (model) {
    session.model = model;
    session.contextWindowSize = contextWindowFor(model);
  }

  const inputTokens = usage.input_tokens;
  const outputTokens = usage.output_tokens;
  const cacheCreationTokens = usage.cache_creation_input_tokens;
  const cacheReadTokens = usage.cache_read_input_tokens;

  session.totalInputTokens += inputTokens;
  session.totalOutputTokens += outputTokens;
  session.totalCacheCreationTokens += cacheCreationTokens;
  session.totalCacheReadTokens += cacheReadTokens;

  // Overwritten, not summed: the fill reported by the most recent turn.
  session.latestContextUsed = inputTokens + cacheCreationTokens + cacheReadTokens;

  session.messages.push({
    timestamp: timestamp ?? "",
    model,
    inputTokens,
    outputTokens,
    cacheCreationTokens,
    cacheReadTokens,
    messageType: type,
  });
}

// ============================================================
// Computed accessors
// ============================================================

/** Input + output tokens (cache tokens excluded). */
export function totalTokens(session: SessionRecord): number {
  return session.totalInputTokens + session.totalOutputTokens;
}

/** Context fill of the latest turn as a percentage of the window, in [0, 100]. */
export function contextUsagePct(session: SessionRecord): number {
  if (session.contextWindowSize <= 0) return 0;
  const pct = (session.latestContextUsed / session.contextWindowSize) * 100;
  return Math.max(0, Math.min(100, pct));
}

/** Estimated cost in USD, recomputed from the current totals on every call. */
export function estimatedCostUsd(session: SessionRecord): number {
  return computeCost(
    {
      inputTokens: session.totalInputTokens,
      outputTokens: session.totalOutputTokens,
      cacheCreationTokens: session.totalCacheCreationTokens,
      cacheReadTokens: session.totalCacheReadTokens,
    },
    session.model,
  );
}

/**
 * Average tokens per minute between the first and last recorded message.
 * 0 with fewer than two messages, a non-positive span or unparsable timestamps.
 */
export function tokensPerMinute(session: SessionRecord): number {
  const { messages } = session;
  if (messages.length < 2) return 0;

  const first = Date.parse(messages[0].timestamp);
  const last = Date.parse(messages[messages.length - 1].timestamp);
  if (Number.isNaN(first) || Number.isNaN(last)) return 0;

  const elapsedMinutes = (last - first) / 60_000;
  if (elapsedMinutes <= 0) return 0;
  return totalTokens(session) / elapsedMinutes;
}
