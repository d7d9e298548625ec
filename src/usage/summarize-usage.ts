import { estimatedCostUsd, type SessionRecord } from "../parser";
import type { UsageSummary } from "./types";

/** A session counts as active when its file changed within this window. */
export const ACTIVE_WINDOW_MS = 3_600_000;

/**
 * Fold sessions into one summary. Each session contributes exactly once;
 * activity is judged against `now`, not against when the session was parsed.
 */
export function summarizeUsage(
  sessions: readonly SessionRecord[],
  now: number = Date.now(),
): UsageSummary {
  const summary: UsageSummary = {
    totalSessions: sessions.length,
    activeSessions: 0,
    totalInputTokens: 0,
    totalOutputTokens: 0,
    totalCacheCreationTokens: 0,
    totalCacheReadTokens: 0,
    totalCostUsd: 0,
    totalMessages: 0,
    modelsUsed: new Set<string>(),
  };

  for (const session of sessions) {
    summary.totalInputTokens += session.totalInputTokens;
    summary.totalOutputTokens += session.totalOutputTokens;
    summary.totalCacheCreationTokens += session.totalCacheCreationTokens;
    summary.totalCacheReadTokens += session.totalCacheReadTokens;
    summary.totalCostUsd += estimatedCostUsd(session);
    summary.totalMessages += session.messageCount;

    if (session.model) summary.modelsUsed.add(session.model);

    if (session.fileMtimeMs > 0 && now - session.fileMtimeMs < ACTIVE_WINDOW_MS) {
      summary.activeSessions++;
    }
  }

  return summary;
}

/** Input + output tokens across the summary (cache tokens excluded). */
export function summaryTotalTokens(summary: UsageSummary): number {
  return summary.totalInputTokens + summary.totalOutputTokens;
}
