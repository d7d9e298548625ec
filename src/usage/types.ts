// ============================================================
// Aggregate usage across sessions
// ============================================================

export interface UsageSummary {
  totalSessions: number;
  /** Sessions whose file changed within the active window at aggregation time */
  activeSessions: number;
  totalInputTokens: number;
  totalOutputTokens: number;
  totalCacheCreationTokens: number;
  totalCacheReadTokens: number;
  totalCostUsd: number;
  totalMessages: number;
  /** Distinct non-empty model ids across all sessions */
  modelsUsed: Set<string>;
}

// ============================================================
// Trailing-window request/token rate
// ============================================================

/** Per-minute ceilings the observed rate is compared against. */
export interface RateLimits {
  requestsPerMinute: number;
  inputTokensPerMinute: number;
  outputTokensPerMinute: number;
}

export type RateStatus = "idle" | "ok" | "moderate" | "near-limit";

export interface RateEstimate {
  /** Messages inside the window */
  requests: number;
  /** Input + cache creation + cache read tokens inside the window */
  inputTokens: number;
  /** Output tokens inside the window */
  outputTokens: number;
  /** Each value as a percentage of its ceiling, clamped to [0, 100] */
  requestsPct: number;
  inputPct: number;
  outputPct: number;
  status: RateStatus;
}
