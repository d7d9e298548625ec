// Public API — usage module
export { summarizeUsage, summaryTotalTokens, ACTIVE_WINDOW_MS } from "./summarize-usage";
export { estimateRate, DEFAULT_RATE_LIMITS, RATE_WINDOW_MS } from "./estimate-rate";

export type { UsageSummary, RateLimits, RateStatus, RateEstimate } from "./types";
