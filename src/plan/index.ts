// Public API — plan module
export {
  fetchPlanUsage,
  isPlanUsageAvailable,
  planQuotas,
  emptyPlanUsage,
  USAGE_ENDPOINT,
  OAUTH_BETA_HEADER,
  DEFAULT_BASE_URL,
  NO_TOKEN_ERROR,
} from "./fetch-plan-usage";
export type { FetchPlanUsageOptions } from "./fetch-plan-usage";
export { findOAuthToken, defaultFallbackPaths, TOKEN_LOOKUPS } from "./credentials";
export type { FoundToken, TokenLookup } from "./credentials";
export { formatResetTime } from "./format-reset-time";
export { createPlanUsagePoller } from "./poller";
export type { PlanUsagePoller, PlanUsagePollerOptions } from "./poller";

export type { PlanQuota, PlanUsageResult, OAuthUsageResponse } from "./types";
