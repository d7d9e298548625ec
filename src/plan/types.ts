import type { z } from "zod";
import type { OAuthUsageResponseSchema } from "./schemas";

export type OAuthUsageResponse = z.infer<typeof OAuthUsageResponseSchema>;

/** One subscription limit window. */
export interface PlanQuota {
  /** Display label, e.g. "5-Hour Session" */
  label: string;
  /** Percentage used, clamped to [0, 100] */
  utilization: number;
  /** ISO 8601 reset instant, "" when the API gave none */
  resetsAt: string;
}

/** Subscription plan usage as reported by the OAuth usage endpoint. */
export interface PlanUsageResult {
  fiveHour: PlanQuota | null;
  sevenDay: PlanQuota | null;
  sevenDaySonnet: PlanQuota | null;
  sevenDayOpus: PlanQuota | null;
  /** "" on success; otherwise why no (or partial) data is available */
  error: string;
}
