import type { Logger } from "../logging/logger";
import type { SessionRecord } from "../parser";
import type { PlanUsagePoller, PlanUsageResult } from "../plan";
import type { RateEstimate, RateLimits, UsageSummary } from "../usage";

export type CollectFn = (dataDir: string) => Promise<SessionRecord[]>;

export interface MonitorOptions {
  /** Data root holding `projects/` */
  dataDir: string;
  /** Override for testing. Defaults to scanner's collectSessions. */
  collect?: CollectFn;
  /** Plan usage source; without one the plan panel stays empty. */
  planPoller?: PlanUsagePoller;
  /** Minimum time between plan requests (default: 60000). */
  planRefreshIntervalMs?: number;
  rateLimits?: RateLimits;
  logger?: Logger;
}

// ============================================================
// Monitor Snapshot (one refresh cycle, immutable once returned)
// ============================================================

export interface MonitorSnapshot {
  dataDir: string;
  /** Epoch ms the cycle was computed for */
  takenAt: number;
  /** Most recently modified first */
  sessions: SessionRecord[];
  summary: UsageSummary;
  /** Index into `sessions`, -1 when there are none */
  selectedIndex: number;
  selected: SessionRecord | null;
  /** Rate estimate for the selected session */
  rate: RateEstimate;
  /** False when the monitor has no plan usage source */
  planEnabled: boolean;
  /** Last plan result delivered, null until the first one arrives */
  plan: PlanUsageResult | null;
}
