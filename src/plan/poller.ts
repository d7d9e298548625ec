import { silentLogger, type Logger } from "../logging/logger";
import { emptyPlanUsage } from "./fetch-plan-usage";
import type { PlanUsageResult } from "./types";

export interface PlanUsagePoller {
  /** Start a fetch unless one is in flight. Returns whether one started. */
  request(): boolean;
  /** Take the delivered result, if any, and clear the slot. Never waits. */
  take(): PlanUsageResult | null;
  readonly inFlight: boolean;
  /** Resolves once the current fetch (if any) has delivered its result */
  settled(): Promise<void>;
}

export interface PlanUsagePollerOptions {
  fetch: () => Promise<PlanUsageResult>;
  logger?: Logger;
}

/**
 * Run plan fetches off the refresh path. At most one fetch is in flight;
 * a newer result replaces an untaken one.
 */
export function createPlanUsagePoller(options: PlanUsagePollerOptions): PlanUsagePoller {
  const log = (options.logger ?? silentLogger()).child({ module: "plan-poller" });
  let slot: PlanUsageResult | null = null;
  let pending: Promise<void> | null = null;

  return {
    request() {
      if (pending) return false;
      pending = options
        .fetch()
        .then(
          (result) => {
            slot = result;
          },
          (err: unknown) => {
            log.error({ err }, "plan usage fetch rejected");
            slot = emptyPlanUsage(err instanceof Error ? err.message : String(err));
          },
        )
        .finally(() => {
          pending = null;
        });
      return true;
    },
    take() {
      const result = slot;
      slot = null;
      return result;
    },
    get inFlight() {
      return pending !== null;
    },
    async settled() {
      if (pending) await pending;
    },
  };
}
