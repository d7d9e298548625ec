import { silentLogger } from "../logging/logger";
import type { SessionRecord } from "../parser";
import type { PlanUsageResult } from "../plan";
import { collectSessions } from "../scanner";
import { DEFAULT_RATE_LIMITS, estimateRate, summarizeUsage, type UsageSummary } from "../usage";
import { restoreSelection, stepSelection } from "./selection";
import type { MonitorOptions, MonitorSnapshot } from "./types";

export const DEFAULT_PLAN_REFRESH_MS = 60_000;

export interface Monitor {
  /** Reload every session and return the new snapshot. */
  refresh: (now?: number) => Promise<MonitorSnapshot>;
  /** Snapshot of the last refresh with the current selection, null before the first. */
  current: () => MonitorSnapshot | null;
  selectNext: () => MonitorSnapshot | null;
  selectPrevious: () => MonitorSnapshot | null;
  /** Select by session id; false when the id is not in the last refresh. */
  selectSession: (sessionId: string) => boolean;
}

interface CycleState {
  takenAt: number;
  sessions: SessionRecord[];
  summary: UsageSummary;
}

export function createMonitor(options: MonitorOptions): Monitor {
  const collect = options.collect ?? collectSessions;
  const planInterval = options.planRefreshIntervalMs ?? DEFAULT_PLAN_REFRESH_MS;
  const limits = options.rateLimits ?? DEFAULT_RATE_LIMITS;
  const log = (options.logger ?? silentLogger()).child({ module: "monitor" });

  let cycle: CycleState | null = null;
  let selectedId: string | null = null;
  let selectedIndex = -1;
  let plan: PlanUsageResult | null = null;
  let lastPlanRequest: number | null = null;

  function pollPlan(now: number): void {
    const poller = options.planPoller;
    if (!poller) return;

    if (lastPlanRequest === null || now - lastPlanRequest >= planInterval) {
      if (poller.request()) {
        lastPlanRequest = now;
        log.debug("plan usage requested");
      }
    }

    const delivered = poller.take();
    if (delivered) {
      plan = delivered;
      if (delivered.error) log.info({ error: delivered.error }, "plan usage unavailable");
    }
  }

  function snapshot(state: CycleState): MonitorSnapshot {
    const selected = state.sessions[selectedIndex] ?? null;
    return {
      dataDir: options.dataDir,
      takenAt: state.takenAt,
      sessions: state.sessions,
      summary: state.summary,
      selectedIndex,
      selected,
      rate: estimateRate(selected?.messages ?? [], state.takenAt, limits),
      planEnabled: options.planPoller !== undefined,
      plan,
    };
  }

  function select(index: number): void {
    selectedIndex = index;
    selectedId = cycle?.sessions[index]?.sessionId ?? null;
  }

  async function refresh(now: number = Date.now()): Promise<MonitorSnapshot> {
    const sessions = await collect(options.dataDir);
    cycle = { takenAt: now, sessions, summary: summarizeUsage(sessions, now) };
    select(restoreSelection(sessions, selectedId, selectedIndex));
    log.debug({ sessions: sessions.length }, "refreshed");

    pollPlan(now);
    return snapshot(cycle);
  }

  function current(): MonitorSnapshot | null {
    return cycle ? snapshot(cycle) : null;
  }

  function move(delta: number): MonitorSnapshot | null {
    if (!cycle) return null;
    select(stepSelection(cycle.sessions.length, selectedIndex, delta));
    return snapshot(cycle);
  }

  function selectSession(sessionId: string): boolean {
    const index = cycle?.sessions.findIndex((s) => s.sessionId === sessionId) ?? -1;
    if (index === -1) return false;
    select(index);
    return true;
  }

  return {
    refresh,
    current,
    selectNext: () => move(1),
    selectPrevious: () => move(-1),
    selectSession,
  };
}
