// Public API — monitor module
export { createMonitor, DEFAULT_PLAN_REFRESH_MS } from "./create-monitor";
export type { Monitor } from "./create-monitor";
export { restoreSelection, stepSelection } from "./selection";

export type { MonitorOptions, MonitorSnapshot, CollectFn } from "./types";
