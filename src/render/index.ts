// Public API — render module
export {
  formatTokens,
  formatNumber,
  formatThousands,
  formatCost,
  formatPercent,
  formatClock,
  shortenProjectPath,
  shortenModel,
  truncateStart,
  truncateEnd,
} from "./format";
export { downsample, renderSparkline, renderBar, SPARK_BLOCKS } from "./charts";
export { renderTable } from "./table";
export type { Column } from "./table";
export { renderSnapshot, SNAPSHOT_HEADING } from "./snapshot";
export type { SnapshotInput } from "./snapshot";
export { renderDashboard, renderStatusLine, contextStatus } from "./dashboard";
export type { DashboardOptions } from "./dashboard";
