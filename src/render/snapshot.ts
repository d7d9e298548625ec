import { contextUsagePct, estimatedCostUsd, type SessionRecord } from "../parser";
import { formatResetTime, isPlanUsageAvailable, planQuotas, type PlanUsageResult } from "../plan";
import type { UsageSummary } from "../usage";
import { formatCost, formatNumber, formatPercent, shortenModel, shortenProjectPath } from "./format";
import { renderTable } from "./table";

export interface SnapshotInput {
  sessions: readonly SessionRecord[];
  summary: UsageSummary;
  /** null when plan usage was not requested */
  plan: PlanUsageResult | null;
  now: number;
}

export const SNAPSHOT_HEADING = "Usage Snapshot";

function summaryTable(summary: UsageSummary): string {
  const models = [...summary.modelsUsed].sort().join(", ") || "N/A";
  return renderTable(
    [{ header: "Metric" }, { header: "Value" }],
    [
      ["Total Sessions", String(summary.totalSessions)],
      ["Active Sessions", String(summary.activeSessions)],
      ["Total Messages", formatNumber(summary.totalMessages)],
      ["Input Tokens", formatNumber(summary.totalInputTokens)],
      ["Output Tokens", formatNumber(summary.totalOutputTokens)],
      ["Cache Write", formatNumber(summary.totalCacheCreationTokens)],
      ["Cache Read", formatNumber(summary.totalCacheReadTokens)],
      ["Estimated Cost", formatCost(summary.totalCostUsd)],
      ["Models", models],
    ],
    "Overall Summary",
  );
}

function sessionTable(sessions: readonly SessionRecord[]): string {
  return renderTable(
    [
      { header: "Project" },
      { header: "Model" },
      { header: "Messages", align: "right" },
      { header: "Input", align: "right" },
      { header: "Output", align: "right" },
      { header: "Context %", align: "right" },
      { header: "Cost", align: "right" },
    ],
    sessions.map((s) => [
      shortenProjectPath(s.projectPath),
      shortenModel(s.model),
      String(s.messageCount),
      formatNumber(s.totalInputTokens),
      formatNumber(s.totalOutputTokens),
      formatPercent(contextUsagePct(s)),
      formatCost(estimatedCostUsd(s)),
    ]),
    "Sessions",
  );
}

function planTable(plan: PlanUsageResult, now: number): string {
  return renderTable(
    [{ header: "Limit" }, { header: "Usage", align: "right" }, { header: "Resets In" }],
    planQuotas(plan).map((q) => [q.label, formatPercent(q.utilization, 0), formatResetTime(q.resetsAt, now)]),
    "Plan Usage",
  );
}

/**
 * One-shot text report: overall summary, one row per session, and the
 * plan quota table when any window is available.
 */
export function renderSnapshot({ sessions, summary, plan, now }: SnapshotInput): string {
  const sections = [SNAPSHOT_HEADING, summaryTable(summary)];
  if (sessions.length > 0) sections.push(sessionTable(sessions));
  if (plan && isPlanUsageAvailable(plan)) {
    sections.push(planTable(plan, now));
  } else if (plan?.error) {
    sections.push(`Plan usage unavailable: ${plan.error}`);
  }
  return `${sections.join("\n\n")}\n`;
}
