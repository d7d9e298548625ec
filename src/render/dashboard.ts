import type { MonitorSnapshot } from "../monitor";
import type { SessionRecord } from "../parser";
import { contextUsagePct, estimatedCostUsd, totalTokens } from "../parser";
import { formatResetTime, isPlanUsageAvailable, planQuotas } from "../plan";
import { costBreakdown } from "../pricing";
import { summaryTotalTokens, type RateEstimate, type RateLimits, type RateStatus } from "../usage";
import { downsample, renderBar, renderSparkline } from "./charts";
import {
  formatClock,
  formatCost,
  formatNumber,
  formatPercent,
  formatThousands,
  formatTokens,
  shortenModel,
  shortenProjectPath,
  truncateEnd,
  truncateStart,
} from "./format";
import { renderTable } from "./table";

export interface DashboardOptions {
  /** Terminal columns available (default: 80) */
  width?: number;
  /** Session rows shown at once (default: 8) */
  maxSessions?: number;
  refreshIntervalMs: number;
  rateLimits: RateLimits;
}

const INDENT = "  ";
const SEPARATOR = "│";

const RATE_STATUS_TEXT: Record<RateStatus, string> = {
  idle: "No recent activity",
  ok: "Within limits",
  moderate: "Moderate usage",
  "near-limit": "NEAR LIMIT - May experience throttling",
};

export function contextStatus(pct: number): string {
  if (pct >= 90) return "[CRITICAL]";
  if (pct >= 70) return "[WARNING]";
  return "";
}

function sessionList(snapshot: MonitorSnapshot, maxRows: number): string[] {
  if (snapshot.sessions.length === 0) return [`${INDENT}No sessions found in ${snapshot.dataDir}`];

  const start = Math.max(0, snapshot.selectedIndex - maxRows + 1);
  const visible = snapshot.sessions.slice(start, start + maxRows);
  const table = renderTable(
    [
      { header: "  Project" },
      { header: "Model" },
      { header: "Msgs", align: "right" },
      { header: "Tokens", align: "right" },
      { header: "Last" },
    ],
    visible.map((s, i) => [
      `${start + i === snapshot.selectedIndex ? "▶" : " "} ${truncateStart(shortenProjectPath(s.projectPath), 20)}`,
      truncateEnd(shortenModel(s.model), 14),
      String(s.messageCount),
      formatTokens(totalTokens(s)),
      formatClock(s.lastActivity),
    ]),
  );
  const lines = table.split("\n");
  const hidden = snapshot.sessions.length - visible.length;
  if (hidden > 0) lines.push(`${INDENT}(${hidden} more)`);
  return lines;
}

function contextGauge(session: SessionRecord, barWidth: number): string[] {
  const pct = contextUsagePct(session);
  const remaining = Math.max(0, session.contextWindowSize - session.latestContextUsed);
  const status = contextStatus(pct);
  const details = [
    `${formatThousands(session.latestContextUsed)} / ${formatThousands(session.contextWindowSize)} tokens`,
    `${formatThousands(remaining)} remaining`,
    [formatPercent(pct), status].filter(Boolean).join(" "),
  ];
  if (session.model) details.push(`Model: ${session.model}`);
  return [`${INDENT}${renderBar(pct, barWidth)} ${formatPercent(pct)}`, `${INDENT}${details.join(" | ")}`];
}

function usageBreakdown(session: SessionRecord): string[] {
  const cost = costBreakdown(
    {
      inputTokens: session.totalInputTokens,
      outputTokens: session.totalOutputTokens,
      cacheCreationTokens: session.totalCacheCreationTokens,
      cacheReadTokens: session.totalCacheReadTokens,
    },
    session.model,
  );
  const total =
    session.totalInputTokens +
    session.totalOutputTokens +
    session.totalCacheCreationTokens +
    session.totalCacheReadTokens;

  return renderTable(
    [{ header: "Category" }, { header: "Tokens", align: "right" }, { header: "Cost", align: "right" }],
    [
      ["Input", formatNumber(session.totalInputTokens), formatCost(cost.input)],
      ["Output", formatNumber(session.totalOutputTokens), formatCost(cost.output)],
      ["Cache Write", formatNumber(session.totalCacheCreationTokens), formatCost(cost.cacheWrite)],
      ["Cache Read", formatNumber(session.totalCacheReadTokens), formatCost(cost.cacheRead)],
      ["TOTAL", formatNumber(total), formatCost(cost.total)],
    ],
  )
    .split("\n")
    .map((line) => INDENT + line);
}

function tokenHistory(session: SessionRecord, chartWidth: number): string[] {
  if (session.messages.length === 0) return [`${INDENT}No data yet`];

  const inputs = downsample(
    session.messages.map((m) => m.inputTokens + m.cacheCreationTokens + m.cacheReadTokens),
    chartWidth,
  );
  const outputs = downsample(
    session.messages.map((m) => m.outputTokens),
    chartWidth,
  );
  return [
    `${INDENT}IN  ${renderSparkline(inputs)}`,
    `${INDENT}OUT ${renderSparkline(outputs)}`,
    `${INDENT}IN peak: ${formatNumber(Math.max(...inputs))}  OUT peak: ${formatNumber(Math.max(...outputs))}  ${session.messages.length} calls`,
  ];
}

function rateMonitor(rate: RateEstimate, limits: RateLimits, barWidth: number): string[] {
  const row = (label: string, value: number, limit: number, pct: number) =>
    `${INDENT}${label}: ${formatNumber(value)}/${formatNumber(limit)}  ${renderBar(pct, barWidth)}`;
  return [
    row("Requests/min", rate.requests, limits.requestsPerMinute, rate.requestsPct),
    row("Input tokens/min", rate.inputTokens, limits.inputTokensPerMinute, rate.inputPct),
    row("Output tokens/min", rate.outputTokens, limits.outputTokensPerMinute, rate.outputPct),
    `${INDENT}${RATE_STATUS_TEXT[rate.status]}`,
  ];
}

function planPanel(snapshot: MonitorSnapshot, barWidth: number): string[] {
  const { plan } = snapshot;
  if (!snapshot.planEnabled) return [`${INDENT}Plan usage disabled`];
  if (!plan) return [`${INDENT}Fetching...`];
  if (!isPlanUsageAvailable(plan)) return [`${INDENT}${plan.error || "No plan data"}`];

  return planQuotas(plan).map((q) => {
    const reset = formatResetTime(q.resetsAt, snapshot.takenAt);
    const line = `${INDENT}${q.label}: ${formatPercent(q.utilization, 0)}  ${renderBar(q.utilization, barWidth)}`;
    return reset ? `${line}  Resets in ${reset}` : line;
  });
}

function costPanel(snapshot: MonitorSnapshot): string[] {
  const { summary, selected } = snapshot;
  const models = [...summary.modelsUsed].map(shortenModel).sort().join(", ") || "none";
  const lines = [
    `${INDENT}Total: ${formatCost(summary.totalCostUsd)}`,
    `${INDENT}Sessions  ${summary.totalSessions} (${summary.activeSessions} active)`,
    `${INDENT}Messages  ${formatNumber(summary.totalMessages)}`,
    `${INDENT}Input     ${formatNumber(summary.totalInputTokens)} tokens`,
    `${INDENT}Output    ${formatNumber(summary.totalOutputTokens)} tokens`,
    `${INDENT}Cached    ${formatNumber(summary.totalCacheReadTokens)} tokens`,
    `${INDENT}Models    ${models}`,
  ];
  if (selected) lines.push(`${INDENT}Session   ${formatCost(estimatedCostUsd(selected))}`);
  return lines;
}

/** Bottom status line: counts, totals, refresh cadence and key hints. */
export function renderStatusLine(snapshot: MonitorSnapshot, refreshIntervalMs: number): string {
  return [
    `${snapshot.sessions.length} sessions`,
    `${formatNumber(summaryTotalTokens(snapshot.summary))} tokens`,
    formatCost(snapshot.summary.totalCostUsd),
    `↻ ${refreshIntervalMs / 1000}s`,
    "q quit  r refresh  j/k select",
  ].join(`  ${SEPARATOR}  `);
}

/**
 * Full live view as plain text, one panel after another. The caller
 * clears the screen and writes it; nothing here touches the terminal.
 */
export function renderDashboard(snapshot: MonitorSnapshot, options: DashboardOptions): string {
  const width = Math.max(40, options.width ?? 80);
  const barWidth = Math.max(10, Math.min(40, width - 40));
  const chartWidth = Math.max(10, width - 6);
  const { selected } = snapshot;

  const sections: string[][] = [
    [`tokentally ${SEPARATOR} Context & Usage ${SEPARATOR} ● LIVE`],
    ["Sessions", ...sessionList(snapshot, options.maxSessions ?? 8)],
  ];
  if (selected) {
    sections.push(
      ["Context Window", ...contextGauge(selected, barWidth)],
      ["Token Usage", ...usageBreakdown(selected)],
      ["Token History", ...tokenHistory(selected, chartWidth)],
      ["Rate (last 60s)", ...rateMonitor(snapshot.rate, options.rateLimits, barWidth)],
    );
  }
  sections.push(
    ["Plan Usage", ...planPanel(snapshot, barWidth)],
    ["Cost Summary", ...costPanel(snapshot)],
    [renderStatusLine(snapshot, options.refreshIntervalMs)],
  );

  return sections.map((lines) => lines.join("\n")).join("\n\n") + "\n";
}
