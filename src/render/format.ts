const INTEGER = new Intl.NumberFormat("en-US", { maximumFractionDigits: 0 });
const ONE_DECIMAL = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 1,
  maximumFractionDigits: 1,
});

/** Compact token count: 950, 12.3K, 4.5M */
export function formatTokens(n: number): string {
  if (n >= 1_000_000) return `${(n / 1_000_000).toFixed(1)}M`;
  if (n >= 1_000) return `${(n / 1_000).toFixed(1)}K`;
  return String(n);
}

/** Integer with thousands separators: 1234567 → "1,234,567" */
export function formatNumber(n: number): string {
  return INTEGER.format(n);
}

/** Thousands of tokens with one decimal: 90500 → "90.5K" */
export function formatThousands(n: number): string {
  return `${ONE_DECIMAL.format(n / 1_000)}K`;
}

export function formatCost(usd: number): string {
  return `$${usd.toFixed(4)}`;
}

export function formatPercent(pct: number, digits = 1): string {
  return `${pct.toFixed(digits)}%`;
}

/** "HH:MM" (UTC) of an ISO timestamp; "" when absent, "?" when unparsable. */
export function formatClock(iso: string): string {
  if (!iso) return "";
  const ms = Date.parse(iso);
  if (Number.isNaN(ms)) return "?";
  return new Date(ms).toISOString().slice(11, 16);
}

/**
 * Turn an encoded project directory back into a readable path.
 * `-home-user-myproject` → `~/myproject`, `-opt-work` → `/opt/work`.
 * Names that don't start with "-" are returned as-is.
 */
export function shortenProjectPath(projectPath: string): string {
  if (!projectPath.startsWith("-")) return projectPath;
  const parts = projectPath.replace(/^-+/, "").split("-");
  if (parts.length >= 3 && parts[0] === "home") {
    return `~/${parts.slice(2).join("-")}`;
  }
  return `/${parts.join("/")}`;
}

/** `claude-opus-4-1` → `opus-4-1`; "?" when the model is unknown. */
export function shortenModel(model: string): string {
  if (!model) return "?";
  return model.replace(/^claude-/, "");
}

/** Keep the tail of `text`, prefixed with "...", when it exceeds `max`. */
export function truncateStart(text: string, max: number): string {
  if (text.length <= max) return text;
  return `...${text.slice(text.length - (max - 3))}`;
}

export function truncateEnd(text: string, max: number): string {
  return text.length <= max ? text : text.slice(0, max);
}
