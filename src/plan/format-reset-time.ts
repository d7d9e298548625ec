const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

/**
 * Human-readable time until a quota resets, e.g. "2d 3h", "4h 12m", "37m".
 * Empty for a missing or unparsable instant; "resetting..." once it is due.
 */
export function formatResetTime(resetsAt: string, now: number = Date.now()): string {
  if (!resetsAt) return "";
  const target = Date.parse(resetsAt);
  if (Number.isNaN(target)) return "";

  const remaining = target - now;
  if (remaining <= 0) return "resetting...";

  const days = Math.floor(remaining / DAY_MS);
  const hours = Math.floor((remaining % DAY_MS) / HOUR_MS);
  const minutes = Math.floor((remaining % HOUR_MS) / MINUTE_MS);

  if (days > 0) return `${days}d ${hours}h`;
  if (hours > 0) return `${hours}h ${minutes}m`;
  return `${minutes}m`;
}
