import type { MessageStat } from "../parser";
import type { RateEstimate, RateLimits, RateStatus } from "./types";

/** Length of the trailing window the rate is measured over. */
export const RATE_WINDOW_MS = 60_000;

/** Approximate per-minute API ceilings; these vary by account tier. */
export const DEFAULT_RATE_LIMITS: RateLimits = {
  requestsPerMinute: 50,
  inputTokensPerMinute: 40_000,
  outputTokensPerMinute: 8_000,
};

function percentOf(value: number, ceiling: number): number {
  if (ceiling <= 0) return 0;
  return Math.min(100, (value / ceiling) * 100);
}

function statusFor(maxPct: number): RateStatus {
  if (maxPct >= 80) return "near-limit";
  if (maxPct >= 50) return "moderate";
  return "ok";
}

/**
 * Estimate the request and token rate over the last minute.
 *
 * Messages are assumed to be in time order: the scan walks backwards from
 * the newest and stops at the first message older than the window.
 * Messages with unparsable timestamps are skipped.
 */
export function estimateRate(
  messages: readonly MessageStat[],
  now: number = Date.now(),
  limits: RateLimits = DEFAULT_RATE_LIMITS,
): RateEstimate {
  let requests = 0;
  let inputTokens = 0;
  let outputTokens = 0;

  for (let i = messages.length - 1; i >= 0; i--) {
    const message = messages[i];
    const ts = Date.parse(message.timestamp);
    if (Number.isNaN(ts)) continue;
    if (now - ts > RATE_WINDOW_MS) break;

    requests++;
    inputTokens += message.inputTokens + message.cacheCreationTokens + message.cacheReadTokens;
    outputTokens += message.outputTokens;
  }

  const requestsPct = percentOf(requests, limits.requestsPerMinute);
  const inputPct = percentOf(inputTokens, limits.inputTokensPerMinute);
  const outputPct = percentOf(outputTokens, limits.outputTokensPerMinute);

  return {
    requests,
    inputTokens,
    outputTokens,
    requestsPct,
    inputPct,
    outputPct,
    status: messages.length === 0 ? "idle" : statusFor(Math.max(requestsPct, inputPct, outputPct)),
  };
}
