import type { CredentialSources } from "../config";
import { silentLogger, type Logger } from "../logging/logger";
import { findOAuthToken } from "./credentials";
import { OAuthUsageResponseSchema, UsageLimitSchema } from "./schemas";
import type { OAuthUsageResponse, PlanQuota, PlanUsageResult } from "./types";

export const USAGE_ENDPOINT = "/api/oauth/usage";
export const OAUTH_BETA_HEADER = "oauth-2025-04-20";
export const DEFAULT_BASE_URL = "https://api.anthropic.com";
export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

export const NO_TOKEN_ERROR =
  "No OAuth token found. Set TOKENTALLY_OAUTH_TOKEN or sign in so a credentials file exists.";

/** Response windows in display order, with their labels */
const WINDOWS = [
  { key: "five_hour", field: "fiveHour", label: "5-Hour Session" },
  { key: "seven_day", field: "sevenDay", label: "Weekly (All Models)" },
  { key: "seven_day_sonnet", field: "sevenDaySonnet", label: "Weekly (Sonnet)" },
  { key: "seven_day_opus", field: "sevenDayOpus", label: "Weekly (Opus)" },
] as const;

export interface FetchPlanUsageOptions {
  credentials?: CredentialSources;
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  logger?: Logger;
  /** Passed to the token lookup; tests point these at temp dirs */
  homeDir?: string;
  fallbackPaths?: string[];
}

export function emptyPlanUsage(error = ""): PlanUsageResult {
  return { fiveHour: null, sevenDay: null, sevenDaySonnet: null, sevenDayOpus: null, error };
}

function clampUtilization(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(100, Math.max(0, value));
}

function toPlanUsage(body: OAuthUsageResponse, log: Logger): PlanUsageResult {
  const result = emptyPlanUsage();
  for (const { key, field, label } of WINDOWS) {
    const raw = body[key];
    if (raw == null) continue;

    const parsed = UsageLimitSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn({ window: key, issues: parsed.error.issues }, "skipping malformed plan window");
      continue;
    }
    const { utilization, resets_at: resetsAt } = parsed.data;
    // An empty window carries no data
    if (utilization == null && resetsAt == null) continue;

    const quota: PlanQuota = {
      label,
      utilization: clampUtilization(utilization ?? 0),
      resetsAt: resetsAt ?? "",
    };
    result[field] = quota;
  }
  return result;
}

function describeError(err: unknown): string {
  if (err instanceof Error) {
    if (err.name === "TimeoutError" || err.name === "AbortError") return "Request timed out";
    return err.message;
  }
  return String(err);
}

/**
 * Fetch subscription quota windows from the OAuth usage endpoint.
 *
 * Never throws: a missing token, a transport failure, a non-2xx status or an
 * unexpected body all come back as a result with `error` set.
 */
export async function fetchPlanUsage(options: FetchPlanUsageOptions = {}): Promise<PlanUsageResult> {
  const log = (options.logger ?? silentLogger()).child({ module: "plan" });

  const found = await findOAuthToken(options.credentials ?? {}, {
    homeDir: options.homeDir,
    fallbackPaths: options.fallbackPaths,
  });
  if (!found) {
    log.debug("no OAuth token available");
    return emptyPlanUsage(NO_TOKEN_ERROR);
  }
  log.debug({ source: found.source }, "using OAuth token");

  const base = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
  const fetchImpl = options.fetchImpl ?? fetch;

  let response: Response;
  try {
    response = await fetchImpl(`${base}${USAGE_ENDPOINT}`, {
      method: "GET",
      headers: {
        Accept: "application/json",
        "Content-Type": "application/json",
        Authorization: `Bearer ${found.token}`,
        "anthropic-beta": OAUTH_BETA_HEADER,
      },
      signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS),
    });
  } catch (err) {
    log.warn({ err }, "plan usage request failed");
    return emptyPlanUsage(`Request failed: ${describeError(err)}`);
  }

  if (!response.ok) {
    log.warn({ status: response.status }, "plan usage request rejected");
    return emptyPlanUsage(`HTTP ${response.status}`);
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (err) {
    log.warn({ err }, "plan usage response is not JSON");
    return emptyPlanUsage(`Invalid response: ${describeError(err)}`);
  }

  const parsed = OAuthUsageResponseSchema.safeParse(body);
  if (!parsed.success) {
    log.warn({ issues: parsed.error.issues }, "unexpected plan usage response");
    return emptyPlanUsage("Invalid response: unexpected shape");
  }
  return toPlanUsage(parsed.data, log);
}

/** True when at least one window is present, whatever `error` says. */
export function isPlanUsageAvailable(result: PlanUsageResult): boolean {
  return planQuotas(result).length > 0;
}

/** The windows that are present, in display order. */
export function planQuotas(result: PlanUsageResult): PlanQuota[] {
  const quotas: PlanQuota[] = [];
  for (const { field } of WINDOWS) {
    const quota = result[field];
    if (quota) quotas.push(quota);
  }
  return quotas;
}
