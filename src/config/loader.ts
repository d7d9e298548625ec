import { parseConfig } from "./schema";
import type { MonitorConfig } from "./types";

/** Environment variables recognized by {@link loadConfig}. */
export const ENV = {
  dataDir: "TOKENTALLY_CLAUDE_DIR",
  token: "TOKENTALLY_OAUTH_TOKEN",
  tokenFile: "CLAUDE_SESSION_INGRESS_TOKEN_FILE",
  tokenFd: "CLAUDE_CODE_OAUTH_TOKEN_FILE_DESCRIPTOR",
  configDir: "CLAUDE_CONFIG_DIR",
  baseUrl: "ANTHROPIC_BASE_URL",
  refreshMs: "TOKENTALLY_REFRESH_MS",
  planRefreshMs: "TOKENTALLY_PLAN_REFRESH_MS",
  requestTimeoutMs: "TOKENTALLY_REQUEST_TIMEOUT_MS",
  requestsPerMinute: "TOKENTALLY_RPM_LIMIT",
  inputTokensPerMinute: "TOKENTALLY_INPUT_TPM_LIMIT",
  outputTokensPerMinute: "TOKENTALLY_OUTPUT_TPM_LIMIT",
  logLevel: "TOKENTALLY_LOG_LEVEL",
  logFile: "TOKENTALLY_LOG_FILE",
  logJson: "TOKENTALLY_LOG_JSON",
} as const;

/** Values from the command line; they win over the environment. */
export interface ConfigOverrides {
  dataDir?: string;
  refreshIntervalMs?: number;
}

/** Read a variable, treating empty and whitespace-only values as unset. */
function read(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value.trim() === "" ? undefined : value;
}

function readFlag(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const value = read(env, name);
  if (value === undefined) return undefined;
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

/**
 * Build the configuration from environment variables and CLI overrides.
 * Throws a ZodError when a value is present but invalid.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
): MonitorConfig {
  return parseConfig({
    dataDir: overrides.dataDir ?? read(env, ENV.dataDir),
    refreshIntervalMs: overrides.refreshIntervalMs ?? read(env, ENV.refreshMs),
    planRefreshIntervalMs: read(env, ENV.planRefreshMs),
    baseUrl: read(env, ENV.baseUrl),
    requestTimeoutMs: read(env, ENV.requestTimeoutMs),
    rateLimits: {
      requestsPerMinute: read(env, ENV.requestsPerMinute),
      inputTokensPerMinute: read(env, ENV.inputTokensPerMinute),
      outputTokensPerMinute: read(env, ENV.outputTokensPerMinute),
    },
    credentials: {
      token: read(env, ENV.token)?.trim(),
      tokenFile: read(env, ENV.tokenFile),
      tokenFd: read(env, ENV.tokenFd),
      configDir: read(env, ENV.configDir),
    },
    logging: {
      level: read(env, ENV.logLevel)?.trim().toLowerCase(),
      file: read(env, ENV.logFile),
      json: readFlag(env, ENV.logJson),
    },
  });
}
