import { z } from "zod";

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error", "silent"]).default("warn"),
  file: z.string().min(1).optional(),
  json: z.boolean().default(false),
});

/** Sources for the OAuth token discovery chain, in priority order. */
const credentialsSchema = z.object({
  token: z.string().min(1).optional(),
  tokenFile: z.string().min(1).optional(),
  tokenFd: z.string().min(1).optional(),
  configDir: z.string().min(1).optional(),
});

const rateLimitsSchema = z.object({
  requestsPerMinute: z.coerce.number().positive().default(50),
  inputTokensPerMinute: z.coerce.number().positive().default(40_000),
  outputTokensPerMinute: z.coerce.number().positive().default(8_000),
});

export const configSchema = z.object({
  /** Data root; when unset the first existing default candidate is used. */
  dataDir: z.string().min(1).optional(),
  refreshIntervalMs: z.coerce.number().int().positive().default(2_000),
  planRefreshIntervalMs: z.coerce.number().int().positive().default(60_000),
  baseUrl: z.string().url().default("https://api.anthropic.com"),
  requestTimeoutMs: z.coerce.number().int().positive().default(10_000),
  rateLimits: rateLimitsSchema.default({}),
  credentials: credentialsSchema.default({}),
  logging: loggingSchema.default({}),
});

export function parseConfig(raw: unknown): z.infer<typeof configSchema> {
  return configSchema.parse(raw);
}
