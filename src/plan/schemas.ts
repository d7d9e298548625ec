import { z } from "zod";

/** One quota window in the `/api/oauth/usage` response */
export const UsageLimitSchema = z.object({
  utilization: z.number().nullish(),
  resets_at: z.string().nullish(),
});

/**
 * Response body of `GET /api/oauth/usage`: an object keyed by window name.
 * Windows are decoded one by one so a malformed window costs only itself.
 */
export const OAuthUsageResponseSchema = z.record(z.string(), z.unknown());
