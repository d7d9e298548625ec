import { z } from "zod";

// ============================================================
// Raw JSONL records (what arrives from disk)
// ============================================================

/** Token counts are never negative; anything absent or unusable counts as 0. */
const TokenCountSchema = z.number().nonnegative().catch(0);

/** Token usage reported on assistant messages */
export const TokenUsageSchema = z.object({
  input_tokens: TokenCountSchema,
  output_tokens: TokenCountSchema,
  cache_creation_input_tokens: TokenCountSchema,
  cache_read_input_tokens: TokenCountSchema,
});

const EMPTY_USAGE = {
  input_tokens: 0,
  output_tokens: 0,
  cache_creation_input_tokens: 0,
  cache_read_input_tokens: 0,
};

/** The `message` payload of an assistant record. Only model and usage matter here. */
export const AssistantMessageSchema = z.object({
  model: z.string().catch(""),
  usage: TokenUsageSchema.catch(EMPTY_USAGE),
});

/**
 * Top-level record. The log format is external and uncontrolled, so every
 * field is optional and anything unexpected degrades to an empty value
 * instead of rejecting the line.
 */
export const RawRecordSchema = z.object({
  type: z.string().catch(""),
  timestamp: z.string().optional().catch(undefined),
  message: z.unknown().optional(),
});
