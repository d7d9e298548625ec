// Public API
export { parseLine } from "./parse-line";
export { parseSessionFile, parseSessionContent } from "./parse-session";
export {
  createSessionRecord,
  applyRecord,
  totalTokens,
  contextUsagePct,
  estimatedCostUsd,
  tokensPerMinute,
} from "./session";

// Types
export type {
  RawRecord,
  AssistantMessage,
  TokenUsage,
  MessageStat,
  FileInfo,
  SessionRecord,
} from "./types";
