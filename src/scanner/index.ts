// Public API — scanner module
export {
  PROJECTS_DIR,
  SESSION_EXTENSION,
  EXCLUDED_SEGMENT,
  defaultDataDirCandidates,
  findDataDir,
  discoverSessions,
} from "./discover-sessions";
export { collectSessions, PARSE_CONCURRENCY } from "./collect-sessions";
export type { CollectOptions } from "./collect-sessions";
