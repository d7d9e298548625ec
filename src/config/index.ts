// Public API — config module
export { loadConfig, ENV } from "./loader";
export { parseConfig, configSchema } from "./schema";

export type { ConfigOverrides } from "./loader";
export type { MonitorConfig, LoggingConfig, CredentialSources } from "./types";
