import type { z } from "zod";
import type { configSchema } from "./schema";

export type MonitorConfig = z.infer<typeof configSchema>;
export type LoggingConfig = MonitorConfig["logging"];
export type CredentialSources = MonitorConfig["credentials"];
