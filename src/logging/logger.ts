import pino from "pino";
import type { LoggingConfig } from "../config";

export type Logger = pino.Logger;

/** Standard error; stdout belongs to the dashboard. */
const STDERR_FD = 2;

export function createLogger(config?: Partial<LoggingConfig>): Logger {
  const level = config?.level ?? "warn";
  const destination = config?.file ?? STDERR_FD;

  if (level === "silent") return silentLogger();
  if (config?.json) {
    return pino({ level }, pino.destination(destination));
  }

  return pino({
    level,
    transport: {
      target: "pino-pretty",
      options: {
        colorize: config?.file === undefined,
        translateTime: "HH:MM:ss",
        destination,
      },
    },
  });
}

/** A logger that discards everything; the default where none is injected. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
