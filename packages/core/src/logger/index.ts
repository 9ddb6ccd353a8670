import pino, { type Logger } from "pino";
import type { LoggingConfig } from "../schemas/storage-config.js";

export type { Logger } from "pino";

export function createLogger(config: LoggingConfig): Logger {
  const usePretty = config.pretty || process.env.NODE_ENV !== "production";

  return pino({
    name: "stowage",
    level: config.level,
    ...(usePretty ? { transport: { target: "pino-pretty" } } : {}),
  });
}

/** Logger used by backends constructed without one. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
