import pino, { type Logger } from "pino";

import type { LogLevel } from "./config";

export type { Logger };

// Root logger; components receive children carrying their own `component` tag.
export function createLogger(level: LogLevel = "info"): Logger {
  return pino({
    name: "cupping-journal-api",
    level,
  });
}
