import pino from "pino";
import type { Logger } from "pino";

export type { Logger };

export function createLogger(level: string = process.env.LOG_LEVEL || "info"): Logger {
  return pino({
    level,
    base: { service: "voice-event-pipeline" },
  });
}
