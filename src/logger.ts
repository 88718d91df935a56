import { pino, type Logger, type LevelWithSilent } from "pino";

export type { Logger };

export function createLogger(level: LevelWithSilent = "info"): Logger {
  return pino({
    name: "post-notifier",
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
