import pino, { type Logger } from "pino";

export type { Logger };

export function createLogger(options: { level?: string } = {}): Logger {
  return pino({
    base: undefined,
    level: options.level ?? process.env.LOG_LEVEL ?? "info",
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.epochTime,
  });
}
