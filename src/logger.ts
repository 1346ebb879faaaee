import { pino, type Logger } from "pino";

const rootLogger: Logger = pino({
  name: "shell-relay",
  level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === "test" ? "silent" : "info"),
  formatters: {
    level: (label) => ({ level: label })
  },
  timestamp: pino.stdTimeFunctions.isoTime
});

export type { Logger };

export const logger = rootLogger;

/** Child logger tagged with the module that owns it. */
export function createLogger(module: string): Logger {
  return rootLogger.child({ module });
}
