import pino, { type Logger } from "pino";

export const logger = pino({
  level: process.env.LOG_LEVEL?.toLowerCase() || "info",
  formatters: {
    level: (label) => ({ level: label })
  },
  base: {
    service: "nessus-report-service"
  },
  timestamp: pino.stdTimeFunctions.isoTime
});

export function createModuleLogger(module: string): Logger {
  return logger.child({ module });
}
