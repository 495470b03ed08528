import { pino } from "pino";

const logLevel = process.env.LOG_LEVEL || (process.env.VITEST ? "silent" : "info");

export const logger = pino({
  level: logLevel,
  base: { service: "address-ngram-search" },
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
});

export type Logger = typeof logger;

/** Child logger tagged with the component name. */
export function createLogger(component: string): Logger {
  return logger.child({ component });
}
