import pino, { type Logger } from "pino";

const level = process.env.LOG_LEVEL?.trim() || (process.env.DEBUG ? "debug" : "info");

export const logger = pino({
  level,
  base: { service: process.env.SERVICE_NAME?.trim() || "trackprint" },
  transport:
    process.env.NODE_ENV === "development"
      ? {
          target: "pino-pretty",
          options: { colorize: true, ignore: "pid,hostname", translateTime: "SYS:standard" },
        }
      : undefined,
});

export type { Logger };

export function componentLogger(component: string, bindings?: Record<string, unknown>): Logger {
  return logger.child({ component, ...bindings });
}
