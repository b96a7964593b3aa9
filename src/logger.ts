import { pino, type Logger } from "pino";

export type { Logger } from "pino";

export const logger: Logger = pino({
  name: "ragqa",
  level: process.env["LOG_LEVEL"] ?? "info",
  transport:
    process.env["NODE_ENV"] === "development"
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
          },
        }
      : undefined,
});

export function createLogger(name: string): Logger {
  return logger.child({ name });
}
