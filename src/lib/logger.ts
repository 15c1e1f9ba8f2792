import pino from "pino";

const env = process.env.NODE_ENV ?? "development";

const logger = pino({
  name: "job-posting-assistant",
  level: process.env.LOG_LEVEL ?? (env === "test" ? "silent" : env === "production" ? "info" : "debug"),
  ...(env === "development"
    ? {
        transport: {
          target: "pino-pretty",
          options: { colorize: true },
        },
      }
    : {}),
});

export type Logger = pino.Logger;

/**
 * Creates a child logger scoped to a single conversation.
 */
export function createSessionLogger(
  sessionId: string,
  extra?: Record<string, unknown>,
  parent: Logger = logger
): Logger {
  return parent.child({ sessionId, ...extra });
}

export default logger;
