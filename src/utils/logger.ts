import pino from "pino";
import { env } from "../config/env";

const isDev = env.nodeEnv === "development";

const redact = {
  paths: [
    "req.headers.authorization",
    "req.headers.cookie",
    "apiKey",
    "*.apiKey",
    "token",
  ],
  remove: true,
};

export const logger = pino({
  level: env.logLevel || "info",
  transport: isDev
    ? {
        target: "pino-pretty",
        options: { colorize: true, translateTime: true, singleLine: false },
      }
    : undefined,
  base: undefined,
  redact,
});

// Request logs share the root destination but are tagged so they can be filtered
export const requestLogger = logger.child({ stream: "http" });
