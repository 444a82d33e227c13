import { pino, type Logger } from "pino";

const isProduction = process.env.NODE_ENV === "production";
const isTest = process.env.NODE_ENV === "test";

/**
 * Shared service logger. Pretty output in development, JSON in production;
 * LOG_LEVEL overrides the default level ("info", or "silent" under tests).
 */
const logger = pino({
  level: process.env.LOG_LEVEL || (isTest ? "silent" : "info"),
  transport:
    !isProduction && !isTest
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "yyyy-mm-dd HH:MM:ss.l",
            ignore: "pid,hostname",
          },
        }
      : undefined,
});

export type { Logger };

export default logger;
