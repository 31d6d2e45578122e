import pino, { Logger } from "pino";

export type AppLogger = Logger;

/** Choose a default log level from NODE_ENV; LOG_LEVEL overrides it. */
export const inferDefaultLevel = (nodeEnv = process.env.NODE_ENV) => {
  if (nodeEnv === "test") return "silent";
  return nodeEnv === "production" ? "info" : "debug";
};

export const logger: AppLogger = pino({
  name: "flash-notes",
  level: process.env.LOG_LEVEL ?? inferDefaultLevel()
});
