import { config } from "dotenv";
import { settingsFromEnv } from "../validators/flashSettings";

config();

const bool = (value: string | undefined, fallback = false) => {
  if (value === undefined) return fallback;
  return value.toLowerCase() === "true";
};

const num = (value: string | undefined, fallback: number) => {
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const requiredEnvVars: Array<keyof typeof process.env> = ["SESSION_SECRET"];

const missing = requiredEnvVars.filter((key) => !process.env[key]);
if (missing.length && process.env.NODE_ENV !== "test") {
  console.warn(
    `⚠️ Missing required environment variables: ${missing.join(
      ", "
    )}. Using fallback dev values.`
  );
}

export const env = {
  nodeEnv: process.env.NODE_ENV ?? "development",
  port: num(process.env.APP_PORT, 3000),
  host: process.env.APP_HOST ?? "127.0.0.1",
  sessionSecret: process.env.SESSION_SECRET ?? "dev-secret-change-me",
  trustProxy: bool(process.env.TRUST_PROXY),
  logFormat: process.env.LOG_FORMAT ?? "dev",
  // Validated when the plugin is mounted
  flash: settingsFromEnv(process.env)
};

export const isProd = env.nodeEnv === "production";
export const isDev = !isProd;
