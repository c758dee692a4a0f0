/**
 * Bot Front End Configuration
 *
 * Environment-driven config. dotenv loads here because ESM import hoisting
 * evaluates this module before index.ts runs.
 */

import { config as dotenvConfig } from "dotenv";

dotenvConfig();

export const config = {
  /** HTTP receiver port (POST /deliver) */
  port: parseInt(process.env.PORT || "3002", 10),

  /** Display name used in bot replies */
  appName: process.env.APP_NAME || "RunNotify",

  /** Node environment */
  nodeEnv: process.env.NODE_ENV || "development",

  /** Backend API the commands call */
  backendApiUrl: (process.env.BACKEND_API_URL || "http://localhost:3001").replace(/\/$/, ""),

  /** Per-call timeout for backend requests */
  backendTimeoutMs: parseInt(process.env.BACKEND_TIMEOUT_MS || "10000", 10),

  /** Skip updates that queued up while the bot was offline */
  dropPendingUpdates: process.env.TELEGRAM_DROP_PENDING_UPDATES === "true",
} as const;

/** Telegram bot token from @BotFather. */
export function getBotToken(): string {
  const token = process.env.TELEGRAM_BOT_TOKEN?.trim();
  if (!token) {
    throw new Error("TELEGRAM_BOT_TOKEN environment variable is required");
  }
  return token;
}

/**
 * Shared secret between the bot and the backend. Read at call time so
 * tests can set it after import.
 */
export function getServiceToken(): string {
  const token = process.env.SERVICE_TOKEN?.trim();
  if (!token && config.nodeEnv === "production") {
    throw new Error("SERVICE_TOKEN environment variable is required in production");
  }
  return token || "dev-only-service-token";
}
