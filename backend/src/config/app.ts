/**
 * Central backend configuration.
 *
 * dotenv must load here (not in index.ts) because ESM import hoisting
 * evaluates this module before any code in index.ts runs.
 */

import { config as dotenvConfig } from "dotenv";

dotenvConfig();

function parsePositiveInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/** Display name (used in the root health response and notification headers) */
export const APP_NAME: string = process.env.APP_NAME || "RunNotify";

/** Short lowercase slug used for the default DB filename and log service name. */
export const APP_SLUG: string = process.env.APP_SLUG || "runnotify";

export const APP_VERSION = "1.0.0";

/** Prefix of every issued API key. */
export const API_KEY_PREFIX = "exp_";

export const config = {
  port: parsePositiveInt("PORT", 3001),
  nodeEnv: process.env.NODE_ENV || "development",

  /** Bot front end receiver; the delivery worker POSTs to `${botDeliveryUrl}/deliver`. */
  botDeliveryUrl: (process.env.BOT_DELIVERY_URL || "http://localhost:3002").replace(/\/$/, ""),

  /** Per-forward timeout for the delivery worker. */
  deliveryTimeoutMs: parsePositiveInt("DELIVERY_TIMEOUT_MS", 10_000),

  /** CORS allowed origins (production only; development allows all) */
  allowedOrigins: process.env.ALLOWED_ORIGINS?.split(",").map((s) => s.trim()) || [],
} as const;

/**
 * Shared secret between the bot front end and the backend.
 * Read at call time so tests can set it after import.
 */
export function getServiceToken(): string {
  const token = process.env.SERVICE_TOKEN?.trim();
  if (!token && config.nodeEnv === "production") {
    throw new Error("SERVICE_TOKEN environment variable is required in production");
  }
  return token || "dev-only-service-token";
}

export function getDatabaseUrl(): string {
  return process.env.DATABASE_URL || `file:./${APP_SLUG}.db`;
}
