import { randomBytes } from "crypto";
import { eq } from "drizzle-orm";
import { db, users, type User } from "../db/index.js";
import { API_KEY_PREFIX } from "../config/app.js";

/** Generate an opaque bearer credential, e.g. `exp_Vd3...`. */
export function generateApiKey(): string {
  return `${API_KEY_PREFIX}${randomBytes(16).toString("base64url")}`;
}

/** First characters of a key, safe to echo back in chat. */
export function previewApiKey(apiKey: string): string {
  return `${apiKey.slice(0, 10)}…`;
}

/**
 * Resolve an API key to its active owner and refresh last-active bookkeeping.
 * Returns null for unknown keys and for deactivated users.
 */
export async function authenticateApiKey(apiKey: string): Promise<User | null> {
  const [user] = await db.select().from(users).where(eq(users.apiKey, apiKey)).limit(1);
  if (!user || !user.isActive) {
    return null;
  }

  const lastActive = new Date();
  await db.update(users).set({ lastActive }).where(eq(users.id, user.id));

  return { ...user, lastActive };
}
