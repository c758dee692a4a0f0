/**
 * User registration and key lifecycle, driven by the bot front end's
 * /start, /revoke, /status and /mute commands.
 */

import { randomUUID } from "crypto";
import { and, count, eq, isNull } from "drizzle-orm";
import { db, users, processes, type User } from "../db/index.js";
import { logger } from "../middleware/logging.js";
import { generateApiKey, previewApiKey } from "./apiKeys.js";
import { UserNotFoundError } from "./errors.js";

export interface RegisterParams {
  platformUserId: string;
  chatId: string;
  displayName?: string;
}

export interface RegisterResult {
  apiKey: string;
  created: boolean;
}

export interface UserStatus {
  apiKeyPreview: string;
  createdAt: string;
  lastActive: string;
  active: boolean;
  muted: boolean;
  messageCount: number;
  openProcesses: number;
}

async function findByPlatformId(platformUserId: string): Promise<User | undefined> {
  return db.query.users.findFirst({
    where: eq(users.platformUserId, platformUserId),
  });
}

async function requireUser(platformUserId: string): Promise<User> {
  const user = await findByPlatformId(platformUserId);
  if (!user) {
    throw new UserNotFoundError(platformUserId);
  }
  return user;
}

/**
 * Issue a key for an unseen user, or return the existing key.
 * Idempotent on identity: a returning user keeps their key but gets
 * chat id / display name refreshed.
 */
export async function registerUser(params: RegisterParams): Promise<RegisterResult> {
  const now = new Date();
  const existing = await findByPlatformId(params.platformUserId);

  if (existing) {
    await db
      .update(users)
      .set({
        chatId: params.chatId,
        displayName: params.displayName ?? existing.displayName,
        lastActive: now,
      })
      .where(eq(users.id, existing.id));

    return { apiKey: existing.apiKey, created: false };
  }

  const apiKey = generateApiKey();
  await db.insert(users).values({
    id: randomUUID(),
    platformUserId: params.platformUserId,
    chatId: params.chatId,
    displayName: params.displayName ?? null,
    apiKey,
    createdAt: now,
    lastActive: now,
  });

  logger.info("User registered", { platformUserId: params.platformUserId });
  return { apiKey, created: true };
}

/** Replace the user's key. The old key stops authenticating immediately. */
export async function revokeApiKey(platformUserId: string): Promise<string> {
  const user = await requireUser(platformUserId);

  let apiKey = generateApiKey();
  while (apiKey === user.apiKey) {
    apiKey = generateApiKey();
  }

  await db
    .update(users)
    .set({ apiKey, lastActive: new Date() })
    .where(eq(users.id, user.id));

  logger.info("API key revoked", { platformUserId });
  return apiKey;
}

export async function getUserStatus(platformUserId: string): Promise<UserStatus> {
  const user = await requireUser(platformUserId);

  const [open] = await db
    .select({ value: count() })
    .from(processes)
    .where(and(eq(processes.userId, user.id), isNull(processes.endedAt)));

  return {
    apiKeyPreview: previewApiKey(user.apiKey),
    createdAt: user.createdAt.toISOString(),
    lastActive: user.lastActive.toISOString(),
    active: user.isActive,
    muted: user.isMuted,
    messageCount: user.messageCount,
    openProcesses: open?.value ?? 0,
  };
}

export async function setMuted(platformUserId: string, muted: boolean): Promise<boolean> {
  const user = await requireUser(platformUserId);
  await db.update(users).set({ isMuted: muted }).where(eq(users.id, user.id));
  logger.info(muted ? "User muted notifications" : "User unmuted notifications", { platformUserId });
  return muted;
}
