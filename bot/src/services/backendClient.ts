/**
 * Backend HTTP Client
 *
 * Makes service-token requests to the backend API on behalf of chat commands:
 *  - Issuing and revoking API keys
 *  - Fetching the /status summary
 *  - Muting and unmuting delivery
 *
 * Never throws. A failed call resolves to `{ ok: false }` so command handlers
 * can answer the user either way.
 */

import { z } from "zod";
import { logger } from "../middleware/logging.js";
import { config, getServiceToken } from "../config.js";

export type BackendResult<T> =
  | { ok: true; data: T }
  | { ok: false; status?: number };

const registerResultSchema = z.object({
  apiKey: z.string(),
  created: z.boolean(),
});

const userStatusSchema = z.object({
  apiKeyPreview: z.string(),
  createdAt: z.string(),
  lastActive: z.string(),
  active: z.boolean(),
  muted: z.boolean(),
  messageCount: z.number(),
  openProcesses: z.number(),
});

const envelopeSchema = z.object({ data: z.unknown() });

export type RegisterResult = z.infer<typeof registerResultSchema>;
export type UserStatus = z.infer<typeof userStatusSchema>;

async function backendFetch(path: string, options: RequestInit = {}): Promise<Response> {
  return fetch(`${config.backendApiUrl}${path}`, {
    ...options,
    headers: {
      "Content-Type": "application/json",
      "X-Service-Token": getServiceToken(),
    },
    signal: AbortSignal.timeout(config.backendTimeoutMs),
  });
}

async function call<T>(
  operation: string,
  path: string,
  schema: z.ZodType<T>,
  options: RequestInit = {},
): Promise<BackendResult<T>> {
  try {
    const res = await backendFetch(path, options);
    if (!res.ok) {
      logger.warn("Backend request failed", { operation, status: res.status });
      return { ok: false, status: res.status };
    }
    const envelope = envelopeSchema.parse(await res.json());
    return { ok: true, data: schema.parse(envelope.data) };
  } catch (error) {
    logger.error(`Backend client error: ${operation}`, error instanceof Error ? error : undefined);
    return { ok: false };
  }
}

/**
 * Issue a key for the user, or get back the one they already have.
 */
export async function registerUser(params: {
  platformUserId: string;
  chatId: string;
  displayName?: string;
}): Promise<BackendResult<RegisterResult>> {
  return call("registerUser", "/api/register", registerResultSchema, {
    method: "POST",
    body: JSON.stringify(params),
  });
}

export async function revokeKey(platformUserId: string): Promise<BackendResult<{ apiKey: string }>> {
  return call("revokeKey", "/api/keys/revoke", z.object({ apiKey: z.string() }), {
    method: "POST",
    body: JSON.stringify({ platformUserId }),
  });
}

/** 404 means the user never ran /start. */
export async function getUserStatus(platformUserId: string): Promise<BackendResult<UserStatus>> {
  return call("getUserStatus", `/api/users/${encodeURIComponent(platformUserId)}/status`, userStatusSchema);
}

export async function setMuted(platformUserId: string, muted: boolean): Promise<BackendResult<{ muted: boolean }>> {
  return call("setMuted", `/api/users/${encodeURIComponent(platformUserId)}/mute`, z.object({ muted: z.boolean() }), {
    method: "POST",
    body: JSON.stringify({ muted }),
  });
}
