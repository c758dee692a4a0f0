/**
 * Process tracking: start / end / heartbeat for units of external work.
 *
 * External ids are chosen by the client; lookups are always scoped to the
 * owning user so another user's id behaves exactly like an unknown one.
 */

import { randomUUID } from "crypto";
import { and, eq, isNull } from "drizzle-orm";
import { db, processes, type Metadata, type Process, type User } from "../db/index.js";
import { logger } from "../middleware/logging.js";
import { ProcessAlreadyEndedError, ProcessAlreadyExistsError, ProcessNotFoundError } from "./errors.js";
import { recordNotification } from "./notifications.js";

type ProcessOwner = Pick<User, "id" | "chatId" | "isMuted">;
export type EndStatus = "completed" | "error";

export interface StartProcessParams {
  processId: string;
  name: string;
  metadata?: Metadata;
  parentId?: string;
}

export interface EndProcessParams {
  processId: string;
  status: EndStatus;
  metadata?: Metadata;
}

export interface EndProcessResult {
  processId: string;
  status: EndStatus;
  durationSeconds: number;
}

export interface HeartbeatParams {
  processId?: string;
  metadata?: Metadata;
}

async function findOwnedProcess(userId: string, externalId: string): Promise<Process | undefined> {
  return db.query.processes.findFirst({
    where: and(eq(processes.externalId, externalId), eq(processes.userId, userId)),
  });
}

export async function startProcess(user: ProcessOwner, params: StartProcessParams): Promise<{ processId: string }> {
  const existing = await db.query.processes.findFirst({
    where: eq(processes.externalId, params.processId),
  });
  if (existing) {
    throw new ProcessAlreadyExistsError(params.processId);
  }

  let parentProcessId: string | null = null;
  if (params.parentId) {
    const parent = await findOwnedProcess(user.id, params.parentId);
    if (!parent) {
      throw new ProcessNotFoundError(params.parentId);
    }
    parentProcessId = parent.id;
  }

  const id = randomUUID();
  await db.insert(processes).values({
    id,
    userId: user.id,
    externalId: params.processId,
    name: params.name,
    status: "started",
    startedAt: new Date(),
    metadata: params.metadata ?? null,
    parentProcessId,
  });

  logger.info("Process started", { userId: user.id, processId: params.processId });

  await recordNotification({
    user,
    kind: "process_started",
    message: `Process "${params.name}" started`,
    metadata: params.metadata ?? null,
    processRowId: id,
    process: { processId: params.processId, name: params.name, status: "started" },
  });

  return { processId: params.processId };
}

export async function endProcess(user: ProcessOwner, params: EndProcessParams): Promise<EndProcessResult> {
  const row = await findOwnedProcess(user.id, params.processId);
  if (!row) {
    throw new ProcessNotFoundError(params.processId);
  }
  if (row.endedAt) {
    throw new ProcessAlreadyEndedError(params.processId);
  }

  // Clamp so a clock step backwards can never produce a negative duration.
  const endedAt = new Date(Math.max(Date.now(), row.startedAt.getTime()));
  const durationSeconds = (endedAt.getTime() - row.startedAt.getTime()) / 1000;

  const updated = await db
    .update(processes)
    .set({
      status: params.status,
      endedAt,
      metadata: { ...(row.metadata ?? {}), ...(params.metadata ?? {}) },
    })
    .where(and(eq(processes.id, row.id), isNull(processes.endedAt)))
    .returning({ id: processes.id });

  // Lost a race with a concurrent end call.
  if (updated.length === 0) {
    throw new ProcessAlreadyEndedError(params.processId);
  }

  logger.info("Process ended", {
    userId: user.id,
    processId: params.processId,
    status: params.status,
    durationSeconds,
  });

  await recordNotification({
    user,
    kind: "process_ended",
    message: `Process "${row.name}" ${params.status === "completed" ? "completed" : "failed"}`,
    metadata: { ...(params.metadata ?? {}), durationSeconds },
    processRowId: row.id,
    process: {
      processId: params.processId,
      name: row.name,
      status: params.status,
      durationSeconds,
    },
  });

  return { processId: params.processId, status: params.status, durationSeconds };
}

/**
 * Keep-alive. User last-active is refreshed by API-key auth; with a process id
 * the process's heartbeat timestamp and metadata are updated too. Never
 * changes status; an ended process answers 409 like a second end.
 */
export async function heartbeat(
  user: ProcessOwner,
  params: HeartbeatParams,
): Promise<{ processId?: string; lastHeartbeatAt: string }> {
  const now = new Date();
  if (!params.processId) {
    return { lastHeartbeatAt: now.toISOString() };
  }

  const row = await findOwnedProcess(user.id, params.processId);
  if (!row) {
    throw new ProcessNotFoundError(params.processId);
  }
  if (row.endedAt) {
    throw new ProcessAlreadyEndedError(params.processId);
  }

  await db
    .update(processes)
    .set({
      lastHeartbeatAt: now,
      metadata: params.metadata
        ? { ...(row.metadata ?? {}), ...params.metadata }
        : row.metadata,
    })
    .where(eq(processes.id, row.id));

  return { processId: params.processId, lastHeartbeatAt: now.toISOString() };
}
