/**
 * Notification Service
 *
 * Persists one notification row per call and hands a delivery job to the
 * queue. Muted users still get the row, but nothing is queued.
 */

import { randomUUID } from "crypto";
import { eq, sql } from "drizzle-orm";
import { db, notifications, users, type Metadata, type NotificationKind, type User } from "../db/index.js";
import { logger } from "../middleware/logging.js";
import { deliveryQueue, type DeliveryJob } from "./deliveryQueue.js";

export interface RecordNotificationParams {
  user: Pick<User, "id" | "chatId" | "isMuted">;
  kind: NotificationKind;
  message: string;
  metadata?: Metadata | null;
  /** Internal process row id */
  processRowId?: string;
  process?: DeliveryJob["process"];
}

export interface RecordNotificationResult {
  notificationId: string;
  queued: boolean;
}

export async function recordNotification(params: RecordNotificationParams): Promise<RecordNotificationResult> {
  const notificationId = randomUUID();
  const metadata = params.metadata ?? null;

  await db.insert(notifications).values({
    id: notificationId,
    userId: params.user.id,
    processId: params.processRowId ?? null,
    kind: params.kind,
    message: params.message,
    metadata,
    createdAt: new Date(),
  });

  await db
    .update(users)
    .set({ messageCount: sql`${users.messageCount} + 1` })
    .where(eq(users.id, params.user.id));

  if (params.user.isMuted) {
    logger.debug("User muted; notification stored without delivery", { notificationId, userId: params.user.id });
    return { notificationId, queued: false };
  }

  const queued = deliveryQueue.enqueue({
    notificationId,
    chatId: params.user.chatId,
    kind: params.kind,
    message: params.message,
    metadata,
    ...(params.process ? { process: params.process } : {}),
  });

  return { notificationId, queued };
}
