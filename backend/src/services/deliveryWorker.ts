/**
 * Delivery Worker: the single consumer of the delivery queue.
 *
 * Drains jobs strictly in enqueue order, forwards each one to the bot front
 * end and marks the notification delivered on success. A failed forward is
 * logged and the job discarded: delivery is at-most-once and best-effort.
 */

import { and, eq } from "drizzle-orm";
import { db, notifications } from "../db/index.js";
import { logger } from "../middleware/logging.js";
import { forwardToBot, type ForwardResult } from "./botClient.js";
import { deliveryQueue, type DeliveryJob, type NotificationQueue } from "./deliveryQueue.js";

export interface DeliveryWorkerOptions {
  forward?: (job: DeliveryJob) => Promise<ForwardResult>;
  markDelivered?: (notificationId: string) => Promise<boolean>;
}

/** Flip `delivered` once; a second call is a no-op and returns false. */
export async function markNotificationDelivered(notificationId: string): Promise<boolean> {
  const updated = await db
    .update(notifications)
    .set({ delivered: true, deliveredAt: new Date() })
    .where(and(eq(notifications.id, notificationId), eq(notifications.delivered, false)))
    .returning({ id: notifications.id });
  return updated.length > 0;
}

export class DeliveryWorker {
  private readonly queue: NotificationQueue<DeliveryJob>;
  private readonly forward: (job: DeliveryJob) => Promise<ForwardResult>;
  private readonly markDelivered: (notificationId: string) => Promise<boolean>;
  private loop: Promise<void> | null = null;

  constructor(queue: NotificationQueue<DeliveryJob> = deliveryQueue, options: DeliveryWorkerOptions = {}) {
    this.queue = queue;
    this.forward = options.forward ?? forwardToBot;
    this.markDelivered = options.markDelivered ?? markNotificationDelivered;
  }

  get isRunning(): boolean {
    return this.loop !== null;
  }

  start(): void {
    if (this.loop) return;
    logger.info("Delivery worker started");
    this.loop = this.run();
  }

  /** Close the queue and wait for the in-flight job. Queued jobs are still drained. */
  async stop(): Promise<void> {
    this.queue.close();
    if (this.loop) {
      await this.loop;
      this.loop = null;
      logger.info("Delivery worker stopped");
    }
  }

  /** Resolves once the queue is empty and no job is in flight. */
  whenIdle(): Promise<void> {
    return this.queue.onIdle();
  }

  private async run(): Promise<void> {
    for (;;) {
      const job = await this.queue.take();
      if (job === null) return;
      try {
        await this.deliver(job);
      } finally {
        this.queue.done();
      }
    }
  }

  private async deliver(job: DeliveryJob): Promise<void> {
    try {
      const result = await this.forward(job);
      if (!result.ok) {
        logger.warn("Notification delivery failed; dropping", {
          notificationId: job.notificationId,
          kind: job.kind,
          status: result.status,
          reason: result.error,
        });
        return;
      }

      await this.markDelivered(job.notificationId);
      logger.debug("Notification delivered", { notificationId: job.notificationId, kind: job.kind });
    } catch (error) {
      logger.error("Notification delivery error; dropping", error as Error, {
        notificationId: job.notificationId,
      });
    }
  }
}
