/**
 * Delivery Queue: in-process FIFO between request handlers and the delivery worker.
 *
 * Unbounded, single consumer, no persistence: anything still queued when the
 * process exits is lost. If the backend ever runs as more than one process,
 * this needs to become a shared queue.
 */

import type { Metadata, NotificationKind, ProcessStatus } from "../db/schema.js";
import { logger } from "../middleware/logging.js";

export interface DeliveryJob {
  notificationId: string;
  chatId: string;
  kind: NotificationKind;
  message: string;
  metadata: Metadata | null;
  process?: {
    processId: string;
    name: string;
    status: ProcessStatus;
    durationSeconds?: number;
  };
}

export class NotificationQueue<T> {
  private items: T[] = [];
  private waiters: Array<() => void> = [];
  private idleWaiters: Array<() => void> = [];
  private outstanding = 0;
  private closed = false;

  /** Items waiting to be taken. */
  get size(): number {
    return this.items.length;
  }

  /** Items taken but not yet marked done. */
  get pending(): number {
    return this.outstanding;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Returns false (and drops the item) once the queue is closed. */
  enqueue(item: T): boolean {
    if (this.closed) {
      logger.warn("Delivery queue closed; dropping item");
      return false;
    }
    this.items.push(item);
    this.waiters.shift()?.();
    return true;
  }

  /**
   * Wait for the next item. Resolves null once the queue is closed and empty.
   * Every non-null result must be followed by `done()`.
   */
  async take(): Promise<T | null> {
    while (this.items.length === 0) {
      if (this.closed) return null;
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }
    const [item] = this.items.splice(0, 1);
    this.outstanding++;
    return item;
  }

  done(): void {
    this.outstanding = Math.max(0, this.outstanding - 1);
    this.settleIdle();
  }

  /** Resolves once nothing is queued and nothing is in flight. */
  onIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  close(): void {
    this.closed = true;
    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) wake();
  }

  private isIdle(): boolean {
    return this.items.length === 0 && this.outstanding === 0;
  }

  private settleIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}

/** Process-wide queue shared by the API routes and the delivery worker. */
export const deliveryQueue = new NotificationQueue<DeliveryJob>();
