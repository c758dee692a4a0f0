import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from "vitest";
import { NotificationQueue, type DeliveryJob } from "../services/deliveryQueue.js";
import { DeliveryWorker } from "../services/deliveryWorker.js";
import type { ForwardResult } from "../services/botClient.js";

function job(notificationId: string): DeliveryJob {
  return {
    notificationId,
    chatId: "1001",
    kind: "message",
    message: `message ${notificationId}`,
    metadata: null,
  };
}

describe("DeliveryWorker", () => {
  let queue: NotificationQueue<DeliveryJob>;
  let forward: Mock<(job: DeliveryJob) => Promise<ForwardResult>>;
  let markDelivered: Mock<(id: string) => Promise<boolean>>;
  let worker: DeliveryWorker;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});

    queue = new NotificationQueue<DeliveryJob>();
    forward = vi.fn<(job: DeliveryJob) => Promise<ForwardResult>>(async () => ({ ok: true, status: 200 }));
    markDelivered = vi.fn<(id: string) => Promise<boolean>>(async () => true);
    worker = new DeliveryWorker(queue, { forward, markDelivered });
  });

  afterEach(async () => {
    await worker.stop();
    vi.restoreAllMocks();
  });

  it("should forward jobs in enqueue order and mark each delivered", async () => {
    queue.enqueue(job("n1"));
    queue.enqueue(job("n2"));
    queue.enqueue(job("n3"));

    worker.start();
    await worker.whenIdle();

    expect(forward.mock.calls.map(([j]) => j.notificationId)).toEqual(["n1", "n2", "n3"]);
    expect(markDelivered.mock.calls.map(([id]) => id)).toEqual(["n1", "n2", "n3"]);
  });

  it("should pick up jobs enqueued after start", async () => {
    worker.start();
    queue.enqueue(job("late"));

    await worker.whenIdle();

    expect(forward).toHaveBeenCalledTimes(1);
    expect(markDelivered).toHaveBeenCalledWith("late");
  });

  it("should drop a failed delivery without retrying and carry on", async () => {
    forward.mockImplementation(async (j) =>
      j.notificationId === "bad" ? { ok: false, status: 502, error: "blocked" } : { ok: true, status: 200 },
    );
    queue.enqueue(job("bad"));
    queue.enqueue(job("good"));

    worker.start();
    await worker.whenIdle();

    expect(forward).toHaveBeenCalledTimes(2);
    expect(markDelivered.mock.calls.map(([id]) => id)).toEqual(["good"]);
  });

  it("should survive a forward that throws", async () => {
    forward.mockRejectedValueOnce(new Error("socket hang up"));
    queue.enqueue(job("boom"));
    queue.enqueue(job("after"));

    worker.start();
    await worker.whenIdle();

    expect(markDelivered.mock.calls.map(([id]) => id)).toEqual(["after"]);
  });

  it("should stop once the queue is closed and drained", async () => {
    worker.start();
    expect(worker.isRunning).toBe(true);

    await worker.stop();

    expect(worker.isRunning).toBe(false);
    expect(queue.enqueue(job("too-late"))).toBe(false);
  });
});
