import { Router } from "express";
import { requireServiceToken } from "../middleware/auth.js";
import { logger } from "../middleware/logging.js";
import { deliveryJobSchema } from "../services/deliveryJob.js";
import { renderNotification } from "../services/render.js";
import type { MessageSender } from "../services/telegram.js";

/**
 * POST /deliver: the backend's delivery worker pushes one job per call.
 * 200 once every chunk is sent, 502 if the chat platform refuses.
 */
export function createDeliverRoutes(send: MessageSender) {
  const router = Router();

  router.post("/", requireServiceToken, async (req, res) => {
    const parsed = deliveryJobSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({
        success: false,
        error: {
          code: "VALIDATION_ERROR",
          message: "Invalid delivery job",
          details: parsed.error.errors.map((e) => ({ path: e.path.join("."), message: e.message })),
        },
      });
      return;
    }
    const job = parsed.data;

    const chunks = renderNotification(job);
    try {
      for (const chunk of chunks) {
        await send(job.chatId, chunk);
      }
    } catch (error) {
      logger.warn("Telegram send failed", {
        requestId: req.requestId,
        notificationId: job.notificationId,
        reason: error instanceof Error ? error.message : String(error),
      });
      res.status(502).json({
        success: false,
        error: { code: "DELIVERY_FAILED", message: "Could not deliver message to chat" },
      });
      return;
    }

    logger.info("Notification delivered", {
      requestId: req.requestId,
      notificationId: job.notificationId,
      kind: job.kind,
      chunks: chunks.length,
    });
    res.json({ success: true, data: { chunks: chunks.length } });
  });

  return router;
}
