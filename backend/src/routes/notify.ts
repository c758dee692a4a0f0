import { Router, Request } from "express";
import { authenticate, standardRateLimit, validate, schemas } from "../middleware/index.js";
import type { NotifyBody } from "../middleware/validation.js";
import { recordNotification } from "../services/notifications.js";

/** The authenticate middleware guarantees apiUser on these routes. */
function requireApiUser(req: Request) {
  if (!req.apiUser) {
    throw new Error("authenticate middleware did not run");
  }
  return req.apiUser;
}

export const notifyRoutes = Router();

/**
 * POST /api/notify
 * Persist a notification and queue it for delivery. Returns as soon as the
 * job is queued; delivery happens in the background.
 */
notifyRoutes.post(
  "/notify",
  authenticate,
  standardRateLimit,
  validate({ body: schemas.notify }),
  async (req, res) => {
    const user = requireApiUser(req);
    const body: NotifyBody = req.body;

    const result = await recordNotification({
      user,
      kind: "message",
      message: body.message,
      metadata: body.metadata ?? null,
    });

    res.json({
      success: true,
      message: user.isMuted ? "Notification stored (muted)" : "Notification queued",
      data: result,
    });
  },
);

/**
 * GET /api/validate
 * Whether the presented key is valid and active.
 */
notifyRoutes.get("/validate", authenticate, (req, res) => {
  const user = requireApiUser(req);
  res.json({
    success: true,
    message: "API key is valid",
    data: {
      valid: true,
      userId: user.platformUserId,
      lastActive: user.lastActive.toISOString(),
    },
  });
});

export { requireApiUser };
