import { Router, Request } from "express";
import { requireServiceToken, serviceRateLimit, validate, schemas } from "../middleware/index.js";
import { getUserStatus, setMuted } from "../services/users.js";

/** Extract a route param as string (Express 5 types it as string | string[]). */
function getParam(req: Request, name: string): string {
  const val = req.params[name];
  return Array.isArray(val) ? val[0] : val;
}

export const userRoutes = Router();

userRoutes.use(requireServiceToken, serviceRateLimit);

/**
 * GET /api/users/:platformUserId/status
 * Connection/usage summary for the bot's /status command.
 */
userRoutes.get(
  "/:platformUserId/status",
  validate({ params: schemas.platformUserParam }),
  async (req, res) => {
    const status = await getUserStatus(getParam(req, "platformUserId"));
    res.json({ success: true, data: status });
  },
);

/**
 * POST /api/users/:platformUserId/mute
 * Muted users keep their notifications stored but nothing is delivered.
 */
userRoutes.post(
  "/:platformUserId/mute",
  validate({ params: schemas.platformUserParam, body: schemas.setMuted }),
  async (req, res) => {
    const { muted }: { muted: boolean } = req.body;
    const result = await setMuted(getParam(req, "platformUserId"), muted);
    res.json({ success: true, data: { muted: result } });
  },
);
