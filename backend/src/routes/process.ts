/**
 * Process lifecycle endpoints for the client library's tracking helpers.
 */

import { Router } from "express";
import { authenticate, standardRateLimit, validate, schemas } from "../middleware/index.js";
import type { EndProcessBody, HeartbeatBody, StartProcessBody } from "../middleware/validation.js";
import { endProcess, heartbeat, startProcess } from "../services/processes.js";
import { requireApiUser } from "./notify.js";

export const processRoutes = Router();

processRoutes.use(authenticate, standardRateLimit);

/**
 * POST /api/process/start
 * 409 if the id was already used, 404 if parentId is not one of the caller's processes.
 */
processRoutes.post("/start", validate({ body: schemas.startProcess }), async (req, res) => {
  const user = requireApiUser(req);
  const body: StartProcessBody = req.body;
  const result = await startProcess(user, body);

  res.status(201).json({
    success: true,
    message: "Process started",
    data: result,
  });
});

/**
 * POST /api/process/end
 * Ends a process exactly once. Unknown or foreign ids are 404, a second end is 409.
 */
processRoutes.post("/end", validate({ body: schemas.endProcess }), async (req, res) => {
  const user = requireApiUser(req);
  const body: EndProcessBody = req.body;
  const result = await endProcess(user, body);

  res.json({
    success: true,
    message: "Process ended",
    data: result,
  });
});

processRoutes.post("/heartbeat", validate({ body: schemas.heartbeat }), async (req, res) => {
  const user = requireApiUser(req);
  const body: HeartbeatBody = req.body;
  const result = await heartbeat(user, body);

  res.json({ success: true, data: result });
});
