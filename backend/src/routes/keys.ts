/**
 * Key issuance and revocation, called by the bot front end with the
 * shared service token.
 */

import { Router } from "express";
import { requireServiceToken, serviceRateLimit, validate, schemas } from "../middleware/index.js";
import type { RegisterBody } from "../middleware/validation.js";
import { registerUser, revokeApiKey } from "../services/users.js";

export const keyRoutes = Router();

/**
 * POST /api/register
 * Issue a key for an unseen user, or return the existing one.
 */
keyRoutes.post("/register", requireServiceToken, serviceRateLimit, validate({ body: schemas.register }), async (req, res) => {
  const body: RegisterBody = req.body;
  const result = await registerUser(body);

  res.status(result.created ? 201 : 200).json({
    success: true,
    message: result.created ? "API key issued" : "Existing API key returned",
    data: result,
  });
});

/**
 * POST /api/keys/revoke
 * Replace the user's key; the old one stops working immediately.
 */
keyRoutes.post("/keys/revoke", requireServiceToken, serviceRateLimit, validate({ body: schemas.revoke }), async (req, res) => {
  const { platformUserId }: { platformUserId: string } = req.body;
  const apiKey = await revokeApiKey(platformUserId);

  res.json({
    success: true,
    message: "API key revoked",
    data: { apiKey },
  });
});
