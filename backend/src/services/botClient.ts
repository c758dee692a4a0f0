/**
 * Bot Client: forwards queued notifications to the bot front end.
 *
 * Non-throwing: failures are returned as `{ ok: false }` and left to the
 * caller to log. No retry.
 */

import { config, getServiceToken } from "../config/app.js";
import type { DeliveryJob } from "./deliveryQueue.js";

export interface ForwardResult {
  ok: boolean;
  status?: number;
  error?: string;
}

export async function forwardToBot(job: DeliveryJob): Promise<ForwardResult> {
  try {
    const res = await fetch(`${config.botDeliveryUrl}/deliver`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "X-Service-Token": getServiceToken(),
      },
      body: JSON.stringify(job),
      signal: AbortSignal.timeout(config.deliveryTimeoutMs),
    });

    if (res.ok) {
      return { ok: true, status: res.status };
    }

    const body = await res.text().catch(() => "");
    return { ok: false, status: res.status, error: body.slice(0, 200) };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}
