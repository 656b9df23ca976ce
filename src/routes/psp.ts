// src/routes/psp.ts
import type { Request, Response } from "express";
import { Router } from "express";
import type { Knex } from "knex";
import crypto from "node:crypto";
import { handleGatewayCallback } from "../callbacks.js";
import { UnauthorizedError } from "../errors.js";
import { moduleLogger } from "../logger.js";
import { toErrorResponse } from "../middleware/errors.js";

const log = moduleLogger("psp");

/** Hex HMAC-SHA256 of the raw body, as sent in x-gateway-signature. */
export function signBody(raw: Buffer | string, secret: string): string {
  return crypto.createHmac("sha256", secret).update(raw).digest("hex");
}

function verifyCallback(req: Request, secret: string): boolean {
  if (!secret) return true; // verification disabled
  const provided = req.get("x-gateway-signature");
  const raw = req.rawBody;
  if (!provided || !raw) return false;
  const expected = signBody(raw, secret);
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

/**
 * POST /api/payments/webhook
 * Body: { externalId: <order id>, transactionStatus: "success" | "failed" | ..., transactionId? }
 *
 * Always answers with a structured body so the gateway only retries for
 * reasons it can do something about. Redeliveries answer success; a
 * reconciliation refusal (409 codes other than concurrent_update) is
 * answered with 200 and the error body.
 */
export function pspRoutes(db: Knex, webhookSecret: string) {
  const router = Router();

  router.post("/webhook", async (req: Request, res: Response) => {
    try {
      if (!verifyCallback(req, webhookSecret)) {
        throw new UnauthorizedError("Invalid callback signature");
      }
      const result = await handleGatewayCallback(db, req.body ?? {});
      log.info(result, "callback processed");
      return res.json({ status: "success" });
    } catch (err) {
      const { httpStatus, body } = toErrorResponse(err);
      if (httpStatus >= 500) {
        log.error({ err }, "callback failed");
        return res.status(httpStatus).json(body);
      }
      // Over-payment or a payment in the wrong state will not change on
      // redelivery: acknowledge with 200 so the gateway stops retrying.
      if (httpStatus === 409 && body.code !== "concurrent_update") {
        log.warn({ code: body.code, message: body.message }, "callback refused by reconciliation");
        return res.status(200).json(body);
      }
      log.warn({ code: body.code, message: body.message }, "callback rejected");
      return res.status(httpStatus).json(body);
    }
  });

  return router;
}
