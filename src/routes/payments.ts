// src/routes/payments.ts
import { Router, type NextFunction, type Request, type Response } from "express";
import type { Knex } from "knex";
import { findPayment } from "../db/queries.js";
import { NotFoundError } from "../errors.js";
import { summarizePayment } from "../orders.js";
import { initiatePayment, type InitiateOptions } from "../reconcile.js";
import type { PaymentGateway } from "../psp/gateway.js";
import { parseId } from "./orders.js";

export function paymentRoutes(db: Knex, gateway: PaymentGateway, opts: InitiateOptions) {
  const router = Router();

  /**
   * POST /api/payments
   * Body: { order, amount, phone_number, provider? }
   *
   * Collects `amount` via mobile money and credits it to the order.
   * 201 -> { payment, order: { amount_paid, remaining_balance, payment_status, tracking_number, ... } }
   */
  router.post("/", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const state = await initiatePayment(db, gateway, req.body ?? {}, opts);
      res.status(201).json(state);
    } catch (err) {
      next(err);
    }
  });

  router.get("/:id", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = parseId(req.params.id);
      const row = await findPayment(db, id);
      if (!row) throw new NotFoundError(`Payment ${id} not found`);
      res.json(summarizePayment(row));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
