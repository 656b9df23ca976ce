// src/routes/orders.ts
import { Router, type NextFunction, type Request, type Response } from "express";
import type { Knex } from "knex";
import { z } from "zod";
import { ORDER_STATUSES } from "../ledger.js";
import { ValidationError } from "../errors.js";
import {
  createOrder,
  getOrderSummary,
  listOrderPayments,
  updateOrderStatus,
} from "../orders.js";

const createOrderSchema = z.object({
  customer: z.coerce.number().int().positive(),
  shipping_address: z.string().trim().default(""),
  items: z
    .array(
      z.object({
        product: z.coerce.number().int().positive(),
        quantity: z.coerce.number().int().min(1, "Quantity must be at least 1."),
      })
    )
    .min(1, "Order must contain at least one item."),
});

const updateOrderStatusSchema = z.object({
  status: z.enum(ORDER_STATUSES),
});

export function parseId(raw: string | undefined, field = "id"): number {
  const id = Number(raw);
  if (!Number.isInteger(id) || id <= 0) {
    throw new ValidationError(`Invalid ${field}`, { [field]: `Invalid ${field}` });
  }
  return id;
}

export function orderRoutes(db: Knex) {
  const router = Router();

  /**
   * POST /api/orders
   * Body: { customer, shipping_address?, items: [{ product, quantity }] }
   */
  router.post("/", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = createOrderSchema.safeParse(req.body ?? {});
      if (!parsed.success) throw ValidationError.fromZod(parsed.error, "Invalid order");

      const order = await createOrder(db, {
        customerId: parsed.data.customer,
        shippingAddress: parsed.data.shipping_address,
        items: parsed.data.items.map((it) => ({ productId: it.product, quantity: it.quantity })),
      });
      res.status(201).json(order);
    } catch (err) {
      next(err);
    }
  });

  router.get("/:id", async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await getOrderSummary(db, parseId(req.params.id)));
    } catch (err) {
      next(err);
    }
  });

  router.get("/:id/payments", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const payments = await listOrderPayments(db, parseId(req.params.id));
      res.json({ count: payments.length, payments });
    } catch (err) {
      next(err);
    }
  });

  /**
   * PATCH /api/orders/:id/status
   * Body: { status: "PROCESSING" | "SHIPPED" | "DELIVERED" | "CANCELLED" }
   */
  router.patch("/:id/status", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = parseId(req.params.id);
      const parsed = updateOrderStatusSchema.safeParse(req.body ?? {});
      if (!parsed.success) throw ValidationError.fromZod(parsed.error, "Invalid status");

      res.json(await updateOrderStatus(db, id, parsed.data.status));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
