// src/callbacks.ts
// Gateway callbacks: translate the provider's status vocabulary and feed
// confirmed payments through the same reconciliation unit as initiation.

import type { Knex } from "knex";
import { z } from "zod";
import type { PaymentStatus } from "./ledger.js";
import { moduleLogger } from "./logger.js";
import {
  findOrder,
  findPaymentByTransactionId,
  findPaymentForCallback,
  toPaymentEntry,
  type PaymentRow,
} from "./db/queries.js";
import { completePayment } from "./reconcile.js";
import { NotFoundError, ValidationError } from "./errors.js";

const log = moduleLogger("callbacks");

// Anything not listed maps to PENDING, never to a terminal status.
const GATEWAY_STATUS: Readonly<Record<string, PaymentStatus>> = {
  success: "COMPLETED",
  failed: "FAILED",
};

export function mapGatewayStatus(value: string): PaymentStatus {
  const key = value.trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(GATEWAY_STATUS, key)
    ? GATEWAY_STATUS[key]
    : "PENDING";
}

export const CallbackBody = z.object({
  externalId: z.union([z.string().trim().min(1), z.number()]),
  transactionStatus: z.string().trim().min(1),
  transactionId: z.string().trim().min(1).optional(),
});

export type CallbackOutcome = "applied" | "failed" | "ignored";

export interface CallbackResult {
  outcome: CallbackOutcome;
  paymentId: number;
  status: PaymentStatus;
}

function parseOrderId(externalId: string | number): number | null {
  const id = typeof externalId === "number" ? externalId : Number(externalId);
  return Number.isInteger(id) && id > 0 ? id : null;
}

type Target = { row: PaymentRow; byTransaction: boolean };

/**
 * A known transaction id pins the payment it was recorded on. Otherwise
 * fall back to the order's newest PENDING attempt, then its newest attempt.
 */
async function resolveTarget(
  trx: Knex.Transaction,
  orderId: number,
  transactionId: string | undefined
): Promise<Target> {
  if (transactionId) {
    const row = await findPaymentByTransactionId(trx, transactionId);
    if (row) {
      if (row.order_id !== orderId) {
        throw new ValidationError("Transaction does not match order", {
          transactionId: `Transaction ${transactionId} belongs to another order.`,
        });
      }
      return { row, byTransaction: true };
    }
  }
  const row = await findPaymentForCallback(trx, orderId);
  if (!row) throw new NotFoundError(`No payment found for order ${orderId}`);
  return { row, byTransaction: false };
}

/**
 * Apply one delivery of a gateway callback. Redeliveries are no-ops: a
 * payment that is already COMPLETED (or FAILED) is left alone.
 *
 * An attempt whose initiating request is still waiting on the gateway
 * belongs to that request. A callback only completes it when it brings a
 * transaction id not seen before; anything else is left to the request.
 */
export async function handleGatewayCallback(
  db: Knex,
  input: unknown
): Promise<CallbackResult> {
  const parsed = CallbackBody.safeParse(input);
  if (!parsed.success) throw ValidationError.fromZod(parsed.error, "Missing required fields");

  const body = parsed.data;
  const orderId = parseOrderId(body.externalId);
  if (orderId === null) {
    throw new ValidationError("Missing required fields", {
      externalId: "externalId must be an order id.",
    });
  }

  const mapped = mapGatewayStatus(body.transactionStatus);

  return db.transaction(async (trx): Promise<CallbackResult> => {
    const order = await findOrder(trx, orderId);
    if (!order) throw new NotFoundError(`Order ${orderId} not found`);

    const target = await resolveTarget(trx, orderId, body.transactionId);
    const payment = toPaymentEntry(target.row);

    const claimsInFlight = mapped === "COMPLETED" && body.transactionId !== undefined;
    if (payment.status === "PENDING" && payment.awaitingGateway && !claimsInFlight) {
      log.info(
        { orderId, paymentId: payment.id, reported: body.transactionStatus },
        "callback left to in-flight request"
      );
      return { outcome: "ignored", paymentId: payment.id, status: payment.status };
    }

    if (mapped === "COMPLETED" && payment.status === "PENDING") {
      const state = await completePayment(trx, payment.id, body.transactionId);
      return {
        outcome: state.outcome === "applied" ? "applied" : "ignored",
        paymentId: payment.id,
        status: "COMPLETED",
      };
    }

    if (mapped === "FAILED" && payment.status === "PENDING") {
      await trx("payments")
        .where({ id: payment.id, status: "PENDING" })
        .update({ status: "FAILED", updated_at: trx.fn.now() });
      log.info({ orderId, paymentId: payment.id }, "payment failed by callback");
      return { outcome: "failed", paymentId: payment.id, status: "FAILED" };
    }

    log.info(
      {
        orderId,
        paymentId: payment.id,
        reported: body.transactionStatus,
        mapped,
        current: payment.status,
        byTransaction: target.byTransaction,
      },
      mapped === payment.status ? "duplicate callback ignored" : "callback ignored"
    );
    return { outcome: "ignored", paymentId: payment.id, status: payment.status };
  });
}
