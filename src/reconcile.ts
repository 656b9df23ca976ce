// src/reconcile.ts
// Order reconciliation: crediting confirmed payments to their order.
//
// Every write to orders.amount_paid / payment_status / tracking_number goes
// through applyPayment inside a transaction that holds the order row lock.

import type { Knex } from "knex";
import { z } from "zod";
import {
  derivePaymentStatus,
  formatTrackingNumber,
  remainingBalance,
} from "./ledger.js";
import { formatAmount, parseAmount } from "./money.js";
import { normalizePhoneNumber } from "./phone.js";
import { moduleLogger } from "./logger.js";
import {
  findOrder,
  findPayment,
  findPaymentByTransactionId,
  toOrderLedger,
  toPaymentEntry,
} from "./db/queries.js";
import {
  acceptsPayments,
  summarizeOrder,
  summarizePayment,
  type OrderSummary,
  type PaymentSummary,
} from "./orders.js";
import {
  ConcurrentUpdateError,
  DuplicatePaymentError,
  GatewayError,
  NotFoundError,
  OrderStateError,
  OverpaymentError,
  PaymentStateError,
  ValidationError,
} from "./errors.js";
import { PROVIDERS, type PaymentGateway, type Provider } from "./psp/gateway.js";

const log = moduleLogger("reconcile");

export interface ReconciledState {
  order: OrderSummary;
  payment: PaymentSummary;
}

/* ------------------------------ apply_payment ----------------------------- */

/**
 * Credit a COMPLETED payment to its order. Must run inside `trx`; the order
 * row is locked first so the balance check sees the latest amount_paid.
 *
 * Throws DuplicatePaymentError if the payment was already credited and
 * OverpaymentError if it exceeds the remaining balance; nothing is written
 * in either case.
 */
export async function applyPayment(
  trx: Knex.Transaction,
  orderId: number,
  paymentId: number,
  now: Date = new Date()
): Promise<ReconciledState> {
  const orderRow = await findOrder(trx, orderId, { lock: true });
  if (!orderRow) throw new NotFoundError(`Order ${orderId} not found`);
  const paymentRow = await findPayment(trx, paymentId, { lock: true });
  if (!paymentRow) throw new NotFoundError(`Payment ${paymentId} not found`);

  const order = toOrderLedger(orderRow);
  const payment = toPaymentEntry(paymentRow);

  if (payment.orderId !== order.id) {
    throw new PaymentStateError(`Payment ${payment.id} belongs to order ${payment.orderId}, not ${order.id}`);
  }
  if (payment.status !== "COMPLETED") {
    throw new PaymentStateError(`Payment ${payment.id} is ${payment.status}; only COMPLETED payments can be applied`);
  }
  if (payment.appliedAt !== null) {
    throw new DuplicatePaymentError(payment.id);
  }
  if (order.paymentStatus === "REFUNDED") {
    throw new OrderStateError(`Order ${order.id} has been refunded`);
  }

  const remaining = remainingBalance(order);
  if (payment.amount > remaining) {
    throw new OverpaymentError(formatAmount(payment.amount), formatAmount(remaining));
  }

  const amountPaid = order.amountPaid + payment.amount;
  const paymentStatus = derivePaymentStatus({ amount: order.amount, amountPaid });
  const assignTracking = paymentStatus === "PAID" && order.trackingNumber === null;
  const trackingNumber = assignTracking
    ? formatTrackingNumber(order.id, now)
    : order.trackingNumber;

  // Compare-and-set on the value we read: if anything slipped past the row
  // lock, this update matches nothing and the transaction rolls back.
  const updated = await trx("orders")
    .where({ id: order.id, amount_paid: orderRow.amount_paid })
    .update({
      amount_paid: formatAmount(amountPaid),
      payment_status: paymentStatus,
      tracking_number: trackingNumber,
      updated_at: trx.fn.now(),
    });
  if (updated !== 1) throw new ConcurrentUpdateError(order.id);

  const marked = await trx("payments")
    .where({ id: payment.id })
    .whereNull("applied_at")
    .update({ applied_at: trx.fn.now(), updated_at: trx.fn.now() });
  if (marked !== 1) throw new DuplicatePaymentError(payment.id);

  log.info(
    {
      orderId: order.id,
      paymentId: payment.id,
      amount: formatAmount(payment.amount),
      amountPaid: formatAmount(amountPaid),
      paymentStatus,
    },
    "payment applied"
  );
  if (assignTracking) {
    log.info({ orderId: order.id, trackingNumber }, "tracking number assigned");
  }

  const afterOrder = await findOrder(trx, order.id);
  const afterPayment = await findPayment(trx, payment.id);
  if (!afterOrder || !afterPayment) {
    throw new Error(`Order ${order.id} or payment ${payment.id} vanished during reconciliation`);
  }
  return { order: summarizeOrder(afterOrder), payment: summarizePayment(afterPayment) };
}

/* ----------------------------- complete_payment --------------------------- */

export type CompletionOutcome = "applied" | "already_applied";

/**
 * PENDING -> COMPLETED and credit the order, as one unit inside `trx`.
 * Used by both the synchronous initiation flow and gateway callbacks, so
 * whichever arrives second finds the payment already applied. Refuses a
 * transaction id that is already recorded on another payment.
 */
export async function completePayment(
  trx: Knex.Transaction,
  paymentId: number,
  transactionId?: string | null
): Promise<ReconciledState & { outcome: CompletionOutcome }> {
  const row = await findPayment(trx, paymentId, { lock: true });
  if (!row) throw new NotFoundError(`Payment ${paymentId} not found`);
  const payment = toPaymentEntry(row);

  if (payment.status === "COMPLETED" && payment.appliedAt !== null) {
    const orderRow = await findOrder(trx, payment.orderId);
    if (!orderRow) throw new NotFoundError(`Order ${payment.orderId} not found`);
    return { outcome: "already_applied", order: summarizeOrder(orderRow), payment: summarizePayment(row) };
  }
  if (payment.status !== "PENDING" && payment.status !== "COMPLETED") {
    throw new PaymentStateError(`Payment ${payment.id} is ${payment.status} and cannot be completed`);
  }

  // A transaction id identifies one collection; it never moves between payments.
  if (transactionId && transactionId !== payment.transactionId) {
    const holder = await findPaymentByTransactionId(trx, transactionId);
    if (holder && holder.id !== payment.id) {
      throw new PaymentStateError(
        `Transaction ${transactionId} is already recorded on payment ${holder.id}`
      );
    }
  }

  const update: Record<string, unknown> = {
    status: "COMPLETED",
    awaiting_gateway: false,
    updated_at: trx.fn.now(),
  };
  if (transactionId && !payment.transactionId) update.transaction_id = transactionId;
  await trx("payments").where({ id: payment.id }).update(update);

  const state = await applyPayment(trx, payment.orderId, payment.id);
  return { outcome: "applied", ...state };
}

/* ----------------------------- initiate_payment --------------------------- */

export const InitiatePaymentBody = z.object({
  order: z.coerce.number().int().positive(),
  amount: z.union([z.number(), z.string()]),
  phone_number: z.string().trim().min(1, "Phone number is required"),
  provider: z.enum(PROVIDERS).optional(),
});

export type InitiateOptions = {
  countryCode: string;
  defaultProvider: Provider;
};

type ValidInitiation = {
  orderId: number;
  amount: number;
  phoneNumber: string;
  provider: Provider;
};

function validateInitiation(input: unknown, opts: InitiateOptions): ValidInitiation {
  const parsed = InitiatePaymentBody.safeParse(input);
  if (!parsed.success) throw ValidationError.fromZod(parsed.error, "Invalid payment request");

  const amount = parseAmount(parsed.data.amount);
  if (amount === null || amount <= 0) {
    throw new ValidationError("Invalid payment request", {
      amount: "Amount must be a positive number with at most 2 decimal places.",
    });
  }
  const phoneNumber = normalizePhoneNumber(parsed.data.phone_number, opts.countryCode);
  if (!phoneNumber) {
    throw new ValidationError("Invalid payment request", {
      phone_number: "Enter a valid mobile number.",
    });
  }
  return {
    orderId: parsed.data.order,
    amount,
    phoneNumber,
    provider: parsed.data.provider ?? opts.defaultProvider,
  };
}

/** Remove a tentative payment that never got credited. */
async function discardPending(db: Knex, paymentId: number, reason: string): Promise<void> {
  try {
    const removed = await db("payments")
      .where({ id: paymentId, status: "PENDING" })
      .whereNull("applied_at")
      .del();
    log.warn({ paymentId, reason, removed }, "tentative payment discarded");
  } catch (err) {
    // Callers get the first error; this one only goes to the logs.
    log.error({ err, paymentId, reason }, "could not discard tentative payment");
  }
}

/**
 * Record a PENDING payment, ask the gateway to collect it, and on success
 * complete and credit it. Any failure after the row was created removes it
 * again, so the order is left exactly as it was.
 */
export async function initiatePayment(
  db: Knex,
  gateway: PaymentGateway,
  input: unknown,
  opts: InitiateOptions
): Promise<ReconciledState> {
  const req = validateInitiation(input, opts);

  const paymentId = await db.transaction(async (trx) => {
    const row = await findOrder(trx, req.orderId, { lock: true });
    if (!row) throw new NotFoundError(`Order ${req.orderId} not found`);
    const order = toOrderLedger(row);

    if (!acceptsPayments(order.status)) {
      throw new OrderStateError(`Order ${order.id} is ${order.status} and does not accept payments`);
    }
    if (order.paymentStatus === "REFUNDED") {
      throw new OrderStateError(`Order ${order.id} has been refunded`);
    }
    const remaining = remainingBalance(order);
    if (req.amount > remaining) {
      throw new OverpaymentError(formatAmount(req.amount), formatAmount(remaining));
    }

    const [inserted] = await trx("payments")
      .insert({
        order_id: order.id,
        amount: formatAmount(req.amount),
        phone_number: req.phoneNumber,
        provider: req.provider,
        status: "PENDING",
        awaiting_gateway: true,
      })
      .returning<{ id: number }[]>("id");
    return inserted.id;
  });

  log.info(
    { orderId: req.orderId, paymentId, amount: formatAmount(req.amount), provider: req.provider },
    "payment initiated"
  );

  const result = await gateway
    .submit({
      amount: formatAmount(req.amount),
      phoneNumber: req.phoneNumber,
      provider: req.provider,
      externalReference: String(req.orderId),
    })
    .catch(async (err: unknown): Promise<never> => {
      await discardPending(db, paymentId, "gateway error");
      const failure = err instanceof GatewayError ? err : new GatewayError(err);
      log.error({ paymentId, detail: failure.detail }, "gateway call failed");
      throw failure;
    });

  if (!result.success) {
    await discardPending(db, paymentId, "gateway rejected");
    log.warn({ paymentId, message: result.message }, "gateway rejected payment");
    throw new GatewayError({ reason: "rejected", message: result.message ?? null });
  }

  const transactionId = result.transactionId ?? null;
  try {
    const state = await db.transaction((trx) =>
      completePayment(trx, paymentId, transactionId)
    );
    if (state.outcome === "already_applied") {
      log.info({ paymentId }, "payment already credited by callback");
    }
    return { order: state.order, payment: state.payment };
  } catch (err) {
    await discardPending(db, paymentId, "reconciliation failed");
    throw err;
  }
}
