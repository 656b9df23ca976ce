// src/db/queries.ts
import type { Knex } from "knex";
import { toCents } from "../money.js";
import {
  isOrderPaymentStatus,
  isOrderStatus,
  isPaymentStatus,
  type OrderLedger,
  type PaymentEntry,
} from "../ledger.js";

/* --------------------------------- Rows ----------------------------------- */

// Decimal columns come back as strings from pg and numbers from SQLite.
type Decimal = string | number;

export interface OrderRow {
  id: number;
  customer_id: number;
  amount: Decimal;
  amount_paid: Decimal;
  payment_status: string;
  status: string;
  shipping_address: string;
  tracking_number: string | null;
  created_at: Date | string;
  updated_at: Date | string;
}

export interface PaymentRow {
  id: number;
  order_id: number;
  amount: Decimal;
  phone_number: string;
  provider: string;
  status: string;
  transaction_id: string | null;
  applied_at: Date | string | null;
  // SQLite hands booleans back as 0/1
  awaiting_gateway: boolean | number;
  created_at: Date | string;
  updated_at: Date | string;
}

export interface ProductRow {
  id: number;
  sku: string;
  name: string;
  price: Decimal;
  stock: number;
}

export interface CustomerRow {
  id: number;
  name: string;
  phone_number: string | null;
  address: string;
}

export interface OrderItemRow {
  id: number;
  order_id: number;
  product_id: number;
  quantity: number;
  price_at_time: Decimal;
}

/* -------------------------------- Mappers --------------------------------- */

export function toOrderLedger(row: OrderRow): OrderLedger {
  if (!isOrderPaymentStatus(row.payment_status)) {
    throw new TypeError(`Order ${row.id} has unknown payment_status ${row.payment_status}`);
  }
  if (!isOrderStatus(row.status)) {
    throw new TypeError(`Order ${row.id} has unknown status ${row.status}`);
  }
  return {
    id: row.id,
    amount: toCents(row.amount),
    amountPaid: toCents(row.amount_paid),
    paymentStatus: row.payment_status,
    status: row.status,
    trackingNumber: row.tracking_number ?? null,
  };
}

export function toPaymentEntry(row: PaymentRow): PaymentEntry {
  if (!isPaymentStatus(row.status)) {
    throw new TypeError(`Payment ${row.id} has unknown status ${row.status}`);
  }
  return {
    id: row.id,
    orderId: row.order_id,
    amount: toCents(row.amount),
    phoneNumber: row.phone_number,
    provider: row.provider,
    status: row.status,
    transactionId: row.transaction_id ?? null,
    appliedAt: row.applied_at ?? null,
    awaitingGateway: Boolean(row.awaiting_gateway),
  };
}

/* ------------------------------- Lookups ---------------------------------- */

/**
 * Read an order; with `lock` the row is held FOR UPDATE until the
 * surrounding transaction ends (a no-op on SQLite, where writers are
 * already serialized).
 */
export async function findOrder(
  db: Knex,
  id: number,
  opts: { lock?: boolean } = {}
): Promise<OrderRow | null> {
  const q = db<OrderRow>("orders").where({ id });
  if (opts.lock) q.forUpdate();
  const row = await q.first();
  return row ?? null;
}

export async function findPayment(
  db: Knex,
  id: number,
  opts: { lock?: boolean } = {}
): Promise<PaymentRow | null> {
  const q = db<PaymentRow>("payments").where({ id });
  if (opts.lock) q.forUpdate();
  const row = await q.first();
  return row ?? null;
}

export async function listPaymentsForOrder(db: Knex, orderId: number): Promise<PaymentRow[]> {
  const rows = await db<PaymentRow>("payments")
    .where({ order_id: orderId })
    .orderBy("id", "desc");
  return rows;
}

export async function findPaymentByTransactionId(
  db: Knex,
  transactionId: string
): Promise<PaymentRow | null> {
  const row = await db<PaymentRow>("payments").where({ transaction_id: transactionId }).first();
  return row ?? null;
}

/**
 * The payment a callback without a known transaction id refers to: the
 * newest PENDING attempt, otherwise the newest attempt of any status.
 */
export async function findPaymentForCallback(
  db: Knex,
  orderId: number
): Promise<PaymentRow | null> {
  const pending = await db<PaymentRow>("payments")
    .where({ order_id: orderId, status: "PENDING" })
    .orderBy("id", "desc")
    .first();
  if (pending) return pending;

  const latest = await db<PaymentRow>("payments")
    .where({ order_id: orderId })
    .orderBy("id", "desc")
    .first();
  return latest ?? null;
}

export async function findProductsByIds(db: Knex, ids: number[]): Promise<ProductRow[]> {
  if (!ids.length) return [];
  const rows = await db<ProductRow>("products").whereIn("id", ids);
  return rows;
}

export async function findCustomer(db: Knex, id: number): Promise<CustomerRow | null> {
  const row = await db<CustomerRow>("customers").where({ id }).first();
  return row ?? null;
}

export async function listOrderItems(db: Knex, orderId: number): Promise<OrderItemRow[]> {
  const rows = await db<OrderItemRow>("order_items")
    .where({ order_id: orderId })
    .orderBy("id", "asc");
  return rows;
}
