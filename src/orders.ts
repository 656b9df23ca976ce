// src/orders.ts
// Order creation, workflow status, and the summaries the API returns.

import type { Knex } from "knex";
import { formatAmount, toCents } from "./money.js";
import { moduleLogger } from "./logger.js";
import {
  orderTotal,
  remainingBalance,
  type OrderItemEntry,
  type OrderPaymentStatus,
  type OrderStatus,
  type PaymentStatus,
} from "./ledger.js";
import {
  findCustomer,
  findOrder,
  findProductsByIds,
  listOrderItems,
  listPaymentsForOrder,
  toOrderLedger,
  toPaymentEntry,
  type OrderRow,
  type PaymentRow,
} from "./db/queries.js";
import { NotFoundError, OrderStateError, ValidationError } from "./errors.js";

const log = moduleLogger("orders");

/* -------------------------------- Summaries ------------------------------- */

export interface OrderSummary {
  id: number;
  amount: string;
  amount_paid: string;
  remaining_balance: string;
  payment_status: OrderPaymentStatus;
  status: OrderStatus;
  tracking_number: string | null;
}

export interface PaymentSummary {
  id: number;
  order: number;
  amount: string;
  phone_number: string;
  provider: string;
  status: PaymentStatus;
  transaction_id: string | null;
}

export function summarizeOrder(row: OrderRow): OrderSummary {
  const order = toOrderLedger(row);
  return {
    id: order.id,
    amount: formatAmount(order.amount),
    amount_paid: formatAmount(order.amountPaid),
    remaining_balance: formatAmount(remainingBalance(order)),
    payment_status: order.paymentStatus,
    status: order.status,
    tracking_number: order.trackingNumber,
  };
}

export function summarizePayment(row: PaymentRow): PaymentSummary {
  const p = toPaymentEntry(row);
  return {
    id: p.id,
    order: p.orderId,
    amount: formatAmount(p.amount),
    phone_number: p.phoneNumber,
    provider: p.provider,
    status: p.status,
    transaction_id: p.transactionId,
  };
}

export async function getOrderSummary(db: Knex, orderId: number): Promise<OrderSummary> {
  const row = await findOrder(db, orderId);
  if (!row) throw new NotFoundError(`Order ${orderId} not found`);
  return summarizeOrder(row);
}

export async function listOrderPayments(db: Knex, orderId: number): Promise<PaymentSummary[]> {
  const row = await findOrder(db, orderId);
  if (!row) throw new NotFoundError(`Order ${orderId} not found`);
  const payments = await listPaymentsForOrder(db, orderId);
  return payments.map(summarizePayment);
}

/* --------------------------------- Create --------------------------------- */

export type OrderItemInput = {
  productId: number;
  quantity: number;
};

export interface CreateOrderInput {
  customerId: number;
  shippingAddress: string;
  items: OrderItemInput[];
}

/**
 * Creates one `orders` row and its `order_items`, snapshotting each
 * product's price and taking the quantities out of stock. Everything runs
 * in one transaction so a stock shortfall leaves nothing behind.
 */
export async function createOrder(db: Knex, input: CreateOrderInput): Promise<OrderSummary> {
  if (!input.items.length) {
    throw new ValidationError("Order must contain at least one item", {
      items: "Order must contain at least one item.",
    });
  }

  const seen = new Set<number>();
  for (const it of input.items) {
    if (!Number.isInteger(it.quantity) || it.quantity < 1) {
      throw new ValidationError("Invalid quantity", {
        items: `Quantity for product ${it.productId} must be at least 1.`,
      });
    }
    if (seen.has(it.productId)) {
      throw new ValidationError("Duplicate product", {
        items: `Product ${it.productId} appears more than once.`,
      });
    }
    seen.add(it.productId);
  }

  return db.transaction(async (trx) => {
    const customer = await findCustomer(trx, input.customerId);
    if (!customer) throw new NotFoundError(`Customer ${input.customerId} not found`);

    const products = await findProductsByIds(trx, [...seen]);
    const byId = new Map(products.map((p) => [p.id, p]));

    const lines: OrderItemEntry[] = [];
    for (const it of input.items) {
      const product = byId.get(it.productId);
      if (!product) {
        throw new ValidationError("Unknown product", {
          items: `Product with id ${it.productId} does not exist.`,
        });
      }
      if (product.stock < it.quantity) {
        throw new ValidationError("Insufficient stock", {
          items: `Not enough stock for ${product.name}. Available: ${product.stock}`,
        });
      }
      lines.push({
        productId: product.id,
        quantity: it.quantity,
        priceAtTime: toCents(product.price),
      });
    }

    const amount = orderTotal(lines);
    if (amount < 1) {
      throw new ValidationError("Order total must be at least 0.01", {
        amount: "Order total must be at least 0.01.",
      });
    }

    const [inserted] = await trx("orders")
      .insert({
        customer_id: customer.id,
        amount: formatAmount(amount),
        amount_paid: formatAmount(0),
        payment_status: "UNPAID",
        status: "PENDING",
        shipping_address: input.shippingAddress,
        tracking_number: null,
      })
      .returning<{ id: number }[]>("id");

    const orderId = inserted.id;

    await trx("order_items").insert(
      lines.map((line) => ({
        order_id: orderId,
        product_id: line.productId,
        quantity: line.quantity,
        price_at_time: formatAmount(line.priceAtTime),
      }))
    );

    for (const line of lines) {
      await trx("products")
        .where({ id: line.productId })
        .decrement("stock", line.quantity);
    }

    log.info({ orderId, amount: formatAmount(amount), items: lines.length }, "order created");

    const row = await findOrder(trx, orderId);
    if (!row) throw new Error(`Order ${orderId} vanished after insert`);
    return summarizeOrder(row);
  });
}

/* ------------------------------ Workflow status --------------------------- */

const NEXT_STATUS: Record<OrderStatus, readonly OrderStatus[]> = {
  PENDING: ["PROCESSING", "CANCELLED"],
  PROCESSING: ["SHIPPED", "CANCELLED"],
  SHIPPED: ["DELIVERED"],
  DELIVERED: [],
  CANCELLED: [],
};

export function canTransition(from: OrderStatus, to: OrderStatus): boolean {
  return NEXT_STATUS[from].includes(to);
}

/** Orders accept new payments until they are delivered or cancelled. */
export function acceptsPayments(status: OrderStatus): boolean {
  return status !== "CANCELLED" && status !== "DELIVERED";
}

/**
 * Move an order through its workflow. Cancelling returns the items to
 * stock and is refused once money has been credited (refunds are handled
 * outside this service).
 */
export async function updateOrderStatus(
  db: Knex,
  orderId: number,
  next: OrderStatus
): Promise<OrderSummary> {
  return db.transaction(async (trx) => {
    const row = await findOrder(trx, orderId, { lock: true });
    if (!row) throw new NotFoundError(`Order ${orderId} not found`);

    const order = toOrderLedger(row);
    if (!canTransition(order.status, next)) {
      throw new OrderStateError(`Order ${orderId} cannot move from ${order.status} to ${next}`);
    }
    if (next === "CANCELLED" && order.amountPaid > 0) {
      throw new OrderStateError(
        `Order ${orderId} has ${formatAmount(order.amountPaid)} paid and cannot be cancelled`
      );
    }

    await trx("orders")
      .where({ id: orderId })
      .update({ status: next, updated_at: trx.fn.now() });

    if (next === "CANCELLED") {
      const items = await listOrderItems(trx, orderId);
      for (const item of items) {
        await trx("products")
          .where({ id: item.product_id })
          .increment("stock", item.quantity);
      }
    }

    log.info({ orderId, from: order.status, to: next }, "order status updated");

    const updated = await findOrder(trx, orderId);
    if (!updated) throw new Error(`Order ${orderId} vanished during update`);
    return summarizeOrder(updated);
  });
}
