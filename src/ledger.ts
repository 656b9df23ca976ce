// Ledger entities: the order/payment shapes and the pure derivations the
// reconciliation engine relies on. Amounts are integer cents here.

export const PAYMENT_STATUSES = ['PENDING', 'COMPLETED', 'FAILED', 'REFUNDED'] as const;
export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];

export const ORDER_PAYMENT_STATUSES = ['UNPAID', 'PARTIALLY_PAID', 'PAID', 'REFUNDED'] as const;
export type OrderPaymentStatus = (typeof ORDER_PAYMENT_STATUSES)[number];

export const ORDER_STATUSES = ['PENDING', 'PROCESSING', 'SHIPPED', 'DELIVERED', 'CANCELLED'] as const;
export type OrderStatus = (typeof ORDER_STATUSES)[number];

export const TRACKING_PREFIX = 'SNBL';

export interface OrderLedger {
  id: number;
  amount: number;
  amountPaid: number;
  paymentStatus: OrderPaymentStatus;
  status: OrderStatus;
  trackingNumber: string | null;
}

export interface PaymentEntry {
  id: number;
  orderId: number;
  amount: number;
  phoneNumber: string;
  provider: string;
  status: PaymentStatus;
  transactionId: string | null;
  appliedAt: Date | string | null;
  /** The initiating request has not heard back from the gateway yet. */
  awaitingGateway: boolean;
}

export interface OrderItemEntry {
  productId: number;
  quantity: number;
  priceAtTime: number;
}

type Balance = Pick<OrderLedger, 'amount' | 'amountPaid'>;

export function remainingBalance(order: Balance): number {
  return Math.max(order.amount - order.amountPaid, 0);
}

export function isFullyPaid(order: Balance): boolean {
  return order.amountPaid >= order.amount;
}

/**
 * UNPAID -> PARTIALLY_PAID -> PAID from amounts alone.
 * REFUNDED is never produced here; only an explicit refund sets it.
 */
export function derivePaymentStatus(order: Balance): Exclude<OrderPaymentStatus, 'REFUNDED'> {
  if (order.amountPaid >= order.amount) return 'PAID';
  if (order.amountPaid > 0) return 'PARTIALLY_PAID';
  return 'UNPAID';
}

export function orderTotal(items: OrderItemEntry[]): number {
  return items.reduce((sum, it) => sum + it.quantity * it.priceAtTime, 0);
}

/** SNBL<YYYYMMDD><id:06d>, dated by the UTC day the order became fully paid. */
export function formatTrackingNumber(orderId: number, at: Date = new Date()): string {
  const datePart = [
    at.getUTCFullYear(),
    String(at.getUTCMonth() + 1).padStart(2, '0'),
    String(at.getUTCDate()).padStart(2, '0'),
  ].join('');
  return `${TRACKING_PREFIX}${datePart}${String(orderId).padStart(6, '0')}`;
}

const ORDER_STATUSES_SET: ReadonlySet<string> = new Set(ORDER_STATUSES);
const PAYMENT_STATUSES_SET: ReadonlySet<string> = new Set(PAYMENT_STATUSES);
const ORDER_PAYMENT_STATUSES_SET: ReadonlySet<string> = new Set(ORDER_PAYMENT_STATUSES);

export function isOrderStatus(value: string): value is OrderStatus {
  return ORDER_STATUSES_SET.has(value);
}

export function isPaymentStatus(value: string): value is PaymentStatus {
  return PAYMENT_STATUSES_SET.has(value);
}

export function isOrderPaymentStatus(value: string): value is OrderPaymentStatus {
  return ORDER_PAYMENT_STATUSES_SET.has(value);
}
