import type { ZodError } from 'zod';

export type FieldErrors = Record<string, string>;

/** Base for every failure the API reports with a stable code. */
export class AppError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(message: string, status: number, code: string) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
  }
}

export class ValidationError extends AppError {
  readonly details: FieldErrors;

  constructor(message: string, details: FieldErrors = {}) {
    super(message, 400, 'validation_error');
    this.details = details;
  }

  static fromZod(err: ZodError, message = 'Invalid request'): ValidationError {
    const details: FieldErrors = {};
    for (const issue of err.issues) {
      const field = issue.path.length ? issue.path.join('.') : '_';
      if (!details[field]) details[field] = issue.message;
    }
    return new ValidationError(message, details);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Unauthorized') {
    super(message, 401, 'unauthorized');
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, 'not_found');
  }
}

export class OverpaymentError extends AppError {
  readonly remainingBalance: string;

  constructor(amount: string, remainingBalance: string) {
    super(`Payment of ${amount} exceeds remaining balance of ${remainingBalance}`, 409, 'overpayment');
    this.remainingBalance = remainingBalance;
  }
}

export class DuplicatePaymentError extends AppError {
  readonly paymentId: number;

  constructor(paymentId: number) {
    super(`Payment ${paymentId} has already been applied`, 409, 'duplicate_payment');
    this.paymentId = paymentId;
  }
}

export class OrderStateError extends AppError {
  constructor(message: string) {
    super(message, 409, 'invalid_order_state');
  }
}

export class PaymentStateError extends AppError {
  constructor(message: string) {
    super(message, 409, 'invalid_payment_state');
  }
}

export class ConcurrentUpdateError extends AppError {
  constructor(orderId: number) {
    super(`Order ${orderId} was modified concurrently`, 409, 'concurrent_update');
  }
}

/**
 * The gateway refused or could not be reached. `detail` is for logs only;
 * callers see the generic message.
 */
export class GatewayError extends AppError {
  readonly detail: unknown;

  constructor(detail: unknown, message = 'Payment could not be initiated with the mobile-money provider') {
    super(message, 502, 'gateway_error');
    this.detail = detail;
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}
