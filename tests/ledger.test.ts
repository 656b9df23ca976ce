import { describe, it, expect } from 'vitest';
import {
  derivePaymentStatus,
  formatTrackingNumber,
  isFullyPaid,
  orderTotal,
  remainingBalance,
} from '../src/ledger.js';

describe('ledger derivations', () => {
  it('remainingBalance never goes below zero', () => {
    expect(remainingBalance({ amount: 10000, amountPaid: 6000 })).toBe(4000);
    expect(remainingBalance({ amount: 10000, amountPaid: 10000 })).toBe(0);
    expect(remainingBalance({ amount: 10000, amountPaid: 12000 })).toBe(0);
  });

  it('isFullyPaid treats exact payment as paid', () => {
    expect(isFullyPaid({ amount: 25000, amountPaid: 24999 })).toBe(false);
    expect(isFullyPaid({ amount: 25000, amountPaid: 25000 })).toBe(true);
  });

  it('derivePaymentStatus follows amount_paid against amount', () => {
    expect(derivePaymentStatus({ amount: 10000, amountPaid: 0 })).toBe('UNPAID');
    expect(derivePaymentStatus({ amount: 10000, amountPaid: 1 })).toBe('PARTIALLY_PAID');
    expect(derivePaymentStatus({ amount: 10000, amountPaid: 9999 })).toBe('PARTIALLY_PAID');
    expect(derivePaymentStatus({ amount: 10000, amountPaid: 10000 })).toBe('PAID');
  });

  it('orderTotal multiplies quantity by the price snapshot', () => {
    expect(
      orderTotal([
        { productId: 1, quantity: 2, priceAtTime: 1250 },
        { productId: 2, quantity: 1, priceAtTime: 999 },
      ])
    ).toBe(3499);
  });
});

describe('formatTrackingNumber', () => {
  it('embeds the UTC date and a zero-padded order id', () => {
    expect(formatTrackingNumber(42, new Date('2026-03-14T10:00:00Z'))).toBe('SNBL20260314000042');
  });

  it('uses the UTC day even late in the evening elsewhere', () => {
    expect(formatTrackingNumber(7, new Date('2026-12-31T23:30:00Z'))).toBe('SNBL20261231000007');
  });

  it('does not truncate ids wider than six digits', () => {
    expect(formatTrackingNumber(1234567, new Date('2026-01-02T00:00:00Z'))).toBe('SNBL202601021234567');
  });
});
