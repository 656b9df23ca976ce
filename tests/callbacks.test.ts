import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { Knex } from 'knex';
import { handleGatewayCallback, mapGatewayStatus } from '../src/callbacks.js';
import { findPayment } from '../src/db/queries.js';
import { getOrderSummary } from '../src/orders.js';
import { NotFoundError, OverpaymentError, ValidationError } from '../src/errors.js';
import { createTestDb, seedOrder, seedPayment } from './helpers/db.js';

describe('mapGatewayStatus', () => {
  it('maps the provider vocabulary', () => {
    expect(mapGatewayStatus('success')).toBe('COMPLETED');
    expect(mapGatewayStatus('SUCCESS')).toBe('COMPLETED');
    expect(mapGatewayStatus('failed')).toBe('FAILED');
  });

  it('treats anything else as still pending', () => {
    expect(mapGatewayStatus('processing')).toBe('PENDING');
    expect(mapGatewayStatus('')).toBe('PENDING');
    expect(mapGatewayStatus('toString')).toBe('PENDING');
  });
});

describe('handleGatewayCallback', () => {
  let db: Knex;

  beforeEach(async () => {
    db = await createTestDb();
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('completes and credits the pending payment', async () => {
    const orderId = await seedOrder(db, '100.00');
    const paymentId = await seedPayment(db, orderId, '100.00');

    const result = await handleGatewayCallback(db, {
      externalId: String(orderId),
      transactionStatus: 'success',
      transactionId: 'AZ-7781',
    });

    expect(result).toEqual({ outcome: 'applied', paymentId, status: 'COMPLETED' });
    const payment = await findPayment(db, paymentId);
    expect(payment?.status).toBe('COMPLETED');
    expect(payment?.transaction_id).toBe('AZ-7781');
    expect(await getOrderSummary(db, orderId)).toMatchObject({
      amount_paid: '100.00',
      payment_status: 'PAID',
    });
  });

  it('ignores a redelivered success callback', async () => {
    const orderId = await seedOrder(db, '100.00');
    const paymentId = await seedPayment(db, orderId, '40.00');
    const body = { externalId: orderId, transactionStatus: 'success', transactionId: 'AZ-1' };

    await handleGatewayCallback(db, body);
    const replay = await handleGatewayCallback(db, body);

    expect(replay).toEqual({ outcome: 'ignored', paymentId, status: 'COMPLETED' });
    expect((await getOrderSummary(db, orderId)).amount_paid).toBe('40.00');
  });

  it('targets the newest pending attempt', async () => {
    const orderId = await seedOrder(db, '100.00');
    await seedPayment(db, orderId, '10.00', { status: 'FAILED' });
    const older = await seedPayment(db, orderId, '20.00');
    const newer = await seedPayment(db, orderId, '30.00');
    await seedPayment(db, orderId, '5.00', { status: 'FAILED' });

    const result = await handleGatewayCallback(db, { externalId: orderId, transactionStatus: 'success' });

    expect(result.paymentId).toBe(newer);
    expect((await findPayment(db, older))?.status).toBe('PENDING');
    expect((await getOrderSummary(db, orderId)).amount_paid).toBe('30.00');
  });

  it('marks a pending payment failed and keeps it failed', async () => {
    const orderId = await seedOrder(db, '100.00');
    const paymentId = await seedPayment(db, orderId, '50.00');

    const failed = await handleGatewayCallback(db, { externalId: orderId, transactionStatus: 'failed' });
    expect(failed).toEqual({ outcome: 'failed', paymentId, status: 'FAILED' });

    const late = await handleGatewayCallback(db, { externalId: orderId, transactionStatus: 'success' });
    expect(late).toEqual({ outcome: 'ignored', paymentId, status: 'FAILED' });
    expect((await getOrderSummary(db, orderId)).payment_status).toBe('UNPAID');
  });

  it('leaves the payment alone for an in-progress status', async () => {
    const orderId = await seedOrder(db, '100.00');
    const paymentId = await seedPayment(db, orderId, '50.00');

    const result = await handleGatewayCallback(db, { externalId: orderId, transactionStatus: 'processing' });
    expect(result).toEqual({ outcome: 'ignored', paymentId, status: 'PENDING' });
  });

  it('does not credit a callback that would overpay', async () => {
    const orderId = await seedOrder(db, '100.00');
    const paymentId = await seedPayment(db, orderId, '150.00');

    await expect(
      handleGatewayCallback(db, { externalId: orderId, transactionStatus: 'success' })
    ).rejects.toBeInstanceOf(OverpaymentError);

    expect((await findPayment(db, paymentId))?.status).toBe('PENDING');
    expect((await getOrderSummary(db, orderId)).amount_paid).toBe('0.00');
  });

  it('uses the transaction id to find an already completed payment', async () => {
    const orderId = await seedOrder(db, '100.00');
    const completed = await seedPayment(db, orderId, '60.00', { status: 'COMPLETED', transactionId: 'AZ-60' });
    const pending = await seedPayment(db, orderId, '40.00');

    const replay = await handleGatewayCallback(db, {
      externalId: orderId,
      transactionStatus: 'success',
      transactionId: 'AZ-60',
    });

    expect(replay).toEqual({ outcome: 'ignored', paymentId: completed, status: 'COMPLETED' });
    expect((await findPayment(db, pending))?.status).toBe('PENDING');
  });

  it('rejects a transaction id recorded on another order', async () => {
    const orderId = await seedOrder(db, '100.00');
    const otherOrder = await seedOrder(db, '100.00');
    await seedPayment(db, otherOrder, '10.00', { status: 'COMPLETED', transactionId: 'AZ-OTHER' });
    await seedPayment(db, orderId, '10.00');

    await expect(
      handleGatewayCallback(db, { externalId: orderId, transactionStatus: 'success', transactionId: 'AZ-OTHER' })
    ).rejects.toThrow('Transaction does not match order');
  });

  it('rejects incomplete bodies', async () => {
    await expect(handleGatewayCallback(db, { transactionStatus: 'success' })).rejects.toBeInstanceOf(
      ValidationError
    );
    await expect(
      handleGatewayCallback(db, { externalId: 'ORD-1', transactionStatus: 'success' })
    ).rejects.toThrow('Missing required fields');
  });

  it('reports unknown orders and orders without payments', async () => {
    await expect(
      handleGatewayCallback(db, { externalId: 4242, transactionStatus: 'success' })
    ).rejects.toThrow('Order 4242 not found');

    const orderId = await seedOrder(db, '100.00');
    await expect(
      handleGatewayCallback(db, { externalId: orderId, transactionStatus: 'success' })
    ).rejects.toBeInstanceOf(NotFoundError);
  });
});
