/**
 * Order Ledger Tests
 * Status transitions and racing updates on one order
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { OrderLedger } from '../services/orderLedger';
import { sequentialIds } from './fixtures';

describe('OrderLedger', () => {
  let ledger: OrderLedger;

  beforeEach(() => {
    ledger = new OrderLedger({ generateId: sequentialIds(), now: () => '2026-01-01T00:00:00.000Z' });
  });

  it('adds pending orders with normalized fields', () => {
    const id = ledger.add('big basket', ' 4821 ', 'ab 1234 5678');
    expect(id).toBe('order-1');
    expect(ledger.get(id)).toEqual({
      orderId: 'order-1',
      company: 'Big Basket',
      otp: '4821',
      trackingId: 'AB12345678',
      status: 'pending',
      createdAt: '2026-01-01T00:00:00.000Z',
      updatedAt: '2026-01-01T00:00:00.000Z',
    });
    expect(ledger.has(id)).toBe(true);
    expect(ledger.list()).toHaveLength(1);
  });

  it('hands out copies', () => {
    const id = ledger.add('Zomato', '4821');
    const copy = ledger.get(id);
    if (copy) copy.status = 'completed';
    expect(ledger.get(id)?.status).toBe('pending');
  });

  it('walks pending -> approved -> completed', () => {
    const id = ledger.add('Zomato', '4821');
    expect(ledger.setStatus(id, 'approved')).toMatchObject({ ok: true, changed: true });
    expect(ledger.setStatus(id, 'completed')).toMatchObject({ ok: true, changed: true });
    expect(ledger.get(id)?.status).toBe('completed');
  });

  it('treats completed and denied as terminal', () => {
    const done = ledger.add('Zomato');
    ledger.setStatus(done, 'approved');
    ledger.setStatus(done, 'completed');
    expect(ledger.setStatus(done, 'pending')).toMatchObject({
      ok: false,
      reason: "Cannot move order from 'completed' to 'pending'",
    });

    const denied = ledger.add('Swiggy');
    ledger.setStatus(denied, 'denied');
    expect(ledger.setStatus(denied, 'approved').ok).toBe(false);
  });

  it('cannot skip approval', () => {
    const id = ledger.add('Amazon');
    expect(ledger.setStatus(id, 'completed').ok).toBe(false);
    expect(ledger.get(id)?.status).toBe('pending');
  });

  it('accepts the current status again without a change', () => {
    const id = ledger.add('Amazon');
    expect(ledger.setStatus(id, 'pending')).toMatchObject({ ok: true, changed: false });
  });

  it('reports unknown orders', () => {
    expect(ledger.setStatus('missing', 'approved')).toEqual({ ok: false, reason: 'Order missing not found' });
    expect(ledger.get('missing')).toBeUndefined();
  });

  it('lets only one of a racing approve and deny win', async () => {
    const id = ledger.add('Zomato', '4821');
    const [approve, deny] = await Promise.all([
      Promise.resolve().then(() => ledger.setStatus(id, 'approved')),
      Promise.resolve().then(() => ledger.setStatus(id, 'denied')),
    ]);

    expect(approve.ok).toBe(true);
    expect(deny.ok).toBe(false);
    expect(ledger.get(id)?.status).toBe('approved');
  });

  it('releases the OTP only while approved', () => {
    const id = ledger.add('Zomato', '4821');
    expect(ledger.releaseOtp(id)).toBeUndefined();
    ledger.setStatus(id, 'approved');
    expect(ledger.releaseOtp(id)).toBe('4821');
    ledger.setStatus(id, 'completed');
    expect(ledger.releaseOtp(id)).toBeUndefined();
  });
});
