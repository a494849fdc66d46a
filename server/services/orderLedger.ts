/**
 * Order Ledger - in-memory registry of delivery orders and their
 * verification status.
 *
 * One instance is created at start-up and handed to everything that needs
 * it. Every mutation is a synchronous read-check-write on the owned map, so
 * two requests racing on the same order are serialized by the event loop:
 * the second one sees the first one's result.
 */

import crypto from 'crypto';
import dayjs from 'dayjs';
import type { Order, OrderStatus } from '@shared/schema';
import { titleCase } from '../utils/text';

const TRANSITIONS: Record<OrderStatus, readonly OrderStatus[]> = {
  pending: ['approved', 'denied'],
  approved: ['completed'],
  completed: [],
  denied: [],
};

export type TransitionResult =
  | { ok: true; order: Order; changed: boolean }
  | { ok: false; reason: string; order?: Order };

export interface OrderLedgerOptions {
  generateId?: () => string;
  now?: () => string;
}

export class OrderLedger {
  private readonly orders = new Map<string, Order>();
  private readonly generateId: () => string;
  private readonly now: () => string;

  constructor(options: OrderLedgerOptions = {}) {
    this.generateId = options.generateId ?? (() => crypto.randomUUID());
    this.now = options.now ?? (() => dayjs().toISOString());
  }

  add(company: string, otp?: string, trackingId?: string): string {
    const orderId = this.generateId();
    const timestamp = this.now();

    const order: Order = {
      orderId,
      company: titleCase(company),
      otp: otp?.trim() || undefined,
      trackingId: trackingId ? trackingId.replace(/\s+/g, '').toUpperCase() || undefined : undefined,
      status: 'pending',
      createdAt: timestamp,
      updatedAt: timestamp,
    };

    this.orders.set(orderId, order);
    console.log(`[Ledger] Added order ${orderId} for ${order.company}`);
    return orderId;
  }

  get(orderId: string): Order | undefined {
    const order = this.orders.get(orderId);
    return order ? { ...order } : undefined;
  }

  list(): Order[] {
    return Array.from(this.orders.values(), order => ({ ...order }));
  }

  has(orderId: string): boolean {
    return this.orders.has(orderId);
  }

  /**
   * pending -> approved -> completed, or pending -> denied.
   * Asking for the current status again succeeds without changing anything.
   */
  setStatus(orderId: string, status: OrderStatus): TransitionResult {
    const current = this.orders.get(orderId);
    if (!current) {
      return { ok: false, reason: `Order ${orderId} not found` };
    }

    if (current.status === status) {
      return { ok: true, order: { ...current }, changed: false };
    }

    if (!TRANSITIONS[current.status].includes(status)) {
      console.warn(`[Ledger] Rejected ${current.status} -> ${status} for ${orderId}`);
      return {
        ok: false,
        reason: `Cannot move order from '${current.status}' to '${status}'`,
        order: { ...current },
      };
    }

    const next: Order = { ...current, status, updatedAt: this.now() };
    this.orders.set(orderId, next);
    console.log(`[Ledger] ${orderId}: ${current.status} -> ${status}`);
    return { ok: true, order: { ...next }, changed: true };
  }

  /**
   * The stored OTP, only while the order is approved.
   */
  releaseOtp(orderId: string): string | undefined {
    const order = this.orders.get(orderId);
    if (!order || order.status !== 'approved') return undefined;
    return order.otp;
  }
}
