import { randomUUID } from 'node:crypto';
import { roundBase, toBaseCurrency } from '../config/currency.js';
import { OrderSchema } from './schemas.js';
import type {
  CustomerInfo,
  Order,
  OrderCollection,
  OrderTotals,
  PaymentMethod,
  PricedCart,
} from './types.js';

function randomHex(length: number): string {
  return randomUUID().replace(/-/g, '').slice(0, length).toUpperCase();
}

/**
 * ORD-YYYYMMDD-XXXXXXXX, regenerated until it does not clash with `taken`
 */
export function generateOrderId(now: Date, taken: ReadonlySet<string> = new Set()): string {
  const date = now.toISOString().slice(0, 10).replace(/-/g, '');
  let id: string;
  do {
    id = `ORD-${date}-${randomHex(8)}`;
  } while (taken.has(id));
  return id;
}

export function generateTransactionId(): string {
  return `TXN-${randomHex(12)}`;
}

/**
 * Totals for a priced cart paid with `method`. The fee is a display-currency amount.
 */
export function computeOrderTotals(cart: PricedCart, method: PaymentMethod): OrderTotals {
  const display = cart.totalDisplay;
  return {
    base: cart.totalBase,
    display,
    withFeeBase: roundBase(cart.totalBase + toBaseCurrency(method.fee)),
    withFeeDisplay: display + method.fee,
  };
}

export interface BuildOrderParams {
  orderId: string;
  cart: PricedCart;
  customer: CustomerInfo;
  method: PaymentMethod;
  now: Date;
  ttlMs: number;
}

/**
 * Snapshot a priced cart into a pending order
 */
export function buildOrder({ orderId, cart, customer, method, now, ttlMs }: BuildOrderParams): Order {
  return {
    orderId,
    createdAt: now.toISOString(),
    expiresAt: new Date(now.getTime() + ttlMs).toISOString(),
    items: cart.items.map((item) => ({ ...item })),
    customer: { ...customer },
    paymentMethod: method.id,
    paymentFee: method.fee,
    totals: computeOrderTotals(cart, method),
    status: 'pending',
  };
}

/**
 * Flip an order to paid. Applying it twice overwrites paidAt and transactionId.
 */
export function markPaid(order: Order, now: Date): Order {
  return {
    ...order,
    status: 'paid',
    paidAt: now.toISOString(),
    transactionId: generateTransactionId(),
  };
}

/**
 * A pending order past its expiry can no longer be paid
 */
export function isExpired(order: Order, now: Date): boolean {
  return order.status === 'pending' && now.getTime() > Date.parse(order.expiresAt);
}

/**
 * Newest first; Array.prototype.sort is stable so ties keep insertion order
 */
export function sortNewestFirst(orders: Order[]): Order[] {
  return [...orders].sort((a, b) => Date.parse(b.createdAt) - Date.parse(a.createdAt));
}

/**
 * Read the stored order collection, dropping entries that do not parse
 */
export function normalizeOrders(value: unknown): { orders: OrderCollection; dropped: string[] } {
  const orders: OrderCollection = {};
  const dropped: string[] = [];

  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return { orders, dropped };
  }

  for (const [orderId, raw] of Object.entries(value)) {
    const parsed = OrderSchema.safeParse(raw);
    if (parsed.success && parsed.data.orderId === orderId) {
      orders[orderId] = parsed.data;
    } else {
      dropped.push(orderId);
    }
  }

  return { orders, dropped };
}
