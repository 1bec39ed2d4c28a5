import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MemorySessionStore } from '../src/clients/memorySessionStore.js';
import { SESSION_KEYS } from '../src/clients/sessionStore.js';
import { CartService } from '../src/services/cart.service.js';
import { OrderService } from '../src/services/order.service.js';
import { PricingService } from '../src/services/pricing.service.js';
import type { CheckoutInput, Order } from '../src/models/types.js';
import { SESSION, StubCatalog, product } from './helpers.js';

const HOUR = 3_600_000;
const START = new Date('2026-03-14T09:00:00.000Z');

const input: CheckoutInput = {
  name: 'Test Buyer',
  phone: '081200000000',
  email: 'buyer@example.test',
  address: 'Jl. Test 1, Jakarta',
  paymentMethod: 'qris',
};

describe('OrderService', () => {
  let store: MemorySessionStore;
  let catalog: StubCatalog;
  let carts: CartService;
  let service: OrderService;

  async function placeOrder(overrides: Partial<CheckoutInput> = {}): Promise<Order> {
    const result = await service.createOrder(SESSION, { ...input, ...overrides });
    if (!result.ok) {
      throw new Error(`checkout failed: ${result.error.kind}`);
    }
    return result.value;
  }

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(START);
    store = new MemorySessionStore(86_400_000);
    catalog = new StubCatalog([product(1, 10), product(2, 300), product(3, 322)]);
    carts = new CartService(store);
    service = new OrderService(store, carts, new PricingService(catalog), {
      orderTtlMs: HOUR,
      paymentDelayMs: 0,
    });
  });

  afterEach(() => {
    store.clear();
    vi.useRealTimers();
  });

  describe('createOrder', () => {
    it('creates a pending order from the priced cart', async () => {
      await carts.addItem(SESSION, '1', 2);
      const order = await placeOrder();

      expect(order.orderId).toMatch(/^ORD-20260314-[0-9A-F]{8}$/);
      expect(order.status).toBe('pending');
      expect(order.createdAt).toBe('2026-03-14T09:00:00.000Z');
      expect(order.expiresAt).toBe('2026-03-14T10:00:00.000Z');
      expect(order.totals).toEqual({ base: 20, display: 310_000, withFeeBase: 20, withFeeDisplay: 310_000 });
      expect(order.customer).toEqual({
        name: 'Test Buyer',
        phone: '081200000000',
        email: 'buyer@example.test',
        address: 'Jl. Test 1, Jakarta',
      });
      expect(await service.getOrder(SESSION, order.orderId)).toEqual(order);
    });

    it('leaves the cart in place until payment', async () => {
      await carts.addItem(SESSION, '1', 2);
      await placeOrder();

      expect(await carts.getCart(SESSION)).toEqual({ '1': 2 });
    });

    it('trims customer fields', async () => {
      await carts.addItem(SESSION, '1', 1);
      const order = await placeOrder({ name: '  Test Buyer  ', email: undefined });

      expect(order.customer.name).toBe('Test Buyer');
      expect(order.customer.email).toBe('');
    });

    it('rejects an empty cart', async () => {
      const result = await service.createOrder(SESSION, input);

      expect(result).toEqual({ ok: false, error: { kind: 'empty_cart' } });
      expect(await store.get(SESSION, SESSION_KEYS.orders)).toBeUndefined();
    });

    it('lists blank required fields', async () => {
      await carts.addItem(SESSION, '1', 1);
      const result = await service.createOrder(SESSION, { ...input, name: '', phone: '   ' });

      expect(result).toEqual({ ok: false, error: { kind: 'missing_fields', fields: ['name', 'phone'] } });
      expect(await store.get(SESSION, SESSION_KEYS.orders)).toBeUndefined();
    });

    it('rejects an unknown payment method', async () => {
      await carts.addItem(SESSION, '1', 1);
      const result = await service.createOrder(SESSION, { ...input, paymentMethod: 'barter' });

      expect(result).toEqual({
        ok: false,
        error: { kind: 'unknown_payment_method', methodId: 'barter' },
      });
    });

    it('creates an order with no lines when every product left the catalog', async () => {
      await carts.addItem(SESSION, '99', 1);
      const order = await placeOrder({ paymentMethod: 'cod' });

      expect(order.status).toBe('pending');
      expect(order.items).toEqual([]);
      expect(order.totals).toEqual({ base: 0, display: 0, withFeeBase: 0.97, withFeeDisplay: 15_000 });
    });

    it('adds the cash on delivery fee', async () => {
      await carts.addItem(SESSION, '2', 1);
      const order = await placeOrder({ paymentMethod: 'cod' });

      expect(order.paymentFee).toBe(15_000);
      expect(order.totals.withFeeDisplay).toBe(4_665_000);
    });

    it('rejects cash on delivery when the total with fee exceeds the limit', async () => {
      // 322 * 15500 = 4,991,000 before the fee
      await carts.addItem(SESSION, '3', 1);
      const result = await service.createOrder(SESSION, { ...input, paymentMethod: 'cod' });

      expect(result).toEqual({
        ok: false,
        error: { kind: 'cod_limit_exceeded', total: 5_006_000, limit: 5_000_000 },
      });
      expect(await service.listOrders(SESSION)).toEqual([]);
    });

    it('has no limit for other methods', async () => {
      await carts.addItem(SESSION, '3', 10);
      const order = await placeOrder({ paymentMethod: 'bank_transfer' });

      expect(order.totals.withFeeDisplay).toBe(49_910_000);
    });
  });

  describe('getOrderForPayment', () => {
    it('returns a pending order before expiry', async () => {
      await carts.addItem(SESSION, '1', 1);
      const order = await placeOrder();
      vi.setSystemTime(new Date(START.getTime() + HOUR));

      const result = await service.getOrderForPayment(SESSION, order.orderId);
      expect(result.ok).toBe(true);
    });

    it('reports an expired order and keeps it in the ledger', async () => {
      await carts.addItem(SESSION, '1', 1);
      const order = await placeOrder();
      vi.setSystemTime(new Date(START.getTime() + 2 * HOUR));

      expect(await service.getOrderForPayment(SESSION, order.orderId)).toEqual({
        ok: false,
        error: { kind: 'expired', orderId: order.orderId, expiresAt: '2026-03-14T10:00:00.000Z' },
      });
      expect((await service.getOrder(SESSION, order.orderId))?.status).toBe('pending');
    });

    it('reports unknown orders', async () => {
      expect(await service.getOrderForPayment(SESSION, 'ORD-20260314-FFFFFFFF')).toEqual({
        ok: false,
        error: { kind: 'not_found', orderId: 'ORD-20260314-FFFFFFFF' },
      });
    });

    it('does not resolve inherited property names', async () => {
      expect(await service.getOrder(SESSION, '__proto__')).toBeNull();
      expect(await service.getOrder(SESSION, 'constructor')).toBeNull();
    });
  });

  describe('completePayment', () => {
    it('marks the order paid and clears the cart', async () => {
      await carts.addItem(SESSION, '1', 2);
      const order = await placeOrder();
      vi.setSystemTime(new Date('2026-03-14T09:10:00.000Z'));

      const result = await service.completePayment(SESSION, order.orderId);
      if (!result.ok) throw new Error('payment failed');

      expect(result.value.status).toBe('paid');
      expect(result.value.paidAt).toBe('2026-03-14T09:10:00.000Z');
      expect(result.value.transactionId).toMatch(/^TXN-[0-9A-F]{12}$/);
      expect(await carts.getCart(SESSION)).toEqual({});
      expect((await service.getOrder(SESSION, order.orderId))?.status).toBe('paid');
    });

    it('waits for the processing delay before marking paid', async () => {
      const delayed = new OrderService(store, carts, new PricingService(catalog), {
        orderTtlMs: HOUR,
        paymentDelayMs: 2_000,
      });
      await carts.addItem(SESSION, '1', 2);
      const order = await placeOrder();

      const payment = delayed.completePayment(SESSION, order.orderId);

      await vi.advanceTimersByTimeAsync(1_999);
      expect((await service.getOrder(SESSION, order.orderId))?.status).toBe('pending');
      expect(await carts.getCart(SESSION)).toEqual({ '1': 2 });

      await vi.advanceTimersByTimeAsync(1);
      const result = await payment;
      if (!result.ok) throw new Error('payment failed');

      expect(result.value.paidAt).toBe('2026-03-14T09:00:02.000Z');
      expect((await service.getOrder(SESSION, order.orderId))?.status).toBe('paid');
      expect(await carts.getCart(SESSION)).toEqual({});
    });

    it('succeeds again for an already paid order', async () => {
      await carts.addItem(SESSION, '1', 1);
      const order = await placeOrder();

      await service.completePayment(SESSION, order.orderId);
      const again = await service.completePayment(SESSION, order.orderId);

      expect(again.ok).toBe(true);
      expect(await service.listOrders(SESSION)).toHaveLength(1);
    });

    it('reports unknown orders without touching the cart', async () => {
      await carts.addItem(SESSION, '1', 1);

      expect(await service.completePayment(SESSION, 'ORD-20260314-FFFFFFFF')).toEqual({
        ok: false,
        error: { kind: 'not_found', orderId: 'ORD-20260314-FFFFFFFF' },
      });
      expect(await carts.getCart(SESSION)).toEqual({ '1': 1 });
    });
  });

  describe('listOrders', () => {
    it('returns orders newest first', async () => {
      await carts.addItem(SESSION, '1', 1);
      const first = await placeOrder();
      vi.setSystemTime(new Date(START.getTime() + 60_000));
      const second = await placeOrder();

      const listed = await service.listOrders(SESSION);
      expect(listed.map((o) => o.orderId)).toEqual([second.orderId, first.orderId]);
    });

    it('skips corrupted entries', async () => {
      await carts.addItem(SESSION, '1', 1);
      const order = await placeOrder();
      const stored = await store.get(SESSION, SESSION_KEYS.orders);
      await store.set(SESSION, SESSION_KEYS.orders, {
        ...(typeof stored === 'object' && stored !== null ? stored : {}),
        'ORD-BROKEN': 'garbage',
      });

      expect((await service.listOrders(SESSION)).map((o) => o.orderId)).toEqual([order.orderId]);
    });
  });

  describe('previewCheckout', () => {
    it('prices every payment method', async () => {
      await carts.addItem(SESSION, '1', 2);
      const preview = await service.previewCheckout(SESSION);

      expect(preview.cart.totalDisplay).toBe(310_000);
      const options = Object.fromEntries(
        preview.paymentMethods.map((option) => [option.method.id, option])
      );
      expect(options.qris.totalWithFeeDisplay).toBe(310_000);
      expect(options.cod.totalWithFeeDisplay).toBe(325_000);
      expect(options.cod.available).toBe(true);
    });

    it('marks cash on delivery unavailable over the limit', async () => {
      await carts.addItem(SESSION, '3', 1);
      const preview = await service.previewCheckout(SESSION);

      const cod = preview.paymentMethods.find((option) => option.method.id === 'cod');
      expect(cod?.available).toBe(false);
    });
  });

  describe('codEligibility', () => {
    it('reports an empty cart', async () => {
      expect(await service.codEligibility(SESSION)).toEqual({
        available: false,
        total: 0,
        limit: 5_000_000,
        message: 'Cart is empty',
      });
    });

    it('allows carts within the limit', async () => {
      await carts.addItem(SESSION, '2', 1);
      expect(await service.codEligibility(SESSION)).toEqual({
        available: true,
        total: 4_665_000,
        limit: 5_000_000,
        message: 'COD available',
      });
    });

    it('refuses carts over the limit once the fee is added', async () => {
      await carts.addItem(SESSION, '3', 1);
      expect(await service.codEligibility(SESSION)).toEqual({
        available: false,
        total: 5_006_000,
        limit: 5_000_000,
        message: 'COD maximum is Rp 5,000,000',
      });
    });
  });
});
