import { SESSION_KEYS, type SessionStore } from '../clients/sessionStore.js';
import {
  COD_METHOD_ID,
  exceedsLimit,
  getPaymentMethod,
  listPaymentMethods,
} from '../config/paymentMethods.js';
import {
  buildOrder,
  computeOrderTotals,
  generateOrderId,
  isExpired,
  markPaid,
  normalizeOrders,
  sortNewestFirst,
} from '../models/order.js';
import {
  err,
  ok,
  type CheckoutError,
  type CheckoutInput,
  type CheckoutPreview,
  type CodEligibility,
  type Order,
  type OrderCollection,
  type PaymentLookupError,
  type Result,
} from '../models/types.js';
import { logger, type Logger } from '../lib/logger.js';
import type { CartService } from './cart.service.js';
import type { PricingService } from './pricing.service.js';

export interface OrderServiceOptions {
  /** how long a pending order can be paid */
  orderTtlMs: number;
  /** simulated payment processing time */
  paymentDelayMs: number;
  logger?: Logger;
}

const REQUIRED_FIELDS = ['address', 'name', 'phone', 'paymentMethod'] as const;

/**
 * Order ledger: turns the session cart into orders and moves them from
 * pending to paid. Orders live in the session under one key.
 */
export class OrderService {
  private readonly log: Logger;

  constructor(
    private readonly store: SessionStore,
    private readonly carts: CartService,
    private readonly pricing: PricingService,
    private readonly options: OrderServiceOptions
  ) {
    this.log = options.logger ?? logger;
  }

  /**
   * Validate checkout input and snapshot the priced cart into a pending order.
   * Nothing is stored unless every check passes.
   */
  async createOrder(sessionId: string, input: CheckoutInput): Promise<Result<Order, CheckoutError>> {
    const cart = await this.carts.getCart(sessionId);
    if (Object.keys(cart).length === 0) {
      return err({ kind: 'empty_cart' });
    }

    const missing = REQUIRED_FIELDS.filter((field) => !input[field].trim());
    if (missing.length > 0) {
      return err({ kind: 'missing_fields', fields: [...missing] });
    }

    const methodId = input.paymentMethod.trim();
    const method = getPaymentMethod(methodId);
    if (!method) {
      return err({ kind: 'unknown_payment_method', methodId });
    }

    // Products gone from the catalog drop out; the order may end up with no lines
    const priced = await this.pricing.priceCart(cart);
    const totals = computeOrderTotals(priced, method);
    if (method.maxAmount !== undefined && exceedsLimit(method, totals.withFeeDisplay)) {
      this.log.info('order rejected over payment method limit', {
        sessionId,
        method: method.id,
        total: totals.withFeeDisplay,
        limit: method.maxAmount,
      });
      return err({ kind: 'cod_limit_exceeded', total: totals.withFeeDisplay, limit: method.maxAmount });
    }

    const orders = await this.readOrders(sessionId);
    const now = new Date();
    const order = buildOrder({
      orderId: generateOrderId(now, new Set(Object.keys(orders))),
      cart: priced,
      customer: {
        name: input.name.trim(),
        phone: input.phone.trim(),
        email: (input.email ?? '').trim(),
        address: input.address.trim(),
      },
      method,
      now,
      ttlMs: this.options.orderTtlMs,
    });

    await this.store.set(sessionId, SESSION_KEYS.orders, { ...orders, [order.orderId]: order });
    this.log.info('order created', {
      sessionId,
      orderId: order.orderId,
      total: order.totals.withFeeDisplay,
      method: method.id,
    });

    return ok(order);
  }

  async getOrder(sessionId: string, orderId: string): Promise<Order | null> {
    const orders = await this.readOrders(sessionId);
    return Object.hasOwn(orders, orderId) ? orders[orderId] : null;
  }

  /**
   * Look up an order that is about to be paid. A pending order past its
   * expiry is reported as expired; it stays in the ledger.
   */
  async getOrderForPayment(
    sessionId: string,
    orderId: string
  ): Promise<Result<Order, PaymentLookupError>> {
    const order = await this.getOrder(sessionId, orderId);
    if (!order) {
      return err({ kind: 'not_found', orderId });
    }

    if (isExpired(order, new Date())) {
      return err({ kind: 'expired', orderId, expiresAt: order.expiresAt });
    }

    return ok(order);
  }

  /**
   * Simulate payment, mark the order paid and empty the live cart.
   * Expiry is not checked here; callers go through getOrderForPayment first.
   */
  async completePayment(
    sessionId: string,
    orderId: string
  ): Promise<Result<Order, { kind: 'not_found'; orderId: string }>> {
    if (!(await this.getOrder(sessionId, orderId))) {
      return err({ kind: 'not_found', orderId });
    }

    if (this.options.paymentDelayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.options.paymentDelayMs));
    }

    // Re-read so the write is based on the current collection
    const orders = await this.readOrders(sessionId);
    const current = Object.hasOwn(orders, orderId) ? orders[orderId] : null;
    if (!current) {
      return err({ kind: 'not_found', orderId });
    }

    const paid = markPaid(current, new Date());
    await this.store.set(sessionId, SESSION_KEYS.orders, { ...orders, [orderId]: paid });
    await this.carts.clear(sessionId);

    this.log.info('payment completed', {
      sessionId,
      orderId,
      transactionId: paid.transactionId,
    });
    return ok(paid);
  }

  /**
   * All session orders, newest first
   */
  async listOrders(sessionId: string): Promise<Order[]> {
    return sortNewestFirst(Object.values(await this.readOrders(sessionId)));
  }

  /**
   * Priced cart plus what each payment method would cost
   */
  async previewCheckout(sessionId: string): Promise<CheckoutPreview> {
    const cart = await this.pricing.priceCart(await this.carts.getCart(sessionId));

    return {
      cart,
      paymentMethods: listPaymentMethods().map((method) => {
        const totalWithFeeDisplay = computeOrderTotals(cart, method).withFeeDisplay;
        return {
          method,
          totalWithFeeDisplay,
          available: !exceedsLimit(method, totalWithFeeDisplay),
        };
      }),
    };
  }

  /**
   * Whether the current cart could be paid cash on delivery
   */
  async codEligibility(sessionId: string): Promise<CodEligibility> {
    const method = getPaymentMethod(COD_METHOD_ID);
    if (!method) {
      return { available: false, total: 0, limit: 0, message: 'COD is not offered' };
    }

    const limit = method.maxAmount ?? 0;
    const cart = await this.carts.getCart(sessionId);
    if (Object.keys(cart).length === 0) {
      return { available: false, total: 0, limit, message: 'Cart is empty' };
    }

    const priced = await this.pricing.priceCart(cart);
    const total = computeOrderTotals(priced, method).withFeeDisplay;
    const available = !exceedsLimit(method, total);

    return {
      available,
      total,
      limit,
      message: available ? 'COD available' : `COD maximum is Rp ${limit.toLocaleString('en-US')}`,
    };
  }

  private async readOrders(sessionId: string): Promise<OrderCollection> {
    const { orders, dropped } = normalizeOrders(
      await this.store.get(sessionId, SESSION_KEYS.orders)
    );
    if (dropped.length > 0) {
      this.log.warn('dropped malformed session orders', { sessionId, dropped });
    }
    return orders;
  }
}
