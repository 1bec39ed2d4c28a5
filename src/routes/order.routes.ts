import { Hono } from 'hono';
import type { CartService } from '../services/cart.service.js';
import type { OrderService } from '../services/order.service.js';
import { getPaymentMethod } from '../config/paymentMethods.js';
import { NotFoundError, paymentLookupErrorToStoreError } from '../lib/errors.js';
import { jsonError } from '../lib/http.js';
import type { AppEnv } from '../types/hono.js';

/**
 * Order status, history and payment routes
 */
export function createOrderRoutes(orders: OrderService, carts: CartService): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  /**
   * GET /orders - Payment history, newest first
   */
  app.get('/', async (c) => {
    try {
      const [list, cartCount] = await Promise.all([
        orders.listOrders(c.var.sessionId),
        carts.totalItemCount(c.var.sessionId),
      ]);
      return c.json({ orders: list, cartCount });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  /**
   * GET /orders/:id - Order status
   */
  app.get('/:id', async (c) => {
    try {
      const order = await orders.getOrder(c.var.sessionId, c.req.param('id'));
      if (!order) {
        throw new NotFoundError('Order not found');
      }

      const cartCount = await carts.totalItemCount(c.var.sessionId);
      return c.json({ order, paymentMethod: getPaymentMethod(order.paymentMethod), cartCount });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  /**
   * GET /orders/:id/payment - Payment page; expired orders send the visitor back to checkout
   */
  app.get('/:id/payment', async (c) => {
    try {
      const result = await orders.getOrderForPayment(c.var.sessionId, c.req.param('id'));
      if (!result.ok) {
        throw paymentLookupErrorToStoreError(result.error);
      }

      const order = result.value;
      const cartCount = await carts.totalItemCount(c.var.sessionId);
      return c.json({ order, paymentMethod: getPaymentMethod(order.paymentMethod), cartCount });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  /**
   * POST /orders/:id/payment - Complete the (simulated) payment
   */
  app.post('/:id/payment', async (c) => {
    try {
      const orderId = c.req.param('id');
      const lookup = await orders.getOrderForPayment(c.var.sessionId, orderId);
      if (!lookup.ok) {
        throw paymentLookupErrorToStoreError(lookup.error);
      }

      const result = await orders.completePayment(c.var.sessionId, orderId);
      if (!result.ok) {
        throw paymentLookupErrorToStoreError(result.error);
      }

      return c.json({
        success: true,
        message: 'Payment completed successfully!',
        orderId,
        transactionId: result.value.transactionId,
        order: result.value,
      });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  return app;
}
