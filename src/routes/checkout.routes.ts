import { Hono } from 'hono';
import type { OrderService } from '../services/order.service.js';
import { COD_METHOD_ID } from '../config/paymentMethods.js';
import { ValidationError, checkoutErrorToStoreError } from '../lib/errors.js';
import { jsonError, readJson } from '../lib/http.js';
import { validateCheckoutRequest } from '../lib/validation.js';
import type { AppEnv } from '../types/hono.js';

/**
 * Checkout form and order creation routes
 */
export function createCheckoutRoutes(orders: OrderService): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  /**
   * GET /checkout - Priced cart with per-method totals
   */
  app.get('/', async (c) => {
    try {
      const preview = await orders.previewCheckout(c.var.sessionId);
      if (preview.cart.itemCount === 0) {
        throw new ValidationError('Your cart is empty', '/cart', 'EMPTY_CART');
      }

      const cod = preview.paymentMethods.find((option) => option.method.id === COD_METHOD_ID);
      return c.json({
        ...preview,
        codAvailable: cod?.available ?? false,
        codLimit: cod?.method.maxAmount ?? null,
        cartCount: preview.cart.itemCount,
      });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  /**
   * POST /checkout - Create a pending order
   */
  app.post('/', async (c) => {
    try {
      const input = validateCheckoutRequest(await readJson(c));
      const result = await orders.createOrder(c.var.sessionId, input);
      if (!result.ok) {
        throw checkoutErrorToStoreError(result.error);
      }

      const order = result.value;
      return c.json({ order, redirectTo: `/orders/${order.orderId}/payment` }, 201);
    } catch (error) {
      return jsonError(c, error);
    }
  });

  /**
   * GET /checkout/cod-eligibility
   */
  app.get('/cod-eligibility', async (c) => {
    try {
      return c.json(await orders.codEligibility(c.var.sessionId));
    } catch (error) {
      return jsonError(c, error);
    }
  });

  return app;
}
