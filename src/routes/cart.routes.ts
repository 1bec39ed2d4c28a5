import { Hono } from 'hono';
import type { CartService } from '../services/cart.service.js';
import type { PricingService } from '../services/pricing.service.js';
import { countItems } from '../models/cart.js';
import { jsonError, readJson } from '../lib/http.js';
import { errorMeta } from '../lib/logger.js';
import {
  validateAddItemRequest,
  validateCartUpdateRequest,
  validateProductId,
  validateQuantityRequest,
} from '../lib/validation.js';
import type { AppEnv } from '../types/hono.js';

/**
 * Create cart routes
 */
export function createCartRoutes(carts: CartService, pricing: PricingService): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  /**
   * GET /cart - Priced cart
   */
  app.get('/', async (c) => {
    try {
      const mapping = await carts.getCart(c.var.sessionId);
      const cart = await pricing.priceCart(mapping);
      return c.json({ cart, cartCount: countItems(mapping) });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  /**
   * GET /cart/count - Header badge count
   */
  app.get('/count', async (c) => {
    try {
      const count = await carts.totalItemCount(c.var.sessionId);
      return c.json({ success: true, count });
    } catch (error) {
      c.var.log.warn('cart count failed', errorMeta(error));
      return c.json({ success: false, count: 0 });
    }
  });

  /**
   * POST /cart/items - Add a product
   */
  app.post('/items', async (c) => {
    try {
      const { productId, quantity } = validateAddItemRequest(await readJson(c));
      const items = await carts.addItem(c.var.sessionId, productId, quantity);
      return c.json({
        items,
        cartCount: countItems(items),
        message: 'Product added to cart successfully!',
      });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  /**
   * PATCH /cart - Bulk quantity update and optional removal
   */
  app.patch('/', async (c) => {
    try {
      const update = validateCartUpdateRequest(await readJson(c));
      const items = await carts.updateItems(c.var.sessionId, update);
      return c.json({ items, cartCount: countItems(items), message: 'Cart updated successfully' });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  /**
   * PATCH /cart/items/:productId - Set one quantity (<= 0 removes)
   */
  app.patch('/items/:productId', async (c) => {
    try {
      const productId = validateProductId(c.req.param('productId'));
      const { quantity } = validateQuantityRequest(await readJson(c));
      const items = await carts.setQuantity(c.var.sessionId, productId, quantity);
      return c.json({ items, cartCount: countItems(items), message: 'Cart updated successfully' });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  /**
   * DELETE /cart/items/:productId - Remove a product
   */
  app.delete('/items/:productId', async (c) => {
    try {
      const productId = validateProductId(c.req.param('productId'));
      const items = await carts.removeItem(c.var.sessionId, productId);
      return c.json({ items, cartCount: countItems(items), message: 'Item removed from cart' });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  /**
   * DELETE /cart - Empty the cart
   */
  app.delete('/', async (c) => {
    try {
      await carts.clear(c.var.sessionId);
      return c.json({ items: {}, cartCount: 0, message: 'Cart cleared successfully' });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  return app;
}
