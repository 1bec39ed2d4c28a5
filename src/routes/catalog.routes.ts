import { Hono } from 'hono';
import type { CartService } from '../services/cart.service.js';
import type { CatalogService } from '../services/catalog.service.js';
import { NotFoundError } from '../lib/errors.js';
import { jsonError } from '../lib/http.js';
import { parseListingQuery, validateProductId } from '../lib/validation.js';
import type { AppEnv } from '../types/hono.js';

/**
 * Product listing, category and detail routes
 */
export function createCatalogRoutes(catalog: CatalogService, carts: CartService): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  /**
   * GET /products?search=&category=&sort=
   */
  app.get('/products', async (c) => {
    try {
      const query = parseListingQuery({
        search: c.req.query('search'),
        category: c.req.query('category'),
        sort: c.req.query('sort'),
      });

      const [products, categories, cartCount] = await Promise.all([
        catalog.listProducts(query),
        catalog.listCategories(),
        carts.totalItemCount(c.var.sessionId),
      ]);

      return c.json({ products, categories, filters: query, cartCount });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  /**
   * GET /products/:id
   */
  app.get('/products/:id', async (c) => {
    try {
      const id = validateProductId(c.req.param('id'));
      const product = await catalog.getProductDetail(id);
      if (!product) {
        throw new NotFoundError('Product not found');
      }

      const cartCount = await carts.totalItemCount(c.var.sessionId);
      return c.json({ product, cartCount });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  /**
   * GET /categories
   */
  app.get('/categories', async (c) => {
    try {
      return c.json({ categories: await catalog.listCategories() });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  /**
   * GET /categories/:name/products
   */
  app.get('/categories/:name/products', async (c) => {
    try {
      const name = c.req.param('name');
      const [products, categories, cartCount] = await Promise.all([
        catalog.listCategoryProducts(name),
        catalog.listCategories(),
        carts.totalItemCount(c.var.sessionId),
      ]);

      return c.json({ category: name, products, categories, cartCount });
    } catch (error) {
      return jsonError(c, error);
    }
  });

  return app;
}
