import { Hono } from 'hono';
import type { CatalogGateway } from './clients/catalogClient.js';
import type { SessionStore } from './clients/sessionStore.js';
import { jsonError } from './lib/http.js';
import { requestContext } from './middleware/requestContext.js';
import { sessionCookie } from './middleware/session.js';
import { createCartRoutes } from './routes/cart.routes.js';
import { createCatalogRoutes } from './routes/catalog.routes.js';
import { createCheckoutRoutes } from './routes/checkout.routes.js';
import { createOrderRoutes } from './routes/order.routes.js';
import { CartService } from './services/cart.service.js';
import { CatalogService } from './services/catalog.service.js';
import { OrderService } from './services/order.service.js';
import { PricingService } from './services/pricing.service.js';
import type { AppEnv } from './types/hono.js';

export interface AppDeps {
  store: SessionStore;
  catalog: CatalogGateway;
  orderTtlMs: number;
  paymentDelayMs: number;
  sessionCookieSecure: boolean;
  sessionTtlMs: number;
}

export interface Services {
  carts: CartService;
  pricing: PricingService;
  catalog: CatalogService;
  orders: OrderService;
}

export function createServices(deps: AppDeps): Services {
  const carts = new CartService(deps.store);
  const pricing = new PricingService(deps.catalog);

  return {
    carts,
    pricing,
    catalog: new CatalogService(deps.catalog),
    orders: new OrderService(deps.store, carts, pricing, {
      orderTtlMs: deps.orderTtlMs,
      paymentDelayMs: deps.paymentDelayMs,
    }),
  };
}

/**
 * Build the Hono app with every route mounted
 */
export function createApp(deps: AppDeps): Hono<AppEnv> {
  const services = createServices(deps);
  const app = new Hono<AppEnv>();

  app.use('*', requestContext);
  app.use(
    '*',
    sessionCookie({
      secure: deps.sessionCookieSecure,
      maxAgeSeconds: Math.floor(deps.sessionTtlMs / 1000),
    })
  );

  // Health check
  app.get('/health', (c) => {
    return c.json({ status: 'ok' });
  });

  app.route('/', createCatalogRoutes(services.catalog, services.carts));
  app.route('/cart', createCartRoutes(services.carts, services.pricing));
  app.route('/checkout', createCheckoutRoutes(services.orders));
  app.route('/orders', createOrderRoutes(services.orders, services.carts));

  // 404 handler
  app.notFound((c) => {
    return c.json(
      {
        error: {
          code: 'NOT_FOUND',
          message: 'Route not found',
        },
        redirectTo: '/',
      },
      404
    );
  });

  // Last-resort boundary for anything thrown outside a route's try/catch
  app.onError((error, c) => jsonError(c, error));

  return app;
}
