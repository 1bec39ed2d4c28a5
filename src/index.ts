import { serve } from '@hono/node-server';
import { createApp } from './app.js';
import { CatalogClient } from './clients/catalogClient.js';
import { MemorySessionStore } from './clients/memorySessionStore.js';
import { EXCHANGE_RATE } from './config/currency.js';
import { loadConfig } from './config/settings.js';
import { logger } from './lib/logger.js';

const config = loadConfig();

// Initialize components
const store = new MemorySessionStore(
  config.sessionTtlMs,
  config.sweepIntervalMs,
  config.sweepScanLimit,
  config.sweepBudgetMs
);

const catalog = new CatalogClient({
  baseUrl: config.catalogBaseUrl,
  timeoutMs: config.catalogTimeoutMs,
});

// Start bounded sweeper
store.startSweeper();

const app = createApp({
  store,
  catalog,
  orderTtlMs: config.orderTtlMs,
  paymentDelayMs: config.paymentDelayMs,
  sessionCookieSecure: config.sessionCookieSecure,
  sessionTtlMs: config.sessionTtlMs,
});

serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info('server running', {
    url: `http://localhost:${info.port}`,
    catalog: config.catalogBaseUrl,
    exchangeRate: EXCHANGE_RATE,
    orderTtlMs: config.orderTtlMs,
    sessionTtlMs: config.sessionTtlMs,
  });
});
