/**
 * Runtime configuration, read once at startup
 */
export interface AppConfig {
  port: number;
  catalogBaseUrl: string;
  catalogTimeoutMs: number;
  orderTtlMs: number;
  paymentDelayMs: number;
  sessionTtlMs: number;
  sessionCookieSecure: boolean;
  sweepIntervalMs: number;
  sweepScanLimit: number;
  sweepBudgetMs: number;
}

function intOr(raw: string | undefined, fallback: number): number {
  const value = parseInt(raw || '', 10);
  return Number.isFinite(value) && value >= 0 ? value : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const secureRaw = (env.SESSION_COOKIE_SECURE || '').trim().toLowerCase();

  return {
    port: intOr(env.PORT, 3000),
    catalogBaseUrl: (env.CATALOG_BASE_URL || 'https://fakestoreapi.com').replace(/\/+$/, ''),
    catalogTimeoutMs: intOr(env.CATALOG_TIMEOUT_MS, 10_000),
    orderTtlMs: intOr(env.ORDER_TTL_MS, 3_600_000), // 1 hour
    paymentDelayMs: intOr(env.PAYMENT_DELAY_MS, 2_000),
    sessionTtlMs: intOr(env.SESSION_TTL_MS, 86_400_000), // 24 hours
    sessionCookieSecure:
      secureRaw === '' ? env.NODE_ENV === 'production' : secureRaw === 'true' || secureRaw === '1',
    sweepIntervalMs: intOr(env.SWEEP_INTERVAL_MS, 60_000),
    sweepScanLimit: intOr(env.SWEEP_SCAN_LIMIT, 100),
    sweepBudgetMs: intOr(env.SWEEP_BUDGET_MS, 50),
  };
}
