declare namespace NodeJS {
  interface ProcessEnv {
    NODE_ENV?: string;
    PORT?: string;
    LOG_LEVEL?: string;
    CATALOG_BASE_URL?: string;
    CATALOG_TIMEOUT_MS?: string;
    EXCHANGE_RATE?: string;
    ORDER_TTL_MS?: string;
    PAYMENT_DELAY_MS?: string;
    SESSION_TTL_MS?: string;
    SESSION_COOKIE_SECURE?: string;
    SWEEP_INTERVAL_MS?: string;
    SWEEP_SCAN_LIMIT?: string;
    SWEEP_BUDGET_MS?: string;
  }
}
