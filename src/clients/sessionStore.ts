/**
 * Per-visitor key/value persistence. Each call reads or writes one value as a
 * unit; there is no locking across calls (last write wins).
 */
export interface SessionStore {
  get(sessionId: string, key: string): Promise<unknown>;
  set(sessionId: string, key: string, value: unknown): Promise<void>;
  delete(sessionId: string, key: string): Promise<void>;
  destroy(sessionId: string): Promise<void>;
}

export const SESSION_KEYS = {
  cart: 'cart',
  orders: 'orders',
} as const;
