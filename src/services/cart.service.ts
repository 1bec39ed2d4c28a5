import { SESSION_KEYS, type SessionStore } from '../clients/sessionStore.js';
import {
  addToCart,
  applyCartUpdate,
  countItems,
  normalizeCart,
  removeFromCart,
  setCartQuantity,
} from '../models/cart.js';
import type { CartMapping } from '../models/types.js';
import { logger, type Logger } from '../lib/logger.js';

/**
 * Cart service: owns the session's product id -> quantity mapping.
 * Every mutation reads the mapping once and writes it back as one value.
 */
export class CartService {
  constructor(
    private readonly store: SessionStore,
    private readonly log: Logger = logger
  ) {}

  /**
   * Get the cart. A corrupted stored value is rewritten in normalized form.
   */
  async getCart(sessionId: string): Promise<CartMapping> {
    const raw = await this.store.get(sessionId, SESSION_KEYS.cart);
    const cart = normalizeCart(raw);

    if (raw !== undefined && needsRepair(raw, cart)) {
      this.log.warn('cart session value repaired', { sessionId });
      await this.store.set(sessionId, SESSION_KEYS.cart, cart);
    }
    return cart;
  }

  async addItem(sessionId: string, productId: string, quantity = 1): Promise<CartMapping> {
    return this.mutate(sessionId, (cart) => addToCart(cart, productId, quantity));
  }

  async setQuantity(sessionId: string, productId: string, quantity: number): Promise<CartMapping> {
    return this.mutate(sessionId, (cart) => setCartQuantity(cart, productId, quantity));
  }

  async removeItem(sessionId: string, productId: string): Promise<CartMapping> {
    return this.mutate(sessionId, (cart) => removeFromCart(cart, productId));
  }

  /**
   * Bulk update from the cart form
   */
  async updateItems(
    sessionId: string,
    update: { quantities: Record<string, number>; remove?: string }
  ): Promise<CartMapping> {
    return this.mutate(sessionId, (cart) => applyCartUpdate(cart, update));
  }

  async clear(sessionId: string): Promise<void> {
    await this.store.delete(sessionId, SESSION_KEYS.cart);
  }

  async totalItemCount(sessionId: string): Promise<number> {
    return countItems(await this.getCart(sessionId));
  }

  private async mutate(
    sessionId: string,
    apply: (cart: CartMapping) => CartMapping
  ): Promise<CartMapping> {
    const updated = apply(await this.getCart(sessionId));
    await this.store.set(sessionId, SESSION_KEYS.cart, updated);
    return updated;
  }
}

function needsRepair(raw: unknown, cart: CartMapping): boolean {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return true;
  }

  const entries = Object.entries(raw);
  return (
    entries.length !== Object.keys(cart).length ||
    entries.some(([productId, quantity]) => cart[productId] !== quantity)
  );
}
