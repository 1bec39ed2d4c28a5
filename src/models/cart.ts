import { parseInteger } from '../lib/validation.js';
import type { CartMapping } from './types.js';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Normalize a stored cart value. Anything that is not a mapping becomes an
 * empty cart. Integer strings are coerced; entries without a positive
 * integer quantity are discarded one by one.
 */
export function normalizeCart(value: unknown): CartMapping {
  if (!isPlainObject(value)) {
    return {};
  }

  const cart: CartMapping = {};
  for (const [productId, raw] of Object.entries(value)) {
    const quantity = parseInteger(raw);
    if (quantity !== null && quantity > 0) {
      cart[productId] = quantity;
    }
  }
  return cart;
}

/**
 * Add quantity to an entry, summing with what is already there.
 * A sum <= 0 removes the entry.
 */
export function addToCart(cart: CartMapping, productId: string, quantity = 1): CartMapping {
  return setCartQuantity(cart, productId, (cart[productId] ?? 0) + quantity);
}

/**
 * Set an entry to exactly `quantity`; <= 0 removes it
 */
export function setCartQuantity(cart: CartMapping, productId: string, quantity: number): CartMapping {
  if (quantity <= 0) {
    return removeFromCart(cart, productId);
  }
  return { ...cart, [productId]: quantity };
}

/**
 * Remove an entry; removing an absent id returns an equal cart
 */
export function removeFromCart(cart: CartMapping, productId: string): CartMapping {
  const { [productId]: _removed, ...rest } = cart;
  return rest;
}

/**
 * Apply a bulk update: drop `remove`, then set quantities for ids already in the cart
 */
export function applyCartUpdate(
  cart: CartMapping,
  update: { quantities: Record<string, number>; remove?: string }
): CartMapping {
  let updated = update.remove !== undefined ? removeFromCart(cart, update.remove) : cart;

  for (const productId of Object.keys(updated)) {
    const quantity = update.quantities[productId];
    if (quantity !== undefined) {
      updated = setCartQuantity(updated, productId, quantity);
    }
  }

  return updated;
}

export function countItems(cart: CartMapping): number {
  return Object.values(cart).reduce((sum, quantity) => sum + quantity, 0);
}
