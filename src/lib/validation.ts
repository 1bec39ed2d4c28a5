import { ValidationError } from './errors.js';
import type { CheckoutInput, ListingQuery, ProductSort } from '../models/types.js';

const PRODUCT_ID_RE = /^\d+$/;
const INTEGER_RE = /^-?\d+$/;

function asRecord(body: unknown): Record<string, unknown> {
  if (!body || typeof body !== 'object' || Array.isArray(body)) {
    throw new ValidationError('Request body must be an object');
  }
  return Object.fromEntries(Object.entries(body));
}

/**
 * Parse an integer from a JSON number or a form-style string
 */
export function parseInteger(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : null;
  }
  if (typeof value === 'string' && INTEGER_RE.test(value.trim())) {
    return parseInt(value.trim(), 10);
  }
  return null;
}

/**
 * Validate a product id (catalog ids are positive integers)
 */
export function validateProductId(productId: string): string {
  const trimmed = productId.trim();
  if (!PRODUCT_ID_RE.test(trimmed) || parseInt(trimmed, 10) < 1) {
    throw new ValidationError('Product id must be a positive integer', '/');
  }
  return String(parseInt(trimmed, 10));
}

/**
 * Validate add item request; quantity falls back to 1 when absent or not numeric
 */
export function validateAddItemRequest(body: unknown): {
  productId: string;
  quantity: number;
} {
  const { productId, quantity } = asRecord(body);

  if (typeof productId !== 'string' && typeof productId !== 'number') {
    throw new ValidationError('productId must be a string or number', '/');
  }

  return {
    productId: validateProductId(String(productId)),
    quantity: parseInteger(quantity) ?? 1,
  };
}

/**
 * Validate set quantity request
 */
export function validateQuantityRequest(body: unknown): { quantity: number } {
  const quantity = parseInteger(asRecord(body).quantity);
  if (quantity === null) {
    throw new ValidationError('quantity must be an integer', '/cart');
  }
  return { quantity };
}

/**
 * Validate bulk cart update request. Entries with non-integer quantities are skipped.
 */
export function validateCartUpdateRequest(body: unknown): {
  quantities: Record<string, number>;
  remove?: string;
} {
  const data = asRecord(body);
  const quantities: Record<string, number> = {};

  if (data.quantities !== undefined) {
    const raw = asRecord(data.quantities);
    for (const [productId, value] of Object.entries(raw)) {
      const quantity = parseInteger(value);
      if (quantity !== null) {
        quantities[productId] = quantity;
      }
    }
  }

  if (data.remove !== undefined && typeof data.remove !== 'string' && typeof data.remove !== 'number') {
    throw new ValidationError('remove must be a product id', '/cart');
  }

  return data.remove === undefined ? { quantities } : { quantities, remove: String(data.remove) };
}

/**
 * Validate checkout request. Blank fields are left for the order ledger to report.
 */
export function validateCheckoutRequest(body: unknown): CheckoutInput {
  const data = asRecord(body);

  const text = (field: string): string => {
    const value = data[field];
    if (value === undefined || value === null) return '';
    if (typeof value !== 'string') {
      throw new ValidationError(`${field} must be a string`, '/checkout');
    }
    return value;
  };

  return {
    name: text('name'),
    phone: text('phone'),
    email: text('email'),
    address: text('address'),
    paymentMethod: text('paymentMethod'),
  };
}

function isSort(value: string): value is ProductSort {
  return value === 'price_asc' || value === 'price_desc';
}

/**
 * Parse listing query params; unknown sort values are ignored
 */
export function parseListingQuery(params: {
  search?: string;
  category?: string;
  sort?: string;
}): ListingQuery {
  const query: ListingQuery = {};
  if (params.search?.trim()) query.search = params.search.trim();
  if (params.category) query.category = params.category;
  if (params.sort && isSort(params.sort)) query.sort = params.sort;
  return query;
}
