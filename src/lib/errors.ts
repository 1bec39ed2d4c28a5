import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { CheckoutError, PaymentLookupError } from '../models/types.js';

/**
 * Custom error classes for the storefront API.
 * `redirectTo` names the view a client should fall back to.
 */

export class StoreError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: ContentfulStatusCode,
    public readonly redirectTo?: string
  ) {
    super(message);
    this.name = 'StoreError';
  }
}

export class NotFoundError extends StoreError {
  constructor(message = 'Resource not found', redirectTo = '/') {
    super(message, 'NOT_FOUND', 404, redirectTo);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends StoreError {
  constructor(message = 'Validation failed', redirectTo?: string, code = 'VALIDATION_ERROR') {
    super(message, code, 400, redirectTo);
    this.name = 'ValidationError';
  }
}

export class OrderExpiredError extends StoreError {
  constructor(message = 'Payment session expired') {
    super(message, 'ORDER_EXPIRED', 410, '/checkout');
    this.name = 'OrderExpiredError';
  }
}

export class CodLimitError extends StoreError {
  constructor(
    public readonly limit: number,
    public readonly total: number
  ) {
    super(
      `COD maximum amount is Rp ${limit.toLocaleString('en-US')}`,
      'COD_LIMIT_EXCEEDED',
      422,
      '/checkout'
    );
    this.name = 'CodLimitError';
  }
}

export function checkoutErrorToStoreError(error: CheckoutError): StoreError {
  switch (error.kind) {
    case 'empty_cart':
      return new ValidationError('Your cart is empty', '/cart', 'EMPTY_CART');
    case 'missing_fields':
      return new ValidationError(
        `Please fill in all required fields: ${error.fields.join(', ')}`,
        '/checkout',
        'MISSING_FIELDS'
      );
    case 'unknown_payment_method':
      return new ValidationError(
        'Please select a valid payment method',
        '/checkout',
        'UNKNOWN_PAYMENT_METHOD'
      );
    case 'cod_limit_exceeded':
      return new CodLimitError(error.limit, error.total);
  }
}

export function paymentLookupErrorToStoreError(error: PaymentLookupError): StoreError {
  switch (error.kind) {
    case 'not_found':
      return new NotFoundError('Order not found');
    case 'expired':
      return new OrderExpiredError();
  }
}

/**
 * Error envelope for API responses
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
  };
  redirectTo?: string;
}

export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof StoreError) {
    return {
      error: {
        code: error.code,
        message: error.message,
      },
      ...(error.redirectTo ? { redirectTo: error.redirectTo } : {}),
    };
  }

  return {
    error: {
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
    },
    redirectTo: '/',
  };
}
