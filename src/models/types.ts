/**
 * Core domain types for the storefront API
 */

/** product id (string form) -> quantity, always >= 1 */
export type CartMapping = Record<string, number>;

export interface ProductRating {
  rate: number;
  count: number;
}

export interface Product {
  id: number;
  title: string;
  price: number;
  description: string;
  category: string;
  image: string;
  rating?: ProductRating;
}

export interface ProductView extends Product {
  priceDisplay: number;
}

export interface PricedLineItem {
  productId: string;
  title: string;
  image: string;
  unitPriceBase: number;
  unitPriceDisplay: number;
  quantity: number;
  subtotalBase: number;
  subtotalDisplay: number;
}

export interface PricedCart {
  items: PricedLineItem[];
  totalBase: number;
  totalDisplay: number;
  itemCount: number;
}

export interface BankAccount {
  bank: string;
  account: string;
  holder: string;
}

export interface PaymentMethod {
  id: string;
  name: string;
  description: string;
  /** display currency */
  fee: number;
  /** display currency; orders above this (fee included) are rejected */
  maxAmount?: number;
  phoneNumber?: string;
  accounts?: BankAccount[];
  supported?: string[];
}

export interface CustomerInfo {
  name: string;
  phone: string;
  email: string;
  address: string;
}

export type OrderStatus = 'pending' | 'paid';

export interface OrderTotals {
  base: number;
  display: number;
  withFeeBase: number;
  withFeeDisplay: number;
}

/**
 * An order snapshot. Everything but the payment status fields is fixed at creation.
 */
export interface Order {
  readonly orderId: string;
  readonly createdAt: string;
  readonly expiresAt: string;
  readonly items: readonly PricedLineItem[];
  readonly customer: Readonly<CustomerInfo>;
  readonly paymentMethod: string;
  readonly paymentFee: number;
  readonly totals: Readonly<OrderTotals>;
  status: OrderStatus;
  paidAt?: string;
  transactionId?: string;
}

export type OrderCollection = Record<string, Order>;

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export type CheckoutError =
  | { kind: 'empty_cart' }
  | { kind: 'missing_fields'; fields: string[] }
  | { kind: 'unknown_payment_method'; methodId: string }
  | { kind: 'cod_limit_exceeded'; total: number; limit: number };

export type PaymentLookupError =
  | { kind: 'not_found'; orderId: string }
  | { kind: 'expired'; orderId: string; expiresAt: string };

export interface CheckoutInput {
  name: string;
  phone: string;
  email?: string;
  address: string;
  paymentMethod: string;
}

export interface PaymentOption {
  method: PaymentMethod;
  totalWithFeeDisplay: number;
  available: boolean;
}

export interface CheckoutPreview {
  cart: PricedCart;
  paymentMethods: PaymentOption[];
}

export interface CodEligibility {
  available: boolean;
  total: number;
  limit: number;
  message: string;
}

export type ProductSort = 'price_asc' | 'price_desc';

export interface ListingQuery {
  search?: string;
  category?: string;
  sort?: ProductSort;
}
