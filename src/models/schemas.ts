import { z } from 'zod';
import type { Order, PricedLineItem, Product } from './types.js';

// Catalog records. Optional fields carry an explicit default; a record
// missing a required field (or with the wrong type) is rejected.

export const ProductSchema: z.ZodType<Product, z.ZodTypeDef, unknown> = z.object({
  id: z.number().int(),
  title: z.string().default('Unknown Product'),
  price: z.number().nonnegative().default(0),
  description: z.string().default(''),
  category: z.string().default(''),
  image: z.string().default(''),
  rating: z
    .object({
      rate: z.number(),
      count: z.number(),
    })
    .optional(),
});

export const CategoryListSchema = z.array(z.string());

// Session-stored orders are re-validated on read

const PricedLineItemSchema: z.ZodType<PricedLineItem> = z.object({
  productId: z.string(),
  title: z.string(),
  image: z.string(),
  unitPriceBase: z.number(),
  unitPriceDisplay: z.number(),
  quantity: z.number().int().positive(),
  subtotalBase: z.number(),
  subtotalDisplay: z.number(),
});

export const OrderSchema: z.ZodType<Order> = z.object({
  orderId: z.string().min(1),
  createdAt: z.string().datetime(),
  expiresAt: z.string().datetime(),
  items: z.array(PricedLineItemSchema),
  customer: z.object({
    name: z.string(),
    phone: z.string(),
    email: z.string(),
    address: z.string(),
  }),
  paymentMethod: z.string(),
  paymentFee: z.number(),
  totals: z.object({
    base: z.number(),
    display: z.number(),
    withFeeBase: z.number(),
    withFeeDisplay: z.number(),
  }),
  status: z.enum(['pending', 'paid']),
  paidAt: z.string().datetime().optional(),
  transactionId: z.string().optional(),
});
