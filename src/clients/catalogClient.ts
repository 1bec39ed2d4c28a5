import { z } from 'zod';
import { CategoryListSchema, ProductSchema } from '../models/schemas.js';
import type { Product } from '../models/types.js';
import { errorMeta, logger as rootLogger, type Logger } from '../lib/logger.js';

export const FALLBACK_CATEGORIES: readonly string[] = [
  'electronics',
  'jewelery',
  "men's clothing",
  "women's clothing",
];

/**
 * Read-only view of the external product catalog
 */
export interface CatalogGateway {
  getProduct(id: string): Promise<Product | null>;
  getAllProducts(): Promise<Product[]>;
  getProductsByCategory(name: string): Promise<Product[]>;
  getCategories(): Promise<string[]>;
}

export type FetchLike = (
  url: string,
  init: { headers: Record<string, string>; signal: AbortSignal }
) => Promise<Response>;

export interface CatalogClientOptions {
  baseUrl: string;
  timeoutMs: number;
  fetchImpl?: FetchLike;
  logger?: Logger;
}

/**
 * HTTP catalog client. Every call is bounded by `timeoutMs`; transport errors,
 * non-2xx responses and malformed bodies come back as null/empty, never thrown.
 */
export class CatalogClient implements CatalogGateway {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly log: Logger;

  constructor(options: CatalogClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
    this.log = options.logger ?? rootLogger;
  }

  async getProduct(id: string): Promise<Product | null> {
    const body = await this.request(`/products/${encodeURIComponent(id)}`);
    if (body === undefined) {
      return null;
    }

    const parsed = ProductSchema.safeParse(body);
    if (!parsed.success) {
      this.log.warn('catalog product malformed', { productId: id, issues: parsed.error.issues.length });
      return null;
    }
    return parsed.data;
  }

  async getAllProducts(): Promise<Product[]> {
    return this.productList('/products');
  }

  async getProductsByCategory(name: string): Promise<Product[]> {
    return this.productList(`/products/category/${encodeURIComponent(name)}`);
  }

  async getCategories(): Promise<string[]> {
    const body = await this.request('/products/categories');
    const parsed = CategoryListSchema.safeParse(body);
    if (!parsed.success) {
      return [...FALLBACK_CATEGORIES];
    }
    return parsed.data;
  }

  /**
   * Parse a product list, dropping individual records that do not validate
   */
  private async productList(path: string): Promise<Product[]> {
    const body = await this.request(path);
    const parsed = z.array(z.unknown()).safeParse(body);
    if (!parsed.success) {
      return [];
    }

    const products: Product[] = [];
    for (const raw of parsed.data) {
      const product = ProductSchema.safeParse(raw);
      if (product.success) {
        products.push(product.data);
      }
    }

    if (products.length < parsed.data.length) {
      this.log.warn('catalog list contained malformed products', {
        path,
        dropped: parsed.data.length - products.length,
      });
    }
    return products;
  }

  /**
   * GET a JSON body; undefined on any failure
   */
  private async request(path: string): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    const ac = new AbortController();
    const timer = setTimeout(() => ac.abort(), this.timeoutMs);
    const started = Date.now();

    try {
      const res = await this.fetchImpl(url, {
        headers: { accept: 'application/json' },
        signal: ac.signal,
      });

      if (!res.ok) {
        this.log.warn('catalog request failed', { url, status: res.status });
        return undefined;
      }

      // Unknown product ids come back as 200 with an empty body
      const text = await res.text();
      if (!text.trim()) {
        return undefined;
      }
      return JSON.parse(text);
    } catch (error) {
      this.log.warn('catalog request error', {
        url,
        timedOut: ac.signal.aborted,
        durationMs: Date.now() - started,
        ...errorMeta(error),
      });
      return undefined;
    } finally {
      clearTimeout(timer);
    }
  }
}
