import type { CatalogGateway } from '../src/clients/catalogClient.js';
import type { Product } from '../src/models/types.js';

export function product(id: number, price: number, overrides: Partial<Product> = {}): Product {
  return {
    id,
    title: `Product ${id}`,
    price,
    description: '',
    category: 'electronics',
    image: `https://img.test/${id}.png`,
    ...overrides,
  };
}

/**
 * In-process catalog: answers from a map, counts lookups
 */
export class StubCatalog implements CatalogGateway {
  readonly lookups: string[] = [];
  private readonly products = new Map<string, Product>();

  constructor(products: Product[] = []) {
    for (const p of products) {
      this.products.set(String(p.id), p);
    }
  }

  put(p: Product): void {
    this.products.set(String(p.id), p);
  }

  remove(id: number): void {
    this.products.delete(String(id));
  }

  async getProduct(id: string): Promise<Product | null> {
    this.lookups.push(id);
    return this.products.get(id) ?? null;
  }

  async getAllProducts(): Promise<Product[]> {
    return [...this.products.values()];
  }

  async getProductsByCategory(name: string): Promise<Product[]> {
    return [...this.products.values()].filter((p) => p.category === name);
  }

  async getCategories(): Promise<string[]> {
    return [...new Set([...this.products.values()].map((p) => p.category))];
  }
}

export const SESSION = 'session-test-0001';
