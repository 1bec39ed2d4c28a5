import type { CatalogGateway } from '../clients/catalogClient.js';
import { toDisplayCurrency } from '../config/currency.js';
import type { ListingQuery, Product, ProductView } from '../models/types.js';

export function toProductView(product: Product): ProductView {
  return { ...product, priceDisplay: toDisplayCurrency(product.price) };
}

/**
 * Apply search (title substring, case-insensitive), exact category match and price sort
 */
export function applyListingQuery(products: Product[], query: ListingQuery): Product[] {
  let result = products;

  if (query.search) {
    const needle = query.search.toLowerCase();
    result = result.filter((product) => product.title.toLowerCase().includes(needle));
  }

  if (query.category) {
    result = result.filter((product) => product.category === query.category);
  }

  if (query.sort === 'price_asc') {
    result = [...result].sort((a, b) => a.price - b.price);
  } else if (query.sort === 'price_desc') {
    result = [...result].sort((a, b) => b.price - a.price);
  }

  return result;
}

/**
 * Catalog browsing for the listing, category and detail views
 */
export class CatalogService {
  constructor(private readonly catalog: CatalogGateway) {}

  async listProducts(query: ListingQuery = {}): Promise<ProductView[]> {
    const products = await this.catalog.getAllProducts();
    return applyListingQuery(products, query).map(toProductView);
  }

  async listCategoryProducts(name: string): Promise<ProductView[]> {
    const products = await this.catalog.getProductsByCategory(name);
    return products.map(toProductView);
  }

  async getProductDetail(id: string): Promise<ProductView | null> {
    const product = await this.catalog.getProduct(id);
    return product ? toProductView(product) : null;
  }

  async listCategories(): Promise<string[]> {
    return this.catalog.getCategories();
  }
}
