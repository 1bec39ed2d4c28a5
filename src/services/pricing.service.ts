import type { CatalogGateway } from '../clients/catalogClient.js';
import { roundBase, toDisplayCurrency } from '../config/currency.js';
import type { CartMapping, PricedCart, PricedLineItem } from '../models/types.js';

/**
 * Prices a cart against the live catalog. Nothing is cached: every call looks
 * up each product again, and products the catalog cannot find are dropped.
 */
export class PricingService {
  constructor(private readonly catalog: CatalogGateway) {}

  async priceCart(cart: CartMapping): Promise<PricedCart> {
    const entries = Object.entries(cart);
    const products = await Promise.all(
      entries.map(([productId]) => this.catalog.getProduct(productId))
    );

    const items: PricedLineItem[] = [];
    let total = 0;

    entries.forEach(([productId, quantity], index) => {
      const product = products[index];
      if (!product) {
        return;
      }

      const subtotal = product.price * quantity;
      total += subtotal;

      items.push({
        productId,
        title: product.title,
        image: product.image,
        unitPriceBase: product.price,
        unitPriceDisplay: toDisplayCurrency(product.price),
        quantity,
        subtotalBase: roundBase(subtotal),
        subtotalDisplay: toDisplayCurrency(subtotal),
      });
    });

    return {
      items,
      totalBase: roundBase(total),
      totalDisplay: toDisplayCurrency(total),
      itemCount: items.reduce((sum, item) => sum + item.quantity, 0),
    };
  }
}
