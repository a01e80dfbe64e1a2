import { login } from './auth.js';
import { addToBasket, getBasket } from './basket.js';
import { findOrder, getOrderDetails, getOrderHistory, type GetOrderHistoryOptions } from './orders.js';
import { getProductDetails } from './product.js';
import type { Basket, OrderDetails, OrderHistoryPage, OrderSummary, PageSettings, Product } from './schemas.js';
import { searchProducts, type SearchOptions } from './search.js';
import { isSessionAuthenticated } from './session.js';
import { getPageSettings } from './settings.js';
import type { LoginOptions, NemligCredentials, NemligSession } from './types.js';

/**
 * Unified Nemlig API client.
 *
 * Wraps all API functions with a single session for convenient usage.
 *
 * @example
 * import { NemligClient } from 'nemlig-client';
 *
 * const nemlig = await NemligClient.login({ username: 'me@example.com', password: 'secret' });
 *
 * const products = await nemlig.search('kakaomælk', { limit: 5 });
 * await nemlig.addToBasket(products[0].id, 2);
 */
export class NemligClient {
  constructor(public session: NemligSession) {}

  /**
   * Run the login handshake and wrap the resulting session.
   */
  static async login(credentials: NemligCredentials, options?: LoginOptions): Promise<NemligClient> {
    return new NemligClient(await login(credentials, options));
  }

  isAuthenticated(): boolean {
    return isSessionAuthenticated(this.session);
  }

  // ─────────────────────────────────────────────────────────────
  // Search & Products
  // ─────────────────────────────────────────────────────────────

  /**
   * Search for products.
   *
   * @example
   * const products = await nemlig.search('cocio', { limit: 20 });
   * console.log(`Found ${products.length} products`);
   */
  async search(query: string, options?: SearchOptions): Promise<Product[]> {
    return searchProducts(this.session, query, options);
  }

  /**
   * Get full product details.
   */
  async getProduct(productId: string): Promise<Product> {
    return getProductDetails(this.session, productId);
  }

  async getPageSettings(): Promise<PageSettings> {
    return getPageSettings(this.session);
  }

  // ─────────────────────────────────────────────────────────────
  // Basket
  // ─────────────────────────────────────────────────────────────

  async getBasket(): Promise<Basket> {
    return getBasket(this.session);
  }

  /**
   * Add a product to the basket and return the updated basket.
   */
  async addToBasket(productId: string, quantity = 1): Promise<Basket> {
    return addToBasket(this.session, productId, quantity);
  }

  // ─────────────────────────────────────────────────────────────
  // Orders
  // ─────────────────────────────────────────────────────────────

  /**
   * Get a page of order history.
   *
   * @example
   * const history = await nemlig.getOrderHistory({ take: 10 });
   */
  async getOrderHistory(options?: GetOrderHistoryOptions): Promise<OrderHistoryPage> {
    return getOrderHistory(this.session, options);
  }

  async getOrderDetails(orderId: number): Promise<OrderDetails> {
    return getOrderDetails(this.session, orderId);
  }

  /**
   * Find an order among the most recent ones.
   */
  async findOrder(orderId: number): Promise<OrderSummary> {
    return findOrder(this.session, orderId);
  }
}
