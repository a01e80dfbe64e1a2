import { apiRequest } from './api.js';
import { decodeBasket, type Basket, type BasketLine } from './schemas.js';
import { buildHeaders } from './session.js';
import type { NemligSession } from './types.js';
import { ENDPOINTS } from './types.js';
import { formatKroner } from './utils.js';

/**
 * Get the current basket contents.
 *
 * @example
 * const basket = await getBasket(session);
 * basket.lines.forEach(line => console.log(`${line.name} x${line.quantity}`));
 */
export async function getBasket(session: NemligSession): Promise<Basket> {
  const data = await apiRequest(session, ENDPOINTS.basket, {
    headers: buildHeaders(session),
  });
  return decodeBasket(data);
}

/**
 * Add a product to the basket.
 *
 * @param productId - Product ID (from search results)
 * @param quantity - Quantity to add (default 1)
 * @returns The updated basket
 */
export async function addToBasket(
  session: NemligSession,
  productId: string,
  quantity = 1
): Promise<Basket> {
  const data = await apiRequest(session, ENDPOINTS.addToBasket, {
    method: 'POST',
    headers: buildHeaders(session, { referer: ENDPOINTS.home }),
    body: {
      ProductId: productId,
      quantity,
      AffectPartialQuantity: false,
      disableQuantityValidation: false,
    },
  });
  return decodeBasket(data);
}

/**
 * Sum of line totals.
 */
export function getBasketTotal(basket: Basket): number {
  return basket.lines.reduce((sum, line) => sum + line.price, 0);
}

export function findBasketLine(basket: Basket, productId: string): BasketLine | undefined {
  return basket.lines.find(line => line.id === productId);
}

// ─────────────────────────────────────────────────────────────
// Formatting
// ─────────────────────────────────────────────────────────────

export function formatBasketLine(line: BasketLine): string {
  return `  [${line.id}] ${line.name} (${line.brand}) x${line.quantity} @ ${formatKroner(line.itemPrice)} = ${formatKroner(line.price)}`;
}

/**
 * Format the basket with its lines and total.
 */
export function formatBasket(basket: Basket): string {
  if (!basket.lines.length) {
    return 'Your basket is empty.';
  }

  return [
    `Basket (${basket.lines.length} items):`,
    '',
    ...basket.lines.map(formatBasketLine),
    '',
    `  Total: ${formatKroner(getBasketTotal(basket))}`,
  ].join('\n');
}
