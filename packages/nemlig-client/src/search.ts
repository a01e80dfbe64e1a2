import { apiRequest } from './api.js';
import { decodeSearchProducts, type Product } from './schemas.js';
import { buildSearchHeaders } from './session.js';
import { getPageSettings } from './settings.js';
import type { NemligSession } from './types.js';
import { ENDPOINTS } from './types.js';

const DEFAULT_SEARCH_LIMIT = 10;

/**
 * Search options.
 */
export interface SearchOptions {
  limit?: number;
}

/**
 * Search for products using the search gateway.
 *
 * Each call re-fetches page settings first: the delivery timeslot and the
 * catalogue timestamp are server-side session state and must match the search.
 *
 * @example
 * const products = await searchProducts(session, 'kakaomælk', { limit: 5 });
 * console.log(products.map(p => p.name));
 */
export async function searchProducts(
  session: NemligSession,
  query: string,
  options: SearchOptions = {}
): Promise<Product[]> {
  const limit = Math.max(1, options.limit ?? DEFAULT_SEARCH_LIMIT);
  const settings = await getPageSettings(session);

  const data = await apiRequest(session, ENDPOINTS.search, {
    headers: buildSearchHeaders(session, ENDPOINTS.home),
    params: {
      query,
      take: limit,
      skip: 0,
      recipeCount: 0,
      timestamp: settings.timestamp,
      timeslotUtc: settings.timeslotUtc,
      deliveryZoneId: settings.deliveryZoneId,
      // Logged-in users get their favourites flagged in the results
      includeFavorites: settings.userId || undefined,
    },
  });

  return decodeSearchProducts(data);
}
