import { apiRequest } from './api.js';
import { NemligProductNotFoundError } from './errors.js';
import { decodeContentBlocks, decodeProduct, decodeTemplateName, type Product } from './schemas.js';
import { searchProducts } from './search.js';
import { buildHeaders } from './session.js';
import { getPageSettings } from './settings.js';
import type { NemligSession } from './types.js';
import { ENDPOINTS } from './types.js';
import { SITE_URL, formatKroner, stripHtmlTags, wrapText } from './utils.js';

/**
 * Template tag of the content block holding product details.
 */
export const PRODUCT_DETAIL_TEMPLATE = 'productdetailspot';

/**
 * How many search results are scanned for an exact ID match.
 */
export const PRODUCT_LOOKUP_LIMIT = 5;

/**
 * Get full product details by product ID.
 *
 * There is no by-ID endpoint: the product is searched for by its ID to learn
 * its URL slug, and that page is fetched as JSON. The details live in the
 * content block tagged {@link PRODUCT_DETAIL_TEMPLATE}.
 *
 * @throws NemligProductNotFoundError if no search result matches the ID exactly,
 * or the page has no detail block.
 *
 * @example
 * const product = await getProductDetails(session, '701025');
 * console.log(`${product.name} - ${product.price}`);
 */
export async function getProductDetails(
  session: NemligSession,
  productId: string
): Promise<Product> {
  const products = await searchProducts(session, productId, { limit: PRODUCT_LOOKUP_LIMIT });

  const match = products.find(p => p.id === productId);
  if (!match?.url) {
    throw new NemligProductNotFoundError(
      `Product ${productId} not found. ` +
      `Search returned ${products.length} products but none matched ID.`
    );
  }

  const settings = await getPageSettings(session);

  const data = await apiRequest(session, new URL(match.url, ENDPOINTS.home).toString(), {
    headers: buildHeaders(session),
    params: { GetAsJson: '1', t: settings.timeslotUtc, d: '1' },
  });

  const blocks = decodeContentBlocks(data);
  const detail = blocks.find(block => decodeTemplateName(block) === PRODUCT_DETAIL_TEMPLATE);
  if (detail === undefined) {
    const templates = blocks.map(decodeTemplateName);
    throw new NemligProductNotFoundError(
      `Product ${productId}: No '${PRODUCT_DETAIL_TEMPLATE}' in response. ` +
      `Found templates: ${templates.join(', ') || 'none'}`
    );
  }

  return decodeProduct(detail);
}

// ─────────────────────────────────────────────────────────────
// Formatting
// ─────────────────────────────────────────────────────────────

function stockStatus(inStock: boolean): string {
  return inStock ? 'In stock' : 'OUT OF STOCK';
}

/**
 * One-line product summary for search listings.
 */
export function formatProductListItem(product: Product): string {
  const { id, name, brand, price, description } = product;
  let line = `  [${id}] ${name} (${brand}) - ${formatKroner(price)} - ${description} [${stockStatus(product.availability.inStock)}]`;
  if (product.imageUrl) {
    line += `\n    Image: ${product.imageUrl}`;
  }
  return line;
}

/**
 * Full product details block.
 */
export function formatProductDetails(product: Product): string {
  const lines: string[] = [];

  lines.push(product.name);
  lines.push('='.repeat(product.name.length));
  lines.push('');
  lines.push(`ID:          ${product.id}`);
  lines.push(`Brand:       ${product.brand}`);
  lines.push(`Category:    ${product.category} > ${product.subCategory}`);
  lines.push(`Description: ${product.description}`);
  lines.push('');
  lines.push(`Price:       ${formatKroner(product.price)} (${product.unitPrice.toFixed(2)} ${product.unitPriceLabel})`);

  if (product.campaign) {
    const { type, minQuantity, totalPrice } = product.campaign;
    lines.push(`Campaign:    ${minQuantity} for ${formatKroner(totalPrice)} (${type})`);
  }

  lines.push('');
  lines.push(`Stock:       ${stockStatus(product.availability.inStock)}`);
  lines.push(`Delivery:    ${product.availability.deliveryAvailable ? 'Available' : 'Not available'}`);

  if (product.attributes.length) {
    lines.push('');
    lines.push('Attributes:');
    for (const attribute of product.attributes) {
      lines.push(`  ${attribute.name}: ${attribute.value}`);
    }
  }

  if (product.labels.length) {
    lines.push('');
    lines.push(`Labels:      ${product.labels.join(', ')}`);
  }

  const about = stripHtmlTags(product.text);
  if (about) {
    lines.push('');
    lines.push('About:');
    lines.push(...wrapText(about));
  }

  if (product.url) {
    lines.push('');
    lines.push(`URL:         ${SITE_URL}/${product.url.replace(/^\//, '')}`);
  }

  return lines.join('\n');
}
