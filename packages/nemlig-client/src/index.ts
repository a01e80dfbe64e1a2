// ─────────────────────────────────────────────────────────────
// Nemlig Client Library
// Unofficial TypeScript client for the nemlig.com web API
// ─────────────────────────────────────────────────────────────

// Main client class
export { NemligClient } from './client.js';

// ─────────────────────────────────────────────────────────────
// Authentication
// ─────────────────────────────────────────────────────────────
export {
    fetchAntiForgeryToken,
    fetchBearerToken,
    getCredentialsFromEnv,
    login
} from './auth.js';
export {
    buildHeaders,
    buildSearchHeaders,
    createCorrelationId,
    createSession,
    isSessionAuthenticated,
    updateSessionTokens
} from './session.js';

// ─────────────────────────────────────────────────────────────
// Settings & Search
// ─────────────────────────────────────────────────────────────
export { DEFAULT_TIMESLOT_UTC, getAppSettings, getPageSettings } from './settings.js';
export { searchProducts, type SearchOptions } from './search.js';

// ─────────────────────────────────────────────────────────────
// Products
// ─────────────────────────────────────────────────────────────
export {
    getProductDetails,
    formatProductListItem,
    formatProductDetails,
    PRODUCT_DETAIL_TEMPLATE,
    PRODUCT_LOOKUP_LIMIT
} from './product.js';

// ─────────────────────────────────────────────────────────────
// Basket
// ─────────────────────────────────────────────────────────────
export {
    addToBasket,
    findBasketLine,
    getBasket,
    getBasketTotal,
    formatBasket,
    formatBasketLine
} from './basket.js';

// ─────────────────────────────────────────────────────────────
// Orders
// ─────────────────────────────────────────────────────────────
export {
    findOrder,
    getOrderDetails,
    getOrderHistory,
    formatOrderDetails,
    formatOrderHistory,
    formatOrderLine,
    formatOrderStatus,
    formatOrderSummary,
    MAX_ORDER_HISTORY_LOOKUP,
    ORDER_STATUS_LABELS,
    type GetOrderHistoryOptions
} from './orders.js';

// ─────────────────────────────────────────────────────────────
// Decoding
// ─────────────────────────────────────────────────────────────
export {
    decodeBasket,
    decodeOrderDetails,
    decodeOrderHistory,
    decodeProduct,
    decodeSearchProducts,
    type Basket,
    type BasketLine,
    type DeliveryWindow,
    type OrderDetails,
    type OrderHistoryPage,
    type OrderLine,
    type OrderSummary,
    type PageSettings,
    type Product,
    type ProductAttribute,
    type ProductAvailability,
    type ProductCampaign
} from './schemas.js';

// ─────────────────────────────────────────────────────────────
// API Utilities
// ─────────────────────────────────────────────────────────────
export { apiRequest, buildUrl, type ApiRequestOptions, type QueryParams } from './api.js';
export { logDebug, logInfo } from './logger.js';
export { formatKroner, stripHtmlTags, wrapText } from './utils.js';

// ─────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────
export type {
    LoginOptions,
    NemligAuthTokens,
    NemligCredentials,
    NemligHeaders,
    NemligSession
} from './types.js';

// ─────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────
export {
    NemligAuthError,
    NemligError,
    NemligHttpError,
    NemligLookupError,
    NemligProductNotFoundError
} from './errors.js';

export { ENDPOINTS } from './types.js';

import { formatBasket, formatBasketLine } from './basket.js';
import { formatOrderDetails, formatOrderHistory, formatOrderLine, formatOrderSummary } from './orders.js';
import { formatProductDetails, formatProductListItem } from './product.js';

export const formatter = {
  basket: formatBasket,
  basketLine: formatBasketLine,
  orderDetails: formatOrderDetails,
  orderHistory: formatOrderHistory,
  orderLine: formatOrderLine,
  orderSummary: formatOrderSummary,
  productDetails: formatProductDetails,
  productListItem: formatProductListItem,
};
