/**
 * Order history operations.
 *
 * @module orders
 */

import { apiRequest } from './api.js';
import { NemligLookupError } from './errors.js';
import {
  decodeOrderDetails,
  decodeOrderHistory,
  type OrderDetails,
  type OrderHistoryPage,
  type OrderLine,
  type OrderSummary,
} from './schemas.js';
import { buildHeaders } from './session.js';
import type { NemligSession } from './types.js';
import { ENDPOINTS } from './types.js';
import { formatKroner, isoDatePart, isoTimePart } from './utils.js';

/**
 * Order status codes from the API.
 */
export const ORDER_STATUS_LABELS: Record<number, string> = {
  1: 'Pending',
  2: 'Processing',
  4: 'Delivered',
};

/**
 * Maximum orders scanned when looking an order up by ID.
 */
export const MAX_ORDER_HISTORY_LOOKUP = 100;

const DEFAULT_ORDER_PAGE_SIZE = 10;

/**
 * Options for fetching orders.
 */
export interface GetOrderHistoryOptions {
  skip?: number;
  take?: number;
}

/**
 * Get a page of past orders.
 *
 * @example
 * const history = await getOrderHistory(session, { take: 5 });
 * console.log(`${history.orders.length} orders, ${history.numberOfPages} pages`);
 */
export async function getOrderHistory(
  session: NemligSession,
  options: GetOrderHistoryOptions = {}
): Promise<OrderHistoryPage> {
  const data = await apiRequest(session, ENDPOINTS.orderHistory, {
    headers: buildHeaders(session),
    params: {
      skip: options.skip ?? 0,
      take: options.take ?? DEFAULT_ORDER_PAGE_SIZE,
    },
  });
  return decodeOrderHistory(data);
}

/**
 * Get the line items of one order.
 */
export async function getOrderDetails(
  session: NemligSession,
  orderId: number
): Promise<OrderDetails> {
  const data = await apiRequest(session, `${ENDPOINTS.orderDetails}/${orderId}`, {
    headers: buildHeaders(session),
  });
  return decodeOrderDetails(data);
}

/**
 * Find an order summary by ID among the most recent orders.
 *
 * Only the latest {@link MAX_ORDER_HISTORY_LOOKUP} orders are scanned.
 *
 * @throws NemligLookupError if the order is not in that window
 */
export async function findOrder(session: NemligSession, orderId: number): Promise<OrderSummary> {
  const history = await getOrderHistory(session, { skip: 0, take: MAX_ORDER_HISTORY_LOOKUP });
  const order = history.orders
    .slice(0, MAX_ORDER_HISTORY_LOOKUP)
    .find(candidate => candidate.id === orderId);

  if (!order) {
    throw new NemligLookupError(`Order ${orderId} not found in last ${MAX_ORDER_HISTORY_LOOKUP} orders.`);
  }
  return order;
}

// ─────────────────────────────────────────────────────────────
// Formatting
// ─────────────────────────────────────────────────────────────

export function formatOrderStatus(status: number): string {
  return ORDER_STATUS_LABELS[status] ?? `Status ${status}`;
}

function formatDeliveryWindow(order: OrderSummary): string {
  const { start, end } = order.deliveryTime;
  if (!start || !end) {
    return 'N/A';
  }
  return `${isoDatePart(start)} ${isoTimePart(start)}-${isoTimePart(end)}`;
}

/**
 * One-line order summary for the history list.
 */
export function formatOrderSummary(order: OrderSummary): string {
  const date = order.orderDate ? order.orderDate.split('T')[0] : 'Unknown';
  return `  [${order.id}] ${order.orderNumber} - ${date} - ${formatKroner(order.total)} - ` +
    `${formatOrderStatus(order.status)} - Delivery: ${formatDeliveryWindow(order)}`;
}

export function formatOrderLine(line: OrderLine): string {
  const offer = line.hasCampaign ? ' [OFFER]' : '';
  return `  [${line.productNumber}] ${line.productName} - ${line.description} x${line.quantity.toFixed(0)} ` +
    `@ ${formatKroner(line.averageItemPrice)} = ${formatKroner(line.amount)}${offer}`;
}

/**
 * Format a history page as a list.
 */
export function formatOrderHistory(history: OrderHistoryPage): string {
  if (!history.orders.length) {
    return 'No orders found.';
  }

  return [
    `Order History (${history.orders.length} orders, ${history.numberOfPages} pages total):`,
    '',
    ...history.orders.map(formatOrderSummary),
  ].join('\n');
}

/**
 * Format full order details with line items.
 *
 * The delivery fee is not sent separately; it is the difference between the
 * order total and its subtotal.
 */
export function formatOrderDetails(order: OrderSummary, lines: OrderLine[]): string {
  const heading = `Order ${order.orderNumber}`;
  const deliveryFee = order.total - order.subTotal;
  const linesTotal = lines.reduce((sum, line) => sum + line.amount, 0);

  return [
    heading,
    '='.repeat(heading.length),
    '',
    `Order ID:     ${order.id}`,
    `Subtotal:     ${formatKroner(order.subTotal)}`,
    `Delivery:     ${formatKroner(deliveryFee)}`,
    `Total:        ${formatKroner(order.total)}`,
    '',
    `Items (${lines.length}):`,
    ...lines.map(formatOrderLine),
    '',
    `  Lines total: ${formatKroner(linesTotal)}`,
  ].join('\n');
}
