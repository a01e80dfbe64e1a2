/**
 * Partial decoding of Nemlig API payloads.
 *
 * The web API is undocumented and its response shapes drift, so every field
 * here carries its own fallback and every record accepts non-object input.
 * Decoding never throws: a missing or mistyped field becomes its default.
 *
 * @module schemas
 */

import { z } from 'zod';

// ─────────────────────────────────────────────────────────────
// Field decoders
// ─────────────────────────────────────────────────────────────

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Object schema that treats anything but a plain object as `{}`. */
function record<T extends z.ZodRawShape>(shape: T) {
  return z.preprocess(value => (isRecord(value) ? value : {}), z.object(shape));
}

function list<T extends z.ZodTypeAny>(item: T) {
  return z.array(item).catch([]);
}

const text = (fallback = '') => z.string().catch(fallback);
const amount = (fallback = 0) => z.number().finite().catch(fallback);
const flag = z.boolean().catch(false);

/** String or number rendered as a string (IDs, order numbers, attribute values). */
const scalarText = (fallback = '') =>
  z.union([z.string(), z.number(), z.boolean()]).transform(value => String(value)).catch(fallback);

/** Number, or a string holding one (order IDs arrive as both). */
const numericId = z
  .union([z.number().int(), z.string().regex(/^\d+$/).transform(value => Number(value))])
  .catch(0);

// ─────────────────────────────────────────────────────────────
// Domain Types
// ─────────────────────────────────────────────────────────────

export interface ProductAvailability {
  inStock: boolean;
  deliveryAvailable: boolean;
}

/**
 * Multi-buy offer attached to a product (e.g. "3 for 50.00 kr").
 */
export interface ProductCampaign {
  type: string;
  minQuantity: number;
  totalPrice: number;
}

export interface ProductAttribute {
  name: string;
  value: string;
}

/**
 * Product as returned by search results and the product detail view.
 * Detail-only fields are empty for search results.
 */
export interface Product {
  id: string;
  name: string;
  brand: string;
  price: number;
  unitPrice: number;
  unitPriceLabel: string;
  description: string;
  category: string;
  subCategory: string;
  imageUrl: string;
  /** URL slug relative to the site root */
  url: string;
  /** Raw HTML product text */
  text: string;
  availability: ProductAvailability;
  campaign?: ProductCampaign;
  attributes: ProductAttribute[];
  labels: string[];
}

export interface BasketLine {
  id: string;
  name: string;
  brand: string;
  quantity: number;
  /** Unit price */
  itemPrice: number;
  /** Line total */
  price: number;
}

export interface Basket {
  lines: BasketLine[];
}

export interface DeliveryWindow {
  /** ISO 8601 timestamp, empty if unknown */
  start: string;
  end: string;
}

/**
 * Order as listed in order history.
 */
export interface OrderSummary {
  id: number;
  orderNumber: string;
  /** Numeric status code, see ORDER_STATUS_LABELS */
  status: number;
  total: number;
  subTotal: number;
  orderDate: string;
  deliveryTime: DeliveryWindow;
}

export interface OrderHistoryPage {
  orders: OrderSummary[];
  numberOfPages: number;
}

export interface OrderLine {
  productNumber: string;
  productName: string;
  description: string;
  quantity: number;
  /** Line total */
  amount: number;
  averageItemPrice: number;
  hasCampaign: boolean;
}

export interface OrderDetails {
  lines: OrderLine[];
}

/**
 * Server-side session parameters that must accompany every search call.
 */
export interface PageSettings {
  timestamp: string;
  timeslotUtc: string;
  deliveryZoneId: number;
  userId: string;
}

// ─────────────────────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────────────────────

const AvailabilitySchema = record({
  IsAvailableInStock: flag,
  IsDeliveryAvailable: flag,
}).transform((raw): ProductAvailability => ({
  inStock: raw.IsAvailableInStock,
  deliveryAvailable: raw.IsDeliveryAvailable,
}));

const CampaignSchema = record({
  Type: text(),
  MinQuantity: amount(),
  TotalPrice: amount(),
}).transform((raw): ProductCampaign => ({
  type: raw.Type,
  minQuantity: raw.MinQuantity,
  totalPrice: raw.TotalPrice,
}));

const AttributeSchema = record({
  Name: scalarText(),
  Value: scalarText(),
}).transform((raw): ProductAttribute => ({ name: raw.Name, value: raw.Value }));

export const ProductSchema = record({
  Id: scalarText(),
  Name: text('Unknown'),
  Brand: text(),
  Price: amount(),
  UnitPriceCalc: amount(),
  UnitPriceLabel: text(),
  Description: text(),
  Category: text(),
  SubCategory: text(),
  PrimaryImage: text(),
  Url: text(),
  Text: text(),
  Availability: AvailabilitySchema,
  // Only a real object counts as a campaign; null or scalars mean "no offer".
  Campaign: z.unknown().transform(value => (isRecord(value) ? CampaignSchema.parse(value) : undefined)),
  Attributes: list(AttributeSchema),
  Labels: list(text()),
}).transform((raw): Product => ({
  id: raw.Id,
  name: raw.Name,
  brand: raw.Brand,
  price: raw.Price,
  unitPrice: raw.UnitPriceCalc,
  unitPriceLabel: raw.UnitPriceLabel,
  description: raw.Description,
  category: raw.Category,
  subCategory: raw.SubCategory,
  imageUrl: raw.PrimaryImage,
  url: raw.Url,
  text: raw.Text,
  availability: raw.Availability,
  campaign: raw.Campaign,
  attributes: raw.Attributes,
  labels: raw.Labels.filter(label => label.length > 0),
}));

const SearchResponseSchema = record({
  Products: record({
    Products: list(ProductSchema),
  }),
});

const ContentPageSchema = record({
  content: list(z.unknown()),
});

const TemplateTagSchema = record({
  TemplateName: text('unknown'),
});

export const BasketLineSchema = record({
  Id: scalarText(),
  Name: text('Unknown'),
  Brand: text(),
  Quantity: amount(),
  ItemPrice: amount(),
  Price: amount(),
}).transform((raw): BasketLine => ({
  id: raw.Id,
  name: raw.Name,
  brand: raw.Brand,
  quantity: raw.Quantity,
  itemPrice: raw.ItemPrice,
  price: raw.Price,
}));

const BasketSchema = record({
  Lines: list(BasketLineSchema),
}).transform((raw): Basket => ({ lines: raw.Lines }));

export const OrderSummarySchema = record({
  Id: numericId,
  OrderNumber: scalarText('Unknown'),
  Status: amount(),
  Total: amount(),
  SubTotal: amount(),
  OrderDate: text(),
  DeliveryTime: record({
    Start: text(),
    End: text(),
  }),
}).transform((raw): OrderSummary => ({
  id: raw.Id,
  orderNumber: raw.OrderNumber,
  status: raw.Status,
  total: raw.Total,
  subTotal: raw.SubTotal,
  orderDate: raw.OrderDate,
  deliveryTime: { start: raw.DeliveryTime.Start, end: raw.DeliveryTime.End },
}));

const OrderHistorySchema = record({
  Orders: list(OrderSummarySchema),
  NumberOfPages: amount(1),
}).transform((raw): OrderHistoryPage => ({
  orders: raw.Orders,
  numberOfPages: raw.NumberOfPages,
}));

export const OrderLineSchema = record({
  ProductNumber: scalarText(),
  ProductName: text('Unknown'),
  Description: text(),
  Quantity: amount(),
  Amount: amount(),
  AverageItemPrice: amount(),
  HasCampaign: flag,
}).transform((raw): OrderLine => ({
  productNumber: raw.ProductNumber,
  productName: raw.ProductName,
  description: raw.Description,
  quantity: raw.Quantity,
  amount: raw.Amount,
  averageItemPrice: raw.AverageItemPrice,
  hasCampaign: raw.HasCampaign,
}));

const OrderDetailsSchema = record({
  Lines: list(OrderLineSchema),
}).transform((raw): OrderDetails => ({ lines: raw.Lines }));

const AppSettingsSchema = record({
  CombinedProductsAndSitecoreTimestamp: scalarText(),
});

const PageJsonSchema = record({
  Settings: record({
    TimeslotUtc: text(),
    DeliveryZoneId: amount(1),
    UserId: scalarText(),
  }),
});

const AntiForgerySchema = record({ Value: text() });
const TokenSchema = record({ access_token: text() });

// ─────────────────────────────────────────────────────────────
// Decoders
// ─────────────────────────────────────────────────────────────

export function decodeProduct(data: unknown): Product {
  return ProductSchema.parse(data);
}

export function decodeSearchProducts(data: unknown): Product[] {
  return SearchResponseSchema.parse(data).Products.Products;
}

/** Raw `content` blocks of a page fetched with GetAsJson. */
export function decodeContentBlocks(data: unknown): unknown[] {
  return ContentPageSchema.parse(data).content;
}

export function decodeTemplateName(block: unknown): string {
  return TemplateTagSchema.parse(block).TemplateName;
}

export function decodeBasket(data: unknown): Basket {
  return BasketSchema.parse(data);
}

export function decodeOrderHistory(data: unknown): OrderHistoryPage {
  return OrderHistorySchema.parse(data);
}

export function decodeOrderDetails(data: unknown): OrderDetails {
  return OrderDetailsSchema.parse(data);
}

export function decodeAppTimestamp(data: unknown): string {
  return AppSettingsSchema.parse(data).CombinedProductsAndSitecoreTimestamp;
}

export function decodePageSettings(data: unknown): { timeslotUtc: string; deliveryZoneId: number; userId: string } {
  const settings = PageJsonSchema.parse(data).Settings;
  return {
    timeslotUtc: settings.TimeslotUtc,
    deliveryZoneId: settings.DeliveryZoneId,
    userId: settings.UserId,
  };
}

/** Anti-forgery token value, empty when the field is missing. */
export function decodeAntiForgeryToken(data: unknown): string {
  return AntiForgerySchema.parse(data).Value;
}

/** Bearer token value, empty when the field is missing. */
export function decodeBearerToken(data: unknown): string {
  return TokenSchema.parse(data).access_token;
}
