import type { CookieJar } from 'tough-cookie';

/**
 * Authentication tokens issued by the Nemlig web API.
 *
 * Both are required on every authenticated call: the bearer token goes in the
 * `Authorization` header, the anti-forgery token in `X-XSRF-TOKEN`.
 */
export interface NemligAuthTokens {
  /** Anti-forgery (XSRF) token from /webapi/AntiForgery */
  xsrfToken: string;
  /** Bearer token from /webapi/Token */
  bearerToken: string;
}

/**
 * Complete session object with tokens, cookie jar, and logging switches.
 */
export interface NemligSession {
  tokens: NemligAuthTokens;
  /** Cookies set by the remote service, replayed on every request */
  cookies: CookieJar;
  /** Enable detailed debug logging (default: false) */
  debug?: boolean;
  /** Suppress progress messages on stderr (default: false) */
  quiet?: boolean;
}

/**
 * Login credentials - can be passed directly or read from env.
 */
export interface NemligCredentials {
  username: string;
  password: string;
}

/**
 * Options for the login function.
 */
export interface LoginOptions {
  debug?: boolean;
  quiet?: boolean;
}

/**
 * Request headers for Nemlig API calls.
 */
export interface NemligHeaders {
  Accept: string;
  'User-Agent': string;
  'X-Correlation-Id': string;
  'Content-Type'?: string;
  Authorization?: string;
  'X-XSRF-TOKEN'?: string;
  Referer?: string;
  [key: string]: string | undefined;
}

/**
 * Platform identification sent with every request.
 * The web API rejects calls that do not look like they come from the website.
 */
export const APP_PLATFORM = 'web';
export const APP_VERSION = '11.201.0';
export const DEVICE_SIZE = 'desktop';
export const USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/136.0.0.0 Safari/537.36';

/**
 * Nemlig API endpoints.
 */
export const ENDPOINTS = {
  home: 'https://www.nemlig.com/',
  antiForgery: 'https://www.nemlig.com/webapi/AntiForgery',
  token: 'https://www.nemlig.com/webapi/Token',
  login: 'https://www.nemlig.com/webapi/login',
  loginPage: 'https://www.nemlig.com/login?returnUrl=%2F',
  appSettings: 'https://www.nemlig.com/webapi/v2/AppSettings/Website',
  basket: 'https://www.nemlig.com/webapi/basket/GetBasket',
  addToBasket: 'https://www.nemlig.com/webapi/basket/AddToBasket',
  orderHistory: 'https://www.nemlig.com/webapi/order/GetBasicOrderHistory',
  orderDetails: 'https://www.nemlig.com/webapi/v2/order/GetOrderHistory',
  search: 'https://webapi.prod.knl.nemlig.it/searchgateway/api/search',
} as const;
