import { NemligError, NemligHttpError } from './errors.js';
import { logDebug } from './logger.js';
import { isRecord } from './schemas.js';
import { normalizeHeaders } from './session.js';
import type { NemligHeaders, NemligSession } from './types.js';

/**
 * Query string values. Undefined entries are dropped.
 */
export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface ApiRequestOptions {
  method?: 'GET' | 'POST';
  headers: NemligHeaders;
  params?: QueryParams;
  /** JSON body (POST only) */
  body?: unknown;
  /** Body carries credentials or tokens: debug output shows request keys only and no response text */
  sensitive?: boolean;
}

/**
 * Redirect hops followed before giving up.
 */
export const MAX_REDIRECTS = 5;

/**
 * Append query parameters to a URL.
 */
export function buildUrl(base: string, params?: QueryParams): string {
  const url = new URL(base);
  for (const [key, value] of Object.entries(params ?? {})) {
    if (value !== undefined) {
      url.searchParams.set(key, String(value));
    }
  }
  return url.toString();
}

function isRedirect(status: number): boolean {
  return status === 301 || status === 302 || status === 303 || status === 307 || status === 308;
}

function describeBody(body: unknown, sensitive: boolean): unknown {
  if (!sensitive || body === undefined) {
    return body ?? '';
  }
  return isRecord(body) ? Object.keys(body) : '<redacted>';
}

/**
 * One hop: attach jar cookies, send, store any `Set-Cookie` headers.
 * Redirects are not followed here so each hop's cookies reach the jar.
 */
async function send(
  session: NemligSession,
  target: string,
  init: { method: string; headers: Record<string, string>; body?: string }
): Promise<Response> {
  const headers = { ...init.headers };
  const cookieHeader = await session.cookies.getCookieString(target);
  if (cookieHeader) {
    headers.Cookie = cookieHeader;
  }

  const response = await fetch(target, {
    method: init.method,
    headers,
    body: init.body,
    redirect: 'manual',
  });

  for (const setCookie of response.headers.getSetCookie()) {
    await session.cookies.setCookie(setCookie, target, { ignoreError: true });
  }
  return response;
}

/**
 * Execute one request against the Nemlig API and return the parsed JSON body.
 *
 * Cookies from the session jar are sent along and any `Set-Cookie` headers on
 * the response, including those on redirect hops, are stored back into it.
 * Non-2xx responses throw {@link NemligHttpError} with the status and raw body.
 */
export async function apiRequest(
  session: NemligSession,
  url: string,
  options: ApiRequestOptions
): Promise<unknown> {
  const sensitive = options.sensitive ?? false;
  const headers = normalizeHeaders(options.headers);
  let method: string = options.method ?? 'GET';
  let target = buildUrl(url, options.params);
  let body = options.body === undefined ? undefined : JSON.stringify(options.body);

  logDebug(session, `${method} ${target}`, describeBody(options.body, sensitive));

  let response = await send(session, target, { method, headers, body });

  for (let hops = 0; isRedirect(response.status); hops++) {
    const location = response.headers.get('location');
    if (!location) {
      break;
    }
    if (hops >= MAX_REDIRECTS) {
      throw new NemligError(`Too many redirects from ${method} ${target}`, 'TOO_MANY_REDIRECTS');
    }

    // 303, and 301/302 after a POST, continue as a bodiless GET
    if (response.status === 303 || (method === 'POST' && response.status !== 307 && response.status !== 308)) {
      method = 'GET';
      body = undefined;
    }
    target = new URL(location, target).toString();
    await response.body?.cancel();
    logDebug(session, `-> ${response.status} redirect`, `${method} ${target}`);
    response = await send(session, target, { method, headers, body });
  }

  const text = await response.text();
  logDebug(
    session,
    `${method} ${target} -> ${response.status}`,
    sensitive ? `<${text.length} chars redacted>` : text.slice(0, 500)
  );

  if (!response.ok) {
    throw new NemligHttpError(response.status, response.statusText, text, method, target);
  }

  if (!text) {
    return null;
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new NemligError(`Invalid JSON from ${method} ${target}`, 'INVALID_JSON', { cause: error });
  }
}
