import { randomUUID } from 'node:crypto';
import { CookieJar } from 'tough-cookie';
import type { NemligAuthTokens, NemligHeaders, NemligSession } from './types.js';
import { APP_PLATFORM, APP_VERSION, DEVICE_SIZE, USER_AGENT } from './types.js';

const JSON_ACCEPT = 'application/json, text/plain, */*';

/**
 * Generate the per-request correlation id the web API uses for tracing.
 */
export function createCorrelationId(): string {
  return randomUUID();
}

/**
 * Create an empty, unauthenticated session with a fresh cookie jar.
 */
export function createSession(options?: { debug?: boolean; quiet?: boolean }): NemligSession {
  return {
    tokens: { xsrfToken: '', bearerToken: '' },
    cookies: new CookieJar(),
    debug: options?.debug ?? false,
    quiet: options?.quiet ?? false,
  };
}

export function updateSessionTokens(session: NemligSession, tokens: Partial<NemligAuthTokens>): void {
  session.tokens = { ...session.tokens, ...tokens };
}

export function isSessionAuthenticated(session: NemligSession): boolean {
  return Boolean(session.tokens.bearerToken && session.tokens.xsrfToken);
}

/**
 * Build headers for a website (www.nemlig.com) API request.
 *
 * Tokens are attached only when the session holds them, so the same builder
 * serves the pre-login handshake steps.
 */
export function buildHeaders(session: NemligSession, options?: { referer?: string }): NemligHeaders {
  const headers: NemligHeaders = {
    Accept: JSON_ACCEPT,
    'Content-Type': 'application/json',
    'User-Agent': USER_AGENT,
    'Device-Size': DEVICE_SIZE,
    Platform: APP_PLATFORM,
    Version: APP_VERSION,
    'X-Correlation-Id': createCorrelationId(),
  };
  if (session.tokens.xsrfToken) {
    headers['X-XSRF-TOKEN'] = session.tokens.xsrfToken;
  }
  if (session.tokens.bearerToken) {
    headers.Authorization = `Bearer ${session.tokens.bearerToken}`;
  }
  if (options?.referer) {
    headers.Referer = options.referer;
  }
  return headers;
}

/**
 * Build headers for the search gateway, which takes the bearer token
 * but no anti-forgery token.
 */
export function buildSearchHeaders(session: NemligSession, referer: string): NemligHeaders {
  return {
    Accept: JSON_ACCEPT,
    Authorization: `Bearer ${session.tokens.bearerToken}`,
    'X-Correlation-Id': createCorrelationId(),
    Referer: referer,
    'User-Agent': USER_AGENT,
  };
}

export function normalizeHeaders(headers: NemligHeaders): Record<string, string> {
  const normalized: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === 'string' && value.length > 0) {
      normalized[key] = value;
    }
  }
  return normalized;
}
