import { apiRequest } from './api.js';
import { NemligAuthError } from './errors.js';
import { logInfo } from './logger.js';
import { decodeAntiForgeryToken, decodeBearerToken, isRecord } from './schemas.js';
import { buildHeaders, createSession, updateSessionTokens } from './session.js';
import type { LoginOptions, NemligCredentials, NemligSession } from './types.js';
import { ENDPOINTS } from './types.js';

/**
 * Get credentials from environment variables (NEMLIG_USER, NEMLIG_PASS).
 *
 * Values in `overrides` win field by field, so a username passed on the
 * command line can pair with a password from the environment.
 *
 * @returns null if either field is missing after the fallback
 */
export function getCredentialsFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<NemligCredentials> = {}
): NemligCredentials | null {
  const username = overrides.username ?? env.NEMLIG_USER;
  const password = overrides.password ?? env.NEMLIG_PASS;

  if (!username || !password) {
    return null;
  }

  return { username, password };
}

/**
 * Run one token request, turning any failure into an auth error.
 */
async function requestToken(
  session: NemligSession,
  url: string,
  label: string,
  decode: (data: unknown) => string
): Promise<string> {
  let data: unknown;
  try {
    data = await apiRequest(session, url, { headers: buildHeaders(session), sensitive: true });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new NemligAuthError(`Failed to get ${label}: ${reason}`, 'TOKEN_REQUEST_FAILED', { cause: error });
  }

  const token = decode(data);
  if (!token) {
    throw new NemligAuthError(`Failed to get ${label}: token missing from response`, 'TOKEN_REQUEST_FAILED');
  }
  return token;
}

export async function fetchAntiForgeryToken(session: NemligSession): Promise<string> {
  return requestToken(session, ENDPOINTS.antiForgery, 'XSRF token', decodeAntiForgeryToken);
}

export async function fetchBearerToken(session: NemligSession): Promise<string> {
  return requestToken(session, ENDPOINTS.token, 'Bearer token', decodeBearerToken);
}

/**
 * Submit credentials. The web API answers 200 either way; a `RedirectUrl`
 * field is its only success signal.
 */
async function submitLogin(session: NemligSession, credentials: NemligCredentials): Promise<void> {
  let result: unknown;
  try {
    result = await apiRequest(session, ENDPOINTS.login, {
      method: 'POST',
      headers: buildHeaders(session, { referer: ENDPOINTS.loginPage }),
      sensitive: true,
      body: {
        Username: credentials.username,
        Password: credentials.password,
        CheckForExistingProducts: true,
        DoMerge: true,
        AppInstalled: false,
        SaveExistingBasket: false,
      },
    });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new NemligAuthError(`Login request failed: ${reason}`, 'LOGIN_FAILED', { cause: error });
  }

  if (!isRecord(result) || !('RedirectUrl' in result)) {
    throw new NemligAuthError(`Login failed: ${JSON.stringify(result)}`, 'LOGIN_REJECTED');
  }
}

/**
 * Complete the Nemlig login handshake and return an authenticated session.
 *
 * 1. Get XSRF token
 * 2. Get Bearer token
 * 3. Login with credentials (both tokens attached)
 * 4. Re-fetch both tokens; the pre-login ones are not accepted afterwards
 *
 * @param credentials - Username and password
 * @param options - Logging switches
 */
export async function login(
  credentials: NemligCredentials,
  options: LoginOptions = {}
): Promise<NemligSession> {
  const session = createSession(options);

  logInfo(session, 'Step 1: Getting XSRF token...');
  updateSessionTokens(session, { xsrfToken: await fetchAntiForgeryToken(session) });

  logInfo(session, 'Step 2: Getting Bearer token...');
  updateSessionTokens(session, { bearerToken: await fetchBearerToken(session) });

  logInfo(session, 'Step 3: Logging in...');
  await submitLogin(session, credentials);
  logInfo(session, 'Login successful!');

  const bearerToken = await fetchBearerToken(session);
  updateSessionTokens(session, { bearerToken });
  const xsrfToken = await fetchAntiForgeryToken(session);
  updateSessionTokens(session, { xsrfToken });

  return session;
}
