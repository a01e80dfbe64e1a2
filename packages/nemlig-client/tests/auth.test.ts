import { describe, it, expect, vi } from 'vitest';
import { getCredentialsFromEnv, login } from '../src/auth.js';
import { NemligAuthError, NemligHttpError } from '../src/errors.js';
import { isSessionAuthenticated } from '../src/session.js';
import { ENDPOINTS } from '../src/types.js';
import { jsonResponse, requestBody, requestHeaders, stubFetch } from './fetch-stub.js';

const credentials = { username: 'me@example.com', password: 'test-secret' };

/**
 * Fake handshake endpoints that hand out numbered tokens.
 */
function stubHandshake(loginResponse: () => Response = () => jsonResponse({ RedirectUrl: '/' })) {
  let xsrfCount = 0;
  let bearerCount = 0;

  return stubFetch(url => {
    switch (url.pathname) {
      case '/webapi/AntiForgery':
        xsrfCount += 1;
        return jsonResponse({ Value: `xsrf-${xsrfCount}` });
      case '/webapi/Token':
        bearerCount += 1;
        return jsonResponse({ access_token: `bearer-${bearerCount}`, token_type: 'Bearer' });
      case '/webapi/login':
        return loginResponse();
      default:
        return new Response('', { status: 404, statusText: 'Not Found' });
    }
  });
}

describe('login', () => {
  it('runs the handshake in order and keeps the refreshed tokens', async () => {
    const fetchMock = stubHandshake();

    const session = await login(credentials, { quiet: true });

    expect(fetchMock.mock.calls.map(([url]) => new URL(url).pathname)).toEqual([
      '/webapi/AntiForgery',
      '/webapi/Token',
      '/webapi/login',
      '/webapi/Token',
      '/webapi/AntiForgery',
    ]);
    expect(session.tokens).toEqual({ xsrfToken: 'xsrf-2', bearerToken: 'bearer-2' });
    expect(isSessionAuthenticated(session)).toBe(true);
  });

  it('sends the first tokens and the credentials with the login request', async () => {
    const fetchMock = stubHandshake();

    await login(credentials, { quiet: true });

    const [url, init] = fetchMock.mock.calls[2];
    expect(url).toBe(ENDPOINTS.login);
    expect(init?.method).toBe('POST');

    const headers = requestHeaders(init);
    expect(headers.get('X-XSRF-TOKEN')).toBe('xsrf-1');
    expect(headers.get('Authorization')).toBe('Bearer bearer-1');
    expect(headers.get('Referer')).toBe(ENDPOINTS.loginPage);
    expect(headers.get('Platform')).toBe('web');
    expect(headers.get('Device-Size')).toBe('desktop');

    expect(requestBody(init)).toEqual({
      Username: 'me@example.com',
      Password: 'test-secret',
      CheckForExistingProducts: true,
      DoMerge: true,
      AppInstalled: false,
      SaveExistingBasket: false,
    });
  });

  it('sends no token headers before any token is known', async () => {
    const fetchMock = stubHandshake();

    await login(credentials, { quiet: true });

    const headers = requestHeaders(fetchMock.mock.calls[0][1]);
    expect(headers.get('Authorization')).toBeNull();
    expect(headers.get('X-XSRF-TOKEN')).toBeNull();
    expect(headers.get('X-Correlation-Id')).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('sends a fresh correlation id with every request', async () => {
    const fetchMock = stubHandshake();

    await login(credentials, { quiet: true });

    const ids = fetchMock.mock.calls.map(([, init]) => requestHeaders(init).get('X-Correlation-Id'));
    expect(ids).toHaveLength(5);
    expect(ids.every(id => typeof id === 'string' && id.length === 36)).toBe(true);
    expect(new Set(ids).size).toBe(5);
  });

  it('keeps the password and tokens out of debug output', async () => {
    stubHandshake();
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});

    await login(credentials, { debug: true, quiet: true });

    const lines = stderr.mock.calls.map(([message]) => String(message));
    expect(lines.filter(line => line.includes('test-secret') || /(bearer|xsrf)-\d/.test(line))).toEqual([]);
    expect(lines).toContain(
      `DEBUG: POST ${ENDPOINTS.login}: ` +
      '["Username","Password","CheckForExistingProducts","DoMerge","AppInstalled","SaveExistingBasket"]'
    );
  });

  it('logs each step to stderr unless quiet', async () => {
    stubHandshake();
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});

    await login(credentials);

    expect(stderr.mock.calls.map(([message]) => message)).toEqual([
      '[nemlig] Step 1: Getting XSRF token...',
      '[nemlig] Step 2: Getting Bearer token...',
      '[nemlig] Step 3: Logging in...',
      '[nemlig] Login successful!',
    ]);
  });

  it('rejects a login response without RedirectUrl', async () => {
    stubHandshake(() => jsonResponse({ Error: 'bad credentials' }));

    const error = await login(credentials, { quiet: true }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NemligAuthError);
    expect(error).toMatchObject({
      code: 'LOGIN_REJECTED',
      message: 'Login failed: {"Error":"bad credentials"}',
    });
  });

  it('wraps an HTTP failure of the login request', async () => {
    stubHandshake(() => new Response('nope', { status: 403, statusText: 'Forbidden' }));

    const error = await login(credentials, { quiet: true }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NemligAuthError);
    expect(error).toMatchObject({ code: 'LOGIN_FAILED' });
    if (error instanceof NemligAuthError) {
      expect(error.cause).toBeInstanceOf(NemligHttpError);
    }
  });

  it('fails on an HTTP error from the token endpoint', async () => {
    stubFetch(() => new Response('boom', { status: 500, statusText: 'Internal Server Error' }));

    const error = await login(credentials, { quiet: true }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NemligAuthError);
    expect(error).toMatchObject({
      code: 'TOKEN_REQUEST_FAILED',
      message: `Failed to get XSRF token: GET ${ENDPOINTS.antiForgery} failed: 500 Internal Server Error`,
    });
  });

  it('fails when a token response has no token', async () => {
    stubFetch(url =>
      url.pathname === '/webapi/AntiForgery' ? jsonResponse({ Value: 'xsrf-1' }) : jsonResponse({})
    );

    await expect(login(credentials, { quiet: true })).rejects.toMatchObject({
      code: 'TOKEN_REQUEST_FAILED',
      message: 'Failed to get Bearer token: token missing from response',
    });
  });
});

describe('getCredentialsFromEnv', () => {
  it('reads NEMLIG_USER and NEMLIG_PASS', () => {
    expect(getCredentialsFromEnv({ NEMLIG_USER: 'me@example.com', NEMLIG_PASS: 'test-secret' }))
      .toEqual(credentials);
  });

  it('lets overrides win field by field', () => {
    expect(getCredentialsFromEnv(
      { NEMLIG_USER: 'env@example.com', NEMLIG_PASS: 'env-secret' },
      { username: 'me@example.com', password: undefined }
    )).toEqual({ username: 'me@example.com', password: 'env-secret' });
    expect(getCredentialsFromEnv({}, credentials)).toEqual(credentials);
  });

  it('returns null when either is missing', () => {
    expect(getCredentialsFromEnv({ NEMLIG_USER: 'me@example.com' })).toBeNull();
    expect(getCredentialsFromEnv({ NEMLIG_PASS: 'test-secret' })).toBeNull();
    expect(getCredentialsFromEnv({})).toBeNull();
  });
});
