import { describe, it, expect, vi } from 'vitest';
import { MAX_REDIRECTS, apiRequest, buildUrl } from '../src/api.js';
import { NemligError, NemligHttpError } from '../src/errors.js';
import { buildHeaders, createSession } from '../src/session.js';
import { ENDPOINTS } from '../src/types.js';
import { jsonResponse, requestBody, requestHeaders, stubFetch } from './fetch-stub.js';

describe('buildUrl', () => {
  it('appends params and drops undefined values', () => {
    expect(buildUrl('https://example.test/search', { q: 'milk', take: 5, skip: undefined }))
      .toBe('https://example.test/search?q=milk&take=5');
  });

  it('leaves the URL alone without params', () => {
    expect(buildUrl(ENDPOINTS.basket)).toBe(ENDPOINTS.basket);
  });
});

describe('apiRequest', () => {
  it('returns parsed JSON', async () => {
    stubFetch(() => jsonResponse({ Lines: [] }));
    const session = createSession({ quiet: true });

    const data = await apiRequest(session, ENDPOINTS.basket, { headers: buildHeaders(session) });

    expect(data).toEqual({ Lines: [] });
  });

  it('sends POST bodies as JSON', async () => {
    const fetchMock = stubFetch(() => jsonResponse({}));
    const session = createSession({ quiet: true });

    await apiRequest(session, ENDPOINTS.addToBasket, {
      method: 'POST',
      headers: buildHeaders(session),
      body: { ProductId: '701025', quantity: 2 },
    });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(ENDPOINTS.addToBasket);
    expect(init?.method).toBe('POST');
    expect(requestBody(init)).toEqual({ ProductId: '701025', quantity: 2 });
  });

  it('returns null for an empty body', async () => {
    stubFetch(() => new Response('', { status: 200 }));
    const session = createSession({ quiet: true });

    await expect(apiRequest(session, ENDPOINTS.basket, { headers: buildHeaders(session) })).resolves.toBeNull();
  });

  it('throws NemligHttpError with status and body on non-2xx', async () => {
    stubFetch(() => new Response('not here', { status: 404, statusText: 'Not Found' }));
    const session = createSession({ quiet: true });

    const error = await apiRequest(session, ENDPOINTS.basket, { headers: buildHeaders(session) })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NemligHttpError);
    if (error instanceof NemligHttpError) {
      expect(error.status).toBe(404);
      expect(error.body).toBe('not here');
      expect(error.message).toBe(`GET ${ENDPOINTS.basket} failed: 404 Not Found`);
      expect(error.code).toBe('HTTP_ERROR');
    }
  });

  it('rejects a body that is not JSON', async () => {
    stubFetch(() => new Response('<html></html>', { status: 200 }));
    const session = createSession({ quiet: true });

    await expect(apiRequest(session, ENDPOINTS.basket, { headers: buildHeaders(session) }))
      .rejects.toMatchObject({ code: 'INVALID_JSON' });
    await expect(apiRequest(session, ENDPOINTS.basket, { headers: buildHeaders(session) }))
      .rejects.toBeInstanceOf(NemligError);
  });

  it('replays cookies from the session jar', async () => {
    const fetchMock = stubFetch(() => jsonResponse({}));
    const session = createSession({ quiet: true });
    await session.cookies.setCookie('sid=abc; Path=/', ENDPOINTS.home);

    await apiRequest(session, ENDPOINTS.basket, { headers: buildHeaders(session) });

    expect(requestHeaders(fetchMock.mock.calls[0][1]).get('Cookie')).toBe('sid=abc');
  });

  it('sends no cookie header with an empty jar', async () => {
    const fetchMock = stubFetch(() => jsonResponse({}));
    const session = createSession({ quiet: true });

    await apiRequest(session, ENDPOINTS.basket, { headers: buildHeaders(session) });

    expect(requestHeaders(fetchMock.mock.calls[0][1]).get('Cookie')).toBeNull();
  });

  it('stores cookies set on a redirect hop before following it', async () => {
    const fetchMock = stubFetch(url =>
      url.pathname === '/webapi/basket/GetBasket'
        ? new Response(null, {
          status: 302,
          headers: { Location: '/webapi/basket/Current', 'Set-Cookie': 'hop=1; Path=/' },
        })
        : jsonResponse({ Lines: [] })
    );
    const session = createSession({ quiet: true });

    const data = await apiRequest(session, ENDPOINTS.basket, { headers: buildHeaders(session) });

    expect(data).toEqual({ Lines: [] });
    expect(fetchMock.mock.calls.map(([url]) => url)).toEqual([
      ENDPOINTS.basket,
      'https://www.nemlig.com/webapi/basket/Current',
    ]);
    expect(fetchMock.mock.calls[0][1]?.redirect).toBe('manual');
    expect(requestHeaders(fetchMock.mock.calls[1][1]).get('Cookie')).toBe('hop=1');
  });

  it('continues a POST as a bodiless GET after 303', async () => {
    const fetchMock = stubFetch(url =>
      url.pathname === '/webapi/login'
        ? new Response(null, { status: 303, headers: { Location: 'https://www.nemlig.com/' } })
        : jsonResponse({ RedirectUrl: '/' })
    );
    const session = createSession({ quiet: true });

    await apiRequest(session, ENDPOINTS.login, {
      method: 'POST',
      headers: buildHeaders(session),
      body: { Username: 'me@example.com' },
    });

    const [url, init] = fetchMock.mock.calls[1];
    expect(url).toBe('https://www.nemlig.com/');
    expect(init?.method).toBe('GET');
    expect(init?.body).toBeUndefined();
  });

  it('gives up after too many redirects', async () => {
    const fetchMock = stubFetch(() =>
      new Response(null, { status: 302, headers: { Location: '/webapi/basket/GetBasket' } })
    );
    const session = createSession({ quiet: true });

    await expect(apiRequest(session, ENDPOINTS.basket, { headers: buildHeaders(session) }))
      .rejects.toMatchObject({ code: 'TOO_MANY_REDIRECTS' });
    expect(fetchMock).toHaveBeenCalledTimes(MAX_REDIRECTS + 1);
  });

  it('logs only request keys and no response text for sensitive calls', async () => {
    stubFetch(() => jsonResponse({ access_token: 'test-token' }));
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    const session = createSession({ debug: true, quiet: true });

    await apiRequest(session, ENDPOINTS.login, {
      method: 'POST',
      headers: buildHeaders(session),
      body: { Username: 'me@example.com', Password: 'test-secret' },
      sensitive: true,
    });

    expect(stderr.mock.calls.map(([message]) => message)).toEqual([
      `DEBUG: POST ${ENDPOINTS.login}: ["Username","Password"]`,
      `DEBUG: POST ${ENDPOINTS.login} -> 200: <29 chars redacted>`,
    ]);
  });
});
