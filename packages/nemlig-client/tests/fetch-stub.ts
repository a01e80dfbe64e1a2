import { vi } from 'vitest';

export type FetchHandler = (url: URL, init: RequestInit | undefined) => Response;

/**
 * Replace global fetch with an in-process router.
 */
export function stubFetch(handler: FetchHandler) {
  const fetchMock = vi.fn(async (input: string, init?: RequestInit) => handler(new URL(input), init));
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function requestHeaders(init: RequestInit | undefined): Headers {
  return new Headers(init?.headers);
}

export function requestBody(init: RequestInit | undefined): unknown {
  return JSON.parse(String(init?.body));
}
