import { vi } from 'vitest';
import type { Logger } from '../src/shared/logger.js';

export const createTestLogger = () => ({
  debug: vi.fn<Logger['debug']>(),
  info: vi.fn<Logger['info']>(),
  warn: vi.fn<Logger['warn']>(),
  error: vi.fn<Logger['error']>(),
});

export type FetchMock = ReturnType<typeof createFetchMock>;

export const createFetchMock = () =>
  vi.fn<(input: string | URL | Request, init?: RequestInit) => Promise<Response>>();

export const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });

export const requestBody = (fetchMock: FetchMock, call = 0): unknown => {
  const init = fetchMock.mock.calls[call]?.[1];
  return JSON.parse(String(init?.body));
};

export const requestUrl = (fetchMock: FetchMock, call = 0): string => {
  const input = fetchMock.mock.calls[call]?.[0];
  if (input instanceof Request) {
    return input.url;
  }
  return String(input);
};
