import { vi } from 'vitest';

export interface RecordedRequest {
  method: string;
  url: URL;
  headers: Headers;
  body: string | undefined;
}

export interface FakeResponse {
  status?: number;
  statusText?: string;
  body: string;
}

/**
 * In-process stand-in for fetch: answers with the queued responses in order
 * and records every request it sees.
 */
export function createFakeFetch(...responses: FakeResponse[]) {
  const queue = [...responses];
  const requests: RecordedRequest[] = [];

  const fetchImpl = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
    requests.push({
      method: init?.method ?? 'GET',
      url: new URL(String(input)),
      headers: new Headers(init?.headers),
      body: typeof init?.body === 'string' ? init.body : undefined,
    });

    const next = queue.shift();
    if (!next) {
      throw new Error('unexpected request');
    }
    return new Response(next.body, {
      status: next.status ?? 200,
      statusText: next.statusText ?? '',
    });
  });

  return { fetch: fetchImpl, requests };
}
