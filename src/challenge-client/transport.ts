import { API_PREFIX, SECRET_PARAM } from '@shared/constants';
import { silentLogger, type Logger } from '@shared/logger';
import type { HttpMethod, QueryParams, RequestOptions } from '@shared/types';

export interface TransportConfig {
  /** Server root, without the api/ prefix */
  baseUrl: string;
  /** Custom fetch implementation (defaults to the global one) */
  fetch?: typeof fetch;
  logger?: Logger;
}

/**
 * A non-2xx response. Carries the status and body; the URL is kept without
 * its query string so the secret never ends up in messages or logs.
 */
export class HttpError extends Error {
  readonly status: number;
  readonly statusText: string;
  readonly url: string;
  readonly body: string;

  constructor(status: number, statusText: string, url: string, body: string) {
    super(`${status} ${statusText} for url: ${url}`);
    this.name = 'HttpError';
    this.status = status;
    this.statusText = statusText;
    this.url = url;
    this.body = body;
  }
}

/** Percent-escape each path segment, keeping the slashes between them. */
export function escapeSubpath(subpath: string): string {
  return subpath.split('/').map(encodeURIComponent).join('/');
}

export function resolveApiBase(baseUrl: string): URL {
  const root = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  return new URL(API_PREFIX, root);
}

/**
 * HTTP transport for the challenge API: resolves subpaths under the api/
 * prefix, merges the secret into the query and turns non-2xx responses into
 * HttpError. Network failures from fetch propagate as they are.
 */
export class HttpTransport {
  readonly apiBase: URL;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(config: TransportConfig) {
    this.apiBase = resolveApiBase(config.baseUrl);
    this.fetchImpl = config.fetch ?? fetch;
    this.logger = config.logger ?? silentLogger;
  }

  buildUrl(subpath: string, query: QueryParams): URL {
    const url = new URL(escapeSubpath(subpath), this.apiBase);
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, String(value));
    }
    return url;
  }

  async get(subpath: string, secret: string, options: RequestOptions = {}): Promise<string> {
    return this.request('GET', subpath, secret, options);
  }

  async post(subpath: string, secret: string, options: RequestOptions = {}): Promise<string> {
    return this.request('POST', subpath, secret, options);
  }

  /**
   * Send one request and return the response text.
   *
   * The secret is merged into the query last, so it overrides any
   * caller-supplied parameter of the same name.
   */
  async request(
    method: HttpMethod,
    subpath: string,
    secret: string,
    options: RequestOptions = {},
  ): Promise<string> {
    const url = this.buildUrl(subpath, { ...options.query, [SECRET_PARAM]: secret });
    const headers: Record<string, string> = { ...options.headers };
    const init: RequestInit = { method, headers };

    if (options.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      init.body = JSON.stringify(options.json);
    }

    const response = await this.fetchImpl(url, init);
    const text = await response.text();
    const target = `${url.origin}${url.pathname}`;
    this.logger.debug(`${method} ${target} -> ${response.status}`);

    if (!response.ok) {
      throw new HttpError(response.status, response.statusText, target, text);
    }
    return text;
  }
}
