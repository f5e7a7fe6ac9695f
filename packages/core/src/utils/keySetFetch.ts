import packageJson from '../../package.json' with { type: 'json' };

import type { HttpKeySetSource } from '../interfaces/jwtVerifierConfig.js';
import type { KeySetResponse, KeySetTransport } from '../interfaces/keySetTransport.js';

export const DEFAULT_USER_AGENT = `jwt-keyguard/${packageJson.version}`;
export const DEFAULT_JWKS_PATH = '/.well-known/jwks.json';
export const DEFAULT_TIMEOUT_MS = 5000;

/**
 * Wrapper around fetch() that adds a User-Agent header unless the caller set one.
 *
 * @param url - Request URL (string or URL object)
 * @param init - Fetch options (headers, method, signal, etc.)
 * @param userAgent - Header value used when none is present
 */
// oxlint-disable-next-line require-await
export async function keySetServiceFetch(
  url: string | URL,
  init?: RequestInit,
  userAgent = DEFAULT_USER_AGENT,
): Promise<Response> {
  const headers = new Headers(init?.headers);
  if (!headers.has('User-Agent')) {
    headers.set('User-Agent', userAgent);
  }
  return fetch(url, {
    ...init,
    headers,
  });
}

/**
 * Key-set transport backed by the global fetch(). The request URL is
 * `baseUrl + path`; each request is bounded by `timeoutMs` and by the
 * caller's signal, whichever fires first.
 *
 * @example
 * ```typescript
 * const transport = new FetchKeySetTransport({
 *   baseUrl: 'https://auth.example.com',
 *   timeoutMs: 3000,
 * });
 * const { status, body } = await transport.get('/.well-known/jwks.json');
 * ```
 */
export class FetchKeySetTransport implements KeySetTransport {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly userAgent?: string;

  constructor(source: Omit<HttpKeySetSource, 'path'>) {
    this.baseUrl = source.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = source.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.userAgent = source.userAgent;
  }

  async get(path: string, signal?: AbortSignal): Promise<KeySetResponse> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const response = await keySetServiceFetch(
      `${this.baseUrl}${path}`,
      {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      },
      this.userAgent,
    );

    if (response.status !== 200) {
      await response.body?.cancel();
      return { status: response.status, body: undefined };
    }

    const body: unknown = await response.json();
    return { status: response.status, body };
  }
}
