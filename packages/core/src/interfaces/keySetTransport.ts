/**
 * Result of a key-set GET. `body` is the parsed JSON body of a 200 response
 * and `undefined` for any other status.
 */
export interface KeySetResponse {
  status: number;
  body: unknown;
}

/**
 * Abstract "perform GET, get status + JSON body or error" capability the
 * JWKS cache depends on. Connection reuse, TLS and retries belong to the
 * implementation.
 */
export interface KeySetTransport {
  /**
   * @param path - Path of the key set relative to the transport's base URL
   * @param signal - Aborts the request when triggered
   * @throws When the request fails or the body is not JSON
   */
  get(path: string, signal?: AbortSignal): Promise<KeySetResponse>;
}
