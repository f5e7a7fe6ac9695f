import { type Logger, pino } from 'pino';

import { KeySetFetchError } from '../errors.js';
import type { KeySet, RSAPublicKey } from '../interfaces/jwks.js';
import type { KeySetResponse, KeySetTransport } from '../interfaces/keySetTransport.js';
import {
  JWKSResponseSchema,
  KeyTypeSchema,
  RSAJsonWebKeySchema,
} from '../schemas/jwks.schema.js';
import { formatError } from '../utils/errorFormatting.js';
import { decodeRSAKey } from '../utils/keyCodec.js';
import { DEFAULT_JWKS_PATH } from '../utils/keySetFetch.js';

/**
 * Holds the signer's current RSA public keys, indexed by key id.
 *
 * `fetch` builds a complete new key set off to the side and swaps it in with a
 * single assignment once the network call has finished, so `lookup` always
 * sees either the previous set or the new one, never a mix. A failed fetch
 * keeps the previous set. Concurrent fetches are not coalesced; the last one
 * to complete wins.
 *
 * The cache never refreshes on its own: callers decide when to call `fetch`.
 */
export class JWKSCache {
  private keys: KeySet = new Map();
  private logger: Logger;

  /**
   * @param transport - Performs the key-set GET
   * @param logger - Optional pino logger
   * @param path - Key set path (defaults to '/.well-known/jwks.json')
   */
  constructor(
    private transport: KeySetTransport,
    logger?: Logger,
    private path = DEFAULT_JWKS_PATH,
  ) {
    this.logger = logger ?? pino({ enabled: false });
  }

  /**
   * Fetches the key set and replaces the cached one.
   *
   * Non-RSA keys are dropped. RSA keys that fail to decode are logged and
   * skipped.
   *
   * @param signal - Aborts the network call
   * @throws {KeySetFetchError} When the request fails or is aborted, the status
   * is not 200, the body is not a key set, or no usable key remains
   */
  async fetch(signal?: AbortSignal): Promise<void> {
    let response: KeySetResponse;
    try {
      signal?.throwIfAborted();
      response = await this.transport.get(this.path, signal);
      // the transport may not honor the signal
      signal?.throwIfAborted();
    } catch (error) {
      this.logger.error({ err: error, path: this.path }, 'JWKS request failed');
      throw new KeySetFetchError(`JWKS fetch: ${formatError(error)}`, { cause: error });
    }

    if (response.status !== 200) {
      this.logger.error({ status: response.status, path: this.path }, 'JWKS unexpected status');
      throw new KeySetFetchError(`JWKS fetch: expected 200, got ${response.status}`);
    }

    const parsed = JWKSResponseSchema.safeParse(response.body);
    if (!parsed.success) {
      this.logger.error({ path: this.path }, 'JWKS response is not a key set');
      throw new KeySetFetchError('JWKS fetch: invalid key set format');
    }

    const keys = this.decodeKeys(parsed.data.keys);
    if (keys.size === 0) {
      throw new KeySetFetchError('JWKS fetch: empty key set');
    }

    this.keys = keys;
    this.logger.info({ keyIds: [...keys.keys()] }, 'JWKS refreshed');
  }

  /**
   * Returns the cached key for `kid`. Never triggers a fetch.
   */
  lookup(kid: string): RSAPublicKey | undefined {
    return this.keys.get(kid);
  }

  /** Number of keys currently cached */
  get size(): number {
    return this.keys.size;
  }

  /** Key ids currently cached, in key-set order */
  keyIds(): string[] {
    return [...this.keys.keys()];
  }

  private decodeKeys(rawKeys: unknown[]): Map<string, RSAPublicKey> {
    const keys = new Map<string, RSAPublicKey>();
    for (const raw of rawKeys) {
      const keyType = KeyTypeSchema.safeParse(raw);
      if (!keyType.success || keyType.data.kty !== 'RSA') {
        continue;
      }

      const jwk = RSAJsonWebKeySchema.safeParse(raw);
      if (!jwk.success) {
        this.logger.warn({ error: jwk.error.message }, 'JWK to RSA: malformed key');
        continue;
      }

      try {
        keys.set(jwk.data.kid, decodeRSAKey(jwk.data));
      } catch (error) {
        this.logger.warn({ kid: jwk.data.kid, error: formatError(error) }, 'JWK to RSA failed');
      }
    }
    return keys;
  }
}
