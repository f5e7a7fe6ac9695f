import type { Logger } from 'pino';

import type { KeySetTransport } from './keySetTransport.js';

/** Key set served over HTTP(S) by the token signer */
export interface HttpKeySetSource {
  /** Base URL of the signer (e.g., 'https://cognito-idp.eu-west-1.amazonaws.com/eu-west-1_abc') */
  baseUrl: string;
  /** Key set path appended to `baseUrl` (defaults to '/.well-known/jwks.json') */
  path?: string;
  /** Request timeout in milliseconds (defaults to 5000) */
  timeoutMs?: number;
  /** User-Agent header value (defaults to 'jwt-keyguard/<version>') */
  userAgent?: string;
}

/** Caller-supplied transport, e.g. a shared HTTP client */
export interface CustomKeySetSource {
  transport: KeySetTransport;
  /** Key set path passed to the transport (defaults to '/.well-known/jwks.json') */
  path?: string;
}

/**
 * Configuration object for initializing a JWT verifier.
 * Holds the claims expectations shared by every call and the key-set source.
 */
export interface JWTVerifierConfig {
  /** Expected `iss` claim */
  issuer: string;

  /** Expected `token_use` claim: 'access' or 'id' */
  tokenUse: string;

  /** Accepted client IDs (`client_id` for access tokens, `aud` for ID tokens) */
  clientIds: string[];

  /** Where the signer's public keys are fetched from */
  jwks: HttpKeySetSource | CustomKeySetSource;

  /** Optional pino logger */
  logger?: Logger;

  /** Clock used for expiry checks (defaults to the system clock) */
  clock?: () => Date;
}
