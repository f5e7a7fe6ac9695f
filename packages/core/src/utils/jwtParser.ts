import type { z } from 'zod';

import { TokenFormatError } from '../errors.js';
import { JwtClaimsSchema, type TokenClaims } from '../schemas/jwt/jwtClaims.schema.js';
import { JwtHeaderSchema, type TokenHeader } from '../schemas/jwt/jwtHeader.schema.js';

import { decodeBase64Url } from './base64url.js';

/** The three raw base64url segments of a compact JWT */
export interface TokenSegments {
  header64: string;
  claims64: string;
  signature64: string;
}

/**
 * Splits a compact JWT into its segments without decoding them.
 *
 * @throws {TokenFormatError} Unless the token has exactly three non-empty segments
 */
export function splitToken(token: string): TokenSegments {
  const parts = token.split('.');
  if (parts.length !== 3 || parts.some((part) => part.length === 0)) {
    throw new TokenFormatError('invalid JWT format');
  }
  const [header64, claims64, signature64] = parts;
  return { header64, claims64, signature64 };
}

export function decodeHeader(header64: string): TokenHeader {
  return decodeSegment(header64, JwtHeaderSchema, 'header');
}

export function decodeClaims(claims64: string): TokenClaims {
  return decodeSegment(claims64, JwtClaimsSchema, 'claims');
}

/**
 * Decodes the claims of a token into the typed claims union.
 * Performs no verification; never use the result to authorize a request.
 *
 * @throws {TokenFormatError} When the token or its claims segment is malformed
 */
export function decodeTokenClaims(token: string): TokenClaims {
  return decodeClaims(splitToken(token).claims64);
}

/**
 * Decodes the claims of a token into an open map for display or debugging.
 * A numeric `exp` is replaced by the corresponding `Date`.
 * Performs no verification; never use the result to authorize a request.
 *
 * @throws {TokenFormatError} When the token or its claims segment is malformed
 *
 * @example
 * ```typescript
 * const claims = decodeClaimsAsMap(token);
 * console.log(claims.email, claims.exp); // 'jane@example.com' 2026-10-19T12:00:00.000Z
 * ```
 */
export function decodeClaimsAsMap(token: string): Record<string, unknown> {
  const json = parseSegmentJson(splitToken(token).claims64, 'claims');
  if (typeof json !== 'object' || json === null || Array.isArray(json)) {
    throw new TokenFormatError('invalid JWT claims format');
  }
  const claims: Record<string, unknown> = { ...json };
  if (typeof claims.exp === 'number') {
    claims.exp = new Date(Math.trunc(claims.exp) * 1000);
  }
  return claims;
}

function decodeSegment<T extends z.ZodType>(
  segment: string,
  schema: T,
  name: 'header' | 'claims',
): z.output<T> {
  const result = schema.safeParse(parseSegmentJson(segment, name));
  if (!result.success) {
    throw new TokenFormatError(`invalid JWT ${name} format`);
  }
  return result.data;
}

function parseSegmentJson(segment: string, name: 'header' | 'claims'): unknown {
  let text: string;
  try {
    text = new TextDecoder('utf-8', { fatal: true }).decode(decodeBase64Url(segment));
  } catch {
    throw new TokenFormatError(`invalid JWT ${name} encoding`);
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    throw new TokenFormatError(`invalid JWT ${name} format`);
  }
}
