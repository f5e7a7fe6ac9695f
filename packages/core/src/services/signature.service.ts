import { verify } from 'node:crypto';

import { SignatureError } from '../errors.js';
import type { RSAPublicKey } from '../interfaces/jwks.js';
import { decodeBase64Url } from '../utils/base64url.js';

/**
 * Checks an RS256 (RSASSA-PKCS1-v1_5 over SHA-256) signature.
 *
 * @param signingInput - Exact bytes of `header64 + "." + claims64` as they appear in the token
 * @param signature64 - Signature segment, unpadded base64url
 * @param key - Public key selected by the token's `kid`
 * @throws {SignatureError} When the signature segment is undecodable or does not match
 */
export function verifyRS256(
  signingInput: Uint8Array,
  signature64: string,
  key: RSAPublicKey,
): void {
  let signature: Uint8Array;
  try {
    signature = decodeBase64Url(signature64);
  } catch {
    throw new SignatureError('invalid JWT signature format');
  }

  let valid: boolean;
  try {
    valid = verify('RSA-SHA256', signingInput, key.keyObject, signature);
  } catch {
    valid = false;
  }
  if (!valid) {
    throw new SignatureError('invalid JWT signature');
  }
}

/** Bytes a JWS signature is computed over: the two encoded segments joined by a period. */
export function signingInputOf(header64: string, claims64: string): Uint8Array {
  return new TextEncoder().encode(`${header64}.${claims64}`);
}
