import { base64url } from 'jose';

const UNPADDED_BASE64URL = /^[A-Za-z0-9_-]*$/;

/**
 * Decodes unpadded base64url. Rejects padding, characters outside the
 * URL-safe alphabet and lengths that cannot carry whole bytes.
 *
 * @throws {TypeError} When the input is not unpadded base64url
 */
export function decodeBase64Url(input: string): Uint8Array {
  if (!UNPADDED_BASE64URL.test(input) || input.length % 4 === 1) {
    throw new TypeError('input is not unpadded base64url');
  }
  return base64url.decode(input);
}

export function encodeBase64Url(input: Uint8Array | string): string {
  return base64url.encode(input);
}
