import { createPublicKey, type KeyObject } from 'node:crypto';

import { KeyDecodeError } from '../errors.js';
import type { RSAPublicKey } from '../interfaces/jwks.js';
import type { RSAJsonWebKey } from '../schemas/jwks.schema.js';

import { decodeBase64Url, encodeBase64Url } from './base64url.js';
import { formatError } from './errorFormatting.js';

const MAX_UINT32 = 0xffffffffn;

/**
 * Converts an RSA JSON Web Key into a public key usable for RS256 checks.
 *
 * The exponent is read as a big-endian unsigned integer: 3 bytes are
 * left-padded to 4, 4 bytes are read directly, and any other length is read
 * at arbitrary precision. The result must fit in 32 bits.
 *
 * @param jwk - RSA key from a key set
 * @returns Decoded modulus, exponent and a Node key object
 * @throws {KeyDecodeError} When `n` or `e` is not unpadded base64url, `n` is
 * zero, the exponent exceeds 2^32 - 1, or the values do not form an RSA public key
 *
 * @example
 * ```typescript
 * const key = decodeRSAKey({ kid: 'k1', kty: 'RSA', n: '0vx7...', e: 'AQAB' });
 * key.exponent; // 65537
 * ```
 */
export function decodeRSAKey(jwk: RSAJsonWebKey): RSAPublicKey {
  const modulusBytes = decodeKeyField(jwk.n, 'modulus');
  const exponentBytes = decodeKeyField(jwk.e, 'exponent');

  const modulus = bytesToBigInt(modulusBytes);
  if (modulus === 0n) {
    throw new KeyDecodeError('JWK modulus is empty');
  }
  const exponent = decodeExponent(exponentBytes);

  return {
    kid: jwk.kid,
    modulus,
    exponent,
    keyObject: toKeyObject(modulus, exponent),
  };
}

/**
 * Interprets exponent bytes as an unsigned 32-bit value.
 *
 * @throws {KeyDecodeError} When the value exceeds 2^32 - 1
 */
export function decodeExponent(bytes: Uint8Array): number {
  switch (bytes.length) {
    case 3: {
      const padded = new Uint8Array([0, ...bytes]);
      return new DataView(padded.buffer).getUint32(0);
    }
    case 4:
      return new DataView(bytes.buffer, bytes.byteOffset, 4).getUint32(0);
    default: {
      const value = bytesToBigInt(bytes);
      if (value > MAX_UINT32) {
        throw new KeyDecodeError('JWK exponent too large');
      }
      return Number(value);
    }
  }
}

function decodeKeyField(value: string, field: 'modulus' | 'exponent'): Uint8Array {
  try {
    return decodeBase64Url(value);
  } catch (error) {
    throw new KeyDecodeError(`invalid JWK ${field} encoding: ${formatError(error)}`);
  }
}

function bytesToBigInt(bytes: Uint8Array): bigint {
  if (bytes.length === 0) {
    return 0n;
  }
  return BigInt(`0x${Buffer.from(bytes).toString('hex')}`);
}

function bigIntToBytes(value: bigint): Uint8Array {
  let hex = value.toString(16);
  if (hex.length % 2 === 1) {
    hex = `0${hex}`;
  }
  return Uint8Array.from(Buffer.from(hex, 'hex'));
}

function toKeyObject(modulus: bigint, exponent: number): KeyObject {
  try {
    return createPublicKey({
      key: {
        kty: 'RSA',
        n: encodeBase64Url(bigIntToBytes(modulus)),
        e: encodeBase64Url(bigIntToBytes(BigInt(exponent))),
      },
      format: 'jwk',
    });
  } catch (error) {
    throw new KeyDecodeError(`invalid RSA public key: ${formatError(error)}`);
  }
}
