import type { KeyObject } from 'node:crypto';

/**
 * RSA public key decoded from a JSON Web Key.
 */
export interface RSAPublicKey {
  /** Key identifier from the source JWK */
  kid: string;

  /** Modulus `n` as an unsigned big-endian integer */
  modulus: bigint;

  /** Public exponent `e`, at most 2^32 - 1 */
  exponent: number;

  /** Node key object built from `modulus` and `exponent`, ready for signature checks */
  keyObject: KeyObject;
}

/**
 * Immutable snapshot of a fetched key set, indexed by key id.
 * Replaced as a whole on every successful refresh.
 */
export type KeySet = ReadonlyMap<string, RSAPublicKey>;
