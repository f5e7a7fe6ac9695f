import { generateKeyPairSync, type KeyObject } from 'node:crypto';

import { exportJWK, type JWTPayload, SignJWT } from 'jose';
import { vi } from 'vitest';

import type { KeySetResponse, KeySetTransport } from '../../src/interfaces/index.js';

export const ISSUER = 'https://issuer.example';
export const CLIENT_ID = 'client-1';
/** 2026-01-01T00:00:00Z */
export const NOW = new Date('2026-01-01T00:00:00.000Z');
export const NOW_SECONDS = 1767225600;

export interface TestSigner {
  kid: string;
  privateKey: KeyObject;
  publicKey: KeyObject;
}

export const createSigner = (kid: string): TestSigner => {
  const { privateKey, publicKey } = generateKeyPairSync('rsa', { modulusLength: 2048 });
  return { kid, privateKey, publicKey };
};

/** Public JWK of a signer, as a key-set endpoint would publish it */
export const publicJwk = async (signer: TestSigner) => ({
  ...(await exportJWK(signer.publicKey)),
  kid: signer.kid,
  alg: 'RS256',
  use: 'sig',
});

export const keySetBody = async (...signers: TestSigner[]) => ({
  keys: await Promise.all(signers.map(publicJwk)),
});

export const createAccessClaims = (overrides: JWTPayload = {}): JWTPayload => ({
  iss: ISSUER,
  token_use: 'access',
  client_id: CLIENT_ID,
  exp: NOW_SECONDS + 3600,
  'cognito:groups': [],
  ...overrides,
});

export const createIdClaims = (overrides: JWTPayload = {}): JWTPayload => ({
  iss: ISSUER,
  token_use: 'id',
  aud: CLIENT_ID,
  exp: NOW_SECONDS + 3600,
  email: 'jane@example.com',
  ...overrides,
});

export const signToken = async (signer: TestSigner, claims: JWTPayload): Promise<string> =>
  await new SignJWT(claims)
    .setProtectedHeader({ alg: 'RS256', typ: 'JWT', kid: signer.kid })
    .sign(signer.privateKey);

export const encodeSegment = (value: unknown): string =>
  Buffer.from(JSON.stringify(value)).toString('base64url');

/** Key-set transport answering each GET with the next queued response */
export const createStubTransport = (...responses: KeySetResponse[]) => {
  const get = vi.fn<KeySetTransport['get']>();
  for (const response of responses) {
    get.mockResolvedValueOnce(response);
  }
  const transport: KeySetTransport = { get };
  return { transport, get };
};
