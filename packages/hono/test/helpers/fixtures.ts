import type { JWTVerifierConfig, KeySetTransport } from '@jwt-keyguard/core';
import type { JWTPayload } from 'jose';
import { vi } from 'vitest';

import {
  createAccessClaims,
  ISSUER,
  CLIENT_ID,
  NOW,
  publicJwk,
  signToken,
  type TestSigner,
} from '../../../core/test/helpers/fixtures.js';

export {
  CLIENT_ID,
  createSigner,
  encodeSegment,
  NOW_SECONDS,
  type TestSigner,
} from '../../../core/test/helpers/fixtures.js';

/** Transport serving the signer's public key on every GET */
export const createKeySetTransport = async (signer: TestSigner) => {
  const get = vi.fn<KeySetTransport['get']>().mockResolvedValue({
    status: 200,
    body: { keys: [await publicJwk(signer)] },
  });
  const transport: KeySetTransport = { get };
  return { transport, get };
};

export const createConfig = (transport: KeySetTransport): JWTVerifierConfig => ({
  issuer: ISSUER,
  tokenUse: 'access',
  clientIds: [CLIENT_ID],
  jwks: { transport },
  clock: () => NOW,
});

/** Access token carrying the `admin` group unless overridden */
export const signAccessToken = async (
  signer: TestSigner,
  overrides: JWTPayload = {},
): Promise<string> =>
  await signToken(signer, createAccessClaims({ 'cognito:groups': ['admin'], ...overrides }));

export const bearer = (token: string) => ({ headers: { Authorization: `Bearer ${token}` } });
