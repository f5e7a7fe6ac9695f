import { z } from 'zod';

export const TOKEN_USE_ACCESS = 'access';
export const TOKEN_USE_ID = 'id';

interface BaseTokenClaims {
  issuer: string;
  tokenUse: string;
  /** Expiry as seconds since the Unix epoch */
  expiry: number;
  /** Group memberships, in token order */
  roles: string[];
  email?: string;
}

/** Access token: identifies the calling client by `client_id`. */
export interface AccessTokenClaims extends BaseTokenClaims {
  variant: typeof TOKEN_USE_ACCESS;
  clientId: string;
}

/** ID token: identifies the client through the `aud` claim. */
export interface IdTokenClaims extends BaseTokenClaims {
  variant: typeof TOKEN_USE_ID;
  audience: string[];
}

/** Any other `token_use`; never accepted by the claims policy. */
export interface UnknownTokenClaims extends BaseTokenClaims {
  variant: 'unknown';
}

export type TokenClaims = AccessTokenClaims | IdTokenClaims | UnknownTokenClaims;

/**
 * Wire shape of the claims segment. Access and ID tokens share one flat JSON
 * object, so every variant-specific field is optional here.
 */
export const JwtClaimsWireSchema = z.object({
  iss: z.string(),
  token_use: z.string(),
  exp: z.number().int(),
  client_id: z.string().optional(),
  'cognito:groups': z.array(z.string()).optional(),
  aud: z.union([z.string(), z.array(z.string())]).optional(),
  email: z.string().optional(),
});

export const JwtClaimsSchema = JwtClaimsWireSchema.transform((wire): TokenClaims => {
  const base = {
    issuer: wire.iss,
    tokenUse: wire.token_use,
    expiry: wire.exp,
    roles: wire['cognito:groups'] ?? [],
    email: wire.email,
  };
  switch (wire.token_use) {
    case TOKEN_USE_ACCESS:
      return { ...base, variant: TOKEN_USE_ACCESS, clientId: wire.client_id ?? '' };
    case TOKEN_USE_ID:
      return {
        ...base,
        variant: TOKEN_USE_ID,
        audience: typeof wire.aud === 'string' ? [wire.aud] : (wire.aud ?? []),
      };
    default:
      return { ...base, variant: 'unknown' };
  }
});

export type JwtClaimsWire = z.input<typeof JwtClaimsWireSchema>;
