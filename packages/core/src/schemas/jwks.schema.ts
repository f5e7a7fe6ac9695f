import { z } from 'zod';

/** Body of `GET /.well-known/jwks.json`. Individual keys are validated one at a time. */
export const JWKSResponseSchema = z.object({
  keys: z.array(z.unknown()),
});

/** Minimal shape used to pick out RSA keys before full validation. */
export const KeyTypeSchema = z.object({
  kty: z.string(),
});

/** RSA JSON Web Key (RFC 7517 / RFC 7518 §6.3.1) with unpadded base64url `n` and `e`. */
export const RSAJsonWebKeySchema = z.object({
  kid: z.string().default(''),
  kty: z.literal('RSA'),
  alg: z.string().optional(),
  use: z.string().optional(),
  n: z.string(),
  e: z.string(),
});

export type JWKSResponse = z.infer<typeof JWKSResponseSchema>;
export type RSAJsonWebKey = z.output<typeof RSAJsonWebKeySchema>;
