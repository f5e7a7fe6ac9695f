import { z } from 'zod';

export const JwtHeaderSchema = z
  .object({
    alg: z.string().default(''),
    typ: z.string().default(''),
    kid: z.string().default(''),
  })
  .transform((header) => ({
    algorithm: header.alg,
    type: header.typ,
    keyId: header.kid,
  }));

export type TokenHeader = z.output<typeof JwtHeaderSchema>;
