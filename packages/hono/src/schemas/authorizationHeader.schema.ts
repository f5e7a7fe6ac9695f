import { z } from 'zod';

const BEARER_PREFIX = 'Bearer ';

/**
 * Zod schema for an `Authorization: Bearer <token>` header; outputs the token.
 */
export const AuthorizationHeaderSchema = z
  .string()
  .startsWith(BEARER_PREFIX)
  .transform((header) => header.slice(BEARER_PREFIX.length).trim())
  .pipe(z.string().min(1));

/**
 * Bearer token extracted from a validated Authorization header.
 */
export type BearerToken = z.output<typeof AuthorizationHeaderSchema>;
