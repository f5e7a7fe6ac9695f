import type { JWTVerifierConfig, RoleGroups, TokenClaims } from '@jwt-keyguard/core';
import type { MiddlewareHandler } from 'hono';
import { endTime, startTime } from 'hono/timing';

import { getJWTVerifier } from '../jwtVerifier.js';
import { AuthorizationHeaderSchema } from '../schemas/authorizationHeader.schema.js';

/**
 * Context variables available when using JWT protection middleware.
 */
export interface JWTContextVariables {
  jwtClaims: TokenClaims;
}

export type JWTMiddleware = MiddlewareHandler<{ Variables: JWTContextVariables }>;

/**
 * Builds route middleware from a role requirement.
 * Role groups are ORed within a group and ANDed across groups.
 */
export type JWTGuard = (roleGroups?: RoleGroups) => JWTMiddleware;

/**
 * Creates a guard whose middleware verifies the request's bearer token.
 *
 * Responds 401 `{ error }` when the token cannot be trusted and 403 `{ error }`
 * when its roles miss a required group. On success the verified claims are
 * available as `c.get('jwtClaims')`.
 *
 * @param config - The verifier configuration object
 * @returns Guard producing middleware per role requirement
 *
 * @example
 * ```typescript
 * const jwt = requireJWT(config);
 * app.get('/invoices', jwt([['admin', 'owner'], ['billing']]), listInvoices);
 * ```
 */
export function requireJWT(config: JWTVerifierConfig): JWTGuard {
  return (roleGroups = []) =>
    async (c, next) => {
      startTime(c, 'verifyJWT');

      const header = AuthorizationHeaderSchema.safeParse(c.req.header('Authorization'));
      if (!header.success) {
        endTime(c, 'verifyJWT');
        return c.json({ error: 'missing bearer token' }, 401);
      }

      const verifier = getJWTVerifier(config);
      const result = await verifier.verifyJWT(header.data, roleGroups, c.req.raw.signal);
      endTime(c, 'verifyJWT');
      if (!result.success) {
        return c.json({ error: result.error.message }, result.error.status);
      }

      c.set('jwtClaims', result.claims);
      await next();
    };
}

/**
 * Creates a guard whose middleware lets every request through unchecked.
 * Same shape as {@link requireJWT}, for local development only.
 */
export function passJWT(): JWTGuard {
  return () => async (_c, next) => {
    await next();
  };
}
