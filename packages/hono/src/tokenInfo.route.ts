import { decodeClaimsAsMap, formatError } from '@jwt-keyguard/core';
import type { Handler } from 'hono';
import type { Logger } from 'pino';

import { AuthorizationHeaderSchema } from './schemas/authorizationHeader.schema.js';

/**
 * Creates a route handler echoing the bearer token's claims, unverified,
 * with `exp` rendered as a timestamp. For debugging only: mount it behind
 * `requireJWT` or not at all in production.
 * @param logger - Optional pino logger
 * @returns Route handler for a token info endpoint
 */
export function tokenInfoRouteHandler(logger?: Logger): Handler {
  return (c) => {
    const header = AuthorizationHeaderSchema.safeParse(c.req.header('Authorization'));
    if (!header.success) {
      return c.json({ error: 'missing bearer token' }, 400);
    }
    try {
      return c.json(decodeClaimsAsMap(header.data));
    } catch (error) {
      logger?.debug({ error: formatError(error), path: c.req.path }, 'Token info decode failed');
      return c.json({ error: formatError(error) }, 400);
    }
  };
}
