import { VerificationError } from '@jwt-keyguard/core';
import type { ErrorHandler } from 'hono';
import type { Logger } from 'pino';

/**
 * Creates an `app.onError` handler mapping verification errors thrown by
 * handlers (e.g. from `verifier.assertJWT`) to 401/403 and anything else to 500.
 * @param logger - Optional pino logger for unexpected errors
 * @returns Hono error handler
 */
export function verificationErrorHandler(logger?: Logger): ErrorHandler {
  return (error, c) => {
    if (error instanceof VerificationError) {
      return c.json({ error: error.message }, error.status);
    }
    logger?.error({ err: error, path: c.req.path }, 'Unhandled route error');
    return c.json({ error: 'Internal server error' }, 500);
  };
}
