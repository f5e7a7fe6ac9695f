/**
 * Renders any caught value as a message string.
 *
 * @example
 * ```typescript
 * try {
 *   await transport.get('/.well-known/jwks.json', signal);
 * } catch (error) {
 *   throw new KeySetFetchError(`JWKS fetch: ${formatError(error)}`);
 * }
 * ```
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
