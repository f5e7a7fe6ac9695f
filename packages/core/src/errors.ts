/**
 * Machine-readable reason attached to every verification failure.
 */
export type VerificationErrorKind =
  | 'malformed_token'
  | 'unsupported_algorithm'
  | 'key_not_found'
  | 'key_set_unavailable'
  | 'invalid_signature'
  | 'invalid_issuer'
  | 'invalid_token_use'
  | 'expired'
  | 'invalid_client_id'
  | 'missing_role';

/**
 * Base class for the two failures a caller can observe from JWT verification.
 * `status` is the HTTP status the boundary should respond with.
 */
export abstract class VerificationError extends Error {
  abstract readonly status: 401 | 403;

  constructor(
    message: string,
    readonly kind: VerificationErrorKind,
  ) {
    super(message);
  }
}

/** Authentication failed: the token cannot be trusted. */
export class UnauthorizedError extends VerificationError {
  readonly status = 401;

  constructor(message: string, kind: VerificationErrorKind) {
    super(message, kind);
    this.name = 'UnauthorizedError';
  }
}

/** The token is valid but its roles do not satisfy the route's requirement. */
export class ForbiddenError extends VerificationError {
  readonly status = 403;

  constructor(
    message: string,
    readonly missingRoles: readonly string[],
  ) {
    super(message, 'missing_role');
    this.name = 'ForbiddenError';
  }
}

/** A JWK could not be converted into an RSA public key. */
export class KeyDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'KeyDecodeError';
  }
}

/** The key set could not be fetched or contained no usable key. */
export class KeySetFetchError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'KeySetFetchError';
  }
}

/** A token segment is not valid base64url or not the expected JSON. */
export class TokenFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TokenFormatError';
  }
}

/** The signature segment is undecodable or does not match the signing input. */
export class SignatureError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SignatureError';
  }
}
