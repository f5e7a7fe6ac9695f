import { type Logger, pino } from 'pino';

import {
  KeySetFetchError,
  SignatureError,
  TokenFormatError,
  UnauthorizedError,
  VerificationError,
} from './errors.js';
import type { ClaimsPolicy, RoleGroups } from './interfaces/claimsPolicy.js';
import type { JWTVerifierConfig } from './interfaces/jwtVerifierConfig.js';
import type { KeySetTransport } from './interfaces/keySetTransport.js';
import { TokenSchema } from './schemas/common.schema.js';
import type { TokenClaims } from './schemas/jwt/jwtClaims.schema.js';
import {
  ClaimsPolicySettingsSchema,
  HttpKeySetSourceSchema,
} from './schemas/jwtVerifierConfig.schema.js';
import { checkClaims } from './services/claimsPolicy.service.js';
import { JWKSCache } from './services/jwksCache.service.js';
import { signingInputOf, verifyRS256 } from './services/signature.service.js';
import { formatError } from './utils/errorFormatting.js';
import { decodeClaims, decodeHeader, splitToken } from './utils/jwtParser.js';
import { DEFAULT_JWKS_PATH, FetchKeySetTransport } from './utils/keySetFetch.js';

/** Options for a single verification */
export interface AssertJWTOptions {
  /** Aborts a key-set refresh triggered by this call */
  signal?: AbortSignal;
  /** Time the expiry is checked against (defaults to now) */
  now?: Date;
  /** Optional pino logger */
  logger?: Logger;
}

/** Outcome of {@link JWTVerifier.verifyJWT}, shaped like zod's `safeParse` result */
export type VerifyJWTResult =
  | { success: true; claims: TokenClaims }
  | { success: false; error: VerificationError };

/**
 * Verifies an RS256 JWT against the cached key set and a claims policy.
 *
 * Steps: split the token, decode the header, require `alg` RS256, resolve the
 * signing key (refreshing the key set once on a cache miss), decode the
 * claims, verify the signature, then check the claims.
 *
 * @param token - Compact JWT
 * @param cache - Key cache shared across calls
 * @param policy - Expected issuer, token use, client IDs and role groups
 * @returns The verified claims
 * @throws {UnauthorizedError} For any authentication failure, including an
 * unavailable key set
 * @throws {ForbiddenError} When the token's roles do not satisfy the policy
 */
export async function assertJWT(
  token: string,
  cache: JWKSCache,
  policy: ClaimsPolicy,
  options: AssertJWTOptions = {},
): Promise<TokenClaims> {
  try {
    const { header64, claims64, signature64 } = splitToken(token);

    const header = decodeHeader(header64);
    if (header.algorithm !== 'RS256') {
      throw new UnauthorizedError(
        'unsupported JWT signature algorithm',
        'unsupported_algorithm',
      );
    }

    let key = cache.lookup(header.keyId);
    if (!key) {
      // signers rotate keys without notice; re-sync once before giving up
      options.logger?.debug({ kid: header.keyId }, 'JWKS kid miss, refreshing key set');
      await cache.fetch(options.signal);
      key = cache.lookup(header.keyId);
      if (!key) {
        throw new UnauthorizedError('JWKS kid is not found', 'key_not_found');
      }
    }

    const claims = decodeClaims(claims64);
    verifyRS256(signingInputOf(header64, claims64), signature64, key);
    checkClaims(claims, policy, options.now ?? new Date());

    return claims;
  } catch (error) {
    const verificationError = toVerificationError(error);
    options.logger?.debug(
      { kind: verificationError.kind, reason: verificationError.message },
      'JWT rejected',
    );
    throw verificationError;
  }
}

function toVerificationError(error: unknown): VerificationError {
  if (error instanceof VerificationError) {
    return error;
  }
  if (error instanceof TokenFormatError) {
    return new UnauthorizedError(error.message, 'malformed_token');
  }
  if (error instanceof SignatureError) {
    return new UnauthorizedError(error.message, 'invalid_signature');
  }
  if (error instanceof KeySetFetchError) {
    return new UnauthorizedError(error.message, 'key_set_unavailable');
  }
  return new UnauthorizedError(
    `JWT verification failed: ${formatError(error)}`,
    'malformed_token',
  );
}

/**
 * JWT verifier bound to one signer: owns the key cache and the claims
 * expectations shared by every request.
 *
 * @example
 * ```typescript
 * const verifier = new JWTVerifier({
 *   issuer: 'https://auth.example.com',
 *   tokenUse: 'access',
 *   clientIds: ['client-1'],
 *   jwks: { baseUrl: 'https://auth.example.com' },
 *   logger: pino(),
 * });
 *
 * // (admin OR owner) AND billing
 * const claims = await verifier.assertJWT(token, [['admin', 'owner'], ['billing']]);
 * ```
 */
export class JWTVerifier {
  readonly cache: JWKSCache;
  private logger: Logger;
  private clock: () => Date;
  private settings: { issuer: string; tokenUse: string; clientIds: string[] };

  /**
   * Creates a new verifier. The key set is fetched lazily on the first token.
   *
   * @param config - Issuer, token use, client IDs, key-set source and logger
   * @throws {Error} When the configuration is invalid
   */
  constructor(config: JWTVerifierConfig) {
    const settings = ClaimsPolicySettingsSchema.safeParse(config);
    if (!settings.success) {
      throw new Error(`[JWT] Invalid verifier configuration: ${settings.error.message}`);
    }
    this.settings = settings.data;
    this.logger = config.logger ?? pino({ enabled: false });
    this.clock = config.clock ?? (() => new Date());

    let transport: KeySetTransport;
    if ('transport' in config.jwks) {
      transport = config.jwks.transport;
    } else {
      const source = HttpKeySetSourceSchema.safeParse(config.jwks);
      if (!source.success) {
        throw new Error(`[JWT] Invalid key set source: ${source.error.message}`);
      }
      transport = new FetchKeySetTransport(source.data);
    }
    this.cache = new JWKSCache(transport, this.logger, config.jwks.path ?? DEFAULT_JWKS_PATH);
  }

  /**
   * Verifies a token and requires its roles to satisfy `roleGroups`.
   *
   * @param token - Compact JWT, without the 'Bearer ' prefix
   * @param roleGroups - OR-groups ANDed together; empty means no role requirement
   * @param signal - Aborts a key-set refresh triggered by this call
   * @returns The verified claims
   * @throws {UnauthorizedError} When the token cannot be trusted
   * @throws {ForbiddenError} When a role group is not satisfied
   */
  async assertJWT(
    token: string,
    roleGroups: RoleGroups = [],
    signal?: AbortSignal,
  ): Promise<TokenClaims> {
    const validatedToken = TokenSchema.safeParse(token);
    if (!validatedToken.success) {
      throw new UnauthorizedError('invalid JWT format', 'malformed_token');
    }

    return await assertJWT(validatedToken.data, this.cache, this.policyFor(roleGroups), {
      signal,
      now: this.clock(),
      logger: this.logger,
    });
  }

  /**
   * Same as {@link assertJWT} but reports failure as a value instead of rejecting.
   */
  async verifyJWT(
    token: string,
    roleGroups: RoleGroups = [],
    signal?: AbortSignal,
  ): Promise<VerifyJWTResult> {
    try {
      const claims = await this.assertJWT(token, roleGroups, signal);
      return { success: true, claims };
    } catch (error) {
      return { success: false, error: toVerificationError(error) };
    }
  }

  /**
   * Fetches the key set ahead of the first request, e.g. at startup.
   *
   * @throws {KeySetFetchError} When the key set cannot be fetched
   */
  async refreshKeys(signal?: AbortSignal): Promise<void> {
    await this.cache.fetch(signal);
  }

  private policyFor(roleGroups: RoleGroups): ClaimsPolicy {
    return {
      expectedIssuer: this.settings.issuer,
      expectedTokenUse: this.settings.tokenUse,
      acceptedClientIds: this.settings.clientIds,
      requiredRoleGroups: roleGroups,
    };
  }
}
