import { ForbiddenError, UnauthorizedError } from '../errors.js';
import type { ClaimsPolicy, RoleGroups } from '../interfaces/claimsPolicy.js';
import {
  TOKEN_USE_ACCESS,
  TOKEN_USE_ID,
  type TokenClaims,
} from '../schemas/jwt/jwtClaims.schema.js';

/**
 * Checks decoded claims against a policy. The first failing check wins, in
 * this order: issuer, token use, expiry, client ID, roles.
 *
 * @param claims - Claims of a token whose signature has been verified
 * @param policy - Expected issuer, token use, client IDs and role groups
 * @param now - Current time; compared to `exp` in whole seconds
 * @throws {UnauthorizedError} When issuer, token use, expiry or client ID do not match
 * @throws {ForbiddenError} When a role group is not satisfied
 */
export function checkClaims(claims: TokenClaims, policy: ClaimsPolicy, now: Date): void {
  if (claims.issuer !== policy.expectedIssuer) {
    throw new UnauthorizedError('invalid JWT issuer', 'invalid_issuer');
  }
  if (claims.tokenUse !== policy.expectedTokenUse) {
    throw new UnauthorizedError('invalid JWT use', 'invalid_token_use');
  }
  if (claims.expiry < Math.floor(now.getTime() / 1000)) {
    throw new UnauthorizedError('expired JWT', 'expired');
  }

  checkClientId(claims, policy);
  checkRoles(claims.roles, policy.requiredRoleGroups);
}

function checkClientId(claims: TokenClaims, policy: ClaimsPolicy): void {
  // token use already equals the policy's, so the claims variant selects the branch
  switch (claims.variant) {
    case TOKEN_USE_ACCESS:
      if (!policy.acceptedClientIds.includes(claims.clientId)) {
        throw new UnauthorizedError('invalid client ID', 'invalid_client_id');
      }
      return;
    case TOKEN_USE_ID:
      if (!claims.audience.some((aud) => policy.acceptedClientIds.includes(aud))) {
        throw new UnauthorizedError('invalid client ID', 'invalid_client_id');
      }
      return;
    default:
      throw new UnauthorizedError('invalid token use', 'invalid_token_use');
  }
}

/**
 * Requires every group to share at least one member with `roles`.
 *
 * @throws {ForbiddenError} Naming the members of the first unsatisfied group
 */
export function checkRoles(roles: readonly string[], groups: RoleGroups): void {
  for (const group of groups) {
    if (findAny(roles, group) === undefined) {
      throw new ForbiddenError(
        `missing role: at least one of ${group.join(', ')} is required`,
        group,
      );
    }
  }
}

/** First element of `query` present in `set`, if any. */
function findAny<T>(set: readonly T[], query: readonly T[]): T | undefined {
  return query.find((candidate) => set.includes(candidate));
}
