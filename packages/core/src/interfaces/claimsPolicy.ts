/**
 * Role requirement as OR-groups ANDed together: every group must be satisfied
 * by at least one of the token's roles.
 *
 * @example
 * ```typescript
 * // (admin OR owner) AND billing
 * const roles: RoleGroups = [['admin', 'owner'], ['billing']];
 * ```
 */
export type RoleGroups = readonly (readonly string[])[];

/**
 * Expectations a token's claims are checked against. Immutable per call.
 */
export interface ClaimsPolicy {
  /** Required `iss` claim */
  expectedIssuer: string;

  /** Required `token_use` claim (`access` or `id`) */
  expectedTokenUse: string;

  /** Accepted `client_id` (access tokens) or `aud` (ID tokens) values */
  acceptedClientIds: readonly string[];

  /** Role requirement; an empty list places no constraint */
  requiredRoleGroups: RoleGroups;
}
