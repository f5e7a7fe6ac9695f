export { TokenSchema } from './common.schema.js';
export {
  JWKSResponseSchema,
  KeyTypeSchema,
  RSAJsonWebKeySchema,
  type JWKSResponse,
  type RSAJsonWebKey,
} from './jwks.schema.js';
export {
  JwtClaimsSchema,
  JwtClaimsWireSchema,
  TOKEN_USE_ACCESS,
  TOKEN_USE_ID,
  type AccessTokenClaims,
  type IdTokenClaims,
  type JwtClaimsWire,
  type TokenClaims,
  type UnknownTokenClaims,
} from './jwt/jwtClaims.schema.js';
export { JwtHeaderSchema, type TokenHeader } from './jwt/jwtHeader.schema.js';
export {
  ClaimsPolicySettingsSchema,
  HttpKeySetSourceSchema,
} from './jwtVerifierConfig.schema.js';
