export type { ClaimsPolicy, RoleGroups } from './claimsPolicy.js';
export type { KeySet, RSAPublicKey } from './jwks.js';
export type {
  CustomKeySetSource,
  HttpKeySetSource,
  JWTVerifierConfig,
} from './jwtVerifierConfig.js';
export type { KeySetResponse, KeySetTransport } from './keySetTransport.js';
