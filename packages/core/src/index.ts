export {
  ForbiddenError,
  KeyDecodeError,
  KeySetFetchError,
  SignatureError,
  TokenFormatError,
  UnauthorizedError,
  VerificationError,
  type VerificationErrorKind,
} from './errors.js';
export * from './interfaces/index.js';
export {
  assertJWT,
  JWTVerifier,
  type AssertJWTOptions,
  type VerifyJWTResult,
} from './jwtVerifier.js';
export * from './schemas/index.js';
export { checkClaims, checkRoles } from './services/claimsPolicy.service.js';
export { JWKSCache } from './services/jwksCache.service.js';
export { signingInputOf, verifyRS256 } from './services/signature.service.js';
export { formatError } from './utils/errorFormatting.js';
export {
  decodeClaims,
  decodeClaimsAsMap,
  decodeHeader,
  decodeTokenClaims,
  splitToken,
  type TokenSegments,
} from './utils/jwtParser.js';
export { decodeExponent, decodeRSAKey } from './utils/keyCodec.js';
export {
  DEFAULT_JWKS_PATH,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
  FetchKeySetTransport,
  keySetServiceFetch,
} from './utils/keySetFetch.js';
