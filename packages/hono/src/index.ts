export { verificationErrorHandler } from './errorHandler.js';
export {
  passJWT,
  requireJWT,
  type JWTContextVariables,
  type JWTGuard,
  type JWTMiddleware,
} from './jwtProtection/index.js';
export { getJWTVerifier } from './jwtVerifier.js';
export {
  AuthorizationHeaderSchema,
  type BearerToken,
} from './schemas/authorizationHeader.schema.js';
export { tokenInfoRouteHandler } from './tokenInfo.route.js';
