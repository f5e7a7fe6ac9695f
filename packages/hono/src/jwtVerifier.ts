import { type JWTVerifierConfig, JWTVerifier } from '@jwt-keyguard/core';

// one verifier, and so one key cache, per config object
const verifiers = new WeakMap<JWTVerifierConfig, JWTVerifier>();

/**
 * Gets or creates the verifier for the provided configuration.
 * @param config - The verifier configuration object
 * @returns The verifier shared by every route using this config
 */
export function getJWTVerifier(config: JWTVerifierConfig): JWTVerifier {
  let verifier = verifiers.get(config);
  if (!verifier) {
    verifier = new JWTVerifier(config);
    verifiers.set(config, verifier);
  }
  return verifier;
}
