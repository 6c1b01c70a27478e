export * from './types.js';
export * from './interfaces.js';
export * from './errors.js';
export {
  ACCESS_TOKEN_TTL_SECONDS,
  loadAuthCoreConfig,
  type AuthCoreEnvironment,
  type SecretHasherKind,
  type SigningAlgorithm,
  type VerificationKeyConfig,
} from './config.js';
export { SystemClock, FixedClock } from './clock.js';
export { UuidIdentifierGenerator, SequentialIdentifierGenerator } from './identifiers.js';
export {
  SigningKeyStore,
  JoseTokenCodec,
  buildSigningKey,
  buildVerificationKey,
  buildKeyStoreFromConfig,
} from './signing.js';
export type { SigningKey } from './signing.js';
export { InMemorySessionStore, StaticPermissionLookup } from './memory-stores.js';
export { normalizePermissions, resolvePermissions } from './permissions.js';
export { withPersistence } from './session-persistence.js';
export {
  SessionIssuer,
  hashSessionSecret,
  toSessionTokensResponse,
} from './session-issuer.js';
export type { SessionIssuerDependencies } from './session-issuer.js';
export { SessionVerifier } from './session-verifier.js';
export type { SessionVerifierDependencies } from './session-verifier.js';
