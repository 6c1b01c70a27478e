export * from './constants.js';
export { SessionCoreError, GenerationError, HashError } from './errors.js';
export { RawSecret } from './raw-secret.js';
export { CryptoTokenGenerator } from './token-generator.js';
export type { TokenGenerator, EntropySource } from './token-generator.js';
export {
  ScryptSecretHasher,
  HmacSecretHasher,
  parseHashKeys,
} from './secret-hasher.js';
export type { SecretHasher, ScryptPolicy, HashKeyConfig } from './secret-hasher.js';
export { encodeSessionToken, parseSessionToken, isSessionId } from './session-token.js';
export type { SessionTokenParts } from './session-token.js';
