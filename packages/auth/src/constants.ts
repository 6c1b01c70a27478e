/**
 * Session secret constants
 * Single source of truth for token formats and hashing policy
 */

// Session tokens look like sst_<sessionId>.<base64url secret>
export const SESSION_TOKEN_PREFIX = 'sst';

export const DEFAULT_SESSION_SECRET_BITS = 256;
export const MIN_SESSION_SECRET_BITS = 128;

// scrypt policy: N = 2^14, r = 8, p = 1
export const SCRYPT_COST = 16384;
export const SCRYPT_BLOCK_SIZE = 8;
export const SCRYPT_PARALLELIZATION = 1;
export const SCRYPT_KEY_LENGTH = 64;
export const SCRYPT_SALT_BYTES = 16;

export const HMAC_HASH_ALGO = 'hmac-sha256';
export const SCRYPT_HASH_ALGO = 'scrypt';
