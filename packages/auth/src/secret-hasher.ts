import { createHmac, randomBytes, scrypt, timingSafeEqual } from 'node:crypto';
import type { BinaryLike, ScryptOptions } from 'node:crypto';
import { promisify } from 'node:util';
import {
  HMAC_HASH_ALGO,
  SCRYPT_BLOCK_SIZE,
  SCRYPT_COST,
  SCRYPT_HASH_ALGO,
  SCRYPT_KEY_LENGTH,
  SCRYPT_PARALLELIZATION,
  SCRYPT_SALT_BYTES,
} from './constants.js';
import { HashError } from './errors.js';

const scryptAsync = promisify<BinaryLike, BinaryLike, number, ScryptOptions, Buffer>(scrypt);

/**
 * One-way hashing for session secrets.
 * verify() never throws: a malformed or foreign hash simply does not match.
 */
export interface SecretHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hashed: string): Promise<boolean>;
  /** True when the stored hash was produced under a weaker policy than the current one */
  needsRehash(hashed: string): boolean;
}

function safeEqual(left: Buffer, right: Buffer): boolean {
  return left.length === right.length && timingSafeEqual(left, right);
}

export type ScryptPolicy = {
  cost: number;
  blockSize: number;
  parallelization: number;
  keyLength: number;
  saltBytes: number;
};

type ParsedScryptHash = {
  cost: number;
  blockSize: number;
  parallelization: number;
  salt: Buffer;
  key: Buffer;
};

const DEFAULT_SCRYPT_POLICY: ScryptPolicy = {
  cost: SCRYPT_COST,
  blockSize: SCRYPT_BLOCK_SIZE,
  parallelization: SCRYPT_PARALLELIZATION,
  keyLength: SCRYPT_KEY_LENGTH,
  saltBytes: SCRYPT_SALT_BYTES,
};

function parsePositiveInt(value: string | undefined): number | null {
  if (!value || !/^\d+$/.test(value)) {
    return null;
  }
  const parsed = Number.parseInt(value, 10);
  return parsed > 0 ? parsed : null;
}

function parseScryptHash(hashed: string): ParsedScryptHash | null {
  const parts = hashed.split('$');
  if (parts.length !== 6 || parts[0] !== SCRYPT_HASH_ALGO) {
    return null;
  }

  const [, costStr, blockSizeStr, parallelizationStr, saltB64, keyB64] = parts;
  const cost = parsePositiveInt(costStr);
  const blockSize = parsePositiveInt(blockSizeStr);
  const parallelization = parsePositiveInt(parallelizationStr);
  if (!cost || !blockSize || !parallelization || !saltB64 || !keyB64) {
    return null;
  }

  const salt = Buffer.from(saltB64, 'base64url');
  const key = Buffer.from(keyB64, 'base64url');
  if (salt.length === 0 || key.length === 0) {
    return null;
  }

  return { cost, blockSize, parallelization, salt, key };
}

/**
 * Runs on the libuv thread pool, so hashing never blocks the event loop.
 */
function deriveKey(
  plain: string,
  salt: Buffer,
  keyLength: number,
  params: { cost: number; blockSize: number; parallelization: number }
): Promise<Buffer> {
  return scryptAsync(plain, salt, keyLength, {
    N: params.cost,
    r: params.blockSize,
    p: params.parallelization,
    maxmem: 256 * params.cost * params.blockSize,
  });
}

/**
 * Production hasher: scrypt with a fresh random salt per call.
 * Format: scrypt$<N>$<r>$<p>$<salt>$<key>
 */
export class ScryptSecretHasher implements SecretHasher {
  private readonly policy: ScryptPolicy;

  constructor(policy: Partial<ScryptPolicy> = {}) {
    this.policy = { ...DEFAULT_SCRYPT_POLICY, ...policy };
  }

  async hash(plain: string): Promise<string> {
    const { cost, blockSize, parallelization, keyLength, saltBytes } = this.policy;
    try {
      const salt = randomBytes(saltBytes);
      const key = await deriveKey(plain, salt, keyLength, { cost, blockSize, parallelization });
      return [
        SCRYPT_HASH_ALGO,
        cost,
        blockSize,
        parallelization,
        salt.toString('base64url'),
        key.toString('base64url'),
      ].join('$');
    } catch (error) {
      throw new HashError('scrypt failed to hash session secret', { cause: error });
    }
  }

  async verify(plain: string, hashed: string): Promise<boolean> {
    const parsed = parseScryptHash(hashed);
    if (!parsed) {
      return false;
    }

    try {
      const derived = await deriveKey(plain, parsed.salt, parsed.key.length, parsed);
      return safeEqual(derived, parsed.key);
    } catch {
      // Parameters scrypt refuses (e.g. N not a power of two) cannot match
      return false;
    }
  }

  needsRehash(hashed: string): boolean {
    const parsed = parseScryptHash(hashed);
    if (!parsed) {
      return false;
    }
    return (
      parsed.cost < this.policy.cost ||
      parsed.blockSize < this.policy.blockSize ||
      parsed.parallelization < this.policy.parallelization ||
      parsed.key.length < this.policy.keyLength
    );
  }
}

export type HashKeyConfig = Record<string, string>;

/**
 * Deterministic hasher keyed by a server-side secret.
 * Format: hmac-sha256$<keyId>$<digest>. Hashes under a retired key id report needsRehash.
 */
export class HmacSecretHasher implements SecretHasher {
  private readonly keys: HashKeyConfig;
  private readonly activeKeyId: string;

  constructor(options: { keys: HashKeyConfig; activeKeyId?: string }) {
    const activeKeyId = options.activeKeyId ?? Object.keys(options.keys)[0];
    if (!activeKeyId || !options.keys[activeKeyId]) {
      throw new HashError(`Secret hash key "${activeKeyId ?? ''}" is not configured`);
    }
    this.keys = { ...options.keys };
    this.activeKeyId = activeKeyId;
  }

  static fromEnv(env: NodeJS.ProcessEnv = process.env): HmacSecretHasher {
    const keys = parseHashKeys(env.SECRET_HASH_KEYS);
    const activeKeyId = env.SECRET_HASH_ACTIVE_KEY_ID;
    return new HmacSecretHasher(activeKeyId ? { keys, activeKeyId } : { keys });
  }

  async hash(plain: string): Promise<string> {
    return [HMAC_HASH_ALGO, this.activeKeyId, this.digest(this.activeKeyId, plain)].join('$');
  }

  async verify(plain: string, hashed: string): Promise<boolean> {
    const parts = hashed.split('$');
    if (parts.length !== 3 || parts[0] !== HMAC_HASH_ALGO) {
      return false;
    }
    const [, keyId, digest] = parts;
    if (!keyId || !digest || !this.keys[keyId]) {
      return false;
    }

    const expected = this.digest(keyId, plain);
    return safeEqual(Buffer.from(expected), Buffer.from(digest));
  }

  needsRehash(hashed: string): boolean {
    const parts = hashed.split('$');
    if (parts.length !== 3 || parts[0] !== HMAC_HASH_ALGO) {
      return false;
    }
    return parts[1] !== this.activeKeyId;
  }

  private digest(keyId: string, plain: string): string {
    const secretKey = this.keys[keyId];
    if (!secretKey) {
      throw new HashError(`Secret hash key "${keyId}" is not configured`);
    }
    return createHmac('sha256', secretKey).update(plain).digest('base64url');
  }
}

/**
 * Parse SECRET_HASH_KEYS: a JSON object of { keyId: secret }, optionally wrapped in quotes.
 */
export function parseHashKeys(raw: string | undefined): HashKeyConfig {
  if (!raw || !raw.trim()) {
    throw new HashError('SECRET_HASH_KEYS is required (JSON object of { keyId: secret })');
  }

  const trimmed = raw.trim();
  const unwrapped =
    (trimmed.startsWith("'") && trimmed.endsWith("'")) ||
    (trimmed.startsWith('"') && trimmed.endsWith('"'))
      ? trimmed.slice(1, -1)
      : trimmed;

  let parsed: unknown;
  try {
    parsed = JSON.parse(unwrapped);
  } catch (error) {
    throw new HashError('Failed to parse SECRET_HASH_KEYS. Expected a JSON object.', {
      cause: error,
    });
  }

  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new HashError('SECRET_HASH_KEYS must be a JSON object of { keyId: secret }');
  }

  const keys: HashKeyConfig = {};
  for (const [keyId, secret] of Object.entries(parsed)) {
    if (typeof secret !== 'string' || !secret) {
      throw new HashError(`SECRET_HASH_KEYS.${keyId} must be a non-empty string`);
    }
    keys[keyId] = secret;
  }
  return keys;
}
