import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { DEFAULT_SESSION_SECRET_BITS, MIN_SESSION_SECRET_BITS } from '@sessionkit/auth';
import type { PermissionLookupFailurePolicy } from './types.js';

export const ACCESS_TOKEN_TTL_SECONDS = 15 * 60;
const DEFAULT_CLOCK_SKEW_TOLERANCE_SECONDS = 60;

export type SigningAlgorithm = 'EdDSA' | 'RS256';
export type SecretHasherKind = 'scrypt' | 'hmac';

export type AuthCoreEnvironment = {
  issuer: string;
  audience: string;
  algorithm: SigningAlgorithm;
  keyId: string;
  privateKeyPem: string;
  verificationKeys: VerificationKeyConfig[];
  clockToleranceSeconds: number;
  accessTokenTtlSeconds: number;
  sessionSecretBits: number;
  permissionLookupFailure: PermissionLookupFailurePolicy;
  secretHasher: SecretHasherKind;
};

export type VerificationKeyConfig = {
  kid: string;
  alg: SigningAlgorithm;
  publicKeyPem: string;
};

function isSigningAlgorithm(value: string): value is SigningAlgorithm {
  return value === 'EdDSA' || value === 'RS256';
}

function decodeKeyMaterial(raw: string, source: string): string {
  const trimmed = raw.trim();
  if (trimmed.startsWith('-----BEGIN')) {
    return trimmed;
  }

  const decoded = Buffer.from(trimmed, 'base64').toString('utf8').trim();
  if (!decoded.startsWith('-----BEGIN')) {
    throw new Error(`Invalid ${source} value. Expected PEM or base64-encoded PEM.`);
  }
  return decoded;
}

function readPrivateKeyFromEnv(env: NodeJS.ProcessEnv): string {
  if (env.AUTH_JWT_PRIVATE_KEY_FILE) {
    const path = resolve(env.AUTH_JWT_PRIVATE_KEY_FILE);
    return readFileSync(path, 'utf8');
  }

  const raw = env.AUTH_JWT_PRIVATE_KEY;
  if (!raw) {
    throw new Error(
      'AUTH_JWT_PRIVATE_KEY or AUTH_JWT_PRIVATE_KEY_FILE must be set to load signing keys.'
    );
  }

  return decodeKeyMaterial(raw, 'AUTH_JWT_PRIVATE_KEY');
}

function readStringField(entry: object, field: string): string {
  const value: unknown = Reflect.get(entry, field);
  return typeof value === 'string' ? value.trim() : '';
}

function parseAdditionalPublicKeys(raw: string, defaultAlgorithm: SigningAlgorithm) {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error('AUTH_JWT_ADDITIONAL_PUBLIC_KEYS is not valid JSON', { cause: error });
  }

  if (!Array.isArray(parsed)) {
    throw new Error('AUTH_JWT_ADDITIONAL_PUBLIC_KEYS must be a JSON array');
  }

  return parsed.map((entry: unknown, index): VerificationKeyConfig => {
    const source = `AUTH_JWT_ADDITIONAL_PUBLIC_KEYS[${index}]`;
    if (!entry || typeof entry !== 'object') {
      throw new Error(`${source} must be an object with kid/publicKey fields`);
    }

    const kid = readStringField(entry, 'kid');
    const publicKey = readStringField(entry, 'publicKey');
    const alg = readStringField(entry, 'alg') || defaultAlgorithm;

    if (!kid) {
      throw new Error(`${source}.kid is required`);
    }
    if (!publicKey) {
      throw new Error(`${source}.publicKey is required`);
    }
    if (!isSigningAlgorithm(alg)) {
      throw new Error(`${source}.alg must be "EdDSA" or "RS256"`);
    }

    return {
      kid,
      alg,
      publicKeyPem: decodeKeyMaterial(publicKey, `${source}.publicKey`),
    };
  });
}

function readAdditionalPublicKeys(env: NodeJS.ProcessEnv, defaultAlgorithm: SigningAlgorithm) {
  let raw = env.AUTH_JWT_ADDITIONAL_PUBLIC_KEYS;

  if (env.AUTH_JWT_ADDITIONAL_PUBLIC_KEYS_FILE) {
    const path = resolve(env.AUTH_JWT_ADDITIONAL_PUBLIC_KEYS_FILE);
    raw = readFileSync(path, 'utf8');
  }

  if (!raw || !raw.trim()) {
    return [];
  }

  return parseAdditionalPublicKeys(raw.trim(), defaultAlgorithm);
}

function readInteger(env: NodeJS.ProcessEnv, name: string, fallback: number, min = 1): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new Error(`${name} must be an integer >= ${min}, received "${raw}"`);
  }
  return parsed;
}

function readPermissionLookupFailure(env: NodeJS.ProcessEnv): PermissionLookupFailurePolicy {
  const raw = env.PERMISSION_LOOKUP_FAILURE ?? 'empty';
  if (raw !== 'empty' && raw !== 'fail') {
    throw new Error(`PERMISSION_LOOKUP_FAILURE must be "empty" or "fail", received "${raw}"`);
  }
  return raw;
}

function readSecretHasher(env: NodeJS.ProcessEnv): SecretHasherKind {
  const raw = env.SECRET_HASHER ?? 'scrypt';
  if (raw !== 'scrypt' && raw !== 'hmac') {
    throw new Error(`SECRET_HASHER must be "scrypt" or "hmac", received "${raw}"`);
  }
  return raw;
}

export function loadAuthCoreConfig(env: NodeJS.ProcessEnv = process.env): AuthCoreEnvironment {
  const issuer = env.AUTH_JWT_ISSUER ?? env.AUTH_URL ?? 'http://localhost:3000';
  const audience = env.AUTH_JWT_AUDIENCE ?? `${issuer}/v1`;
  const keyId = env.AUTH_JWT_KEY_ID ?? 'dev-access-key';
  const algorithm = env.AUTH_JWT_ALGORITHM ?? 'EdDSA';

  if (!isSigningAlgorithm(algorithm)) {
    throw new Error(`Unsupported AUTH_JWT_ALGORITHM value: ${algorithm}`);
  }

  const sessionSecretBits = readInteger(
    env,
    'SESSION_SECRET_BITS',
    DEFAULT_SESSION_SECRET_BITS,
    MIN_SESSION_SECRET_BITS
  );

  return {
    issuer,
    audience,
    algorithm,
    keyId,
    privateKeyPem: readPrivateKeyFromEnv(env),
    verificationKeys: readAdditionalPublicKeys(env, algorithm),
    clockToleranceSeconds: readInteger(
      env,
      'AUTH_JWT_CLOCK_TOLERANCE_SECONDS',
      DEFAULT_CLOCK_SKEW_TOLERANCE_SECONDS,
      0
    ),
    accessTokenTtlSeconds: readInteger(env, 'ACCESS_TOKEN_TTL_SECONDS', ACCESS_TOKEN_TTL_SECONDS),
    sessionSecretBits,
    permissionLookupFailure: readPermissionLookupFailure(env),
    secretHasher: readSecretHasher(env),
  };
}
