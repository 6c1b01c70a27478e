import { createPrivateKey, createPublicKey, randomUUID } from 'node:crypto';
import { AccessTokenClaimsSchema } from '@sessionkit/types';
import { type KeyLike, SignJWT, errors, jwtVerify } from 'jose';
import type { AuthCoreEnvironment, SigningAlgorithm, VerificationKeyConfig } from './config.js';
import { ExpiredError, MalformedError, SignatureError, TokenError } from './errors.js';
import type { Clock, SignedTokenCodec } from './interfaces.js';
import type { AccessTokenInput, DecodedAccessToken } from './types.js';

export type SigningKey = {
  kid: string;
  alg: SigningAlgorithm;
  privateKey: KeyLike | null;
  publicKey: KeyLike;
};

export class SigningKeyStore {
  private keyMap = new Map<string, SigningKey>();

  constructor(
    keys: SigningKey[],
    private activeKid: string
  ) {
    for (const key of keys) {
      if (this.keyMap.has(key.kid)) {
        throw new Error(`Duplicate signing key id detected: ${key.kid}`);
      }
      this.keyMap.set(key.kid, key);
    }
    if (!this.keyMap.size) {
      throw new Error('SigningKeyStore requires at least one key');
    }

    if (!this.keyMap.has(activeKid)) {
      throw new Error(`Active signing key "${activeKid}" not found`);
    }
  }

  getActiveKey(): SigningKey & { privateKey: KeyLike } {
    const key = this.keyMap.get(this.activeKid);
    if (!key) {
      throw new Error(`Active signing key "${this.activeKid}" not found`);
    }
    if (!key.privateKey) {
      throw new Error(`Active signing key "${this.activeKid}" is missing a private key`);
    }
    return { ...key, privateKey: key.privateKey };
  }

  getVerificationKey(kid?: string): SigningKey {
    if (kid) {
      const key = this.keyMap.get(kid);
      if (key) {
        return key;
      }
    }
    return this.getActiveKey();
  }

  getAlgorithms(): SigningAlgorithm[] {
    return Array.from(new Set(Array.from(this.keyMap.values(), (key) => key.alg)));
  }
}

export async function buildSigningKey(
  config: Pick<AuthCoreEnvironment, 'keyId' | 'algorithm' | 'privateKeyPem'>
): Promise<SigningKey> {
  const privateKey = createPrivateKey({
    key: config.privateKeyPem,
    format: 'pem',
  });
  const publicKey = createPublicKey(privateKey);

  return {
    kid: config.keyId,
    alg: config.algorithm,
    privateKey,
    publicKey,
  };
}

export async function buildVerificationKey(config: VerificationKeyConfig): Promise<SigningKey> {
  const publicKey = createPublicKey({
    key: config.publicKeyPem,
    format: 'pem',
  });

  return {
    kid: config.kid,
    alg: config.alg,
    privateKey: null,
    publicKey,
  };
}

export async function buildKeyStoreFromConfig(
  config: Pick<AuthCoreEnvironment, 'keyId' | 'algorithm' | 'privateKeyPem' | 'verificationKeys'>
): Promise<SigningKeyStore> {
  const signingKey = await buildSigningKey(config);
  const verificationKeys = await Promise.all(
    config.verificationKeys.map((keyConfig) => buildVerificationKey(keyConfig))
  );

  return new SigningKeyStore([signingKey, ...verificationKeys], config.keyId);
}

type JoseTokenCodecOptions = {
  keyStore: SigningKeyStore;
  issuer: string;
  audience: string;
  clock: Clock;
  clockToleranceSeconds?: number;
  tokenIdFactory?: () => string;
};

function toNumericDate(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

function toTokenError(error: unknown): TokenError {
  if (error instanceof errors.JWTExpired) {
    return new ExpiredError('Access token has expired', { cause: error });
  }
  if (error instanceof errors.JWSSignatureVerificationFailed) {
    return new SignatureError('Access token signature verification failed', { cause: error });
  }
  return new MalformedError('Access token is malformed', { cause: error });
}

/**
 * Signed access tokens as compact JWS (JWT).
 * Signatures are checked before expiry, so a forged expired token reports SignatureError.
 */
export class JoseTokenCodec implements SignedTokenCodec {
  private readonly keyStore: SigningKeyStore;
  private readonly issuer: string;
  private readonly audience: string;
  private readonly clock: Clock;
  private readonly clockToleranceSeconds: number;
  private readonly tokenIdFactory: () => string;

  constructor(options: JoseTokenCodecOptions) {
    this.keyStore = options.keyStore;
    this.issuer = options.issuer;
    this.audience = options.audience;
    this.clock = options.clock;
    this.clockToleranceSeconds = options.clockToleranceSeconds ?? 0;
    this.tokenIdFactory = options.tokenIdFactory ?? randomUUID;
  }

  async encode(input: AccessTokenInput): Promise<string> {
    const issuedAt = toNumericDate(input.issuedAt);
    const exp = toNumericDate(input.expiresAt);
    if (exp <= issuedAt) {
      throw new RangeError('Access token must expire after it is issued');
    }

    const key = this.keyStore.getActiveKey();
    return new SignJWT({
      sid: input.sessionId,
      token_use: 'access',
      scp: [...input.permissions],
    })
      .setProtectedHeader({ alg: key.alg, kid: key.kid, typ: 'JWT' })
      .setSubject(input.userId)
      .setJti(this.tokenIdFactory())
      .setIssuedAt(issuedAt)
      .setExpirationTime(exp)
      .setIssuer(this.issuer)
      .setAudience(this.audience)
      .sign(key.privateKey);
  }

  async decode(token: string): Promise<DecodedAccessToken> {
    let payload: unknown;
    try {
      const verified = await jwtVerify(
        token,
        async ({ kid }: { kid?: string }) => this.keyStore.getVerificationKey(kid).publicKey,
        {
          algorithms: this.keyStore.getAlgorithms(),
          issuer: this.issuer,
          audience: this.audience,
          clockTolerance: this.clockToleranceSeconds,
          currentDate: this.clock.now(),
        }
      );
      payload = verified.payload;
    } catch (error) {
      throw toTokenError(error);
    }

    const parsed = AccessTokenClaimsSchema.safeParse(payload);
    if (!parsed.success) {
      throw new MalformedError('Access token claims are invalid', { cause: parsed.error });
    }

    return Object.freeze({ ...parsed.data, scp: Object.freeze([...parsed.data.scp]) });
  }
}
