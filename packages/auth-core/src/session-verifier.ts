import { type SecretHasher, parseSessionToken } from '@sessionkit/auth';
import { type Logger, logger as rootLogger } from '@sessionkit/observability';
import { SystemClock } from './clock.js';
import { ACCESS_TOKEN_TTL_SECONDS } from './config.js';
import { InvalidSessionSecretError, MalformedError, SessionNotFoundError } from './errors.js';
import type { Clock, PermissionLookup, SessionStore, SignedTokenCodec } from './interfaces.js';
import { resolvePermissions } from './permissions.js';
import { hashSessionSecret } from './session-issuer.js';
import { withPersistence } from './session-persistence.js';
import type {
  PermissionLookupFailurePolicy,
  RefreshAccessTokenResult,
  Session,
  SessionId,
} from './types.js';

export type SessionVerifierDependencies = {
  store: SessionStore;
  permissions: PermissionLookup;
  hasher: SecretHasher;
  codec: SignedTokenCodec;
  clock?: Clock;
  logger?: Logger;
  accessTokenTtlSeconds?: number;
  permissionLookupFailure?: PermissionLookupFailurePolicy;
};

/**
 * Checks presented session tokens against stored hashes and mints fresh access tokens.
 */
export class SessionVerifier {
  private readonly store: SessionStore;
  private readonly permissions: PermissionLookup;
  private readonly hasher: SecretHasher;
  private readonly codec: SignedTokenCodec;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly accessTokenTtlSeconds: number;
  private readonly permissionLookupFailure: PermissionLookupFailurePolicy;

  constructor(dependencies: SessionVerifierDependencies) {
    this.store = dependencies.store;
    this.permissions = dependencies.permissions;
    this.hasher = dependencies.hasher;
    this.codec = dependencies.codec;
    this.clock = dependencies.clock ?? new SystemClock();
    this.logger = dependencies.logger ?? rootLogger.child({ component: 'session-verifier' });
    this.accessTokenTtlSeconds = dependencies.accessTokenTtlSeconds ?? ACCESS_TOKEN_TTL_SECONDS;
    this.permissionLookupFailure = dependencies.permissionLookupFailure ?? 'empty';
  }

  /**
   * Verify a session token, bump lastUseAt and upgrade the stored hash when policy moved on.
   *
   * @throws {MalformedError} the token is not a session token
   * @throws {SessionNotFoundError} no stored session for the embedded id, or it was revoked meanwhile
   * @throws {InvalidSessionSecretError} the embedded secret does not match the stored hash
   * @throws {PersistenceError} the store failed
   */
  async verifySession(sessionToken: string): Promise<Session> {
    const parsed = parseSessionToken(sessionToken);
    if (!parsed) {
      throw new MalformedError('Session token is malformed');
    }

    const session = await withPersistence('load session', () => this.store.get(parsed.sessionId));
    if (!session) {
      throw new SessionNotFoundError();
    }

    const plain = parsed.secret.toBase64Url();
    if (!(await this.hasher.verify(plain, session.secretHash))) {
      this.logger.warn({ sessionId: session.id }, 'session.secret_mismatch');
      throw new InvalidSessionSecretError();
    }

    const now = this.clock.now();
    const rehash = this.hasher.needsRehash(session.secretHash);
    const updated: Session = {
      ...session,
      lastUseAt: now > session.lastUseAt ? now : session.lastUseAt,
      secretHash: rehash ? await hashSessionSecret(this.hasher, parsed.secret) : session.secretHash,
    };

    const stillExists = await withPersistence('update session', () => this.store.update(updated));
    if (!stillExists) {
      throw new SessionNotFoundError();
    }

    if (rehash) {
      this.logger.info({ sessionId: session.id }, 'session.rehashed');
    }
    this.logger.debug({ sessionId: session.id, userId: session.userId }, 'session.verified');

    return updated;
  }

  /**
   * Mint a new access token for the owner of a valid session token
   */
  async refreshAccessToken(sessionToken: string): Promise<RefreshAccessTokenResult> {
    const session = await this.verifySession(sessionToken);
    const permissions = await resolvePermissions(
      this.permissions,
      session.userId,
      this.permissionLookupFailure,
      this.logger
    );

    const issuedAt = this.clock.now();
    const accessTokenExpiresAt = new Date(issuedAt.getTime() + this.accessTokenTtlSeconds * 1000);
    const accessToken = await this.codec.encode({
      userId: session.userId,
      sessionId: session.id,
      permissions,
      issuedAt,
      expiresAt: accessTokenExpiresAt,
    });

    return { accessToken, accessTokenExpiresAt, permissions, session };
  }

  async revokeSession(sessionId: SessionId): Promise<void> {
    await withPersistence('delete session', () => this.store.delete(sessionId));
    this.logger.info({ sessionId }, 'session.revoked');
  }
}
