import {
  DEFAULT_SESSION_SECRET_BITS,
  GenerationError,
  HashError,
  MIN_SESSION_SECRET_BITS,
  type RawSecret,
  type SecretHasher,
  type TokenGenerator,
  encodeSessionToken,
  isSessionId,
} from '@sessionkit/auth';
import { type Logger, logger as rootLogger } from '@sessionkit/observability';
import { type SessionTokensResponse, SessionTokensResponseSchema } from '@sessionkit/types';
import { SystemClock } from './clock.js';
import { ACCESS_TOKEN_TTL_SECONDS } from './config.js';
import { OperationAbortedError } from './errors.js';
import { UuidIdentifierGenerator } from './identifiers.js';
import type {
  Clock,
  IdentifierGenerator,
  PermissionLookup,
  SessionStore,
  SignedTokenCodec,
} from './interfaces.js';
import { resolvePermissions } from './permissions.js';
import { withPersistence } from './session-persistence.js';
import type {
  OpenSessionOptions,
  OpenSessionResult,
  PermissionLookupFailurePolicy,
  Session,
  SessionId,
  UserId,
} from './types.js';

export type SessionIssuerDependencies = {
  store: SessionStore;
  permissions: PermissionLookup;
  hasher: SecretHasher;
  tokens: TokenGenerator;
  codec: SignedTokenCodec;
  clock?: Clock;
  ids?: IdentifierGenerator;
  logger?: Logger;
  accessTokenTtlSeconds?: number;
  secretBits?: number;
  permissionLookupFailure?: PermissionLookupFailurePolicy;
};

/**
 * Hash a raw secret, surfacing unexpected hasher failures as HashError
 */
export async function hashSessionSecret(hasher: SecretHasher, secret: RawSecret): Promise<string> {
  try {
    return await hasher.hash(secret.toBase64Url());
  } catch (error) {
    if (error instanceof HashError) {
      throw error;
    }
    throw new HashError('Secret hasher failed', { cause: error });
  }
}

/**
 * Opens sessions and mints their two bearer artifacts.
 *
 * Everything that can fail runs before SessionStore.save, which is the commit point:
 * a failed call leaves no session behind, and a persisted session always
 * comes back to the caller with its tokens.
 */
export class SessionIssuer {
  private readonly store: SessionStore;
  private readonly permissions: PermissionLookup;
  private readonly hasher: SecretHasher;
  private readonly tokens: TokenGenerator;
  private readonly codec: SignedTokenCodec;
  private readonly clock: Clock;
  private readonly ids: IdentifierGenerator;
  private readonly logger: Logger;
  private readonly accessTokenTtlSeconds: number;
  private readonly secretBits: number;
  private readonly permissionLookupFailure: PermissionLookupFailurePolicy;

  constructor(dependencies: SessionIssuerDependencies) {
    this.store = dependencies.store;
    this.permissions = dependencies.permissions;
    this.hasher = dependencies.hasher;
    this.tokens = dependencies.tokens;
    this.codec = dependencies.codec;
    this.clock = dependencies.clock ?? new SystemClock();
    this.ids = dependencies.ids ?? new UuidIdentifierGenerator();
    this.logger = dependencies.logger ?? rootLogger.child({ component: 'session-issuer' });
    this.accessTokenTtlSeconds = dependencies.accessTokenTtlSeconds ?? ACCESS_TOKEN_TTL_SECONDS;
    this.secretBits = dependencies.secretBits ?? DEFAULT_SESSION_SECRET_BITS;
    this.permissionLookupFailure = dependencies.permissionLookupFailure ?? 'empty';

    if (this.secretBits < MIN_SESSION_SECRET_BITS) {
      throw new RangeError(`Session secrets need at least ${MIN_SESSION_SECRET_BITS} bits`);
    }
  }

  /**
   * @throws {GenerationError} entropy or id generation failed
   * @throws {HashError} the secret hasher failed
   * @throws {PermissionLookupError} lookup failed under the `fail` policy
   * @throws {OperationAbortedError} the signal fired before commit
   * @throws {PersistenceError} the store rejected the write; no tokens exist
   */
  async openSession(userId: UserId, options: OpenSessionOptions = {}): Promise<OpenSessionResult> {
    if (!userId) {
      throw new TypeError('userId is required');
    }

    const secret = this.tokens.generate(this.secretBits);
    const sessionId = this.nextSessionId();
    const now = this.clock.now();

    const session: Session = {
      id: sessionId,
      userId,
      createdAt: now,
      lastUseAt: now,
      secretHash: await hashSessionSecret(this.hasher, secret),
    };

    const permissions = await resolvePermissions(
      this.permissions,
      userId,
      this.permissionLookupFailure,
      this.logger
    );

    const accessTokenExpiresAt = new Date(now.getTime() + this.accessTokenTtlSeconds * 1000);
    const accessToken = await this.codec.encode({
      userId,
      sessionId,
      permissions,
      issuedAt: now,
      expiresAt: accessTokenExpiresAt,
    });
    const sessionToken = encodeSessionToken(sessionId, secret);

    if (options.signal?.aborted) {
      throw new OperationAbortedError('Session opening was aborted before commit', {
        cause: options.signal.reason,
      });
    }

    try {
      await withPersistence('save session', () => this.store.save(session));
    } catch (error) {
      this.logger.error({ sessionId, userId, err: error }, 'session.persist_failed');
      throw error;
    }

    this.logger.info({ sessionId, userId, permissions: permissions.length }, 'session.opened');

    return {
      accessToken,
      sessionToken,
      sessionId,
      userId,
      permissions,
      createdAt: now,
      accessTokenExpiresAt,
    };
  }

  private nextSessionId(): SessionId {
    let id: string;
    try {
      id = this.ids.next();
    } catch (error) {
      throw new GenerationError('Identifier generator failed', { cause: error });
    }
    if (!isSessionId(id)) {
      throw new GenerationError('Identifier generator produced a value that is not a UUID');
    }
    return id;
  }
}

/**
 * Shape an issued session for an HTTP response body
 */
export function toSessionTokensResponse(result: OpenSessionResult): SessionTokensResponse {
  return SessionTokensResponseSchema.parse({
    access_token: result.accessToken,
    session_token: result.sessionToken,
    token_type: 'Bearer',
    expires_in: Math.max(
      0,
      Math.round((result.accessTokenExpiresAt.getTime() - result.createdAt.getTime()) / 1000)
    ),
    session_id: result.sessionId,
  });
}
