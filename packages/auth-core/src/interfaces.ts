import type { AccessTokenInput, DecodedAccessToken, Session, SessionId, UserId } from './types.js';

export type { SecretHasher, TokenGenerator } from '@sessionkit/auth';

export interface Clock {
  now(): Date;
}

export interface IdentifierGenerator {
  /** A new globally unique id (UUID) */
  next(): string;
}

export interface SessionStore {
  /** Upsert keyed by session id */
  save(session: Session): Promise<void>;
  /**
   * Write lastUseAt and secretHash of an existing session, keeping the later lastUseAt.
   * Resolves false when the session no longer exists; never inserts.
   */
  update(session: Session): Promise<boolean>;
  get(id: SessionId): Promise<Session | null>;
  delete(id: SessionId): Promise<void>;
}

export interface PermissionLookup {
  getPermissions(userId: UserId): Promise<string[]>;
}

export interface SignedTokenCodec {
  encode(input: AccessTokenInput): Promise<string>;
  /**
   * @throws {ExpiredError} when the expiry has passed by the injected clock
   * @throws {SignatureError} when the signature does not verify
   * @throws {MalformedError} for anything that is not a valid access token
   */
  decode(token: string): Promise<DecodedAccessToken>;
}
