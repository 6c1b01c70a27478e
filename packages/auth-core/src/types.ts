import type { AccessTokenClaims } from '@sessionkit/types';

export type { AccessTokenClaims } from '@sessionkit/types';

export type UserId = string;
export type SessionId = string;
export type HashedSecret = string;

/**
 * Durable session record. The raw secret is never part of it.
 */
export type Session = {
  id: SessionId;
  userId: UserId;
  createdAt: Date;
  lastUseAt: Date;
  secretHash: HashedSecret;
};

/**
 * What happens when the permission lookup fails while minting an access token:
 * - `empty`: log a warning and issue the token with no permissions
 * - `fail`: abort the operation with PermissionLookupError
 */
export type PermissionLookupFailurePolicy = 'empty' | 'fail';

export type AccessTokenInput = {
  userId: UserId;
  sessionId: SessionId;
  permissions: readonly string[];
  issuedAt: Date;
  expiresAt: Date;
};

export type OpenSessionOptions = {
  signal?: AbortSignal;
};

export type OpenSessionResult = {
  accessToken: string;
  sessionToken: string;
  sessionId: SessionId;
  userId: UserId;
  permissions: string[];
  createdAt: Date;
  accessTokenExpiresAt: Date;
};

export type RefreshAccessTokenResult = {
  accessToken: string;
  accessTokenExpiresAt: Date;
  permissions: string[];
  session: Session;
};

/**
 * Decoded claims are frozen, permission list included
 */
export type DecodedAccessToken = Readonly<
  Omit<AccessTokenClaims, 'scp'> & { scp: readonly string[] }
>;
