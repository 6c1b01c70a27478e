import { SESSION_TOKEN_PREFIX } from './constants.js';
import { RawSecret } from './raw-secret.js';

const UUID_PATTERN =
  /^[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[1-5][0-9a-fA-F]{3}-[89abAB][0-9a-fA-F]{3}-[0-9a-fA-F]{12}$/;
const SESSION_TOKEN_PATTERN = /^([a-z]+)_([0-9a-fA-F-]{36})\.([A-Za-z0-9_-]+)$/;

export type SessionTokenParts = {
  sessionId: string;
  secret: RawSecret;
};

export function isSessionId(value: string): boolean {
  return UUID_PATTERN.test(value);
}

/**
 * Bind a session id and its raw secret into one opaque bearer string.
 * The string proves nothing on its own: the secret must still match the stored hash.
 */
export function encodeSessionToken(sessionId: string, secret: RawSecret): string {
  if (!isSessionId(sessionId)) {
    throw new TypeError('Session id must be a UUID');
  }
  return `${SESSION_TOKEN_PREFIX}_${sessionId}.${secret.toBase64Url()}`;
}

/**
 * Returns null for anything that is not a well-formed session token
 */
export function parseSessionToken(token: string): SessionTokenParts | null {
  if (!token || typeof token !== 'string') {
    return null;
  }

  const match = token.trim().match(SESSION_TOKEN_PATTERN);
  if (!match) {
    return null;
  }

  const [, prefix, sessionId, encodedSecret] = match;
  if (prefix !== SESSION_TOKEN_PREFIX || !sessionId || !encodedSecret) {
    return null;
  }
  if (!isSessionId(sessionId)) {
    return null;
  }

  const secret = RawSecret.fromBase64Url(encodedSecret);
  if (!secret) {
    return null;
  }

  return { sessionId, secret };
}
