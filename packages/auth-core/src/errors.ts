import { SessionCoreError } from '@sessionkit/auth';

export { SessionCoreError, GenerationError, HashError } from '@sessionkit/auth';

/**
 * The session store could not complete a read or write
 */
export class PersistenceError extends SessionCoreError {
  constructor(message = 'Session store is unavailable', options?: ErrorOptions) {
    super(message, options);
  }
}

export class PermissionLookupError extends SessionCoreError {
  constructor(message = 'Permission lookup failed', options?: ErrorOptions) {
    super(message, options);
  }
}

export class OperationAbortedError extends SessionCoreError {
  constructor(message = 'Operation was aborted before commit', options?: ErrorOptions) {
    super(message, options);
  }
}

/**
 * Base class for tokens that fail to decode.
 * Callers branch on the subclass: expired tokens warrant re-authentication, the rest are rejected.
 */
export class TokenError extends SessionCoreError {}

export class ExpiredError extends TokenError {
  constructor(message = 'Token has expired', options?: ErrorOptions) {
    super(message, options);
  }
}

export class SignatureError extends TokenError {
  constructor(message = 'Token signature is invalid', options?: ErrorOptions) {
    super(message, options);
  }
}

export class MalformedError extends TokenError {
  constructor(message = 'Token is malformed', options?: ErrorOptions) {
    super(message, options);
  }
}

export class UnauthorizedError extends SessionCoreError {
  constructor(message = 'Unauthorized', options?: ErrorOptions) {
    super(message, options);
  }
}

export class SessionNotFoundError extends UnauthorizedError {
  constructor(message = 'Session is invalid or no longer exists', options?: ErrorOptions) {
    super(message, options);
  }
}

export class InvalidSessionSecretError extends UnauthorizedError {
  constructor(message = 'Session secret does not match', options?: ErrorOptions) {
    super(message, options);
  }
}
