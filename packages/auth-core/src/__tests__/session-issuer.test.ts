import {
  CryptoTokenGenerator,
  GenerationError,
  HashError,
  type SecretHasher,
  parseSessionToken,
} from '@sessionkit/auth';
import { createLogger } from '@sessionkit/observability';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { FixedClock } from '../clock.js';
import {
  OperationAbortedError,
  PermissionLookupError,
  PersistenceError,
} from '../errors.js';
import { SequentialIdentifierGenerator } from '../identifiers.js';
import type { PermissionLookup, SignedTokenCodec } from '../interfaces.js';
import { InMemorySessionStore, StaticPermissionLookup } from '../memory-stores.js';
import {
  SessionIssuer,
  type SessionIssuerDependencies,
  toSessionTokensResponse,
} from '../session-issuer.js';
import { buildTestCodec, buildTestHasher, silentLogger } from './helpers.js';

const NOW = new Date('2025-01-01T00:00:00.000Z');
const FIRST_SESSION_ID = '00000000-0000-4000-8000-000000000001';

describe('SessionIssuer.openSession', () => {
  let clock: FixedClock;
  let codec: SignedTokenCodec;
  let store: InMemorySessionStore;
  let hasher: SecretHasher;

  beforeEach(async () => {
    clock = new FixedClock(NOW);
    ({ codec } = await buildTestCodec(clock));
    store = new InMemorySessionStore();
    hasher = buildTestHasher();
  });

  function buildIssuer(overrides: Partial<SessionIssuerDependencies> = {}) {
    return new SessionIssuer({
      store,
      permissions: new StaticPermissionLookup({ 'u-1': ['read'] }),
      hasher,
      tokens: new CryptoTokenGenerator(),
      codec,
      clock,
      ids: new SequentialIdentifierGenerator(),
      logger: silentLogger,
      ...overrides,
    });
  }

  const failingLookup: PermissionLookup = {
    getPermissions: async () => {
      throw new Error('permissions service unavailable');
    },
  };

  it('issues decodable tokens bound to exactly one stored session', async () => {
    const result = await buildIssuer().openSession('u-1');

    const claims = await codec.decode(result.accessToken);
    expect(claims.sub).toBe('u-1');
    expect(claims.scp).toEqual(['read']);
    expect(claims.sid).toBe(FIRST_SESSION_ID);

    const parsed = parseSessionToken(result.sessionToken);
    expect(parsed?.sessionId).toBe(FIRST_SESSION_ID);

    const stored = await store.get(FIRST_SESSION_ID);
    expect(store.size).toBe(1);
    expect(stored?.userId).toBe('u-1');
    expect(await hasher.hash(parsed?.secret.toBase64Url() ?? '')).toBe(stored?.secretHash);
  });

  it('stamps createdAt and lastUseAt with the clock', async () => {
    const result = await buildIssuer().openSession('u-1');

    const stored = await store.get(result.sessionId);
    expect(stored?.createdAt.toISOString()).toBe(NOW.toISOString());
    expect(stored?.lastUseAt.toISOString()).toBe(NOW.toISOString());
    expect(result.createdAt.toISOString()).toBe(NOW.toISOString());
  });

  it('persists only the hash of the secret', async () => {
    const result = await buildIssuer().openSession('u-1');
    const secret = parseSessionToken(result.sessionToken)?.secret.toBase64Url();

    const stored = await store.get(result.sessionId);
    expect(Object.keys(stored ?? {})).toEqual([
      'id',
      'userId',
      'createdAt',
      'lastUseAt',
      'secretHash',
    ]);
    expect(stored?.secretHash.startsWith('hmac-sha256$v1$')).toBe(true);
    expect(stored?.secretHash.includes(secret ?? '')).toBe(false);
  });

  it('expires the access token after the configured ttl', async () => {
    const result = await buildIssuer({ accessTokenTtlSeconds: 60 }).openSession('u-1');

    const claims = await codec.decode(result.accessToken);
    expect(claims.exp - claims.iat).toBe(60);
    expect(result.accessTokenExpiresAt.toISOString()).toBe('2025-01-01T00:01:00.000Z');
  });

  it('uses 256-bit secrets by default and honours a configured length', async () => {
    const defaults = await buildIssuer().openSession('u-1');
    const shorter = await buildIssuer({ secretBits: 128 }).openSession('u-2');

    expect(parseSessionToken(defaults.sessionToken)?.secret.byteLength).toBe(32);
    expect(parseSessionToken(shorter.sessionToken)?.secret.byteLength).toBe(16);
  });

  it('refuses secrets shorter than 128 bits', () => {
    expect(() => buildIssuer({ secretBits: 64 })).toThrow(RangeError);
  });

  it('opens independent sessions for the same user', async () => {
    const issuer = buildIssuer({ ids: undefined });

    const results = await Promise.all(
      Array.from({ length: 5 }, () => issuer.openSession('u-1'))
    );

    expect(new Set(results.map((result) => result.sessionId)).size).toBe(5);
    expect(new Set(results.map((result) => result.sessionToken)).size).toBe(5);
    expect(store.listByUser('u-1')).toHaveLength(5);
  });

  it('returns PersistenceError and leaves nothing behind when the save fails', async () => {
    vi.spyOn(store, 'save').mockRejectedValueOnce(new Error('connection refused'));

    await expect(buildIssuer().openSession('u-1')).rejects.toBeInstanceOf(PersistenceError);
    expect(await store.get(FIRST_SESSION_ID)).toBeNull();
    expect(store.size).toBe(0);
  });

  it('keeps the store cause on PersistenceError', async () => {
    const cause = new Error('connection refused');
    vi.spyOn(store, 'save').mockRejectedValueOnce(cause);

    const error = await buildIssuer()
      .openSession('u-1')
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(PersistenceError);
    expect(error instanceof PersistenceError ? error.cause : undefined).toBe(cause);
  });

  it('issues an empty permission set when the lookup fails under the empty policy', async () => {
    const logger = createLogger({ level: 'silent' });
    const warn = vi.spyOn(logger, 'warn');

    const result = await buildIssuer({ permissions: failingLookup, logger }).openSession('u-1');

    expect(result.permissions).toEqual([]);
    expect((await codec.decode(result.accessToken)).scp).toEqual([]);
    expect(store.size).toBe(1);
    expect(warn).toHaveBeenCalledWith(
      expect.objectContaining({ userId: 'u-1' }),
      'session.permission_lookup_failed'
    );
  });

  it('fails before persisting when the lookup fails under the fail policy', async () => {
    const issuer = buildIssuer({
      permissions: failingLookup,
      permissionLookupFailure: 'fail',
    });

    await expect(issuer.openSession('u-1')).rejects.toBeInstanceOf(PermissionLookupError);
    expect(store.size).toBe(0);
  });

  it('de-duplicates and sorts permissions', async () => {
    const permissions = new StaticPermissionLookup({ 'u-1': ['write', 'read', 'write'] });

    const result = await buildIssuer({ permissions }).openSession('u-1');

    expect(result.permissions).toEqual(['read', 'write']);
  });

  it('surfaces entropy failures as GenerationError', async () => {
    const tokens = {
      generate: () => {
        throw new GenerationError('entropy pool closed');
      },
    };

    await expect(buildIssuer({ tokens }).openSession('u-1')).rejects.toBeInstanceOf(
      GenerationError
    );
    expect(store.size).toBe(0);
  });

  it('surfaces identifier failures as GenerationError', async () => {
    const ids = { next: () => 'sess-1' };

    await expect(buildIssuer({ ids }).openSession('u-1')).rejects.toThrow(
      'Identifier generator produced a value that is not a UUID'
    );
    expect(store.size).toBe(0);
  });

  it('surfaces hasher failures as HashError', async () => {
    const broken: SecretHasher = {
      hash: async () => {
        throw new Error('worker pool exhausted');
      },
      verify: async () => false,
      needsRehash: () => false,
    };

    await expect(buildIssuer({ hasher: broken }).openSession('u-1')).rejects.toBeInstanceOf(
      HashError
    );
    expect(store.size).toBe(0);
  });

  it('does not persist once the caller has aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      buildIssuer().openSession('u-1', { signal: controller.signal })
    ).rejects.toBeInstanceOf(OperationAbortedError);
    expect(store.size).toBe(0);
  });

  it('rejects an empty user id', async () => {
    await expect(buildIssuer().openSession('')).rejects.toThrow('userId is required');
  });

  it('logs the opened session without any token material', async () => {
    const lines: string[] = [];
    const logger = createLogger({ level: 'info' }, { write: (line: string) => lines.push(line) });

    const result = await buildIssuer({ logger }).openSession('u-1');

    expect(lines).toHaveLength(1);
    const entry = JSON.parse(lines[0] ?? '{}') as Record<string, unknown>;
    expect(entry.msg).toBe('session.opened');
    expect(entry.sessionId).toBe(result.sessionId);
    expect(entry.userId).toBe('u-1');
    expect(entry.permissions).toBe(1);
  });
});

describe('toSessionTokensResponse', () => {
  it('shapes the result for a response body', () => {
    const response = toSessionTokensResponse({
      accessToken: 'access',
      sessionToken: 'session',
      sessionId: FIRST_SESSION_ID,
      userId: 'u-1',
      permissions: ['read'],
      createdAt: NOW,
      accessTokenExpiresAt: new Date(NOW.getTime() + 900 * 1000),
    });

    expect(response).toEqual({
      access_token: 'access',
      session_token: 'session',
      token_type: 'Bearer',
      expires_in: 900,
      session_id: FIRST_SESSION_ID,
    });
  });
});
