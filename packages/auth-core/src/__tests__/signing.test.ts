import { SignJWT } from 'jose';
import { beforeEach, describe, expect, it } from 'vitest';
import { FixedClock } from '../clock.js';
import { ExpiredError, MalformedError, SignatureError } from '../errors.js';
import { JoseTokenCodec } from '../signing.js';
import type { AccessTokenInput } from '../types.js';
import {
  TEST_AUDIENCE,
  TEST_ISSUER,
  buildRotatedKeyStore,
  buildTestCodec,
  buildTestKeyStore,
} from './helpers.js';

const ISSUED_AT = new Date('2025-01-01T00:00:00.000Z');
const ISSUED_AT_SECONDS = 1735689600;

function accessTokenInput(overrides: Partial<AccessTokenInput> = {}): AccessTokenInput {
  return {
    userId: 'u-1',
    sessionId: '00000000-0000-4000-8000-000000000001',
    permissions: ['read'],
    issuedAt: ISSUED_AT,
    expiresAt: new Date(ISSUED_AT.getTime() + 900 * 1000),
    ...overrides,
  };
}

describe('JoseTokenCodec', () => {
  let clock: FixedClock;

  beforeEach(() => {
    clock = new FixedClock(ISSUED_AT);
  });

  it('decodes the claims it encoded', async () => {
    const { codec } = await buildTestCodec(clock);

    const token = await codec.encode(accessTokenInput());
    const claims = await codec.decode(token);

    expect(claims.sub).toBe('u-1');
    expect(claims.sid).toBe('00000000-0000-4000-8000-000000000001');
    expect(claims.scp).toEqual(['read']);
    expect(claims.iat).toBe(ISSUED_AT_SECONDS);
    expect(claims.exp).toBe(ISSUED_AT_SECONDS + 900);
    expect(claims.iss).toBe(TEST_ISSUER);
    expect(claims.aud).toBe(TEST_AUDIENCE);
    expect(claims.token_use).toBe('access');
    expect(claims.jti).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('returns frozen claims', async () => {
    const { codec } = await buildTestCodec(clock);

    const claims = await codec.decode(await codec.encode(accessTokenInput()));

    expect(Object.isFrozen(claims)).toBe(true);
    expect(Object.isFrozen(claims.scp)).toBe(true);
  });

  it('uses the injected clock to reject expired tokens', async () => {
    const { codec } = await buildTestCodec(clock);
    const token = await codec.encode(accessTokenInput());

    clock.advanceSeconds(899);
    await expect(codec.decode(token)).resolves.toMatchObject({ sub: 'u-1' });

    clock.advanceSeconds(2);
    await expect(codec.decode(token)).rejects.toBeInstanceOf(ExpiredError);
  });

  it('honours the configured clock tolerance', async () => {
    const { codec } = await buildTestCodec(clock, { clockToleranceSeconds: 60 });
    const token = await codec.encode(accessTokenInput());

    clock.advanceSeconds(930);
    await expect(codec.decode(token)).resolves.toMatchObject({ sub: 'u-1' });

    clock.advanceSeconds(60);
    await expect(codec.decode(token)).rejects.toBeInstanceOf(ExpiredError);
  });

  it('rejects tokens signed by another key with SignatureError', async () => {
    const { codec } = await buildTestCodec(clock);
    const { codec: foreign } = await buildTestCodec(clock);

    const token = await foreign.encode(accessTokenInput());

    await expect(codec.decode(token)).rejects.toBeInstanceOf(SignatureError);
  });

  it('rejects tampered payloads with SignatureError', async () => {
    const { codec } = await buildTestCodec(clock);
    const [header, payload, signature] = (await codec.encode(accessTokenInput())).split('.');
    const claims = JSON.parse(Buffer.from(payload ?? '', 'base64url').toString('utf8')) as Record<
      string,
      unknown
    >;
    const forged = Buffer.from(JSON.stringify({ ...claims, scp: ['admin'] })).toString('base64url');

    await expect(codec.decode(`${header}.${forged}.${signature}`)).rejects.toBeInstanceOf(
      SignatureError
    );
  });

  it('checks the signature before expiry', async () => {
    const { codec } = await buildTestCodec(clock);
    const { codec: foreign } = await buildTestCodec(clock);
    const token = await foreign.encode(accessTokenInput());

    clock.advanceSeconds(3600);

    await expect(codec.decode(token)).rejects.toBeInstanceOf(SignatureError);
  });

  it('reports garbage as MalformedError', async () => {
    const { codec } = await buildTestCodec(clock);

    await expect(codec.decode('not-a-token')).rejects.toBeInstanceOf(MalformedError);
    await expect(codec.decode('')).rejects.toBeInstanceOf(MalformedError);
  });

  it('reports a token for another audience as MalformedError', async () => {
    const { codec, keyStore } = await buildTestCodec(clock);
    const other = new JoseTokenCodec({
      keyStore,
      issuer: TEST_ISSUER,
      audience: 'https://elsewhere.test',
      clock,
    });

    await expect(codec.decode(await other.encode(accessTokenInput()))).rejects.toBeInstanceOf(
      MalformedError
    );
  });

  it('reports signed tokens missing required claims as MalformedError', async () => {
    const { codec, keyStore } = await buildTestCodec(clock);
    const key = keyStore.getActiveKey();
    const token = await new SignJWT({ token_use: 'access', scp: [] })
      .setProtectedHeader({ alg: key.alg, kid: key.kid })
      .setSubject('u-1')
      .setJti('jti-1')
      .setIssuedAt(ISSUED_AT_SECONDS)
      .setExpirationTime(ISSUED_AT_SECONDS + 60)
      .setIssuer(TEST_ISSUER)
      .setAudience(TEST_AUDIENCE)
      .sign(key.privateKey);

    await expect(codec.decode(token)).rejects.toBeInstanceOf(MalformedError);
  });

  it('keeps verifying tokens signed by a retired key', async () => {
    const { keyStore: previous, publicKeyPem } = await buildTestKeyStore('old-key');
    const before = new JoseTokenCodec({
      keyStore: previous,
      issuer: TEST_ISSUER,
      audience: TEST_AUDIENCE,
      clock,
    });
    const after = new JoseTokenCodec({
      keyStore: await buildRotatedKeyStore({ kid: 'old-key', publicKeyPem }),
      issuer: TEST_ISSUER,
      audience: TEST_AUDIENCE,
      clock,
    });

    const token = await before.encode(accessTokenInput());

    await expect(after.decode(token)).resolves.toMatchObject({ sub: 'u-1', scp: ['read'] });
  });

  it('refuses to encode a token that expires before it is issued', async () => {
    const { codec } = await buildTestCodec(clock);

    await expect(codec.encode(accessTokenInput({ expiresAt: ISSUED_AT }))).rejects.toThrow(
      RangeError
    );
  });
});
