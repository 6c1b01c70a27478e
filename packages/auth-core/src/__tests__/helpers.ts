import { generateKeyPairSync } from 'node:crypto';
import { HmacSecretHasher } from '@sessionkit/auth';
import { createLogger } from '@sessionkit/observability';
import type { Clock } from '../interfaces.js';
import { JoseTokenCodec, SigningKeyStore, buildSigningKey, buildVerificationKey } from '../signing.js';

export const TEST_ISSUER = 'https://auth.test';
export const TEST_AUDIENCE = 'https://auth.test/v1';

export function generateEd25519Pem() {
  const { privateKey, publicKey } = generateKeyPairSync('ed25519');
  return {
    privateKeyPem: privateKey.export({ type: 'pkcs8', format: 'pem' }).toString(),
    publicKeyPem: publicKey.export({ type: 'spki', format: 'pem' }).toString(),
  };
}

export async function buildTestKeyStore(kid = 'test-key') {
  const { privateKeyPem, publicKeyPem } = generateEd25519Pem();
  const key = await buildSigningKey({ keyId: kid, algorithm: 'EdDSA', privateKeyPem });
  return { keyStore: new SigningKeyStore([key], kid), privateKeyPem, publicKeyPem };
}

export async function buildTestCodec(clock: Clock, options: { clockToleranceSeconds?: number } = {}) {
  const { keyStore, publicKeyPem } = await buildTestKeyStore();
  const codec = new JoseTokenCodec({
    keyStore,
    issuer: TEST_ISSUER,
    audience: TEST_AUDIENCE,
    clock,
    clockToleranceSeconds: options.clockToleranceSeconds ?? 0,
  });
  return { codec, keyStore, publicKeyPem };
}

export async function buildRotatedKeyStore(previous: { kid: string; publicKeyPem: string }) {
  const { privateKeyPem } = generateEd25519Pem();
  const active = await buildSigningKey({ keyId: 'next-key', algorithm: 'EdDSA', privateKeyPem });
  const retired = await buildVerificationKey({
    kid: previous.kid,
    alg: 'EdDSA',
    publicKeyPem: previous.publicKeyPem,
  });
  return new SigningKeyStore([active, retired], 'next-key');
}

export function buildTestHasher() {
  return new HmacSecretHasher({ keys: { v1: 'test-secret' } });
}

export const silentLogger = createLogger({ level: 'silent' });
